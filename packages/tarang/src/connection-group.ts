/**
 * The resource pool behind a client: every socket opened through it is
 * tracked until it closes, and shutting the group down destroys whatever
 * is still open. A group is shut down at most once.
 */

import type { Duplex } from "node:stream";
import { createLogger } from "@setu/core";
import { AlreadyShutDownError } from "./errors.js";

const log = createLogger("tarang:group");

export class ConnectionGroup {
	private readonly sockets = new Set<Duplex>();
	private shutDown = false;

	constructor(readonly name = "default") {}

	get isShutDown(): boolean {
		return this.shutDown;
	}

	/** Number of tracked sockets that have not closed yet. */
	get size(): number {
		return this.sockets.size;
	}

	/**
	 * Start tracking a socket. Also installs an `error` listener so a socket
	 * failing between handshake stages never surfaces as an uncaught error.
	 *
	 * @throws {AlreadyShutDownError} When the group was shut down.
	 */
	track(socket: Duplex): void {
		if (this.shutDown) throw new AlreadyShutDownError();
		if (this.sockets.has(socket)) return;

		this.sockets.add(socket);
		socket.on("error", (err: Error) => {
			log.debug("Tracked socket error", { group: this.name, error: err.message });
		});
		socket.once("close", () => {
			this.sockets.delete(socket);
		});
	}

	/**
	 * Destroy every tracked socket and resolve once all have closed.
	 *
	 * @throws {AlreadyShutDownError} On every call after the first.
	 */
	async shutdown(): Promise<void> {
		// Check-and-set in one synchronous step
		if (this.shutDown) throw new AlreadyShutDownError();
		this.shutDown = true;

		const open = [...this.sockets];
		log.debug("Shutting down connection group", { group: this.name, open: open.length });
		await Promise.all(open.map((socket) => new Promise<void>((resolve) => {
			socket.once("close", () => resolve());
			socket.destroy();
		})));
		this.sockets.clear();
	}
}

/**
 * Server side of the upgrade, for the `upgrade` event of a `node:http`
 * server. Validates the request, answers `101 Switching Protocols` and
 * installs a server-role {@link WebSocket} on the socket.
 *
 * ```ts
 * httpServer.on("upgrade", (req, socket, head) => {
 *   acceptUpgrade(req, socket, head, (ws) => {
 *     ws.onText((peer, text) => void peer.sendText(text));
 *   });
 * });
 * ```
 */

import type http from "node:http";
import type { Duplex } from "node:stream";
import { createLogger } from "@setu/core";
import { WEBSOCKET_VERSION, computeAcceptKey } from "./upgrade.js";
import { WebSocket } from "./websocket.js";
import type { UpgradeHandler, WebSocketOptions } from "./websocket.js";

const log = createLogger("tarang:server");

/**
 * Validate the handshake request headers. Returns the `Sec-WebSocket-Key`
 * if valid, or null if the handshake should be rejected.
 */
export function validateUpgradeRequest(req: http.IncomingMessage): string | null {
	if (req.method !== "GET") return null;

	const upgrade = req.headers["upgrade"];
	if (!upgrade || upgrade.toLowerCase() !== "websocket") return null;

	const connection = req.headers["connection"];
	if (!connection || !connection.toLowerCase().split(",").some((token) => token.trim() === "upgrade")) return null;

	const key = req.headers["sec-websocket-key"];
	if (typeof key !== "string" || key.length === 0) return null;

	const version = req.headers["sec-websocket-version"];
	if (version !== WEBSOCKET_VERSION) return null;

	return key;
}

function rejectUpgrade(socket: Duplex, statusCode: number, message: string): void {
	const response = [
		`HTTP/1.1 ${statusCode} ${message}`,
		"Content-Type: text/plain; charset=utf-8",
		`Content-Length: ${Buffer.byteLength(message)}`,
		"Connection: close",
		"",
		message,
	].join("\r\n");

	socket.end(response);
}

/**
 * Complete or reject a WebSocket upgrade. Returns the installed session,
 * or null when the request was rejected with `400`.
 */
export function acceptUpgrade(
	req: http.IncomingMessage,
	socket: Duplex,
	head: Buffer,
	onUpgrade: UpgradeHandler,
	options: WebSocketOptions = {},
): WebSocket | null {
	const key = validateUpgradeRequest(req);
	if (!key) {
		log.debug("Rejecting invalid upgrade request", { url: req.url });
		rejectUpgrade(socket, 400, "Bad Request");
		return null;
	}

	socket.write([
		"HTTP/1.1 101 Switching Protocols",
		"Upgrade: websocket",
		"Connection: Upgrade",
		`Sec-WebSocket-Accept: ${computeAcceptKey(key)}`,
		"",
		"",
	].join("\r\n"));

	log.debug("Upgraded connection", { url: req.url });
	return WebSocket.server(socket, onUpgrade, { ...options, leftover: head });
}

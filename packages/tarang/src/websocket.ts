/**
 * Tarang: the WebSocket session.
 * Sanskrit: Tarang (तरंग) = wave.
 *
 * Owns one upgraded socket. Inbound bytes are decoded into frames and run
 * through {@link WebSocket.handleIncoming} in arrival order: control frames
 * are answered here, data frames are reassembled by a {@link FrameSequence}
 * and handed to the single registered text or binary handler.
 */

import { randomUUID } from "node:crypto";
import type { Duplex } from "node:stream";
import { createLogger } from "@setu/core";
import type { Logger } from "@setu/core";
import { ProtocolViolationError, TransportError } from "./errors.js";
import { CloseCode, Opcode, decodeCloseCode, encodeCloseCode, makeFrame, makeMaskKey, unmaskedPayload } from "./frame.js";
import type { PeerRole, WebSocketFrame } from "./frame.js";
import { DEFAULT_MAX_FRAME_SIZE, FrameDecoder, encodeFrame } from "./frame-codec.js";
import { FrameSequence } from "./frame-sequence.js";
import type { CompletedMessage } from "./frame-sequence.js";

const sessionLog = createLogger("tarang:session");

/** @internal Reports a session that was garbage-collected before it closed. */
export function reportUnclosedSession(id: string): void {
	sessionLog.fatal("WebSocket was collected while still open; close() was never called", undefined, { connectionId: id });
}

const unclosedSessions = new FinalizationRegistry<string>(reportUnclosedSession);

// ─── Public Types ───────────────────────────────────────────────────────────

/** Receives each complete text message. */
export type TextHandler = (socket: WebSocket, text: string) => void;

/** Receives each complete binary message. */
export type BinaryHandler = (socket: WebSocket, data: Buffer) => void;

/** Called once the session is installed, before any frame is dispatched. */
export type UpgradeHandler = (socket: WebSocket) => void;

export interface WebSocketOptions {
	/** Largest accepted frame payload in bytes. Default: 16384. */
	maxFrameSize?: number;
}

export interface AttachOptions extends WebSocketOptions {
	/** Bytes that arrived together with the upgrade response. */
	leftover?: Buffer;
}

// ─── Session ────────────────────────────────────────────────────────────────

export class WebSocket {
	/** Identifier used to correlate log entries of this connection. */
	readonly id: string;
	readonly role: PeerRole;
	/** Resolves once the underlying socket has fully closed. */
	readonly onClose: Promise<void>;

	private readonly socket: Duplex;
	private readonly decoder: FrameDecoder;
	private readonly log: Logger;
	private sequence: FrameSequence | null = null;
	private closed = false;
	private textHandler: TextHandler = () => {};
	private binaryHandler: BinaryHandler = () => {};

	constructor(socket: Duplex, role: PeerRole, options: WebSocketOptions = {}) {
		this.id = randomUUID();
		this.role = role;
		this.socket = socket;
		this.decoder = new FrameDecoder(options.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE);
		this.log = sessionLog.withContext({ connectionId: this.id, role });
		unclosedSessions.register(this, this.id, this);

		this.onClose = new Promise<void>((resolve) => {
			if (socket.destroyed) {
				this.markClosed();
				resolve();
				return;
			}
			socket.once("close", () => {
				this.markClosed();
				this.sequence = null;
				this.log.debug("Connection closed");
				resolve();
			});
		});

		socket.on("data", (chunk: Buffer) => this.receive(chunk));
		socket.on("error", (err: Error) => {
			this.log.debug("Socket error", { error: err.message });
		});
	}

	/**
	 * Install a client-role session on an upgraded socket and hand it to
	 * `onUpgrade`.
	 */
	static client(socket: Duplex, onUpgrade: UpgradeHandler, options: AttachOptions = {}): WebSocket {
		return WebSocket.attach(socket, "client", onUpgrade, options);
	}

	/**
	 * Install a server-role session on an upgraded socket and hand it to
	 * `onUpgrade`.
	 */
	static server(socket: Duplex, onUpgrade: UpgradeHandler, options: AttachOptions = {}): WebSocket {
		return WebSocket.attach(socket, "server", onUpgrade, options);
	}

	private static attach(socket: Duplex, role: PeerRole, onUpgrade: UpgradeHandler, options: AttachOptions): WebSocket {
		const ws = new WebSocket(socket, role, options);
		try {
			onUpgrade(ws);
		} catch (err) {
			ws.log.error("Upgrade handler threw", err);
		}
		// Leftover frames are dispatched after onUpgrade has registered handlers
		if (options.leftover && options.leftover.length > 0) {
			ws.receive(options.leftover);
		}
		return ws;
	}

	/** Whether a close frame has been sent or the socket has gone away. */
	get isClosed(): boolean {
		return this.closed;
	}

	// ─── Handlers ────────────────────────────────────────────────────────

	/** Replace the text message handler. Only the latest handler is kept. */
	onText(handler: TextHandler): void {
		this.textHandler = handler;
	}

	/** Replace the binary message handler. Only the latest handler is kept. */
	onBinary(handler: BinaryHandler): void {
		this.binaryHandler = handler;
	}

	// ─── Outbound ────────────────────────────────────────────────────────

	sendText(text: string): Promise<void> {
		return this.send(Buffer.from(text, "utf-8"), Opcode.Text, true);
	}

	sendBinary(data: Uint8Array): Promise<void> {
		return this.send(data, Opcode.Binary, true);
	}

	/**
	 * Write one frame. Settles when the transport has accepted the bytes.
	 * Client-role frames are masked with a fresh key.
	 */
	send(data: Uint8Array, opcode: number, fin = true): Promise<void> {
		const payload = Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
		const frame = makeFrame(opcode, payload, { fin, maskKey: makeMaskKey(this.role) });
		return this.write(frame);
	}

	/**
	 * Start the close handshake. A second call resolves without writing
	 * another close frame.
	 *
	 * @throws {RangeError} (as a rejection) When `code` is not a 16-bit integer.
	 */
	close(code: number = CloseCode.GoingAway): Promise<void> {
		if (!Number.isInteger(code) || code < 0 || code > 0xffff) {
			return Promise.reject(new RangeError(`Close code ${code} does not fit in 16 bits`));
		}
		if (this.closed) return Promise.resolve();
		this.markClosed();
		this.log.debug("Sending close frame", { code });
		return this.send(encodeCloseCode(code), Opcode.Close, true);
	}

	// ─── Inbound ─────────────────────────────────────────────────────────

	/**
	 * Apply one inbound frame to the session state.
	 *
	 * @internal Exposed for the connection handshake and tests.
	 */
	handleIncoming(frame: WebSocketFrame): void {
		switch (frame.opcode) {
			case Opcode.Close:
				this.handleClose(frame);
				return;

			case Opcode.Ping:
				if (frame.fin) {
					this.send(unmaskedPayload(frame), Opcode.Pong, true).catch((err: unknown) => {
						this.log.warn("Pong write failed", { error: String(err) });
					});
				} else {
					this.failConnection(new ProtocolViolationError("Fragmented ping frame"));
				}
				return;

			case Opcode.Text:
			case Opcode.Binary:
				if (this.sequence) {
					this.failConnection(new ProtocolViolationError("Data frame received while a fragmented message is in progress"));
					return;
				}
				this.sequence = new FrameSequence(frame.opcode === Opcode.Text ? "text" : "binary");
				this.appendAndMaybeDeliver(this.sequence, frame);
				return;

			case Opcode.Continuation:
				if (!this.sequence) {
					this.failConnection(new ProtocolViolationError("Continuation frame without a message in progress"));
					return;
				}
				this.appendAndMaybeDeliver(this.sequence, frame);
				return;

			default:
				// Pong and reserved opcodes
				return;
		}
	}

	/** @internal Feed raw bytes from the socket. */
	receive(chunk: Buffer): void {
		try {
			this.decoder.push(chunk, (frame) => {
				if (!this.socket.destroyed) this.handleIncoming(frame);
			});
		} catch (err) {
			if (!(err instanceof ProtocolViolationError)) throw err;
			this.log.warn("Undecodable frame, closing connection", { error: err.message, code: err.closeCode });
			this.sequence = null;
			void this.close(err.closeCode).then(
				() => this.socket.destroy(),
				() => this.socket.destroy(),
			);
		}
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private markClosed(): void {
		if (this.closed) return;
		this.closed = true;
		unclosedSessions.unregister(this);
	}

	private handleClose(frame: WebSocketFrame): void {
		if (this.closed) {
			// Peer confirmed our close
			this.log.debug("Close confirmed by peer");
			this.socket.destroy();
			return;
		}

		const code = decodeCloseCode(unmaskedPayload(frame)) ?? CloseCode.GoingAway;
		this.log.debug("Peer initiated close", { code });
		void this.close(code).then(
			() => this.socket.destroy(),
			(err: unknown) => {
				this.log.debug("Close echo failed", { error: String(err) });
				this.socket.destroy();
			},
		);
	}

	private appendAndMaybeDeliver(sequence: FrameSequence, frame: WebSocketFrame): void {
		let message: CompletedMessage;
		try {
			sequence.append(frame);
			if (!frame.fin) return;
			this.sequence = null;
			message = sequence.finish();
		} catch (err) {
			if (!(err instanceof ProtocolViolationError)) throw err;
			this.failConnection(err);
			return;
		}
		this.deliver(message, sequence.fragments);
	}

	private deliver(message: CompletedMessage, fragments: number): void {
		try {
			if (message.kind === "text") {
				this.log.debug("Text message", { length: message.text.length, fragments });
				this.textHandler(this, message.text);
			} else {
				this.log.debug("Binary message", { length: message.data.length, fragments });
				this.binaryHandler(this, message.data);
			}
		} catch (err) {
			this.log.error(`${message.kind === "text" ? "Text" : "Binary"} handler threw`, err);
		}
	}

	private failConnection(err: ProtocolViolationError): void {
		this.log.warn("Protocol violation", { error: err.message, code: err.closeCode });
		this.sequence = null;
		this.close(err.closeCode).catch((writeErr: unknown) => {
			this.log.debug("Close write failed", { error: String(writeErr) });
		});
	}

	private write(frame: WebSocketFrame): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			if (this.socket.destroyed || !this.socket.writable) {
				reject(new TransportError("Socket is not writable"));
				return;
			}
			this.socket.write(encodeFrame(frame), (err?: Error | null) => {
				if (err) {
					reject(new TransportError("Frame write failed", err));
				} else {
					resolve();
				}
			});
		});
	}
}

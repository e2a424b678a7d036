/**
 * Client side of the HTTP/1.1 → WebSocket upgrade (RFC 6455 §4.1).
 *
 * {@link HttpClientUpgradeCodec} sits between the socket and the single
 * request handler installed on it. It injects the `Upgrade`, `Connection`
 * and `Sec-WebSocket-*` headers into the outgoing request, parses the
 * response head and either switches protocols or passes the head up to the
 * handler as a refusal.
 */

import { createHash, randomBytes } from "node:crypto";
import type { Duplex } from "node:stream";
import { createLogger } from "@setu/core";
import { TransportError, UpgradeRefusedError } from "./errors.js";
import { HttpParseError, ResponseHeadParser, serializeRequestHead } from "./http-codec.js";
import type { HttpHeaderList, HttpRequestHead, HttpResponseHead } from "./http-codec.js";

const log = createLogger("tarang:upgrade");

// ─── Constants ──────────────────────────────────────────────────────────────

/** The GUID appended to the request key before hashing (RFC 6455 §1.3). */
export const WS_MAGIC_GUID = "258EAFA5-E914-47DA-95CA-5AB9F3907FEE";

export const WEBSOCKET_VERSION = "13";

const UPGRADE_HEADER_NAMES = new Set(["upgrade", "connection", "sec-websocket-key", "sec-websocket-version"]);

// ─── Keys ───────────────────────────────────────────────────────────────────

/** A random 16-byte nonce, base64-encoded, for `Sec-WebSocket-Key`. */
export function generateRequestKey(): string {
	return randomBytes(16).toString("base64");
}

/** The `Sec-WebSocket-Accept` value a server must answer `key` with. */
export function computeAcceptKey(key: string): string {
	return createHash("sha1")
		.update(key + WS_MAGIC_GUID)
		.digest("base64");
}

/**
 * Check a `101` response against the request key. Returns the reason the
 * switch is refused, or null when it is valid.
 */
export function verifyUpgradeResponse(head: HttpResponseHead, requestKey: string): string | null {
	if (head.status !== 101) return "invalid response status";

	const upgrade = head.headers["upgrade"];
	if (!upgrade || upgrade.toLowerCase() !== "websocket") {
		return "missing Upgrade: websocket header";
	}
	const connection = head.headers["connection"];
	if (!connection || !connection.toLowerCase().split(",").some((token) => token.trim() === "upgrade")) {
		return "missing Connection: Upgrade header";
	}
	if (head.headers["sec-websocket-accept"] !== computeAcceptKey(requestKey)) {
		return "invalid Sec-WebSocket-Accept";
	}
	return null;
}

// ─── Pipeline ───────────────────────────────────────────────────────────────

/**
 * The handler installed above the upgrade codec. It never sees frames:
 * it is removed before the codec hands the socket to the session.
 */
export interface UpgradeRequestSink {
	/** The connection is ready; send the request. */
	channelActive(codec: HttpClientUpgradeCodec): void;
	/** A response head arrived that did not switch protocols. */
	responseHead(codec: HttpClientUpgradeCodec, head: HttpResponseHead): void;
	errorCaught(codec: HttpClientUpgradeCodec, error: unknown): void;
}

export interface ClientUpgradeConfig {
	requestKey: string;
	/** Installs the session on the upgraded socket. */
	upgradePipelineHandler: (socket: Duplex, leftover: Buffer) => void;
	/** Runs after the pipeline handler; removes the request handler. */
	completionHandler: () => void;
}

export class HttpClientUpgradeCodec {
	private handler: UpgradeRequestSink | null = null;
	private readonly parser = new ResponseHeadParser();
	private attached = false;
	private upgraded = false;

	constructor(
		private readonly socket: Duplex,
		private readonly config: ClientUpgradeConfig,
	) {}

	/** Whether the protocol switch has happened. */
	get isUpgraded(): boolean {
		return this.upgraded;
	}

	/**
	 * Install the request handler and activate it. The socket must already
	 * be connected (and secured, for `wss`).
	 */
	addHandler(handler: UpgradeRequestSink): void {
		this.handler = handler;
		if (!this.attached) {
			this.attached = true;
			this.socket.on("data", this.onData);
			this.socket.on("error", this.onError);
			this.socket.on("close", this.onClose);
		}
		handler.channelActive(this);
	}

	removeHandler(handler: UpgradeRequestSink): void {
		if (this.handler === handler) {
			this.handler = null;
		}
	}

	/** Write the request head with the upgrade headers added. */
	writeRequest(head: HttpRequestHead): void {
		const headers: HttpHeaderList = head.headers.filter(([name]) => !UPGRADE_HEADER_NAMES.has(name.toLowerCase()));
		headers.push(
			["Upgrade", "websocket"],
			["Connection", "Upgrade"],
			["Sec-WebSocket-Key", this.config.requestKey],
			["Sec-WebSocket-Version", WEBSOCKET_VERSION],
		);
		log.debug("Sending upgrade request", { uri: head.uri });
		this.socket.write(serializeRequestHead({ ...head, headers }));
	}

	/** Stop listening and destroy the socket. */
	close(): void {
		this.detach();
		this.socket.destroy();
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private readonly onData = (chunk: Buffer): void => {
		let parsed: ReturnType<ResponseHeadParser["push"]>;
		try {
			parsed = this.parser.push(chunk);
		} catch (err) {
			if (!(err instanceof HttpParseError)) throw err;
			this.handler?.errorCaught(this, new TransportError("Malformed upgrade response", err));
			return;
		}
		if (!parsed) return;

		const { head, rest } = parsed;
		if (head.status !== 101) {
			this.handler?.responseHead(this, head);
			return;
		}

		const refusal = verifyUpgradeResponse(head, this.config.requestKey);
		if (refusal) {
			this.handler?.errorCaught(this, new UpgradeRefusedError(head, refusal));
			return;
		}

		log.debug("Switching protocols");
		this.detach();
		this.upgraded = true;
		this.config.upgradePipelineHandler(this.socket, rest);
		this.config.completionHandler();
	};

	private readonly onError = (err: Error): void => {
		this.handler?.errorCaught(this, new TransportError(`Connection error during upgrade: ${err.message}`, err));
	};

	private readonly onClose = (): void => {
		this.handler?.errorCaught(this, new TransportError("Connection closed before the upgrade completed"));
	};

	private detach(): void {
		if (!this.attached) return;
		this.attached = false;
		this.socket.off("data", this.onData);
		this.socket.off("error", this.onError);
		this.socket.off("close", this.onClose);
	}
}

import { SetuError } from "@setu/core";
import { CloseCode } from "./frame.js";
import type { HttpResponseHead } from "./http-codec.js";

/**
 * A URL or endpoint could not be resolved into scheme, host, port and path.
 */
export class InvalidUrlError extends SetuError {
	readonly url: string;

	constructor(url: string, reason: string) {
		super(`Invalid WebSocket URL "${url}": ${reason}`, "INVALID_URL");
		this.name = "InvalidUrlError";
		this.url = url;
	}
}

/**
 * The server answered the upgrade request without switching protocols,
 * or switched without a valid WebSocket handshake.
 */
export class UpgradeRefusedError extends SetuError {
	readonly responseHead: HttpResponseHead;

	constructor(responseHead: HttpResponseHead, reason = "invalid response status") {
		super(`WebSocket upgrade refused: ${reason} (${responseHead.status} ${responseHead.reason})`, "UPGRADE_REFUSED");
		this.name = "UpgradeRefusedError";
		this.responseHead = responseHead;
	}

	get status(): number {
		return this.responseHead.status;
	}
}

/**
 * The client's connection group was already shut down.
 */
export class AlreadyShutDownError extends SetuError {
	constructor() {
		super("WebSocket client is already shut down", "ALREADY_SHUT_DOWN");
		this.name = "AlreadyShutDownError";
	}
}

/**
 * The peer broke framing rules. `closeCode` is the code the session closes with.
 */
export class ProtocolViolationError extends SetuError {
	readonly closeCode: number;

	constructor(message: string, closeCode: number = CloseCode.ProtocolError) {
		super(message, "PROTOCOL_VIOLATION");
		this.name = "ProtocolViolationError";
		this.closeCode = closeCode;
	}
}

/**
 * Socket, TLS or write failure. The underlying error is kept as `cause`.
 */
export class TransportError extends SetuError {
	constructor(message: string, cause?: unknown) {
		super(message, "TRANSPORT_FAILURE", cause);
		this.name = "TransportError";
	}
}

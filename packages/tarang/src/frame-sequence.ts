/**
 * Reassembly of one fragmented message.
 *
 * A sequence is opened by a text or binary frame and fed every following
 * continuation frame until one carries FIN. Text is decoded as it arrives
 * with a streaming UTF-8 decoder, so a character split across two fragments
 * is decoded once both halves are in. A leading U+FEFF is part of the text.
 */

import { TextDecoder } from "node:util";
import { ProtocolViolationError } from "./errors.js";
import { CloseCode, unmaskedPayload } from "./frame.js";
import type { WebSocketFrame } from "./frame.js";

export type MessageKind = "text" | "binary";

export type CompletedMessage =
	| { kind: "text"; text: string }
	| { kind: "binary"; data: Buffer };

export class FrameSequence {
	readonly kind: MessageKind;
	private readonly chunks: Buffer[] = [];
	private byteLength = 0;
	private text = "";
	private readonly decoder?: TextDecoder;
	private frameCount = 0;

	constructor(kind: MessageKind) {
		this.kind = kind;
		if (kind === "text") {
			this.decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
		}
	}

	/**
	 * Unmask and append one frame's payload.
	 *
	 * @throws {ProtocolViolationError} When a text payload is not valid UTF-8.
	 */
	append(frame: WebSocketFrame): void {
		const payload = unmaskedPayload(frame);
		this.frameCount++;
		this.byteLength += payload.length;

		if (!this.decoder) {
			this.chunks.push(payload);
			return;
		}
		try {
			this.text += this.decoder.decode(payload, { stream: true });
		} catch {
			throw new ProtocolViolationError("Text message is not valid UTF-8", CloseCode.InvalidFramePayloadData);
		}
	}

	/**
	 * Close the sequence and return the assembled message.
	 *
	 * @throws {ProtocolViolationError} When a text message ends mid-character.
	 */
	finish(): CompletedMessage {
		if (!this.decoder) {
			return { kind: "binary", data: Buffer.concat(this.chunks, this.byteLength) };
		}
		try {
			this.text += this.decoder.decode();
		} catch {
			throw new ProtocolViolationError("Text message ends inside a UTF-8 sequence", CloseCode.InvalidFramePayloadData);
		}
		return { kind: "text", text: this.text };
	}

	/** Number of frames appended so far. */
	get fragments(): number {
		return this.frameCount;
	}

	/** Number of payload bytes appended so far. */
	get size(): number {
		return this.byteLength;
	}
}

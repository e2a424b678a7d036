/**
 * Frame codec: RFC 6455 §5.2 wire format.
 *
 * `encodeFrame` serializes a {@link WebSocketFrame} as-is (the payload is
 * already masked when the frame carries a key). `FrameDecoder` consumes a
 * byte stream chunk by chunk and yields complete frames, leaving masked
 * payloads masked.
 */

import { ProtocolViolationError } from "./errors.js";
import { CloseCode, MAX_CONTROL_PAYLOAD, isControlOpcode } from "./frame.js";
import type { WebSocketFrame } from "./frame.js";

/** Default largest payload accepted in a single frame (16 KiB). */
export const DEFAULT_MAX_FRAME_SIZE = 1 << 14;

// ─── Encoding ───────────────────────────────────────────────────────────────

export function encodeFrame(frame: WebSocketFrame): Buffer {
	const len = frame.data.length;
	const maskLen = frame.maskKey ? 4 : 0;
	let headerLen: number;

	if (len < 126) {
		headerLen = 2;
	} else if (len < 65536) {
		headerLen = 4;
	} else {
		headerLen = 10;
	}

	const out = Buffer.alloc(headerLen + maskLen + len);

	out[0] =
		(frame.fin ? 0x80 : 0) |
		(frame.rsv1 ? 0x40 : 0) |
		(frame.rsv2 ? 0x20 : 0) |
		(frame.rsv3 ? 0x10 : 0) |
		(frame.opcode & 0x0f);

	const maskBit = frame.maskKey ? 0x80 : 0;
	if (headerLen === 2) {
		out[1] = maskBit | len;
	} else if (headerLen === 4) {
		out[1] = maskBit | 126;
		out.writeUInt16BE(len, 2);
	} else {
		out[1] = maskBit | 127;
		// Buffers never reach 2^32 bytes here; the high word stays zero
		out.writeUInt32BE(0, 2);
		out.writeUInt32BE(len, 6);
	}

	if (frame.maskKey) {
		frame.maskKey.copy(out, headerLen, 0, 4);
	}
	frame.data.copy(out, headerLen + maskLen);
	return out;
}

// ─── Decoding ───────────────────────────────────────────────────────────────

interface ParsedFrame {
	frame: WebSocketFrame;
	bytesConsumed: number;
}

/**
 * Try to parse one frame at `offset`. Returns null when the buffer does not
 * yet hold a complete frame.
 *
 * @throws {ProtocolViolationError} On reserved bits, oversized control
 *   frames, or a payload larger than `maxFrameSize`.
 */
export function parseFrame(buffer: Buffer, offset: number, maxFrameSize: number): ParsedFrame | null {
	const available = buffer.length - offset;
	if (available < 2) return null;

	const byte0 = buffer[offset];
	const byte1 = buffer[offset + 1];

	const fin = (byte0 & 0x80) !== 0;
	const rsv1 = (byte0 & 0x40) !== 0;
	const rsv2 = (byte0 & 0x20) !== 0;
	const rsv3 = (byte0 & 0x10) !== 0;
	const opcode = byte0 & 0x0f;
	const masked = (byte1 & 0x80) !== 0;
	let payloadLen = byte1 & 0x7f;
	let headerLen = 2;

	// No extensions are negotiated, so reserved bits must be clear
	if (rsv1 || rsv2 || rsv3) {
		throw new ProtocolViolationError("Reserved bits set without a negotiated extension");
	}
	if (isControlOpcode(opcode) && payloadLen > MAX_CONTROL_PAYLOAD) {
		throw new ProtocolViolationError(`Control frame payload exceeds ${MAX_CONTROL_PAYLOAD} bytes`);
	}

	if (payloadLen === 126) {
		if (available < 4) return null;
		payloadLen = buffer.readUInt16BE(offset + 2);
		headerLen = 4;
	} else if (payloadLen === 127) {
		if (available < 10) return null;
		const high = buffer.readUInt32BE(offset + 2);
		if (high !== 0) {
			throw new ProtocolViolationError("Frame payload exceeds the maximum frame size", CloseCode.MessageTooBig);
		}
		payloadLen = buffer.readUInt32BE(offset + 6);
		headerLen = 10;
	}

	if (payloadLen > maxFrameSize) {
		throw new ProtocolViolationError(
			`Frame payload of ${payloadLen} bytes exceeds the maximum frame size of ${maxFrameSize}`,
			CloseCode.MessageTooBig,
		);
	}

	const maskLen = masked ? 4 : 0;
	const totalLen = headerLen + maskLen + payloadLen;
	if (available < totalLen) return null;

	const dataStart = offset + headerLen + maskLen;
	const frame: WebSocketFrame = {
		fin,
		rsv1,
		rsv2,
		rsv3,
		opcode,
		maskKey: masked ? Buffer.from(buffer.subarray(offset + headerLen, dataStart)) : undefined,
		data: Buffer.from(buffer.subarray(dataStart, dataStart + payloadLen)),
	};

	return { frame, bytesConsumed: totalLen };
}

/**
 * Streaming decoder: buffers partial input across `push` calls.
 */
export class FrameDecoder {
	private buffer: Buffer = Buffer.alloc(0);

	constructor(readonly maxFrameSize: number = DEFAULT_MAX_FRAME_SIZE) {}

	/**
	 * Append a chunk and hand every frame it completes to `onFrame`, in order.
	 *
	 * @throws {ProtocolViolationError} After delivering the frames that
	 *   preceded the violation. The stream is unusable after a throw.
	 */
	push(chunk: Buffer, onFrame: (frame: WebSocketFrame) => void): void {
		this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

		let offset = 0;
		try {
			while (offset < this.buffer.length) {
				const parsed = parseFrame(this.buffer, offset, this.maxFrameSize);
				if (!parsed) break;
				offset += parsed.bytesConsumed;
				onFrame(parsed.frame);
			}
		} finally {
			// Keep unprocessed bytes
			if (offset > 0) {
				this.buffer = Buffer.from(this.buffer.subarray(offset));
			}
		}
	}

	/** Bytes received but not yet part of a complete frame. */
	get pendingBytes(): number {
		return this.buffer.length;
	}
}

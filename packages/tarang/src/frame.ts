/**
 * WebSocket frame model, opcodes, close codes and the per-role masking policy.
 */

import { randomBytes } from "node:crypto";

// ─── Constants ──────────────────────────────────────────────────────────────

/** WebSocket frame opcodes (RFC 6455 §5.2). */
export enum Opcode {
	Continuation = 0x0,
	Text = 0x1,
	Binary = 0x2,
	Close = 0x8,
	Ping = 0x9,
	Pong = 0xa,
}

/** Close status codes (RFC 6455 §7.4.1). */
export enum CloseCode {
	NormalClosure = 1000,
	GoingAway = 1001,
	ProtocolError = 1002,
	UnacceptableData = 1003,
	InvalidFramePayloadData = 1007,
	PolicyViolation = 1008,
	MessageTooBig = 1009,
	MissingExtension = 1010,
	UnexpectedCondition = 1011,
}

/** Control frames may not carry more than this many payload bytes. */
export const MAX_CONTROL_PAYLOAD = 125;

/** Which end of the connection a session plays. Decides masking. */
export type PeerRole = "client" | "server";

// ─── Frame ──────────────────────────────────────────────────────────────────

/**
 * One wire-level frame. `data` is the payload exactly as it travels on the
 * wire, i.e. XOR-ed with `maskKey` when a key is present.
 */
export interface WebSocketFrame {
	fin: boolean;
	rsv1: boolean;
	rsv2: boolean;
	rsv3: boolean;
	/** Raw 4-bit opcode; values outside {@link Opcode} are reserved. */
	opcode: number;
	maskKey?: Buffer;
	data: Buffer;
}

export function isControlOpcode(opcode: number): boolean {
	return (opcode & 0x8) !== 0;
}

/**
 * XOR `payload` with a 4-byte key. Masking and unmasking are the same
 * operation; the input is never modified.
 */
export function applyMask(payload: Buffer, maskKey: Buffer): Buffer {
	const out = Buffer.allocUnsafe(payload.length);
	for (let i = 0; i < payload.length; i++) {
		out[i] = payload[i] ^ maskKey[i & 3];
	}
	return out;
}

/**
 * Build a frame from a clear payload, masking it when a key is given.
 */
export function makeFrame(
	opcode: number,
	payload: Buffer,
	opts: { fin?: boolean; maskKey?: Buffer } = {},
): WebSocketFrame {
	const { fin = true, maskKey } = opts;
	return {
		fin,
		rsv1: false,
		rsv2: false,
		rsv3: false,
		opcode,
		maskKey,
		data: maskKey ? applyMask(payload, maskKey) : payload,
	};
}

/** The clear payload of a frame. */
export function unmaskedPayload(frame: WebSocketFrame): Buffer {
	return frame.maskKey ? applyMask(frame.data, frame.maskKey) : frame.data;
}

/**
 * Masking policy: a client masks every frame with a fresh random key,
 * a server never masks.
 */
export function makeMaskKey(role: PeerRole): Buffer | undefined {
	switch (role) {
		case "client":
			return randomBytes(4);
		case "server":
			return undefined;
	}
}

// ─── Close payload ──────────────────────────────────────────────────────────

/** Encode a close code as the 2-byte big-endian close payload. */
export function encodeCloseCode(code: number): Buffer {
	const buf = Buffer.alloc(2);
	buf.writeUInt16BE(code, 0);
	return buf;
}

/**
 * Read the close code from a clear close payload. Returns undefined when the
 * payload is shorter than two bytes.
 */
export function decodeCloseCode(payload: Buffer): number | undefined {
	if (payload.length < 2) return undefined;
	return payload.readUInt16BE(0);
}

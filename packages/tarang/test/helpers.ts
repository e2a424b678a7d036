import { Duplex } from "node:stream";
import { encodeFrame, FrameDecoder } from "../src/frame-codec.js";
import { makeFrame } from "../src/frame.js";
import type { WebSocketFrame } from "../src/frame.js";

// ── In-memory peer ───────────────────────────────────────────────────────────

/**
 * One end of an in-memory connection. `socket` is handed to the code under
 * test; every frame it writes is decoded into `frames`, and `inject` feeds
 * frames back to it.
 */
export interface FramePeer {
	socket: Duplex;
	frames: WebSocketFrame[];
	inject(frame: WebSocketFrame): void;
	injectBytes(bytes: Buffer): void;
}

export function createFramePeer(): FramePeer {
	const decoder = new FrameDecoder(1 << 20);
	const frames: WebSocketFrame[] = [];

	const socket = new Duplex({
		read() {},
		write(chunk: Buffer, _encoding, callback) {
			decoder.push(chunk, (frame) => frames.push(frame));
			callback();
		},
	});

	return {
		socket,
		frames,
		inject: (frame) => {
			socket.push(encodeFrame(frame));
		},
		injectBytes: (bytes) => {
			socket.push(bytes);
		},
	};
}

/** A frame as a client would send it: masked with a fixed key. */
export function clientFrame(opcode: number, payload: Buffer | string, fin = true): WebSocketFrame {
	const data = typeof payload === "string" ? Buffer.from(payload, "utf-8") : payload;
	return makeFrame(opcode, data, { fin, maskKey: Buffer.from([0x12, 0x34, 0x56, 0x78]) });
}

/** A frame as a server would send it: unmasked. */
export function serverFrame(opcode: number, payload: Buffer | string, fin = true): WebSocketFrame {
	const data = typeof payload === "string" ? Buffer.from(payload, "utf-8") : payload;
	return makeFrame(opcode, data, { fin });
}

/** Let pending I/O callbacks run. */
export function flushIO(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

import { describe, it, expect, afterEach, vi } from "vitest";
import http from "node:http";
import net from "node:net";
import type { Duplex } from "node:stream";
import { ConfigError } from "@setu/core";
import { WebSocketClient, connect } from "../src/client.js";
import { ConnectionGroup } from "../src/connection-group.js";
import { AlreadyShutDownError, InvalidUrlError, TransportError, UpgradeRefusedError } from "../src/errors.js";
import { Opcode, makeFrame } from "../src/frame.js";
import { encodeFrame } from "../src/frame-codec.js";
import { acceptUpgrade } from "../src/server.js";
import { tcpConnector } from "../src/transport.js";
import type { TlsWrapper, TransportConnector } from "../src/transport.js";
import { computeAcceptKey } from "../src/upgrade.js";
import type { WebSocket } from "../src/websocket.js";

// ── Helpers ──────────────────────────────────────────────────────────────────

type UpgradeListener = (req: http.IncomingMessage, socket: Duplex, head: Buffer) => void;

interface TestServer {
	port: number;
	requests: http.IncomingMessage[];
	sockets: Duplex[];
}

const servers: http.Server[] = [];
const openSockets: Duplex[] = [];

/** Start a loopback HTTP server that hands every upgrade request to `onUpgrade`. */
async function startServer(onUpgrade: UpgradeListener): Promise<TestServer> {
	const server = http.createServer((_req, res) => {
		res.writeHead(426);
		res.end();
	});
	const state: TestServer = { port: 0, requests: [], sockets: [] };

	server.on("upgrade", (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
		state.requests.push(req);
		state.sockets.push(socket);
		openSockets.push(socket);
		onUpgrade(req, socket, head);
	});
	servers.push(server);

	state.port = await new Promise<number>((resolve) => {
		server.listen(0, "127.0.0.1", () => {
			const addr = server.address();
			resolve(typeof addr === "object" && addr !== null ? addr.port : 0);
		});
	});
	return state;
}

/** Echoes every text message back to the sender. */
const echoUpgrade: UpgradeListener = (req, socket, head) => {
	acceptUpgrade(req, socket, head, (ws) => {
		ws.onText((peer, text) => {
			peer.sendText(text).catch(() => undefined);
		});
	});
};

function rawResponse(lines: string[]): string {
	return [...lines, "", ""].join("\r\n");
}

function waitForClose(socket: Duplex): Promise<void> {
	if (socket.destroyed) return Promise.resolve();
	return new Promise((resolve) => socket.once("close", () => resolve()));
}

/** Resolves with the first text message a session receives. */
function firstText(): { promise: Promise<string>; handler: (ws: WebSocket, text: string) => void } {
	let resolveText: (text: string) => void = () => {};
	const promise = new Promise<string>((resolve) => {
		resolveText = resolve;
	});
	return { promise, handler: (_ws, text) => resolveText(text) };
}

async function unusedPort(): Promise<number> {
	const probe = net.createServer();
	const port = await new Promise<number>((resolve) => {
		probe.listen(0, "127.0.0.1", () => {
			const addr = probe.address();
			resolve(typeof addr === "object" && addr !== null ? addr.port : 0);
		});
	});
	await new Promise<void>((resolve) => probe.close(() => resolve()));
	return port;
}

afterEach(async () => {
	for (const socket of openSockets.splice(0)) socket.destroy();
	await Promise.all(servers.splice(0).map((server) => new Promise<void>((resolve) => {
		server.close(() => resolve());
	})));
});

// ── Tests ────────────────────────────────────────────────────────────────────

describe("WebSocket client", () => {
	// ═══════════════════════════════════════════════════════════════════════
	// Successful handshakes
	// ═══════════════════════════════════════════════════════════════════════

	describe("ws:// handshake", () => {
		it("should upgrade /chat and receive the echo of a text message", async () => {
			const server = await startServer(echoUpgrade);
			const sessions: WebSocket[] = [];
			const echo = firstText();

			await connect(`ws://127.0.0.1:${server.port}/chat`, (ws) => {
				sessions.push(ws);
				ws.onText(echo.handler);
			});

			const ws = sessions[0];
			if (!ws) throw new Error("onUpgrade was not called");
			expect(ws.role).toBe("client");

			await ws.sendText("hi");
			expect(await echo.promise).toBe("hi");

			const req = server.requests[0];
			expect(req?.method).toBe("GET");
			expect(req?.url).toBe("/chat");
			expect(req?.headers.host).toBe(`127.0.0.1:${server.port}`);
			expect(req?.headers["content-length"]).toBe("0");
			expect(req?.headers["sec-websocket-version"]).toBe("13");

			await ws.close();
			await ws.onClose;
		});

		it("should send caller headers with the upgrade request", async () => {
			const server = await startServer(echoUpgrade);
			const sessions: WebSocket[] = [];

			await connect(
				{ host: "127.0.0.1", port: server.port, path: "stream?since=5" },
				(ws) => sessions.push(ws),
				{ headers: { "X-Trace": "abc" } },
			);

			expect(server.requests[0]?.url).toBe("/stream?since=5");
			expect(server.requests[0]?.headers["x-trace"]).toBe("abc");
			await sessions[0]?.close();
		});

		it("should deliver a frame that arrived together with the 101 response", async () => {
			const server = await startServer((req, socket) => {
				const key = String(req.headers["sec-websocket-key"]);
				socket.write(Buffer.concat([
					Buffer.from(rawResponse([
						"HTTP/1.1 101 Switching Protocols",
						"Upgrade: websocket",
						"Connection: Upgrade",
						`Sec-WebSocket-Accept: ${computeAcceptKey(key)}`,
					]), "latin1"),
					encodeFrame(makeFrame(Opcode.Text, Buffer.from("welcome"))),
				]));
			});
			const greeting = firstText();

			await connect(`ws://127.0.0.1:${server.port}/`, (ws) => ws.onText(greeting.handler));

			expect(await greeting.promise).toBe("welcome");
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// wss:// pipeline
	// ═══════════════════════════════════════════════════════════════════════

	describe("wss:// handshake", () => {
		it("should secure the socket before the GET and fail on 404", async () => {
			const order: string[] = [];
			const server = await startServer((_req, socket) => {
				order.push("request");
				socket.write(rawResponse(["HTTP/1.1 404 Not Found", "Content-Length: 0"]));
			});
			const transport: TransportConnector = {
				async connect(host, port, options) {
					order.push("connect");
					return tcpConnector.connect(host, port, options);
				},
			};
			const tls: TlsWrapper = {
				async wrapClient(socket, serverName) {
					order.push(`tls:${serverName}`);
					return socket;
				},
			};
			const onUpgrade = vi.fn();

			const err = await connect({ scheme: "wss", host: "127.0.0.1", port: server.port }, onUpgrade, { transport, tls })
				.then(() => undefined, (e: unknown) => e);

			expect(err).toBeInstanceOf(UpgradeRefusedError);
			expect(err instanceof UpgradeRefusedError && err.status).toBe(404);
			expect(onUpgrade).not.toHaveBeenCalled();
			expect(order).toEqual(["connect", "tls:127.0.0.1", "request"]);

			const serverSocket = server.sockets[0];
			if (!serverSocket) throw new Error("no server socket");
			await waitForClose(serverSocket);
		});

		it("should fail and close the socket when TLS fails", async () => {
			const raw: Duplex[] = [];
			const transport: TransportConnector = {
				async connect(host, port, options) {
					const socket = await tcpConnector.connect(host, port, options);
					raw.push(socket);
					return socket;
				},
			};
			const tls: TlsWrapper = {
				async wrapClient() {
					throw new TransportError("TLS handshake with 127.0.0.1 failed: certificate rejected");
				},
			};
			const server = await startServer(echoUpgrade);

			await expect(connect(`wss://127.0.0.1:${server.port}/`, () => {}, { transport, tls })).rejects.toThrow(
				"TLS handshake with 127.0.0.1 failed: certificate rejected",
			);
			expect(raw[0]?.destroyed).toBe(true);
			expect(server.requests).toHaveLength(0);
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Failures
	// ═══════════════════════════════════════════════════════════════════════

	describe("failures", () => {
		it("should refuse a 101 with a wrong accept key", async () => {
			const server = await startServer((_req, socket) => {
				socket.write(rawResponse([
					"HTTP/1.1 101 Switching Protocols",
					"Upgrade: websocket",
					"Connection: Upgrade",
					"Sec-WebSocket-Accept: bm90IHRoZSByaWdodCBrZXk=",
				]));
			});
			const onUpgrade = vi.fn();

			await expect(connect(`ws://127.0.0.1:${server.port}/`, onUpgrade)).rejects.toThrow(
				"WebSocket upgrade refused: invalid Sec-WebSocket-Accept (101 Switching Protocols)",
			);
			expect(onUpgrade).not.toHaveBeenCalled();
		});

		it("should fail with TransportError when the server hangs up", async () => {
			const server = await startServer((_req, socket) => socket.destroy());

			await expect(connect(`ws://127.0.0.1:${server.port}/`, () => {})).rejects.toBeInstanceOf(TransportError);
		});

		it("should fail with TransportError when nothing listens", async () => {
			const port = await unusedPort();

			await expect(connect(`ws://127.0.0.1:${port}/`, () => {})).rejects.toThrow(
				`Connect to 127.0.0.1:${port} failed`,
			);
		});

		it("should reject URLs that are not ws or wss", async () => {
			await expect(connect("http://127.0.0.1/", () => {})).rejects.toBeInstanceOf(InvalidUrlError);
		});

		it("should reject an invalid config", async () => {
			await expect(connect("ws://127.0.0.1/", () => {}, { config: { maxFrameSize: 0 } })).rejects.toBeInstanceOf(
				ConfigError,
			);
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Group ownership
	// ═══════════════════════════════════════════════════════════════════════

	describe("shutdown", () => {
		it("should shut down an owned group once", async () => {
			const client = new WebSocketClient();
			expect(client.ownsGroup).toBe(true);

			await client.shutdown();
			expect(client.group.isShutDown).toBe(true);
			await expect(client.shutdown()).rejects.toBeInstanceOf(AlreadyShutDownError);
		});

		it("should refuse to connect after shutdown", async () => {
			const client = new WebSocketClient();
			await client.shutdown();

			await expect(client.connect("ws://127.0.0.1:1/", () => {})).rejects.toThrow(
				"WebSocket client is already shut down",
			);
		});

		it("should leave a shared group running", async () => {
			const group = new ConnectionGroup("shared");
			const client = new WebSocketClient({ kind: "shared", group });
			expect(client.ownsGroup).toBe(false);

			await client.shutdown();
			await client.shutdown();
			expect(group.isShutDown).toBe(false);
			await group.shutdown();
		});

		it("should close live sessions when the owned group shuts down", async () => {
			const server = await startServer(echoUpgrade);
			const client = new WebSocketClient();
			const sessions: WebSocket[] = [];

			await client.connect(`ws://127.0.0.1:${server.port}/`, (ws) => sessions.push(ws));
			expect(client.group.size).toBe(1);

			await client.shutdown();

			const ws = sessions[0];
			if (!ws) throw new Error("onUpgrade was not called");
			await ws.onClose;
			expect(ws.isClosed).toBe(true);
			expect(client.group.size).toBe(0);
		});
	});
});

/**
 * Socket transport: TCP connect and the optional TLS layer beneath HTTP.
 *
 * Both stages sit behind small interfaces so a client can be pointed at a
 * different transport (an in-memory pair in tests, a proxy tunnel, ...).
 */

import net from "node:net";
import type { Duplex } from "node:stream";
import tls from "node:tls";
import { TransportError } from "./errors.js";

export interface TransportConnectOptions {
	/** Give up when the connection is not established in this many ms. 0 disables. */
	timeoutMs: number;
}

export interface TransportConnector {
	connect(host: string, port: number, options: TransportConnectOptions): Promise<Duplex>;
}

export interface TlsWrapper {
	/**
	 * Run the TLS client handshake over an already connected socket and
	 * resolve with the secured stream.
	 */
	wrapClient(socket: Duplex, serverName: string, config?: tls.ConnectionOptions): Promise<Duplex>;
}

// ─── TCP ────────────────────────────────────────────────────────────────────

export const tcpConnector: TransportConnector = {
	connect(host, port, options) {
		return new Promise<Duplex>((resolve, reject) => {
			let settled = false;
			const socket = net.createConnection({ host, port });
			socket.setNoDelay(true);

			const timer = options.timeoutMs > 0
				? setTimeout(() => {
					if (settled) return;
					settled = true;
					socket.destroy();
					reject(new TransportError(`Connect to ${host}:${port} timed out after ${options.timeoutMs}ms`));
				}, options.timeoutMs)
				: undefined;

			const onError = (err: Error) => {
				if (settled) return;
				settled = true;
				clearTimeout(timer);
				reject(new TransportError(`Connect to ${host}:${port} failed: ${err.message}`, err));
			};

			socket.once("error", onError);
			socket.once("connect", () => {
				if (settled) return;
				settled = true;
				clearTimeout(timer);
				socket.off("error", onError);
				resolve(socket);
			});
		});
	},
};

// ─── TLS ────────────────────────────────────────────────────────────────────

export const nodeTlsWrapper: TlsWrapper = {
	wrapClient(socket, serverName, config) {
		return new Promise<Duplex>((resolve, reject) => {
			let settled = false;
			const secure = tls.connect({
				...config,
				socket,
				// SNI must not carry an IP literal
				...(net.isIP(serverName) === 0 ? { servername: serverName } : {}),
			});

			const fail = (err: TransportError) => {
				if (settled) return;
				settled = true;
				secure.destroy();
				socket.destroy();
				reject(err);
			};
			const onError = (err: Error) => {
				fail(new TransportError(`TLS handshake with ${serverName} failed: ${err.message}`, err));
			};
			const onClose = () => {
				fail(new TransportError(`Connection to ${serverName} closed during the TLS handshake`));
			};

			secure.once("error", onError);
			secure.once("close", onClose);
			secure.once("secureConnect", () => {
				if (settled) return;
				settled = true;
				secure.off("error", onError);
				secure.off("close", onClose);
				resolve(secure);
			});
		});
	},
};

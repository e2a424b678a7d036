/**
 * Handshake orchestration for the client side.
 *
 * `connect` resolves the endpoint, opens TCP, layers TLS for `wss`, sends
 * the upgrade request and, on a protocol switch, installs a client-role
 * {@link WebSocket} and hands it to `onUpgrade`. Every stage reports into
 * one {@link ResultCell}, so the returned promise settles exactly once.
 */

import type { Duplex } from "node:stream";
import { createLogger } from "@setu/core";
import { resolveClientConfig } from "./config.js";
import type { WebSocketClientConfig } from "./config.js";
import { ConnectionGroup } from "./connection-group.js";
import { AlreadyShutDownError } from "./errors.js";
import { hostHeaderFor, parseWebSocketUrl, resolveEndpoint } from "./endpoint.js";
import type { Endpoint, EndpointOptions } from "./endpoint.js";
import type { HttpHeaderList } from "./http-codec.js";
import { ResultCell } from "./result-cell.js";
import { nodeTlsWrapper, tcpConnector } from "./transport.js";
import type { TlsWrapper, TransportConnector } from "./transport.js";
import { HttpClientUpgradeCodec, generateRequestKey } from "./upgrade.js";
import { UpgradeRequestHandler } from "./upgrade-request-handler.js";
import { WebSocket } from "./websocket.js";
import type { UpgradeHandler } from "./websocket.js";

const log = createLogger("tarang:client");

// ─── Types ──────────────────────────────────────────────────────────────────

/**
 * Where a client's connection group comes from. A client only shuts down
 * a group it created itself.
 */
export type GroupProvider =
	| { kind: "shared"; group: ConnectionGroup }
	| { kind: "createNew" };

export type RequestHeaders = Record<string, string> | HttpHeaderList;

export interface WebSocketClientOptions {
	/** Replaces the TCP stage. */
	transport?: TransportConnector;
	/** Replaces the TLS stage used for `wss`. */
	tls?: TlsWrapper;
}

export interface ConnectOptions extends WebSocketClientOptions {
	/** Extra headers for the upgrade request. */
	headers?: RequestHeaders;
	config?: Partial<WebSocketClientConfig>;
	/** Group to track the connection in. Default: the process-wide group. */
	group?: ConnectionGroup;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function toHeaderList(headers: RequestHeaders | undefined): HttpHeaderList {
	if (!headers) return [];
	return Array.isArray(headers) ? headers : Object.entries(headers);
}

function resolveTarget(target: string | URL | EndpointOptions): Endpoint {
	if (typeof target === "string" || target instanceof URL) {
		return parseWebSocketUrl(target);
	}
	return resolveEndpoint(target);
}

let clientCounter = 0;

const unreleasedGroups = new FinalizationRegistry<string>((groupName) => {
	log.fatal("WebSocketClient was collected without shutdown() on the group it created", undefined, { group: groupName });
});

// ─── Client ─────────────────────────────────────────────────────────────────

export class WebSocketClient {
	readonly group: ConnectionGroup;
	/** True when this client created its group and must shut it down. */
	readonly ownsGroup: boolean;
	readonly config: WebSocketClientConfig;

	private readonly transport: TransportConnector;
	private readonly tls: TlsWrapper;

	constructor(
		provider: GroupProvider = { kind: "createNew" },
		config: Partial<WebSocketClientConfig> = {},
		options: WebSocketClientOptions = {},
	) {
		this.config = resolveClientConfig(config);
		this.transport = options.transport ?? tcpConnector;
		this.tls = options.tls ?? nodeTlsWrapper;

		this.ownsGroup = provider.kind === "createNew";
		this.group = provider.kind === "shared"
			? provider.group
			: new ConnectionGroup(`client-${++clientCounter}`);
		if (this.ownsGroup) {
			unreleasedGroups.register(this, this.group.name, this.group);
		}
	}

	/**
	 * Connect and upgrade. Resolves once `onUpgrade` has received the
	 * session; rejects with the first failure of any stage.
	 *
	 * @throws {InvalidUrlError} The target cannot be resolved.
	 * @throws {AlreadyShutDownError} The group was shut down.
	 * @throws {TransportError} Connect, TLS or socket failure.
	 * @throws {UpgradeRefusedError} The server did not switch protocols.
	 */
	async connect(
		target: string | URL | EndpointOptions,
		onUpgrade: UpgradeHandler,
		headers?: RequestHeaders,
	): Promise<void> {
		const endpoint = resolveTarget(target);
		if (this.group.isShutDown) throw new AlreadyShutDownError();

		const result = new ResultCell<void>();
		this.establish(endpoint, toHeaderList(headers), onUpgrade, result).catch((err: unknown) => {
			result.fail(err);
		});
		return result.promise;
	}

	/**
	 * Shut down the group if this client created it; a shared group is left
	 * alone.
	 *
	 * @throws {AlreadyShutDownError} When the owned group was already shut down.
	 */
	async shutdown(): Promise<void> {
		if (!this.ownsGroup) return;
		const done = this.group.shutdown();
		unreleasedGroups.unregister(this.group);
		await done;
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private async establish(
		endpoint: Endpoint,
		headers: HttpHeaderList,
		onUpgrade: UpgradeHandler,
		result: ResultCell<void>,
	): Promise<void> {
		const clog = log.withContext({ scheme: endpoint.scheme, host: endpoint.host, port: endpoint.port });

		clog.debug("Connecting");
		const raw = await this.transport.connect(endpoint.host, endpoint.port, {
			timeoutMs: this.config.connectTimeoutMs,
		});
		this.trackOrDestroy(raw);

		let socket: Duplex = raw;
		if (endpoint.scheme === "wss") {
			clog.debug("Starting TLS handshake");
			try {
				socket = await this.tls.wrapClient(raw, endpoint.host, this.config.tlsConfig);
			} catch (err) {
				raw.destroy();
				throw err;
			}
			this.trackOrDestroy(socket);
		}

		const requestHandler = new UpgradeRequestHandler({
			hostHeader: hostHeaderFor(endpoint),
			path: endpoint.path,
			headers,
			result,
		});
		const codec = new HttpClientUpgradeCodec(socket, {
			requestKey: generateRequestKey(),
			upgradePipelineHandler: (upgraded, leftover) => {
				WebSocket.client(upgraded, onUpgrade, { maxFrameSize: this.config.maxFrameSize, leftover });
			},
			completionHandler: () => {
				clog.debug("Upgrade complete");
				result.succeed();
				codec.removeHandler(requestHandler);
			},
		});
		codec.addHandler(requestHandler);
	}

	private trackOrDestroy(socket: Duplex): void {
		try {
			this.group.track(socket);
		} catch (err) {
			socket.destroy();
			throw err;
		}
	}
}

// ─── Convenience ────────────────────────────────────────────────────────────

let defaultGroup: ConnectionGroup | null = null;

/** The process-wide group used by {@link connect} when none is given. */
export function getDefaultConnectionGroup(): ConnectionGroup {
	if (!defaultGroup || defaultGroup.isShutDown) {
		defaultGroup = new ConnectionGroup("default");
	}
	return defaultGroup;
}

/**
 * Connect to a `ws://` / `wss://` URL or explicit endpoint with a one-off
 * client over a shared group.
 *
 * ```ts
 * await connect("ws://localhost:8080/chat", (ws) => {
 *   ws.onText((_, text) => console.log(text));
 *   void ws.sendText("hello");
 * });
 * ```
 */
export function connect(
	target: string | URL | EndpointOptions,
	onUpgrade: UpgradeHandler,
	options: ConnectOptions = {},
): Promise<void> {
	let client: WebSocketClient;
	try {
		client = new WebSocketClient(
			{ kind: "shared", group: options.group ?? getDefaultConnectionGroup() },
			options.config,
			options,
		);
	} catch (err) {
		return Promise.reject(err);
	}

	return client.connect(target, onUpgrade, options.headers);
}

import type tls from "node:tls";
import { ConfigError, ValidationError, assertValid, v } from "@setu/core";
import { DEFAULT_MAX_FRAME_SIZE } from "./frame-codec.js";

/** Largest frame size a client may configure (2^31 - 1). */
export const MAX_CONFIGURABLE_FRAME_SIZE = 0x7fffffff;

export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

export interface WebSocketClientConfig {
	/** TLS settings for `wss`. Node's defaults (system CAs, hostname check) when omitted. */
	tlsConfig?: tls.ConnectionOptions;
	/** Largest accepted inbound frame payload in bytes. */
	maxFrameSize: number;
	/** TCP connect timeout; 0 disables it. */
	connectTimeoutMs: number;
}

const configValidator = v.object({
	maxFrameSize: v.optional(v.number().integer().min(1).max(MAX_CONFIGURABLE_FRAME_SIZE).validate).validate,
	connectTimeoutMs: v.optional(v.number().integer().min(0).validate).validate,
}).validate;

/**
 * Validate a partial client config and fill in defaults.
 *
 * @throws {ConfigError} When a value is out of range or of the wrong type.
 */
export function resolveClientConfig(partial: Partial<WebSocketClientConfig> = {}): WebSocketClientConfig {
	try {
		const checked = assertValid(partial, configValidator, "WebSocket client config");
		return {
			maxFrameSize: checked.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE,
			connectTimeoutMs: checked.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
			tlsConfig: partial.tlsConfig,
		};
	} catch (err) {
		if (err instanceof ValidationError) throw new ConfigError(err.message);
		throw err;
	}
}

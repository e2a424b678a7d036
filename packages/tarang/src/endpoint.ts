/**
 * Resolution of a connect target into scheme, host, port and request path.
 */

import { v } from "@setu/core";
import { InvalidUrlError } from "./errors.js";

export type WebSocketScheme = "ws" | "wss";

export interface EndpointOptions {
	/** Default: "ws". */
	scheme?: string;
	host: string;
	/** Default: 80 for ws, 443 for wss. */
	port?: number;
	/** Request target, query string included. Default: "/". */
	path?: string;
}

export interface Endpoint {
	scheme: WebSocketScheme;
	host: string;
	port: number;
	path: string;
}

export function defaultPort(scheme: WebSocketScheme): number {
	return scheme === "wss" ? 443 : 80;
}

const schemeValidator = v.string().oneOf(["ws", "wss"]).validate;
const hostValidator = v.string().min(1).validate;

function isWebSocketScheme(value: string): value is WebSocketScheme {
	return schemeValidator(value).valid;
}

function parseScheme(scheme: string, source: string): WebSocketScheme {
	const lower = scheme.toLowerCase();
	if (isWebSocketScheme(lower)) return lower;
	throw new InvalidUrlError(source, `unsupported scheme "${scheme}"`);
}

function checkPort(port: number, source: string): number {
	if (!Number.isInteger(port) || port < 1 || port > 65535) {
		throw new InvalidUrlError(source, `port ${port} is out of range`);
	}
	return port;
}

/**
 * Resolve explicit endpoint parts, filling scheme, port and path defaults.
 *
 * @throws {InvalidUrlError} On an unsupported scheme, empty host or bad port.
 */
export function resolveEndpoint(options: EndpointOptions): Endpoint {
	const scheme = parseScheme(options.scheme ?? "ws", `${options.scheme ?? "ws"}://${options.host}`);
	const source = `${scheme}://${options.host}`;
	if (!hostValidator(options.host).valid) {
		throw new InvalidUrlError(source, "host is empty");
	}
	return {
		scheme,
		host: options.host,
		port: checkPort(options.port ?? defaultPort(scheme), source),
		path: options.path ?? "/",
	};
}

/**
 * Parse a `ws://` or `wss://` URL. A URL without a host connects to
 * localhost; the query string stays part of the request path.
 *
 * @throws {InvalidUrlError} When the string is not a URL or not ws/wss.
 */
export function parseWebSocketUrl(input: string | URL): Endpoint {
	const source = String(input);
	let url: URL;
	try {
		url = typeof input === "string" ? new URL(input) : input;
	} catch {
		throw new InvalidUrlError(source, "not a valid URL");
	}

	const scheme = parseScheme(url.protocol.replace(/:$/, ""), source);
	// IPv6 literals come back bracketed from the URL parser
	const host = url.hostname.replace(/^\[(.*)\]$/, "$1") || "localhost";
	const port = url.port ? checkPort(Number(url.port), source) : defaultPort(scheme);

	return {
		scheme,
		host,
		port,
		path: `${url.pathname || "/"}${url.search}`,
	};
}

/** `Host` header value: the port is left out when it is the scheme default. */
export function hostHeaderFor(endpoint: Endpoint): string {
	const host = endpoint.host.includes(":") ? `[${endpoint.host}]` : endpoint.host;
	return endpoint.port === defaultPort(endpoint.scheme) ? host : `${host}:${endpoint.port}`;
}

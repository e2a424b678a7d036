/**
 * Minimal HTTP/1.1 head codec for the upgrade exchange.
 *
 * Only heads are handled: the upgrade request has an empty body and the
 * connection either switches protocols or is closed after the response head.
 */

// ─── Types ──────────────────────────────────────────────────────────────────

export interface HttpVersion {
	major: number;
	minor: number;
}

/** Ordered header list; names keep the caller's casing. */
export type HttpHeaderList = Array<[name: string, value: string]>;

export interface HttpRequestHead {
	version: HttpVersion;
	method: string;
	uri: string;
	headers: HttpHeaderList;
}

export interface HttpResponseHead {
	version: HttpVersion;
	status: number;
	reason: string;
	/** Lower-cased names; repeated headers joined with ", ". */
	headers: Record<string, string>;
}

/** Largest response head accepted before the exchange is abandoned. */
export const MAX_RESPONSE_HEAD_BYTES = 16 * 1024;

const HEAD_TERMINATOR = Buffer.from("\r\n\r\n", "latin1");

// ─── Request ────────────────────────────────────────────────────────────────

export function serializeRequestHead(head: HttpRequestHead): Buffer {
	const lines = [`${head.method} ${head.uri} HTTP/${head.version.major}.${head.version.minor}`];
	for (const [name, value] of head.headers) {
		lines.push(`${name}: ${value}`);
	}
	lines.push("", "");
	return Buffer.from(lines.join("\r\n"), "latin1");
}

/** Case-insensitive lookup of the first header with `name`. */
export function findHeader(headers: HttpHeaderList, name: string): string | undefined {
	const lower = name.toLowerCase();
	for (const [key, value] of headers) {
		if (key.toLowerCase() === lower) return value;
	}
	return undefined;
}

// ─── Response ───────────────────────────────────────────────────────────────

export class HttpParseError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "HttpParseError";
	}
}

function parseResponseHead(text: string): HttpResponseHead {
	const lines = text.split("\r\n");
	const statusLine = lines[0] ?? "";
	const match = /^HTTP\/(\d)\.(\d) (\d{3})(?: (.*))?$/.exec(statusLine);
	if (!match) {
		throw new HttpParseError(`Malformed status line: ${JSON.stringify(statusLine)}`);
	}

	const headers: Record<string, string> = {};
	for (const line of lines.slice(1)) {
		if (line.length === 0) continue;
		const colon = line.indexOf(":");
		if (colon <= 0) {
			throw new HttpParseError(`Malformed header line: ${JSON.stringify(line)}`);
		}
		const name = line.slice(0, colon).trim().toLowerCase();
		const value = line.slice(colon + 1).trim();
		headers[name] = Object.hasOwn(headers, name) ? `${headers[name]}, ${value}` : value;
	}

	return {
		version: { major: Number(match[1]), minor: Number(match[2]) },
		status: Number(match[3]),
		reason: match[4] ?? "",
		headers,
	};
}

/**
 * Incremental response-head parser. Feed chunks until it returns a result;
 * `rest` holds whatever followed the blank line.
 */
export class ResponseHeadParser {
	private buffer: Buffer = Buffer.alloc(0);

	constructor(private readonly maxBytes: number = MAX_RESPONSE_HEAD_BYTES) {}

	/**
	 * @throws {HttpParseError} On a malformed or oversized head.
	 */
	push(chunk: Buffer): { head: HttpResponseHead; rest: Buffer } | null {
		this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

		const end = this.buffer.indexOf(HEAD_TERMINATOR);
		if (end === -1) {
			if (this.buffer.length > this.maxBytes) {
				throw new HttpParseError(`Response head exceeds ${this.maxBytes} bytes`);
			}
			return null;
		}

		const head = parseResponseHead(this.buffer.subarray(0, end).toString("latin1"));
		const rest = Buffer.from(this.buffer.subarray(end + HEAD_TERMINATOR.length));
		this.buffer = Buffer.alloc(0);
		return { head, rest };
	}
}

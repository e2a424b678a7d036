import { UpgradeRefusedError } from "./errors.js";
import type { HttpHeaderList, HttpResponseHead } from "./http-codec.js";
import type { ResultCell } from "./result-cell.js";
import type { HttpClientUpgradeCodec, UpgradeRequestSink } from "./upgrade.js";

export interface UpgradeRequestOptions {
	/** Value for the `Host` header. */
	hostHeader: string;
	path: string;
	/** Extra request headers; a name matching a default header replaces it. */
	headers?: HttpHeaderList;
	/** The connect's completion signal, shared with the other handshake stages. */
	result: ResultCell<void>;
}

/** Prefix a missing leading slash; keep any query string. */
export function normalizeRequestPath(path: string): string {
	if (path.length === 0) return "/";
	return path.startsWith("/") ? path : `/${path}`;
}

/**
 * Sends the one GET that asks for the upgrade and turns any answer other
 * than a protocol switch into a failed handshake. Lives only until the
 * switch: the codec removes it before the session is installed.
 */
export class UpgradeRequestHandler implements UpgradeRequestSink {
	constructor(private readonly options: UpgradeRequestOptions) {}

	channelActive(codec: HttpClientUpgradeCodec): void {
		const headers: HttpHeaderList = [
			["Content-Type", "text/plain; charset=utf-8"],
			["Content-Length", "0"],
			["Host", this.options.hostHeader],
		];
		for (const [name, value] of this.options.headers ?? []) {
			const existing = headers.find(([key]) => key.toLowerCase() === name.toLowerCase());
			if (existing) {
				existing[1] = value;
			} else {
				headers.push([name, value]);
			}
		}

		codec.writeRequest({
			version: { major: 1, minor: 1 },
			method: "GET",
			uri: normalizeRequestPath(this.options.path),
			headers,
		});
	}

	responseHead(codec: HttpClientUpgradeCodec, head: HttpResponseHead): void {
		this.options.result.fail(new UpgradeRefusedError(head));
		codec.close();
	}

	errorCaught(codec: HttpClientUpgradeCodec, error: unknown): void {
		this.options.result.fail(error);
		codec.close();
	}
}

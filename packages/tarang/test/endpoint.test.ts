import { describe, it, expect } from "vitest";
import { hostHeaderFor, parseWebSocketUrl, resolveEndpoint } from "../src/endpoint.js";
import { InvalidUrlError } from "../src/errors.js";

describe("Endpoint resolution", () => {
	// ═══════════════════════════════════════════════════════════════════════
	// URLs
	// ═══════════════════════════════════════════════════════════════════════

	describe("parseWebSocketUrl", () => {
		it("should default the port by scheme", () => {
			expect(parseWebSocketUrl("ws://example.test/chat")).toEqual({
				scheme: "ws",
				host: "example.test",
				port: 80,
				path: "/chat",
			});
			expect(parseWebSocketUrl("wss://example.test").port).toBe(443);
		});

		it("should keep an explicit port and the query string", () => {
			expect(parseWebSocketUrl("ws://127.0.0.1:9001/feed?since=10")).toEqual({
				scheme: "ws",
				host: "127.0.0.1",
				port: 9001,
				path: "/feed?since=10",
			});
		});

		it("should default the path to /", () => {
			expect(parseWebSocketUrl("ws://example.test").path).toBe("/");
		});

		it("should strip the brackets of an IPv6 literal", () => {
			expect(parseWebSocketUrl("ws://[::1]:8080/").host).toBe("::1");
		});

		it("should accept URL objects", () => {
			expect(parseWebSocketUrl(new URL("wss://example.test:8443/x")).port).toBe(8443);
		});

		it("should reject other schemes", () => {
			expect(() => parseWebSocketUrl("http://example.test")).toThrow(
				'Invalid WebSocket URL "http://example.test": unsupported scheme "http"',
			);
		});

		it("should reject strings that are not URLs", () => {
			expect(() => parseWebSocketUrl("not a url")).toThrow(InvalidUrlError);
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Explicit parts
	// ═══════════════════════════════════════════════════════════════════════

	describe("resolveEndpoint", () => {
		it("should fill scheme, port and path defaults", () => {
			expect(resolveEndpoint({ host: "example.test" })).toEqual({
				scheme: "ws",
				host: "example.test",
				port: 80,
				path: "/",
			});
			expect(resolveEndpoint({ scheme: "wss", host: "example.test" }).port).toBe(443);
		});

		it("should reject an empty host", () => {
			expect(() => resolveEndpoint({ host: "" })).toThrow("host is empty");
		});

		it("should reject an out-of-range port", () => {
			expect(() => resolveEndpoint({ host: "h", port: 70000 })).toThrow("port 70000 is out of range");
		});

		it("should reject an unsupported scheme", () => {
			expect(() => resolveEndpoint({ scheme: "ftp", host: "h" })).toThrow(InvalidUrlError);
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Host header
	// ═══════════════════════════════════════════════════════════════════════

	describe("hostHeaderFor", () => {
		it("should leave out the default port", () => {
			expect(hostHeaderFor({ scheme: "ws", host: "example.test", port: 80, path: "/" })).toBe("example.test");
			expect(hostHeaderFor({ scheme: "wss", host: "example.test", port: 443, path: "/" })).toBe("example.test");
		});

		it("should include any other port", () => {
			expect(hostHeaderFor({ scheme: "wss", host: "example.test", port: 80, path: "/" })).toBe("example.test:80");
		});

		it("should bracket IPv6 literals", () => {
			expect(hostHeaderFor({ scheme: "ws", host: "::1", port: 8080, path: "/" })).toBe("[::1]:8080");
		});
	});
});

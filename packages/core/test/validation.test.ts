import { describe, it, expect } from "vitest";
import { v, assertValid } from "../src/validation.js";
import { ValidationError } from "../src/errors.js";

describe("Validation", () => {
	// ═══════════════════════════════════════════════════════════════════════
	// Strings
	// ═══════════════════════════════════════════════════════════════════════

	describe("v.string()", () => {
		it("should accept strings", () => {
			expect(v.string().validate("ws")).toEqual({ valid: true, value: "ws" });
		});

		it("should reject non-strings", () => {
			expect(v.string().validate(1)).toEqual({ valid: false, error: "Expected string, received number" });
		});

		it("should enforce a minimum length", () => {
			expect(v.string().min(2).validate("a").error).toBe("String length 1 is below minimum 2");
		});

		it("should enforce a fixed set of values", () => {
			const scheme = v.string().oneOf(["ws", "wss"]).validate;
			expect(scheme("wss").valid).toBe(true);
			expect(scheme("http").error).toBe('Expected one of ws, wss, received "http"');
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Numbers
	// ═══════════════════════════════════════════════════════════════════════

	describe("v.number()", () => {
		it("should reject NaN", () => {
			expect(v.number().validate(Number.NaN).valid).toBe(false);
		});

		it("should enforce integers", () => {
			expect(v.number().integer().validate(1.5).error).toBe("Expected integer, received 1.5");
		});

		it("should enforce bounds", () => {
			const port = v.number().min(1).max(65535).validate;
			expect(port(0).error).toBe("Number 0 is below minimum 1");
			expect(port(70000).error).toBe("Number 70000 exceeds maximum 65535");
			expect(port(8080)).toEqual({ valid: true, value: 8080 });
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Objects and optionals
	// ═══════════════════════════════════════════════════════════════════════

	describe("v.object()", () => {
		const options = v.object({
			host: v.string().min(1).validate,
			port: v.optional(v.number().integer().validate).validate,
		}).validate;

		it("should return the validated fields", () => {
			expect(options({ host: "localhost", port: 80, extra: true })).toEqual({
				valid: true,
				value: { host: "localhost", port: 80 },
			});
		});

		it("should accept a missing optional field", () => {
			expect(options({ host: "localhost" }).valid).toBe(true);
		});

		it("should report every failing field", () => {
			expect(options({ host: "", port: 1.5 }).error).toBe(
				"host: String length 0 is below minimum 1; port: Expected integer, received 1.5",
			);
		});

		it("should reject arrays and null", () => {
			expect(options([]).error).toBe("Expected object, received object");
			expect(options(null).error).toBe("Expected object, received null");
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Helpers
	// ═══════════════════════════════════════════════════════════════════════

	describe("assertValid()", () => {
		it("should return the typed value", () => {
			expect(assertValid(5, v.number().validate)).toBe(5);
		});

		it("should throw ValidationError prefixed with the label", () => {
			expect(() => assertValid(0, v.number().min(1).validate, "maxFrameSize")).toThrow(ValidationError);
			expect(() => assertValid(0, v.number().min(1).validate, "maxFrameSize")).toThrow(
				"maxFrameSize: Number 0 is below minimum 1",
			);
		});
	});
});

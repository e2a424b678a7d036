/**
 * Niyama: Runtime validation utilities.
 * Sanskrit: Niyama (नियम) = rule, regulation.
 *
 * Lightweight fluent validators for option objects passed in by callers.
 * Each builder exposes a `validate` function; `assertValid` turns a
 * failed result into a {@link ValidationError}.
 */

import { ValidationError } from "./errors.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type ValidatorFn<T = unknown> = (value: unknown) => { valid: boolean; error?: string; value?: T };

// ─── Validator Classes ───────────────────────────────────────────────────────

class StringValidator {
	private minLen?: number;
	private oneOfValues?: readonly string[];

	min(n: number): this {
		this.minLen = n;
		return this;
	}

	oneOf(values: readonly string[]): this {
		this.oneOfValues = values;
		return this;
	}

	validate: ValidatorFn<string> = (value: unknown) => {
		if (typeof value !== "string") {
			return { valid: false, error: `Expected string, received ${typeof value}` };
		}
		if (this.minLen !== undefined && value.length < this.minLen) {
			return { valid: false, error: `String length ${value.length} is below minimum ${this.minLen}` };
		}
		if (this.oneOfValues && !this.oneOfValues.includes(value)) {
			return { valid: false, error: `Expected one of ${this.oneOfValues.join(", ")}, received ${JSON.stringify(value)}` };
		}
		return { valid: true, value };
	};
}

class NumberValidator {
	private minVal?: number;
	private maxVal?: number;
	private intOnly = false;

	min(n: number): this {
		this.minVal = n;
		return this;
	}

	max(n: number): this {
		this.maxVal = n;
		return this;
	}

	integer(): this {
		this.intOnly = true;
		return this;
	}

	validate: ValidatorFn<number> = (value: unknown) => {
		if (typeof value !== "number" || Number.isNaN(value)) {
			return { valid: false, error: `Expected number, received ${typeof value}` };
		}
		if (this.intOnly && !Number.isInteger(value)) {
			return { valid: false, error: `Expected integer, received ${value}` };
		}
		if (this.minVal !== undefined && value < this.minVal) {
			return { valid: false, error: `Number ${value} is below minimum ${this.minVal}` };
		}
		if (this.maxVal !== undefined && value > this.maxVal) {
			return { valid: false, error: `Number ${value} exceeds maximum ${this.maxVal}` };
		}
		return { valid: true, value };
	};
}

type InferSchema<T extends Record<string, ValidatorFn>> = {
	[K in keyof T]: T[K] extends ValidatorFn<infer U> ? U : unknown;
};

class ObjectValidator<T extends Record<string, ValidatorFn>> {
	constructor(private schema: T) {}

	validate: ValidatorFn<InferSchema<T>> = (value: unknown) => {
		if (typeof value !== "object" || value === null || Array.isArray(value)) {
			return { valid: false, error: `Expected object, received ${value === null ? "null" : typeof value}` };
		}
		const result: Record<string, unknown> = {};
		const errors: string[] = [];

		for (const [key, validator] of Object.entries(this.schema)) {
			const fieldResult = validator(Reflect.get(value, key));
			if (!fieldResult.valid) {
				errors.push(`${key}: ${fieldResult.error}`);
			} else {
				result[key] = fieldResult.value;
			}
		}

		if (errors.length > 0) {
			return { valid: false, error: errors.join("; ") };
		}
		return { valid: true, value: result as InferSchema<T> };
	};
}

class OptionalValidator<T> {
	constructor(private inner: ValidatorFn<T>) {}

	validate: ValidatorFn<T | undefined> = (value: unknown) => {
		if (value === undefined || value === null) {
			return { valid: true, value: undefined };
		}
		return this.inner(value);
	};
}

// ─── Fluent Builder ──────────────────────────────────────────────────────────

/**
 * Fluent validator builders.
 *
 * ```ts
 * const optionsV = v.object({
 *   maxFrameSize: v.optional(v.number().integer().min(1).validate).validate,
 * }).validate;
 * const schemeV = v.string().oneOf(["ws", "wss"]).validate;
 * ```
 */
export const v = {
	string: () => new StringValidator(),
	number: () => new NumberValidator(),
	object: <T extends Record<string, ValidatorFn>>(schema: T) => new ObjectValidator<T>(schema),
	optional: <T>(validator: ValidatorFn<T>) => new OptionalValidator<T>(validator),
};

// ─── Utility Functions ───────────────────────────────────────────────────────

/**
 * Assert that validation passes and return the typed value.
 *
 * @param label - Prefix for the error message (e.g. "client config").
 * @throws {ValidationError} If validation fails.
 */
export function assertValid<T>(value: unknown, validator: ValidatorFn<T>, label?: string): T {
	const result = validator(value);
	if (!result.valid) {
		const prefix = label ? `${label}: ` : "";
		throw new ValidationError(`${prefix}${result.error ?? "Validation failed"}`, label);
	}
	return result.value as T;
}

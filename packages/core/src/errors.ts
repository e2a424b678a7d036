/**
 * Typed error hierarchy for Setu.
 *
 * All Setu errors extend {@link SetuError} with a machine-readable
 * `code` string for programmatic error handling. Packages built on core
 * add their own subclasses next to the code that raises them.
 */

/**
 * Base error class for all Setu errors.
 *
 * Carries a machine-readable `code` field (e.g. `"TRANSPORT_FAILURE"`) in
 * addition to the human-readable `message`.
 */
export class SetuError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: unknown) {
		super(message, { cause });
		this.name = "SetuError";
		this.code = code;
	}
}

/**
 * Configuration error (invalid option value, unknown key, etc.).
 */
export class ConfigError extends SetuError {
	constructor(message: string) {
		super(message, "CONFIG_ERROR");
		this.name = "ConfigError";
	}
}

/**
 * A value failed runtime validation. Raised by `assertValid`.
 */
export class ValidationError extends SetuError {
	readonly label?: string;

	constructor(message: string, label?: string) {
		super(message, "VALIDATION_ERROR");
		this.name = "ValidationError";
		this.label = label;
	}
}

// @setu/core: Foundation
export * from "./errors.js";

// Validation (Niyama)
export { v, assertValid } from "./validation.js";
export type { ValidatorFn } from "./validation.js";

// Observability (Drishti)
export {
	LogLevel,
	Logger,
	ConsoleTransport,
	JsonTransport,
	createLogger,
	parseLogLevel,
	configureLogging,
	getLoggingConfig,
	resetLoggingConfig,
} from "./observability/logger.js";
export type { LogEntry, LogTransport, LoggerConfig } from "./observability/logger.js";

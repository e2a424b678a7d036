/**
 * Drishti Logger: Structured, pluggable logging for Setu.
 * Sanskrit: Drishti (दृष्टि) = vision, observation.
 *
 * Level filtering, pluggable transports, child loggers and contextual
 * metadata. Entries below the active level are dropped before an entry
 * object is built.
 */

// ─── Log Level ───────────────────────────────────────────────────────────────

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	FATAL = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
	[LogLevel.FATAL]: "FATAL",
};

const LOG_LEVEL_PARSE: Record<string, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
	fatal: LogLevel.FATAL,
};

/** Parse a level name ("debug", "WARN", ...). Returns undefined for unknown names. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
	if (!name) return undefined;
	return LOG_LEVEL_PARSE[name.trim().toLowerCase()];
}

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LogEntry {
	/** ISO-8601 timestamp */
	timestamp: string;
	level: LogLevel;
	levelName: string;
	message: string;
	/** Structured context metadata */
	context: Record<string, unknown>;
	/** Connection identifier for correlating entries of one socket */
	connectionId?: string;
	error?: { name: string; message: string; code?: string; stack?: string };
	/** Module name that produced this log */
	module?: string;
}

export interface LogTransport {
	write(entry: LogEntry): void;
}

export interface LoggerConfig {
	/** Minimum level to emit. */
	level?: LogLevel;
	/** Output transports. Defaults to [ConsoleTransport]. */
	transports?: LogTransport[];
	/** Default context merged into every log entry. */
	defaultContext?: Record<string, unknown>;
}

// ─── Global Configuration ────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {};

/**
 * Configure global logging defaults. Applies to every logger that was not
 * given its own level or transports, including ones created earlier.
 */
export function configureLogging(config: LoggerConfig): void {
	globalConfig = { ...config };
}

/** Get the current global logging configuration. */
export function getLoggingConfig(): LoggerConfig {
	return { ...globalConfig };
}

/** Reset global config to defaults. Primarily for testing. */
export function resetLoggingConfig(): void {
	globalConfig = {};
}

// ─── Transports ──────────────────────────────────────────────────────────────

const ANSI_RESET = "\x1b[0m";
const ANSI_DIM = "\x1b[2m";

const LEVEL_COLORS: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "\x1b[36m",
	[LogLevel.INFO]: "\x1b[32m",
	[LogLevel.WARN]: "\x1b[33m",
	[LogLevel.ERROR]: "\x1b[31m",
	[LogLevel.FATAL]: "\x1b[35;1m",
};

/**
 * Human-readable single-line output, colored when stdout is a TTY.
 *
 * Format: `HH:mm:ss.SSS LEVEL [module] message key=value ...`
 */
export class ConsoleTransport implements LogTransport {
	private readonly useColors: boolean;

	constructor(opts?: { colors?: boolean }) {
		this.useColors = opts?.colors ?? (process.stdout.isTTY ?? false);
	}

	/** Render an entry without writing it. */
	format(entry: LogEntry): string {
		const ts = entry.timestamp.slice(11, 23);
		const lvl = LOG_LEVEL_NAMES[entry.level].padEnd(5);
		const mod = entry.module ? ` [${entry.module}]` : "";

		let line = this.useColors
			? `${ANSI_DIM}${ts}${ANSI_RESET} ${LEVEL_COLORS[entry.level]}${lvl}${ANSI_RESET}${mod} ${entry.message}`
			: `${ts} ${lvl}${mod} ${entry.message}`;

		const ctx = Object.entries(entry.context);
		if (ctx.length > 0) {
			line += " " + ctx.map(([k, val]) => `${k}=${JSON.stringify(val)}`).join(" ");
		}
		if (entry.connectionId) {
			line += ` conn=${entry.connectionId}`;
		}
		if (entry.error) {
			const code = entry.error.code ? ` (${entry.error.code})` : "";
			line += `\n  ${entry.error.name}${code}: ${entry.error.message}`;
		}
		return line;
	}

	write(entry: LogEntry): void {
		const stream = entry.level >= LogLevel.ERROR ? process.stderr : process.stdout;
		stream.write(this.format(entry) + "\n");
	}
}

/**
 * JSON lines, one object per entry, for log aggregation.
 */
export class JsonTransport implements LogTransport {
	write(entry: LogEntry): void {
		const obj: Record<string, unknown> = {
			timestamp: entry.timestamp,
			level: LOG_LEVEL_NAMES[entry.level],
			message: entry.message,
			module: entry.module,
		};
		if (Object.keys(entry.context).length > 0) obj.context = entry.context;
		if (entry.connectionId) obj.connectionId = entry.connectionId;
		if (entry.error) obj.error = entry.error;

		const stream = entry.level >= LogLevel.ERROR ? process.stderr : process.stdout;
		stream.write(JSON.stringify(obj) + "\n");
	}
}

// ─── Logger ──────────────────────────────────────────────────────────────────

function resolveLevel(configLevel?: LogLevel): LogLevel {
	// LOG_LEVEL wins over every configured level
	const envLevel = parseLogLevel(process.env.LOG_LEVEL);
	if (envLevel !== undefined) return envLevel;
	if (configLevel !== undefined) return configLevel;
	if (globalConfig.level !== undefined) return globalConfig.level;
	return process.env.NODE_ENV === "production" ? LogLevel.INFO : LogLevel.DEBUG;
}

function serializeError(error: unknown): NonNullable<LogEntry["error"]> {
	if (error instanceof Error) {
		const code = Reflect.get(error, "code");
		return {
			name: error.name,
			message: error.message,
			...(typeof code === "string" ? { code } : {}),
			stack: error.stack,
		};
	}
	return { name: "Error", message: String(error) };
}

let defaultTransports: LogTransport[] | undefined;

function globalTransports(): LogTransport[] {
	if (globalConfig.transports) return globalConfig.transports;
	defaultTransports ??= [new ConsoleTransport()];
	return defaultTransports;
}

/**
 * Named logger. Level and transports not given in the config are read from
 * the global configuration on every call, so `configureLogging` reaches
 * loggers that modules created at import time.
 */
export class Logger {
	private readonly name: string;
	private readonly configLevel?: LogLevel;
	private pinnedLevel?: LogLevel;
	private readonly ownTransports?: LogTransport[];
	private readonly context: Record<string, unknown>;

	constructor(name: string, config?: LoggerConfig) {
		this.name = name;
		this.configLevel = config?.level;
		this.ownTransports = config?.transports;
		this.context = { ...(config?.defaultContext ?? {}) };
	}

	debug(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.DEBUG, message, undefined, ctx);
	}

	info(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.INFO, message, undefined, ctx);
	}

	warn(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.WARN, message, undefined, ctx);
	}

	/** Log an ERROR message with an optional error value. */
	error(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.ERROR, message, error, ctx);
	}

	/** Log a FATAL message with an optional error value. */
	fatal(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.FATAL, message, error, ctx);
	}

	/**
	 * Create a child logger named `parent:child` that shares level,
	 * transports and context.
	 */
	child(childName: string): Logger {
		return new Logger(`${this.name}:${childName}`, {
			level: this.pinnedLevel ?? this.configLevel,
			transports: this.ownTransports,
			defaultContext: { ...this.context },
		});
	}

	/**
	 * Return a new logger with additional context merged in.
	 */
	withContext(ctx: Record<string, unknown>): Logger {
		return new Logger(this.name, {
			level: this.pinnedLevel ?? this.configLevel,
			transports: this.ownTransports,
			defaultContext: { ...this.context, ...ctx },
		});
	}

	/** Pin the level of this logger, ignoring LOG_LEVEL and the global level. */
	setLevel(level: LogLevel): void {
		this.pinnedLevel = level;
	}

	getLevel(): LogLevel {
		return this.pinnedLevel ?? resolveLevel(this.configLevel);
	}

	getName(): string {
		return this.name;
	}

	isLevelEnabled(level: LogLevel): boolean {
		return level >= this.getLevel();
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private emit(level: LogLevel, message: string, error: unknown, ctx?: Record<string, unknown>): void {
		if (level < this.getLevel()) return;

		const context = { ...(globalConfig.defaultContext ?? {}), ...this.context, ...(ctx ?? {}) };
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			levelName: LOG_LEVEL_NAMES[level],
			message,
			context,
			module: this.name,
		};

		if (context.connectionId !== undefined) {
			entry.connectionId = String(context.connectionId);
			delete context.connectionId;
		}
		if (error !== undefined) {
			entry.error = serializeError(error);
		}

		for (const transport of this.ownTransports ?? globalTransports()) {
			try {
				transport.write(entry);
			} catch {
				// Transport failures never reach the caller
			}
		}
	}
}

// ─── Factory ─────────────────────────────────────────────────────────────────

/**
 * Create a named logger with global defaults.
 *
 * @param name - Module identifier (e.g. "tarang:session", "tarang:client")
 */
export function createLogger(name: string): Logger {
	return new Logger(name);
}

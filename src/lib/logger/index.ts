/**
 * Logger wrapper — domain-agnostic structured logging backed by pino.
 *
 * Callers depend on the narrow Logger interface; pino stays behind this module.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	/** Fields attached to every record (e.g. `{ module: "config" }`). */
	readonly bindings?: Record<string, unknown>;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

type Level = "info" | "warn" | "error" | "debug";

// ── Factory ─────────────────────────────────────────────────────────

function emit(pinoLogger: pino.Logger, level: Level, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "object" && msgOrObj !== null) {
		pinoLogger[level](msgOrObj, msg ?? "");
	} else {
		pinoLogger[level](String(msgOrObj ?? ""));
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional base bindings and custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", bindings: { module: "config" } });
 * logger.info({ precision: 28 }, "Context resolved");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	let pinoLogger: pino.Logger;

	if (config.destination) {
		const destination = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		pinoLogger = pino(pinoOptions, stream);
	} else {
		pinoLogger = pino(pinoOptions);
	}

	return wrapPino(config.bindings ? pinoLogger.child(config.bindings) : pinoLogger);
}

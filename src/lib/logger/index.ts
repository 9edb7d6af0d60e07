/**
 * Logger wrapper: structured logging backed by pino.
 *
 * Journal code depends on the Logger interface only. Entry notes can carry
 * personal data, so callers may pass redact paths (e.g. "notes").
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
	readonly bindings?: Record<string, unknown>;
}

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

type ForwardedLevel = "info" | "warn" | "error" | "debug";

// ── Factory ─────────────────────────────────────────────────────────

function forward(
	pinoLogger: pino.Logger,
	level: ForwardedLevel,
): (msgOrObj: string | Record<string, unknown>, msg?: string) => void {
	return (msgOrObj, msg) => {
		if (typeof msgOrObj === "string") {
			pinoLogger[level](msgOrObj);
		} else {
			pinoLogger[level](msgOrObj, msg ?? "");
		}
	};
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info: forward(pinoLogger, "info"),
		warn: forward(pinoLogger, "warn"),
		error: forward(pinoLogger, "error"),
		debug: forward(pinoLogger, "debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", redactPaths: ["notes"] });
 * logger.info({ journalableId: 42, version: 3 }, "Journal recorded");
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

	const pinoLogger = config.destination ? pino(pinoOptions, config.destination) : pino(pinoOptions);
	const logger = wrapPino(pinoLogger);
	return config.bindings ? logger.child(config.bindings) : logger;
}

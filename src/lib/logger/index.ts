/**
 * Logger wrapper: structured logging backed by pino.
 *
 * Components receive a Logger through their options and bind their own
 * name with child({ component }). Error instances passed under `err` are
 * serialized by pino's standard serializer; configured paths are redacted.
 */

import pino from "pino";
import type { LogLevel } from "../../shared/config.js";

export type { LogLevel };

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
	readonly base?: Record<string, unknown>;
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

type Method = "info" | "warn" | "error" | "debug";

function forward(pinoLogger: pino.Logger, method: Method, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		pinoLogger[method](String(msgOrObj ?? ""));
	} else if (typeof msgOrObj === "object") {
		pinoLogger[method](msgOrObj, msg ?? "");
	} else {
		pinoLogger[method]({ value: msgOrObj }, msg ?? "");
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional redaction and custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", redactPaths: ["*.apiKey"] });
 * logger.child({ component: "engine" }).info({ orderId: "ord_1a2b3c4d" }, "order filled");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
		timestamp: pino.stdTimeFunctions.isoTime,
	};

	if (config.base !== undefined) {
		pinoOptions.base = config.base;
	}

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	const pinoLogger =
		destination !== undefined
			? pino(pinoOptions, {
					write(chunk: string): void {
						destination.write(chunk);
					},
				})
			: pino(pinoOptions);

	return wrapPino(pinoLogger);
}

/** Logger that drops everything; the default for components built without one. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}

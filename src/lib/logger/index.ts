/**
 * Logger wrapper: domain-agnostic structured logging backed by pino.
 *
 * Bigints (every amount and price in the ledger) are rendered as strings so
 * log lines stay valid JSON, and configurable paths are redacted.
 */

import { pino } from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe, plus `silent`. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
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

// ── Serialization ───────────────────────────────────────────────────

function stringifyBigints(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = typeof value === "bigint" ? value.toString() : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type Level = "info" | "warn" | "error" | "debug";

function wrapPino(pinoLogger: pino.Logger): Logger {
	const forward =
		(level: Level) =>
		(msgOrObj: unknown, msg?: string): void => {
			if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
				pinoLogger[level](String(msgOrObj ?? ""));
			} else if (typeof msgOrObj === "object") {
				pinoLogger[level](stringifyBigints({ ...msgOrObj }), msg ?? "");
			} else {
				pinoLogger[level](String(msgOrObj));
			}
		};

	return {
		info: forward("info"),
		warn: forward("warn"),
		error: forward("error"),
		debug: forward("debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(stringifyBigints(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional redaction and custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ tradeId: 7 }, "Trade opened");
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

	if (config.destination) {
		const target = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				target.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}

	return wrapPino(pino(pinoOptions));
}

/** Logger that discards everything; the default for components built without one. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}

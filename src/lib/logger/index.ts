/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Library code depends on the small Logger interface below, never on pino
 * directly. Values handed to the logger may contain bigints, which JSON cannot
 * encode, so object payloads are passed through `toLoggable` first.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	/** Bound to every record as `name`. */
	readonly name?: string;
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

// ── Serialisation ───────────────────────────────────────────────────

/** Replace bigint values (one level deep, and inside arrays) with their decimal strings. */
export function toLoggable(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		if (typeof value === "bigint") {
			result[key] = value.toString();
		} else if (Array.isArray(value)) {
			result[key] = value.map((v: unknown) => (typeof v === "bigint" ? v.toString() : v));
		} else {
			result[key] = value;
		}
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type Level = "info" | "warn" | "error" | "debug";

function emit(pinoLogger: pino.Logger, level: Level, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		pinoLogger[level](String(msgOrObj ?? ""));
	} else if (typeof msgOrObj === "object") {
		pinoLogger[level](toLoggable(Object.fromEntries(Object.entries(msgOrObj))), msg ?? "");
	} else {
		pinoLogger[level](String(msgOrObj));
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
			return wrapPino(pinoLogger.child(toLoggable(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino, optionally writing to a custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug", name: "padic" });
 * logger.debug({ prime: 5, precision: 20 }, "expanded rational");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};
	if (config.name !== undefined) {
		pinoOptions.name = config.name;
	}

	if (config.destination) {
		const destination = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}
	return wrapPino(pino(pinoOptions));
}

/** A logger that drops every record. */
export const silentLogger: Logger = {
	info(): void {},
	warn(): void {},
	error(): void {},
	debug(): void {},
	child(): Logger {
		return silentLogger;
	},
};

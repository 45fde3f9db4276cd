/**
 * Library configuration.
 *
 * Defaults can be overridden per call or through PADIC_* environment
 * variables. Nothing here is read implicitly: callers pass the resolved config
 * to PadicField.fromConfig.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { LOG_LEVELS } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";

export interface PadicConfig {
	/** Digits retained when a constructor is not given a precision */
	readonly defaultPrecision: number;
	/** Terms printed by series formatting before the O(p^k) term */
	readonly showDigits: number;
	readonly logLevel: LogLevel;
}

export const DEFAULT_PADIC_CONFIG: PadicConfig = {
	defaultPrecision: 20,
	showDigits: 10,
	logLevel: "info",
};

const positiveInt = z
	.string()
	.trim()
	.regex(/^\d+$/, "must be a positive integer")
	.transform(Number)
	.refine((n) => Number.isSafeInteger(n) && n > 0, "must be a positive integer");

const logLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

const envSchema = z.object({
	PADIC_PRECISION: positiveInt.optional(),
	PADIC_SHOW_DIGITS: positiveInt.optional(),
	PADIC_LOG_LEVEL: logLevel.optional(),
});

/** Mutable builder shape for constructing Partial<PadicConfig>. */
interface MutablePadicConfig {
	defaultPrecision?: number;
	showDigits?: number;
	logLevel?: LogLevel;
}

/**
 * Reads config overrides from environment variables.
 * Supported: PADIC_PRECISION, PADIC_SHOW_DIGITS, PADIC_LOG_LEVEL.
 * Empty variables are ignored.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(
	env: Readonly<Record<string, string | undefined>> = process.env,
): Partial<PadicConfig> {
	const present = Object.fromEntries(
		Object.keys(envSchema.shape)
			.map((key) => [key, env[key]] as const)
			.filter(([, value]) => value !== undefined && value !== ""),
	);
	const parsed = validate(envSchema, present);
	if (!parsed.ok) {
		throw new ConfigError(`Invalid environment configuration: ${parsed.error.describe()}`, {
			cause: parsed.error,
		});
	}

	const result: MutablePadicConfig = {};
	const { PADIC_PRECISION, PADIC_SHOW_DIGITS, PADIC_LOG_LEVEL } = parsed.value;
	if (PADIC_PRECISION !== undefined) result.defaultPrecision = PADIC_PRECISION;
	if (PADIC_SHOW_DIGITS !== undefined) result.showDigits = PADIC_SHOW_DIGITS;
	if (PADIC_LOG_LEVEL !== undefined) result.logLevel = PADIC_LOG_LEVEL;
	return result;
}

/**
 * Merges overrides over DEFAULT_PADIC_CONFIG.
 * @throws ConfigError if a numeric setting is not a positive integer
 */
export function resolveConfig(overrides: Partial<PadicConfig> = {}): PadicConfig {
	const config: PadicConfig = { ...DEFAULT_PADIC_CONFIG, ...overrides };
	for (const key of ["defaultPrecision", "showDigits"] as const) {
		const value = config[key];
		if (!Number.isSafeInteger(value) || value <= 0) {
			throw new ConfigError(`Invalid ${key}: ${value} must be a positive integer`, { [key]: value });
		}
	}
	if (!LOG_LEVELS.includes(config.logLevel)) {
		throw new ConfigError(`Invalid logLevel: ${String(config.logLevel)}`);
	}
	return config;
}

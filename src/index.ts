// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	map,
	unwrap,
	ErrorCategory,
	PadicError,
	InvalidPrimeError,
	InvalidPrecisionError,
	InvalidInputError,
	PrimeMismatchError,
	NotAnIntegerError,
	PrecisionExceededError,
	ConfigError,
	toPadicError,
	isInvalidPrime,
	isInvalidPrecision,
	isInvalidInput,
	isPrimeMismatch,
	isNotAnInteger,
	isPrecisionExceeded,
	isConfigError,
	type PadicConfig,
	DEFAULT_PADIC_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export {
	type Logger,
	type LoggerConfig,
	type LogLevel,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";
export { ValidationError, type ValidationIssue } from "./lib/validation/index.js";

// ── Rationals & Primes ───────────────────────────────────────────────
export { type IntegerLike, Rational } from "./rational/index.js";
export { isPrime, primesBelow } from "./primes/index.js";

// ── p-adic Core ──────────────────────────────────────────────────────
export {
	type ValuationSplit,
	extractValuation,
	valuationOf,
	type DigitExpansion,
	type ExpansionTail,
	expandDigits,
	type SeriesSpec,
	reconstructSeries,
	type PadicInput,
	type PadicValue,
	toPadicInput,
	type DigitsSpec,
	DEFAULT_PRECISION,
	PAdicNumber,
} from "./padic/index.js";

// ── Series Notation ──────────────────────────────────────────────────
export {
	type SeriesTerm,
	type SeriesTerms,
	type ParsedSeries,
	formatSeries,
	parseSeries,
} from "./series/index.js";

// ── Field Context ────────────────────────────────────────────────────
export { PadicField, type PadicFieldOptions } from "./field/index.js";

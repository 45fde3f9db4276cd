export { type Result, ok, err, map, unwrap } from "./result.js";

export {
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
} from "./errors.js";

export { type PadicConfig, DEFAULT_PADIC_CONFIG, configFromEnv, resolveConfig } from "./config.js";

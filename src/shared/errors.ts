/**
 * PadicError hierarchy — structured error classification.
 *
 * Every error carries a stable code and a category. Nothing in the library
 * performs I/O, so no category is retryable: the category tells the caller
 * whether the fault is in its arguments, in an internal contract, or in a value
 * that the representation cannot express.
 */

/** Error categories that tell the caller who is at fault. */
export const ErrorCategory = {
	InvalidArgument: "invalid_argument",
	ContractViolation: "contract_violation",
	Unrepresentable: "unrepresentable",
	Configuration: "configuration",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing PadicError subclasses with optional cause chain. */
interface PadicErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & PadicErrorOptions;

/** Base error class for every failure raised by the library. */
export class PadicError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "PadicError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** The prime parameter failed the primality check. */
export class InvalidPrimeError extends PadicError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_PRIME", ErrorCategory.InvalidArgument, rest, "use a prime such as 2, 3, 5 or 7");
		this.name = "InvalidPrimeError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** The precision parameter is not a positive integer. */
export class InvalidPrecisionError extends PadicError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_PRECISION", ErrorCategory.InvalidArgument, rest);
		this.name = "InvalidPrecisionError";
		if (cause !== undefined) this.cause = cause;
	}
}

/**
 * Unparseable input, a zero denominator, or a denominator that still shares a
 * factor with p when the digit expander is called.
 */
export class InvalidInputError extends PadicError {
	constructor(
		message: string,
		context: ErrorContext = {},
		category: ErrorCategory = ErrorCategory.InvalidArgument,
	) {
		const { cause, ...rest } = context;
		super(message, "INVALID_INPUT", category, rest);
		this.name = "InvalidInputError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Arithmetic or comparison between numbers over different primes. */
export class PrimeMismatchError extends PadicError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "PRIME_MISMATCH", ErrorCategory.InvalidArgument, rest);
		this.name = "PrimeMismatchError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Integer conversion of a value with a fractional part or a negative valuation. */
export class NotAnIntegerError extends PadicError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "NOT_AN_INTEGER", ErrorCategory.Unrepresentable, rest);
		this.name = "NotAnIntegerError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A denominator-power bound tighter than the representation supports. */
export class PrecisionExceededError extends PadicError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "PRECISION_EXCEEDED", ErrorCategory.Unrepresentable, rest);
		this.name = "PrecisionExceededError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Invalid or malformed library configuration. */
export class ConfigError extends PadicError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Configuration, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/**
 * Wrap an unknown thrown value as a PadicError. Library errors pass through;
 * a RangeError from bigint arithmetic (division by zero) becomes InvalidInputError,
 * anything else a contract violation.
 */
export function toPadicError(error: unknown): PadicError {
	if (error instanceof PadicError) return error;
	if (error instanceof RangeError) {
		return new InvalidInputError(error.message, { cause: error });
	}
	if (error instanceof Error) {
		return new PadicError(error.message, "INTERNAL_ERROR", ErrorCategory.ContractViolation, {
			cause: error,
		});
	}
	return new PadicError(String(error), "INTERNAL_ERROR", ErrorCategory.ContractViolation, {
		cause: error,
	});
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for InvalidPrimeError. */
export function isInvalidPrime(e: unknown): e is InvalidPrimeError {
	return e instanceof InvalidPrimeError;
}

/** Type guard for InvalidPrecisionError. */
export function isInvalidPrecision(e: unknown): e is InvalidPrecisionError {
	return e instanceof InvalidPrecisionError;
}

/** Type guard for InvalidInputError. */
export function isInvalidInput(e: unknown): e is InvalidInputError {
	return e instanceof InvalidInputError;
}

/** Type guard for PrimeMismatchError. */
export function isPrimeMismatch(e: unknown): e is PrimeMismatchError {
	return e instanceof PrimeMismatchError;
}

/** Type guard for NotAnIntegerError. */
export function isNotAnInteger(e: unknown): e is NotAnIntegerError {
	return e instanceof NotAnIntegerError;
}

/** Type guard for PrecisionExceededError. */
export function isPrecisionExceeded(e: unknown): e is PrecisionExceededError {
	return e instanceof PrecisionExceededError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

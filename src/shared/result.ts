/**
 * Result<T, E> — failure as a value for the conversion pipeline.
 *
 * extractValuation, expandDigits and parseSeries report bad input through
 * `err`. PAdicNumber.create passes that along untouched, and the throwing
 * factories (`from`, `fromDigits`, `Rational.of`) call `unwrap` at the edge.
 */

export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

/** Applies `fn` to a success; an error passes through as is. */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
	if (!result.ok) return result;
	return ok(fn(result.value));
}

/**
 * The success value, or the error thrown.
 * @throws the carried error; a non-Error payload is wrapped in Error first
 */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (!result.ok) {
		const { error } = result;
		throw error instanceof Error ? error : new Error(String(error));
	}
	return result.value;
}

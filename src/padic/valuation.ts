import { Rational, gcd } from "../rational/rational.js";
import { InvalidInputError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";

/** `num/den = p^valuation * unitNumerator/unitDenominator`, neither unit part divisible by p. */
export interface ValuationSplit {
	readonly valuation: number;
	readonly unitNumerator: bigint;
	/** Always positive. */
	readonly unitDenominator: bigint;
}

function stripFactor(value: bigint, prime: bigint): { readonly rest: bigint; readonly count: number } {
	let rest = value;
	let count = 0;
	while (rest % prime === 0n) {
		rest /= prime;
		count++;
	}
	return { rest, count };
}

/**
 * Factors the exact power of `prime` out of `num/den`.
 *
 * The fraction is reduced first, so at most one of numerator and denominator
 * carries the prime. Zero has no finite valuation and is rejected; callers
 * special-case it.
 *
 * @example extractValuation(7n, 25n, 5n) // ok({ valuation: -2, unitNumerator: 7n, unitDenominator: 1n })
 */
export function extractValuation(
	num: bigint,
	den: bigint,
	prime: bigint,
): Result<ValuationSplit, InvalidInputError> {
	if (den === 0n) {
		return err(new InvalidInputError("extractValuation: zero denominator", { num: num.toString() }));
	}
	if (num === 0n) {
		return err(
			new InvalidInputError("extractValuation: zero has no finite valuation", {
				prime: prime.toString(),
			}),
		);
	}
	if (prime < 2n) {
		return err(new InvalidInputError("extractValuation: prime must be at least 2", { prime: prime.toString() }));
	}

	const sign = den < 0n ? -1n : 1n;
	const g = gcd(num, den);
	const numerator = stripFactor((sign * num) / g, prime);
	const denominator = stripFactor((sign * den) / g, prime);

	return ok({
		valuation: numerator.count - denominator.count,
		unitNumerator: numerator.rest,
		unitDenominator: denominator.rest,
	});
}

/** The p-adic valuation of a non-zero rational. */
export function valuationOf(value: Rational, prime: bigint): Result<number, InvalidInputError> {
	const split = extractValuation(value.numerator, value.denominator, prime);
	return split.ok ? ok(split.value.valuation) : split;
}

/**
 * Decimal approximation of exact ratios, backed by decimal.js-light.
 *
 * Rationals stay exact everywhere else in the library; this module exists so a
 * reconstructed value can be shown or compared as an ordinary decimal without
 * going through IEEE 754 division of two huge integers.
 */
import DecimalLight from "decimal.js-light";

const WORKING_PRECISION = 60;

DecimalLight.set({
	precision: WORKING_PRECISION,
	rounding: DecimalLight.ROUND_HALF_UP,
	toExpNeg: -WORKING_PRECISION,
	toExpPos: WORKING_PRECISION,
});

function quotient(numerator: bigint, denominator: bigint): DecimalLight {
	if (denominator === 0n) {
		throw new RangeError("approximate: zero denominator");
	}
	return new DecimalLight(numerator.toString()).div(new DecimalLight(denominator.toString()));
}

/**
 * Formats `numerator / denominator` rounded half-up to `significantDigits`.
 * @example approximate(1n, 3n, 5) // "0.33333"
 */
export function approximate(numerator: bigint, denominator: bigint, significantDigits: number): string {
	if (!Number.isInteger(significantDigits) || significantDigits < 1 || significantDigits > WORKING_PRECISION) {
		throw new RangeError(`approximate: significantDigits must be in [1, ${WORKING_PRECISION}]`);
	}
	return quotient(numerator, denominator).toSignificantDigits(significantDigits).toString();
}

/** Nearest double to `numerator / denominator`. */
export function approximateNumber(numerator: bigint, denominator: bigint): number {
	return quotient(numerator, denominator).toNumber();
}

import { Rational } from "../rational/rational.js";

export interface SeriesSpec {
	readonly valuation: number;
	/** Coefficients of p^valuation, p^(valuation+1), ... */
	readonly digits: readonly number[];
	readonly prime: number;
	/**
	 * Repeating block `digits[start, start + length)`. When present the block is
	 * summed as the infinite geometric series it stands for, and digits after it
	 * are ignored. A block with no digits is not a cycle and is ignored.
	 */
	readonly cycle?: { readonly start: number; readonly length: number } | undefined;
}

/** Horner evaluation of `Σ digits[from + k] · p^k` for k in `[0, to − from)`. */
export function horner(digits: readonly number[], prime: bigint, from = 0, to = digits.length): bigint {
	let result = 0n;
	for (let i = to - 1; i >= from; i--) {
		result = result * prime + BigInt(digits[i] ?? 0);
	}
	return result;
}

/**
 * Rebuilds the rational `Σ a_i · p^(valuation+i)`.
 *
 * Without a cycle this is the exact value of the finite truncation. With a cycle
 * `[s, s+L)` the block value C contributes `p^s · C / (1 − p^L)`, which is the
 * exact value of the eventually periodic series.
 *
 * @example reconstructSeries({ valuation: 0, digits: [2, 1, 3], prime: 5 }) // 82
 */
export function reconstructSeries(spec: SeriesSpec): Rational {
	const p = BigInt(spec.prime);
	const scale = Rational.of(p).pow(spec.valuation);

	if (spec.cycle === undefined || spec.cycle.length < 1) {
		return Rational.of(horner(spec.digits, p)).mul(scale);
	}

	const { start, length } = spec.cycle;
	const prefix = Rational.of(horner(spec.digits, p, 0, start));
	const block = horner(spec.digits, p, start, start + length);
	const repeating = Rational.of(block * p ** BigInt(start), 1n - p ** BigInt(length));
	return prefix.add(repeating).mul(scale);
}

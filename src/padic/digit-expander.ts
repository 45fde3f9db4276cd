/**
 * DigitExpander — base-p long division of a p-adic unit.
 *
 * The remaining value is kept as `state / denominator` with the denominator
 * fixed. Each step takes the residue of that value mod p as the next digit,
 * subtracts it and divides by p exactly:
 *
 *     digit  = state · denominator⁻¹ mod p
 *     state' = (state − digit · denominator) / p
 *
 * A rational's expansion is eventually periodic, and the periodicity shows up
 * as a repeated state. Repeats are only looked for among the states visited
 * while producing the requested digits.
 */

import { absBigInt, gcd } from "../rational/rational.js";
import { ErrorCategory, InvalidInputError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";

/** How a digit series continues past its materialised digits. */
export type ExpansionTail =
	/** Every later digit is zero; the digits are the exact value. */
	| { readonly kind: "terminating" }
	/** `digits[start, start + length)` repeats forever; the value is exact. */
	| { readonly kind: "periodic"; readonly start: number; readonly length: number }
	/** The digits are an approximation; later digits are unknown. */
	| { readonly kind: "truncated" };

export const TERMINATING: ExpansionTail = { kind: "terminating" };
export const TRUNCATED: ExpansionTail = { kind: "truncated" };

export interface DigitExpansion {
	/** Exactly `count` digits, lowest power first, each in [0, p). */
	readonly digits: readonly number[];
	readonly tail: ExpansionTail;
}

/** Inverse of `a` modulo `m` by the extended Euclidean algorithm; undefined when none exists. */
export function modInverse(a: bigint, m: bigint): bigint | undefined {
	let [oldR, r] = [mod(a, m), m];
	let [oldS, s] = [1n, 0n];
	while (r !== 0n) {
		const q = oldR / r;
		[oldR, r] = [r, oldR - q * r];
		[oldS, s] = [s, oldS - q * s];
	}
	if (oldR !== 1n) return undefined;
	return mod(oldS, m);
}

/** Least non-negative residue of `a` mod `m`. */
export function mod(a: bigint, m: bigint): bigint {
	const r = a % m;
	return r < 0n ? r + m : r;
}

/**
 * Expands `unitNumerator / unitDenominator` into `count` base-`prime` digits.
 *
 * @example
 * expandDigits(-1n, 1n, 5n, 3n) // digits [4, 4, 4], periodic from 0 with length 1
 */
export function expandDigits(
	unitNumerator: bigint,
	unitDenominator: bigint,
	prime: bigint,
	count: number,
): Result<DigitExpansion, InvalidInputError> {
	if (!Number.isSafeInteger(count) || count < 0) {
		return err(new InvalidInputError(`expandDigits: digit count must be a non-negative integer, got ${count}`));
	}
	if (unitDenominator === 0n) {
		return err(new InvalidInputError("expandDigits: zero denominator"));
	}
	if (gcd(unitDenominator, prime) !== 1n) {
		return err(
			new InvalidInputError(
				"expandDigits: denominator shares a factor with the prime",
				{ denominator: unitDenominator.toString(), prime: prime.toString() },
				ErrorCategory.ContractViolation,
			),
		);
	}

	const sign = unitDenominator < 0n ? -1n : 1n;
	const denominator = absBigInt(unitDenominator);
	let state = sign * unitNumerator;
	const inverse = modInverse(denominator, prime);
	if (inverse === undefined) {
		return err(new InvalidInputError("expandDigits: denominator is not invertible mod p"));
	}

	const digits: number[] = [];
	const seen = new Map<bigint, number>();
	let tail: ExpansionTail = TRUNCATED;

	for (let i = 0; i < count; i++) {
		if (state === 0n) {
			tail = TERMINATING;
			break;
		}
		const firstSeen = seen.get(state);
		if (firstSeen !== undefined) {
			tail = { kind: "periodic", start: firstSeen, length: i - firstSeen };
			break;
		}
		seen.set(state, i);

		const digit = mod(state * inverse, prime);
		digits.push(Number(digit));
		state = (state - digit * denominator) / prime;
	}

	if (tail.kind === "truncated") {
		// the state after the last digit may already close the cycle
		const firstSeen = seen.get(state);
		if (state === 0n) {
			tail = TERMINATING;
		} else if (firstSeen !== undefined) {
			tail = { kind: "periodic", start: firstSeen, length: digits.length - firstSeen };
		}
	}

	return ok({ digits: fill(digits, tail, count), tail });
}

/** Extends `digits` to `count` entries following the tail (zeros, or the repeating block). */
function fill(digits: number[], tail: ExpansionTail, count: number): readonly number[] {
	while (digits.length < count) {
		if (tail.kind === "periodic") {
			const source = digits[tail.start + ((digits.length - tail.start) % tail.length)];
			digits.push(source ?? 0);
		} else {
			digits.push(0);
		}
	}
	return digits;
}

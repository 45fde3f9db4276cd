/**
 * Rational — exact fractions over bigint.
 *
 * The boundary type for p-adic conversion. Always stored in lowest terms with a
 * positive denominator, so structural equality of numerator and denominator is
 * value equality.
 */

import { approximate, approximateNumber } from "../lib/decimal/index.js";
import { InvalidInputError } from "../shared/errors.js";
import { err, ok, unwrap } from "../shared/result.js";
import type { Result } from "../shared/result.js";

/** Integer operand accepted by the factories: a bigint or a safe integer number. */
export type IntegerLike = bigint | number;

export function absBigInt(n: bigint): bigint {
	return n < 0n ? -n : n;
}

export function gcd(a: bigint, b: bigint): bigint {
	let x = absBigInt(a);
	let y = absBigInt(b);
	while (y !== 0n) {
		[x, y] = [y, x % y];
	}
	return x;
}

/** Converts a safe integer number to bigint; rejects fractions, NaN and unsafe magnitudes. */
export function toBigInt(value: IntegerLike, label = "value"): Result<bigint, InvalidInputError> {
	if (typeof value === "bigint") return ok(value);
	if (!Number.isSafeInteger(value)) {
		return err(new InvalidInputError(`${label} must be a safe integer, got ${value}`, { [label]: value }));
	}
	return ok(BigInt(value));
}

const RATIONAL_PATTERN = /^\s*([+-]?\d+)\s*(?:\/\s*([+-]?\d+)\s*)?$/;

export class Rational {
	static readonly ZERO = new Rational(0n, 1n);
	static readonly ONE = new Rational(1n, 1n);

	readonly numerator: bigint;
	readonly denominator: bigint;

	private constructor(numerator: bigint, denominator: bigint) {
		this.numerator = numerator;
		this.denominator = denominator;
	}

	// ── Factories ──────────────────────────────────────────────────

	/** Reduces `numerator / denominator`; fails on a zero denominator. */
	static create(numerator: IntegerLike, denominator: IntegerLike = 1n): Result<Rational, InvalidInputError> {
		const n = toBigInt(numerator, "numerator");
		if (!n.ok) return n;
		const d = toBigInt(denominator, "denominator");
		if (!d.ok) return d;
		if (d.value === 0n) {
			return err(
				new InvalidInputError("Rational: zero denominator", { numerator: n.value.toString() }),
			);
		}
		return ok(Rational.normalize(n.value, d.value));
	}

	/**
	 * Throwing variant of {@link Rational.create}.
	 * @example Rational.of(6, -4).toString() // "-3/2"
	 */
	static of(numerator: IntegerLike, denominator: IntegerLike = 1n): Rational {
		return unwrap(Rational.create(numerator, denominator));
	}

	/** Parses `"n"` or `"n/d"` (optional signs, surrounding whitespace). */
	static parse(text: string): Result<Rational, InvalidInputError> {
		const match = RATIONAL_PATTERN.exec(text);
		if (!match?.[1]) {
			return err(new InvalidInputError(`Rational: cannot parse "${text}"`, { text }));
		}
		return Rational.create(BigInt(match[1]), match[2] === undefined ? 1n : BigInt(match[2]));
	}

	private static normalize(numerator: bigint, denominator: bigint): Rational {
		if (numerator === 0n) return Rational.ZERO;
		const sign = denominator < 0n ? -1n : 1n;
		const g = gcd(numerator, denominator);
		return new Rational((sign * numerator) / g, (sign * denominator) / g);
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: Rational): Rational {
		return Rational.normalize(
			this.numerator * other.denominator + other.numerator * this.denominator,
			this.denominator * other.denominator,
		);
	}

	sub(other: Rational): Rational {
		return this.add(other.neg());
	}

	mul(other: Rational): Rational {
		return Rational.normalize(this.numerator * other.numerator, this.denominator * other.denominator);
	}

	/** @throws InvalidInputError when dividing by zero */
	div(other: Rational): Rational {
		if (other.isZero()) {
			throw new InvalidInputError("Rational.div: division by zero", { dividend: this.toString() });
		}
		return Rational.normalize(this.numerator * other.denominator, this.denominator * other.numerator);
	}

	neg(): Rational {
		return new Rational(-this.numerator, this.denominator);
	}

	/**
	 * Integer power; negative exponents invert.
	 * @throws InvalidInputError for a negative power of zero
	 */
	pow(exponent: number): Rational {
		if (!Number.isSafeInteger(exponent)) {
			throw new InvalidInputError(`Rational.pow: exponent must be an integer, got ${exponent}`);
		}
		if (exponent < 0) {
			if (this.isZero()) {
				throw new InvalidInputError("Rational.pow: zero to a negative power");
			}
			return Rational.normalize(this.denominator ** BigInt(-exponent), this.numerator ** BigInt(-exponent));
		}
		const e = BigInt(exponent);
		return new Rational(this.numerator ** e, this.denominator ** e);
	}

	// ── Comparison ─────────────────────────────────────────────────

	equals(other: Rational): boolean {
		return this.numerator === other.numerator && this.denominator === other.denominator;
	}

	compare(other: Rational): -1 | 0 | 1 {
		const lhs = this.numerator * other.denominator;
		const rhs = other.numerator * this.denominator;
		return lhs < rhs ? -1 : lhs > rhs ? 1 : 0;
	}

	isZero(): boolean {
		return this.numerator === 0n;
	}

	isInteger(): boolean {
		return this.denominator === 1n;
	}

	// ── Conversion ─────────────────────────────────────────────────

	toString(): string {
		return this.denominator === 1n ? this.numerator.toString() : `${this.numerator}/${this.denominator}`;
	}

	/** Rounded decimal form, e.g. `"0.4285714286"` for 3/7 at 10 digits. */
	toDecimalString(significantDigits = 20): string {
		return approximate(this.numerator, this.denominator, significantDigits);
	}

	toNumber(): number {
		return approximateNumber(this.numerator, this.denominator);
	}

	toJSON(): { numerator: string; denominator: string } {
		return { numerator: this.numerator.toString(), denominator: this.denominator.toString() };
	}
}

/**
 * PAdicNumber — an immutable, precision-bounded element of Q_p.
 *
 * A non-zero value is stored as `p^valuation · Σ digits[i] · p^i` with a nonzero
 * first digit. At most `precision` digits are kept; trailing zeros are implicit.
 * The tail records whether the stored digits are the exact value (terminating
 * or periodic) or a truncation.
 *
 * Equality is approximate: two numbers are equal when their digits agree up to
 * the smaller precision. Arithmetic goes through exact rationals and re-expands
 * at the smaller precision; an inexact operand makes the result inexact.
 */

import { isPrime } from "../primes/is-prime.js";
import { Rational } from "../rational/rational.js";
import type { IntegerLike } from "../rational/rational.js";
import { formatSeries } from "../series/format.js";
import type { SeriesTerm, SeriesTerms } from "../series/format.js";
import { parseSeries } from "../series/parse.js";
import { DEFAULT_PADIC_CONFIG } from "../shared/config.js";
import {
	InvalidInputError,
	InvalidPrecisionError,
	InvalidPrimeError,
	NotAnIntegerError,
	PrecisionExceededError,
	PrimeMismatchError,
} from "../shared/errors.js";
import type { PadicError } from "../shared/errors.js";
import { err, ok, unwrap } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { TERMINATING, TRUNCATED, expandDigits } from "./digit-expander.js";
import type { ExpansionTail } from "./digit-expander.js";
import { toPadicInput } from "./input.js";
import type { PadicInput, PadicValue } from "./input.js";
import { reconstructSeries } from "./series-reconstructor.js";
import { extractValuation } from "./valuation.js";

export const DEFAULT_PRECISION = DEFAULT_PADIC_CONFIG.defaultPrecision;
export const DEFAULT_SHOW_DIGITS = DEFAULT_PADIC_CONFIG.showDigits;

interface PadicFields {
	readonly prime: number;
	readonly precision: number;
	readonly valuation: number;
	readonly digits: readonly number[];
	readonly tail: ExpansionTail;
}

/** Direct digit construction. */
export interface DigitsSpec {
	readonly prime: number;
	readonly valuation?: number;
	/** Coefficients of p^valuation upward; leading zeros shift the valuation. */
	readonly digits: readonly number[];
	readonly precision?: number;
	/** Whether the digits are the whole series (default) or a truncation. */
	readonly exact?: boolean;
}

/** Checks that `prime` is prime and `precision` a positive integer. */
export function validateField(prime: number, precision: number): Result<undefined, PadicError> {
	if (!isPrime(prime)) {
		return err(new InvalidPrimeError(`${prime} is not prime`, { prime }));
	}
	if (!Number.isSafeInteger(precision) || precision <= 0) {
		return err(
			new InvalidPrecisionError(`precision must be a positive integer, got ${precision}`, { precision }),
		);
	}
	return ok(undefined);
}

function trimTrailingZeros(digits: readonly number[]): number[] {
	let end = digits.length;
	while (end > 0 && digits[end - 1] === 0) end--;
	return digits.slice(0, end);
}

type Combine = (a: Rational, b: Rational) => Rational;

export class PAdicNumber {
	readonly prime: number;
	readonly precision: number;
	/** Exponent of the first stored digit; 0 for zero. */
	readonly valuation: number;
	readonly digits: readonly number[];
	readonly tail: ExpansionTail;

	private constructor(fields: PadicFields) {
		this.prime = fields.prime;
		this.precision = fields.precision;
		this.valuation = fields.valuation;
		this.digits = Object.freeze([...fields.digits]);
		this.tail = fields.tail;
		Object.freeze(this);
	}

	get isZero(): boolean {
		return this.digits.length === 0;
	}

	/** True unless the digits are a truncation of a longer series. */
	get isExact(): boolean {
		return this.tail.kind !== "truncated";
	}

	// ── Factories ──────────────────────────────────────────────────

	/** Converts an integer, rational or another PAdicNumber. */
	static create(
		value: PadicValue,
		prime: number,
		precision: number = DEFAULT_PRECISION,
	): Result<PAdicNumber, PadicError> {
		const input = toPadicInput(value);
		if (!input.ok) return input;
		return PAdicNumber.fromInput(input.value, prime, precision);
	}

	/**
	 * Throwing variant of {@link PAdicNumber.create}.
	 * @example PAdicNumber.from(Rational.of(7, 25), 5).valuation // -2
	 */
	static from(value: PadicValue, prime: number, precision: number = DEFAULT_PRECISION): PAdicNumber {
		return unwrap(PAdicNumber.create(value, prime, precision));
	}

	static fromInt(integer: IntegerLike, prime: number, precision: number = DEFAULT_PRECISION): PAdicNumber {
		return PAdicNumber.from(integer, prime, precision);
	}

	/** @example PAdicNumber.fromDigits({ prime: 5, digits: [2, 1, 3] }).toRational() // 82 */
	static fromDigits(spec: DigitsSpec): PAdicNumber {
		const input: PadicInput = {
			kind: "digits",
			valuation: spec.valuation ?? 0,
			digits: spec.digits,
			exact: spec.exact ?? true,
		};
		return unwrap(PAdicNumber.fromInput(input, spec.prime, spec.precision ?? DEFAULT_PRECISION));
	}

	static zero(prime: number, precision: number = DEFAULT_PRECISION): PAdicNumber {
		unwrap(validateField(prime, precision));
		return PAdicNumber.zeroOf(prime, precision, TERMINATING);
	}

	/**
	 * Reads series notation. An `O(p^k)` term marks the result inexact and caps its
	 * precision at `k - valuation`.
	 * @example PAdicNumber.parse("1/5 + 2 + 3*5", 5) // ok, value 86/5
	 */
	static parse(text: string, prime: number, precision?: number): Result<PAdicNumber, PadicError> {
		const field = validateField(prime, precision ?? DEFAULT_PRECISION);
		if (!field.ok) return field;
		const parsed = parseSeries(text, prime);
		if (!parsed.ok) return parsed;

		const { valuation, digits, orderExponent } = parsed.value;
		if (orderExponent === undefined) {
			return PAdicNumber.fromInput(
				{ kind: "digits", valuation, digits, exact: true },
				prime,
				precision ?? DEFAULT_PRECISION,
			);
		}
		const known = orderExponent - valuation;
		if (digits.length === 0) {
			if (known <= 0) {
				return err(
					new InvalidInputError(`O(${prime}^${orderExponent}) leaves no known digits of zero`, { text }),
				);
			}
			const zeroPrecision = precision === undefined ? known : Math.min(precision, known);
			return ok(PAdicNumber.zeroOf(prime, zeroPrecision, TRUNCATED));
		}
		return PAdicNumber.fromInput(
			{ kind: "digits", valuation, digits, exact: false },
			prime,
			precision === undefined ? known : Math.min(precision, known),
		);
	}

	/** Routes each input variant to its conversion path. */
	static fromInput(input: PadicInput, prime: number, precision: number): Result<PAdicNumber, PadicError> {
		const field = validateField(prime, precision);
		if (!field.ok) return field;

		switch (input.kind) {
			case "integer":
				return PAdicNumber.expand(Rational.of(input.value), prime, precision, true);
			case "rational":
				return PAdicNumber.expand(input.value, prime, precision, true);
			case "padic":
				return PAdicNumber.copy(input.value, prime, precision);
			case "digits":
				return PAdicNumber.fromDigitArray(input.digits, input.valuation, prime, precision, input.exact);
		}
	}

	private static zeroOf(prime: number, precision: number, tail: ExpansionTail): PAdicNumber {
		return new PAdicNumber({ prime, precision, valuation: 0, digits: [], tail });
	}

	/** Rational → extractValuation → expandDigits. */
	private static expand(
		value: Rational,
		prime: number,
		precision: number,
		exact: boolean,
	): Result<PAdicNumber, InvalidInputError> {
		if (value.isZero()) {
			return ok(PAdicNumber.zeroOf(prime, precision, exact ? TERMINATING : TRUNCATED));
		}
		const p = BigInt(prime);
		const split = extractValuation(value.numerator, value.denominator, p);
		if (!split.ok) return split;
		const expansion = expandDigits(split.value.unitNumerator, split.value.unitDenominator, p, precision);
		if (!expansion.ok) return expansion;

		const { digits, tail } = expansion.value;
		const valuation = split.value.valuation;
		if (exact && tail.kind === "periodic") {
			return ok(new PAdicNumber({ prime, precision, valuation, digits, tail }));
		}
		return ok(
			new PAdicNumber({
				prime,
				precision,
				valuation,
				digits: trimTrailingZeros(digits),
				tail: exact ? tail : TRUNCATED,
			}),
		);
	}

	private static copy(source: PAdicNumber, prime: number, precision: number): Result<PAdicNumber, PadicError> {
		if (source.prime === prime) {
			return ok(source.resize(precision));
		}
		if (source.isZero) {
			return ok(PAdicNumber.zeroOf(prime, precision, source.tail));
		}
		return PAdicNumber.expand(source.toRational(), prime, precision, source.isExact);
	}

	private static fromDigitArray(
		digits: readonly number[],
		valuation: number,
		prime: number,
		precision: number,
		exact: boolean,
	): Result<PAdicNumber, InvalidInputError> {
		if (!Number.isSafeInteger(valuation)) {
			return err(new InvalidInputError(`valuation must be an integer, got ${valuation}`, { valuation }));
		}
		for (const [index, digit] of digits.entries()) {
			if (!Number.isInteger(digit) || digit < 0 || digit >= prime) {
				return err(
					new InvalidInputError(`digit ${digit} at index ${index} is outside [0, ${prime})`, {
						digit,
						index,
						prime,
					}),
				);
			}
		}

		const lead = digits.findIndex((d) => d !== 0);
		if (lead === -1) {
			return ok(PAdicNumber.zeroOf(prime, precision, exact ? TERMINATING : TRUNCATED));
		}
		const significant = digits.slice(lead);
		const droppedNonzero = significant.slice(precision).some((d) => d !== 0);
		return ok(
			new PAdicNumber({
				prime,
				precision,
				valuation: valuation + lead,
				digits: trimTrailingZeros(significant.slice(0, precision)),
				tail: exact && !droppedNonzero ? TERMINATING : TRUNCATED,
			}),
		);
	}

	// ── Copies ─────────────────────────────────────────────────────

	/**
	 * Same prime, new precision. Shrinking drops digits (and exactness, unless
	 * only implicit zeros or a still-complete cycle are affected); growing repeats
	 * the cycle of a periodic value and pads everything else with zeros.
	 */
	withPrecision(precision: number): PAdicNumber {
		unwrap(validateField(this.prime, precision));
		return this.resize(precision);
	}

	/** Re-expands the rational value over another prime. */
	toPrime(prime: number, precision: number = this.precision): PAdicNumber {
		return PAdicNumber.from(this, prime, precision);
	}

	private resize(precision: number): PAdicNumber {
		if (precision === this.precision) return this;
		const { prime, valuation, tail } = this;
		if (this.isZero) {
			return PAdicNumber.zeroOf(prime, precision, tail);
		}
		if (tail.kind === "periodic" && tail.start + tail.length <= precision) {
			const digits = Array.from({ length: precision }, (_, i) => this.digitAt(i));
			return new PAdicNumber({ prime, precision, valuation, digits, tail });
		}
		const complete = tail.kind === "terminating" && this.digits.length <= precision;
		return new PAdicNumber({
			prime,
			precision,
			valuation,
			digits: trimTrailingZeros(this.digits.slice(0, precision)),
			tail: complete ? TERMINATING : TRUNCATED,
		});
	}

	// ── Digits ─────────────────────────────────────────────────────

	/** Coefficient of p^(valuation + index), following the cycle past the stored digits. */
	digitAt(index: number): number {
		if (index < 0) return 0;
		if (index < this.digits.length) return this.digits[index] ?? 0;
		if (this.tail.kind === "periodic") {
			const { start, length } = this.tail;
			return this.digits[start + ((index - start) % length)] ?? 0;
		}
		return 0;
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * The represented rational. Exact for terminating and periodic tails, the
	 * value of the truncation otherwise.
	 * @param maxDenominatorPower - largest power of p the caller accepts in the denominator
	 * @throws PrecisionExceededError when `-valuation` exceeds `maxDenominatorPower`
	 */
	toRational(maxDenominatorPower?: number): Rational {
		if (this.isZero) return Rational.ZERO;
		if (maxDenominatorPower !== undefined && -this.valuation > maxDenominatorPower) {
			throw new PrecisionExceededError(
				`denominator needs ${this.prime}^${-this.valuation}, bound is ${this.prime}^${maxDenominatorPower}`,
				{ valuation: this.valuation, maxDenominatorPower },
			);
		}
		const { tail } = this;
		return reconstructSeries({
			valuation: this.valuation,
			digits: this.digits,
			prime: this.prime,
			cycle: tail.kind === "periodic" ? { start: tail.start, length: tail.length } : undefined,
		});
	}

	/** @throws NotAnIntegerError for a negative valuation or a fractional value */
	toInt(): bigint {
		if (this.isZero) return 0n;
		if (this.valuation < 0) {
			throw new NotAnIntegerError(`valuation ${this.valuation} is negative`, { valuation: this.valuation });
		}
		const value = this.toRational();
		if (!value.isInteger()) {
			throw new NotAnIntegerError(`${value.toString()} is not an integer`, { value: value.toString() });
		}
		return value.numerator;
	}

	/** The p-adic absolute value `p^-valuation`; zero for zero. */
	norm(): Rational {
		return this.isZero ? Rational.ZERO : Rational.of(this.prime).pow(-this.valuation);
	}

	/** This number divided by `p^valuation`. */
	unitPart(): PAdicNumber {
		if (this.isZero) return this;
		return new PAdicNumber({ ...this.fields(), valuation: 0 });
	}

	private fields(): PadicFields {
		return {
			prime: this.prime,
			precision: this.precision,
			valuation: this.valuation,
			digits: this.digits,
			tail: this.tail,
		};
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: PAdicNumber): PAdicNumber {
		return this.combine(other, "add", (a, b) => a.add(b));
	}

	sub(other: PAdicNumber): PAdicNumber {
		return this.combine(other, "subtract", (a, b) => a.sub(b));
	}

	mul(other: PAdicNumber): PAdicNumber {
		return this.combine(other, "multiply", (a, b) => a.mul(b));
	}

	/** @throws InvalidInputError when `other` is zero */
	div(other: PAdicNumber): PAdicNumber {
		return this.combine(other, "divide", (a, b) => a.div(b));
	}

	neg(): PAdicNumber {
		if (this.isZero) return this;
		return unwrap(PAdicNumber.expand(this.toRational().neg(), this.prime, this.precision, this.isExact));
	}

	private combine(other: PAdicNumber, operation: string, fn: Combine): PAdicNumber {
		if (other.prime !== this.prime) {
			throw new PrimeMismatchError(
				`cannot ${operation} a ${this.prime}-adic and a ${other.prime}-adic number`,
				{ operation, left: this.prime, right: other.prime },
			);
		}
		const precision = Math.min(this.precision, other.precision);
		const a = this.resize(precision);
		const b = other.resize(precision);
		const value = fn(a.toRational(), b.toRational());
		return unwrap(PAdicNumber.expand(value, this.prime, precision, a.isExact && b.isExact));
	}

	// ── Comparison ─────────────────────────────────────────────────

	/**
	 * Precision-bounded equality: both zero, or the same prime and valuation with
	 * digits agreeing below `min(this.precision, other.precision, withinPrecision)`.
	 * Not field equality: distinct values that agree to that many digits compare equal.
	 */
	equals(other: PAdicNumber, withinPrecision?: number): boolean {
		if (withinPrecision !== undefined && (!Number.isSafeInteger(withinPrecision) || withinPrecision <= 0)) {
			throw new InvalidPrecisionError(`withinPrecision must be a positive integer, got ${withinPrecision}`, {
				withinPrecision,
			});
		}
		if (this.isZero || other.isZero) return this.isZero && other.isZero;
		if (this.prime !== other.prime || this.valuation !== other.valuation) return false;

		const limit = Math.min(this.precision, other.precision, withinPrecision ?? Number.POSITIVE_INFINITY);
		for (let i = 0; i < limit; i++) {
			if (this.digitAt(i) !== other.digitAt(i)) return false;
		}
		return true;
	}

	// ── Display ────────────────────────────────────────────────────

	/** The first `showDigits` logical digits as (exponent, digit) pairs, zeros omitted. */
	terms(showDigits: number = DEFAULT_SHOW_DIGITS): SeriesTerms {
		if (!Number.isSafeInteger(showDigits) || showDigits <= 0) {
			throw new InvalidInputError(`showDigits must be a positive integer, got ${showDigits}`, { showDigits });
		}
		const shown = Math.min(showDigits, this.precision);
		if (this.isZero) {
			// an inexact zero still prints its order term
			return this.isExact
				? { prime: this.prime, terms: [], truncated: false, orderExponent: 0 }
				: { prime: this.prime, terms: [], truncated: true, orderExponent: shown };
		}
		const terms: SeriesTerm[] = [];
		for (let i = 0; i < shown; i++) {
			const digit = this.digitAt(i);
			if (digit !== 0) terms.push({ exponent: this.valuation + i, digit });
		}
		const complete = this.tail.kind === "terminating" && this.digits.length <= shown;
		return {
			prime: this.prime,
			terms,
			truncated: !complete,
			orderExponent: this.valuation + shown,
		};
	}

	/** @example PAdicNumber.from(82, 5).toSeriesString() // "2 + 1*5 + 3*5^2" */
	toSeriesString(showDigits: number = DEFAULT_SHOW_DIGITS): string {
		return formatSeries(this.terms(showDigits));
	}

	toString(): string {
		return this.toSeriesString();
	}

	toJSON(): Record<string, unknown> {
		return {
			prime: this.prime,
			precision: this.precision,
			valuation: this.valuation,
			digits: [...this.digits],
			isZero: this.isZero,
			tail: this.tail,
		};
	}
}

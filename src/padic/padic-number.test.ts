import { describe, expect, it } from "vitest";
import { Rational } from "../rational/rational.js";
import {
	InvalidInputError,
	InvalidPrecisionError,
	InvalidPrimeError,
	NotAnIntegerError,
	PrecisionExceededError,
	PrimeMismatchError,
} from "../shared/errors.js";
import { PAdicNumber } from "./padic-number.js";

const q = (num: number, den = 1) => Rational.of(num, den);

describe("PAdicNumber", () => {
	describe("construction from integers", () => {
		it("expands 42 over 5 and converts back exactly", () => {
			const n = PAdicNumber.from(42, 5);
			expect(n.valuation).toBe(0);
			expect(n.digits).toEqual([2, 3, 1]);
			expect(n.tail).toEqual({ kind: "terminating" });
			expect(n.toRational().equals(q(42))).toBe(true);
		});

		it("keeps a non-negative valuation for -42 and returns it from toInt", () => {
			const n = PAdicNumber.from(-42, 5);
			expect(n.valuation).toBeGreaterThanOrEqual(0);
			expect(n.digits.slice(0, 5)).toEqual([3, 1, 3, 4, 4]);
			expect(n.toInt()).toBe(-42n);
		});

		it("accepts bigints and the fromInt factory", () => {
			expect(PAdicNumber.from(10n ** 15n, 7).toInt()).toBe(10n ** 15n);
			expect(PAdicNumber.fromInt(100, 3).toRational().toString()).toBe("100");
		});

		it("pulls powers of p into the valuation", () => {
			const n = PAdicNumber.from(250, 5);
			expect(n.valuation).toBe(3);
			expect(n.digits).toEqual([2]);
		});

		it.each([0, 1, -1, 42, -17, 100, 1000])("round-trips %i over every small prime", (value) => {
			for (const prime of [2, 3, 5, 7, 11]) {
				expect(PAdicNumber.from(value, prime).toRational().toString()).toBe(String(value));
			}
		});
	});

	describe("construction from rationals", () => {
		it("reconstructs 3/7 over 5 at precision 10 congruent to 3/7 mod 5^10", () => {
			const n = PAdicNumber.from(q(3, 7), 5, 10);
			const r = n.toRational();
			const modulus = 5n ** 10n;
			// r = 3/7 exactly here, so r·7 ≡ 3 holds mod 5^10
			expect((((r.numerator * 7n - 3n * r.denominator) % modulus) + modulus) % modulus).toBe(0n);
			expect(n.digits).toEqual([4, 0, 2, 1, 4, 2, 3, 0, 2, 1]);
			expect(r.toString()).toBe("3/7");
		});

		it("keeps the requested precision", () => {
			for (const precision of [10, 20, 50]) {
				const n = PAdicNumber.from(q(1, 3), 5, precision);
				expect(n.precision).toBe(precision);
				expect(n.toRational().toString()).toBe("1/3");
			}
		});

		it("gives 7/25 a valuation of -2", () => {
			const n = PAdicNumber.from(q(7, 25), 5);
			expect(n.valuation).toBe(-2);
			expect(n.digits).toEqual([2, 1]);
		});

		const table: Array<[number, number, number, number]> = [
			[1, 2, 5, 0],
			[3, 7, 5, 0],
			[1, 5, 5, -1],
			[1, 25, 5, -2],
			[2, 5, 5, -1],
			[7, 25, 5, -2],
			[15, 4, 5, 1],
			[10, 3, 5, 1],
			[-3, 5, 5, -1],
			[1, 3, 3, -1],
			[9, 1, 3, 2],
			[2, 9, 3, -2],
			[8, 1, 2, 3],
			[1, 4, 2, -2],
			[3, 8, 2, -3],
			[49, 1, 7, 2],
			[5, 7, 7, -1],
			[14, 3, 7, 1],
		];

		it.each(table)("%i/%i over %i has valuation %i and round-trips exactly", (num, den, prime, valuation) => {
			const n = PAdicNumber.from(q(num, den), prime);
			expect(n.valuation).toBe(valuation);
			expect(n.isExact).toBe(true);
			expect(n.digits[0]).not.toBe(0);
			expect(n.toRational().equals(q(num, den))).toBe(true);
		});
	});

	describe("zero", () => {
		it.each([2, 3, 5, 7, 11])("is flagged and converts to 0 over %i", (prime) => {
			const fromInt = PAdicNumber.from(0, prime);
			const fromRational = PAdicNumber.from(Rational.ZERO, prime, 3);
			for (const zero of [fromInt, fromRational, PAdicNumber.zero(prime)]) {
				expect(zero.isZero).toBe(true);
				expect(zero.digits).toEqual([]);
				expect(zero.toRational().equals(Rational.ZERO)).toBe(true);
				expect(zero.toInt()).toBe(0n);
			}
		});
	});

	describe("validation", () => {
		it("rejects a composite prime", () => {
			expect(() => PAdicNumber.from(1, 4)).toThrow(InvalidPrimeError);
			const r = PAdicNumber.create(1, 4);
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error.code).toBe("INVALID_PRIME");
		});

		it.each([0, -3, 2.5])("rejects precision %d", (precision) => {
			expect(() => PAdicNumber.from(1, 5, precision)).toThrow(InvalidPrecisionError);
		});

		it("rejects a fractional number value", () => {
			expect(() => PAdicNumber.from(0.5, 5)).toThrow(InvalidInputError);
		});

		it("checks the prime before the precision", () => {
			const r = PAdicNumber.create(1, 1, 0);
			expect(!r.ok && r.error.code).toBe("INVALID_PRIME");
		});
	});

	describe("fromDigits", () => {
		it("builds 2 + 1*5 + 3*5^2 = 82", () => {
			const n = PAdicNumber.fromDigits({ prime: 5, digits: [2, 1, 3] });
			expect(n.toRational().toString()).toBe("82");
			expect(n.isExact).toBe(true);
		});

		it("moves low-order zeros into the valuation and drops trailing zeros", () => {
			const n = PAdicNumber.fromDigits({ prime: 5, valuation: -1, digits: [0, 0, 2, 1, 0, 0] });
			expect(n.valuation).toBe(1);
			expect(n.digits).toEqual([2, 1]);
		});

		it("treats all-zero digits as zero", () => {
			expect(PAdicNumber.fromDigits({ prime: 3, digits: [0, 0] }).isZero).toBe(true);
		});

		it("truncates past the precision and marks the result inexact", () => {
			const n = PAdicNumber.fromDigits({ prime: 5, digits: [1, 2, 3, 4], precision: 2 });
			expect(n.digits).toEqual([1, 2]);
			expect(n.isExact).toBe(false);
		});

		it("stays exact when only zeros are dropped", () => {
			const n = PAdicNumber.fromDigits({ prime: 5, digits: [1, 2, 0, 0], precision: 2 });
			expect(n.isExact).toBe(true);
		});

		it("honours exact: false", () => {
			expect(PAdicNumber.fromDigits({ prime: 5, digits: [1], exact: false }).tail).toEqual({
				kind: "truncated",
			});
		});

		it.each([[[5]], [[-1]], [[1.5]]])("rejects digits %j over 5", (digits) => {
			expect(() => PAdicNumber.fromDigits({ prime: 5, digits })).toThrow(InvalidInputError);
		});
	});

	describe("copies", () => {
		it("copies through the constructor with the same value", () => {
			for (const value of [q(0), q(1), q(5), q(25), q(42)]) {
				const original = PAdicNumber.from(value, 5);
				const copy = PAdicNumber.from(original, 5);
				expect(copy.toRational().equals(original.toRational())).toBe(true);
				expect(copy.toRational().equals(value)).toBe(true);
			}
		});

		it("keeps a cycle that still fits when shrinking", () => {
			const n = PAdicNumber.from(q(1, 3), 5).withPrecision(3);
			expect(n.digits).toEqual([2, 3, 1]);
			expect(n.toRational().toString()).toBe("1/3");
		});

		it("becomes a truncation when the cycle no longer fits", () => {
			const n = PAdicNumber.from(q(1, 3), 5).withPrecision(2);
			expect(n.digits).toEqual([2, 3]);
			expect(n.isExact).toBe(false);
			expect(n.toRational().toString()).toBe("17");
		});

		it("drops nonzero digits of a terminating value and loses exactness", () => {
			const n = PAdicNumber.from(42, 5).withPrecision(2);
			expect(n.digits).toEqual([2, 3]);
			expect(n.isExact).toBe(false);
		});

		it("extends a periodic value by repeating its cycle", () => {
			const n = PAdicNumber.from(q(1, 3), 5, 3).withPrecision(8);
			expect(n.digits).toEqual([2, 3, 1, 3, 1, 3, 1, 3]);
			expect(n.isExact).toBe(true);
		});

		it("extends a truncated value with implicit zeros", () => {
			const short = PAdicNumber.from(q(1, 7), 2, 2);
			const long = short.withPrecision(6);
			expect(short.isExact).toBe(false);
			expect(long.digits).toEqual([1, 1]);
			expect(long.precision).toBe(6);
			expect(long.isExact).toBe(false);
		});

		it("re-expands over another prime through the rational value", () => {
			const n = PAdicNumber.from(q(1, 3), 5).toPrime(3);
			expect(n.prime).toBe(3);
			expect(n.valuation).toBe(-1);
			expect(n.toRational().toString()).toBe("1/3");
		});

		it("recognises the cycle of -42 at precision 4", () => {
			const n = PAdicNumber.from(-42, 5, 4);
			expect(n.tail).toEqual({ kind: "periodic", start: 3, length: 1 });
			expect(n.toInt()).toBe(-42n);
		});

		it("truncates -42 at precision 3", () => {
			const n = PAdicNumber.from(-42, 5, 3);
			expect(n.isExact).toBe(false);
			expect(n.toRational().toString()).toBe("83");
		});

		it("rejects an invalid target precision", () => {
			expect(() => PAdicNumber.from(1, 5).withPrecision(0)).toThrow(InvalidPrecisionError);
		});
	});

	describe("toRational bound", () => {
		it("fails when the valuation needs a larger power of p", () => {
			const n = PAdicNumber.from(q(7, 25), 5);
			expect(() => n.toRational(1)).toThrow(PrecisionExceededError);
			expect(n.toRational(2).toString()).toBe("7/25");
		});

		it("ignores the bound for a non-negative valuation", () => {
			expect(PAdicNumber.from(10, 5).toRational(0).toString()).toBe("10");
		});
	});

	describe("toInt", () => {
		it("rejects a negative valuation", () => {
			expect(() => PAdicNumber.from(q(1, 5), 5).toInt()).toThrow(NotAnIntegerError);
		});

		it("rejects a unit that is not an integer", () => {
			expect(() => PAdicNumber.from(q(1, 3), 5).toInt()).toThrow("1/3 is not an integer");
		});

		it("returns the integer value of a truncation", () => {
			expect(PAdicNumber.from(q(1, 7), 2, 2).toInt()).toBe(3n);
		});
	});

	describe("arithmetic", () => {
		it("adds 1/3 and 2/3 to exactly 1", () => {
			const sum = PAdicNumber.from(q(1, 3), 5).add(PAdicNumber.from(q(2, 3), 5));
			expect(sum.digits).toEqual([1]);
			expect(sum.isExact).toBe(true);
			expect(sum.equals(PAdicNumber.from(1, 5))).toBe(true);
		});

		it("cancels -42 + 42 to zero", () => {
			expect(PAdicNumber.from(-42, 5).add(PAdicNumber.from(42, 5)).isZero).toBe(true);
		});

		it("multiplies 3/7 by 7", () => {
			const product = PAdicNumber.from(q(3, 7), 5).mul(PAdicNumber.from(7, 5));
			expect(product.toInt()).toBe(3n);
		});

		it("subtracts across valuations", () => {
			const diff = PAdicNumber.from(2, 5).sub(PAdicNumber.from(q(1, 5), 5));
			expect(diff.valuation).toBe(-1);
			expect(diff.toRational().toString()).toBe("9/5");
		});

		it("divides and refuses division by zero", () => {
			const third = PAdicNumber.from(1, 5).div(PAdicNumber.from(3, 5));
			expect(third.toRational().toString()).toBe("1/3");
			expect(() => PAdicNumber.from(1, 5).div(PAdicNumber.zero(5))).toThrow(InvalidInputError);
		});

		it("negates", () => {
			expect(PAdicNumber.from(q(1, 3), 5).neg().toRational().toString()).toBe("-1/3");
			expect(PAdicNumber.zero(5).neg().isZero).toBe(true);
		});

		it("works at the smaller precision", () => {
			const sum = PAdicNumber.from(q(1, 3), 5, 10).add(PAdicNumber.from(1, 5, 5));
			expect(sum.precision).toBe(5);
			expect(sum.toRational().toString()).toBe("4/3");
		});

		it("marks a result inexact when an operand is a truncation", () => {
			const sum = PAdicNumber.from(q(1, 7), 2, 2).add(PAdicNumber.from(1, 2, 2));
			expect(sum.isExact).toBe(false);
			expect(sum.valuation).toBe(2);
			expect(sum.toRational().toString()).toBe("4");
		});

		it("rejects operands over different primes", () => {
			expect(() => PAdicNumber.from(1, 5).add(PAdicNumber.from(1, 3))).toThrow(PrimeMismatchError);
			expect(() => PAdicNumber.from(1, 5).mul(PAdicNumber.from(1, 7))).toThrow(
				"cannot multiply a 5-adic and a 7-adic number",
			);
		});

		it("leaves the operands untouched", () => {
			const a = PAdicNumber.from(q(1, 3), 5);
			const before = [...a.digits];
			a.add(PAdicNumber.from(1, 5)).mul(a);
			expect(a.digits).toEqual(before);
			expect(Object.isFrozen(a)).toBe(true);
			expect(Object.isFrozen(a.digits)).toBe(true);
		});
	});

	describe("equals (approximate, precision-bounded)", () => {
		it("is reflexive and symmetric", () => {
			const values = [PAdicNumber.from(q(3, 7), 5), PAdicNumber.from(-42, 5), PAdicNumber.zero(5)];
			for (const x of values) {
				expect(x.equals(x)).toBe(true);
				for (const y of values) {
					expect(x.equals(y)).toBe(y.equals(x));
				}
			}
		});

		it("compares only up to the smaller precision", () => {
			expect(PAdicNumber.from(q(1, 3), 5, 20).equals(PAdicNumber.from(q(1, 3), 5, 5))).toBe(true);
		});

		it("calls distinct values equal when they agree to that precision", () => {
			// 126 = 1 + 5^3, so the two differ only from the fourth digit on
			expect(PAdicNumber.from(1, 5, 3).equals(PAdicNumber.from(126, 5, 3))).toBe(true);
			expect(PAdicNumber.from(1, 5, 4).equals(PAdicNumber.from(126, 5, 4))).toBe(false);
		});

		it("honours withinPrecision", () => {
			const third = PAdicNumber.from(q(1, 3), 5);
			const seventeen = PAdicNumber.from(17, 5);
			expect(third.equals(seventeen, 2)).toBe(true);
			expect(third.equals(seventeen)).toBe(false);
		});

		it("separates zero, primes and valuations", () => {
			expect(PAdicNumber.zero(5).equals(PAdicNumber.zero(7))).toBe(true);
			expect(PAdicNumber.zero(5).equals(PAdicNumber.from(1, 5))).toBe(false);
			expect(PAdicNumber.from(1, 5).equals(PAdicNumber.from(1, 7))).toBe(false);
			expect(PAdicNumber.from(1, 5).equals(PAdicNumber.from(5, 5))).toBe(false);
		});

		it("rejects a non-positive bound", () => {
			expect(() => PAdicNumber.from(1, 5).equals(PAdicNumber.from(1, 5), 0)).toThrow(InvalidPrecisionError);
		});
	});

	describe("norm and unit part", () => {
		it("gives |50/3|_5 = 1/25 and unit 2/3", () => {
			const n = PAdicNumber.from(q(50, 3), 5);
			expect(n.norm().toString()).toBe("1/25");
			expect(n.unitPart().valuation).toBe(0);
			expect(n.unitPart().toRational().toString()).toBe("2/3");
		});

		it("gives zero a zero norm", () => {
			expect(PAdicNumber.zero(3).norm().isZero()).toBe(true);
		});
	});

	describe("digitAt", () => {
		it("follows the cycle past the stored digits", () => {
			const n = PAdicNumber.from(q(1, 3), 5, 4);
			expect(n.digitAt(10)).toBe(1);
			expect(n.digitAt(11)).toBe(3);
			expect(n.digitAt(-1)).toBe(0);
		});

		it("returns implicit zeros after a terminating series", () => {
			expect(PAdicNumber.from(42, 5).digitAt(3)).toBe(0);
		});
	});

	describe("series display", () => {
		it("formats 82 over 5", () => {
			expect(PAdicNumber.from(82, 5).toSeriesString()).toBe("2 + 1*5 + 3*5^2");
		});

		it("formats negative powers as divisions", () => {
			expect(PAdicNumber.from(q(7, 25), 5).toSeriesString()).toBe("2/5^2 + 1/5");
		});

		it("appends the order term for a periodic value", () => {
			expect(PAdicNumber.from(q(1, 3), 5).toSeriesString(4)).toBe("2 + 3*5 + 1*5^2 + 3*5^3 + O(5^4)");
		});

		it("prints zero as 0", () => {
			expect(PAdicNumber.zero(5).toString()).toBe("0");
		});

		it("enumerates (exponent, digit) pairs", () => {
			expect(PAdicNumber.from(10, 5).terms()).toEqual({
				prime: 5,
				terms: [{ exponent: 1, digit: 2 }],
				truncated: false,
				orderExponent: 11,
			});
		});

		it("stops at the precision when it is below showDigits", () => {
			const series = PAdicNumber.from(q(1, 3), 5, 3).terms(10);
			expect(series.terms.map((t) => t.exponent)).toEqual([0, 1, 2]);
			expect(series.truncated).toBe(true);
			expect(series.orderExponent).toBe(3);
		});

		it("rejects a non-positive term count", () => {
			expect(() => PAdicNumber.from(1, 5).terms(0)).toThrow(InvalidInputError);
		});

		it("serialises to JSON", () => {
			expect(PAdicNumber.from(42, 5).toJSON()).toEqual({
				prime: 5,
				precision: 20,
				valuation: 0,
				digits: [2, 3, 1],
				isZero: false,
				tail: { kind: "terminating" },
			});
		});
	});

	describe("parse", () => {
		it("reads 1/5 + 2 + 3*5 as 86/5", () => {
			const r = PAdicNumber.parse("1/5 + 2 + 3*5", 5);
			expect(r.ok).toBe(true);
			if (r.ok) {
				expect(r.value.valuation).toBe(-1);
				expect(r.value.toRational().toString()).toBe("86/5");
				expect(r.value.toSeriesString()).toBe("1/5 + 2 + 3*5");
			}
		});

		it("takes the precision from the order term", () => {
			const r = PAdicNumber.parse("2 + 3*5 + O(5^4)", 5);
			expect(r.ok).toBe(true);
			if (r.ok) {
				expect(r.value.precision).toBe(4);
				expect(r.value.isExact).toBe(false);
				expect(r.value.toSeriesString()).toBe("2 + 3*5 + O(5^4)");
			}
		});

		it("reads back what the formatter prints", () => {
			const x = PAdicNumber.from(q(3, 7), 5);
			const r = PAdicNumber.parse(x.toSeriesString(), 5);
			expect(r.ok && r.value.equals(x)).toBe(true);
		});

		it("treats an order term alone as an inexact zero known to that order", () => {
			const r = PAdicNumber.parse("O(5^3)", 5);
			expect(r.ok).toBe(true);
			if (r.ok) {
				expect(r.value.isZero).toBe(true);
				expect(r.value.isExact).toBe(false);
				expect(r.value.precision).toBe(3);
				expect(r.value.terms()).toEqual({ prime: 5, terms: [], truncated: true, orderExponent: 3 });
				expect(r.value.toSeriesString()).toBe("O(5^3)");
			}
		});

		it("keeps the order term of a zero through format and parse", () => {
			const first = PAdicNumber.parse("O(7^4)", 7);
			expect(first.ok).toBe(true);
			if (!first.ok) return;
			const again = PAdicNumber.parse(first.value.toSeriesString(), 7);
			expect(again.ok && again.value.precision).toBe(4);
			expect(again.ok && again.value.toSeriesString()).toBe("O(7^4)");
		});

		it("rejects an order term that leaves a zero with no known digits", () => {
			const r = PAdicNumber.parse("O(5^0)", 5);
			expect(!r.ok && r.error.code).toBe("INVALID_INPUT");
		});

		it("reports an invalid prime before reading the text", () => {
			const r = PAdicNumber.parse("1 + 2*4", 4);
			expect(!r.ok && r.error.code).toBe("INVALID_PRIME");
		});

		it("reports malformed text as invalid input", () => {
			const r = PAdicNumber.parse("2 + x", 5);
			expect(!r.ok && r.error.code).toBe("INVALID_INPUT");
		});
	});
});

/**
 * Series notation parser — the inverse of formatSeries.
 *
 * Accepts sums such as `1/5 + 2 + 3*5`, `4*7^2 + O(7^5)` or `3^-2 + 1`. Terms
 * may appear in any order; an `O(p^k)` term must come last.
 */

import { InvalidInputError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";

export interface ParsedSeries {
	readonly valuation: number;
	/** Coefficients from `valuation` upward; empty for zero. */
	readonly digits: readonly number[];
	/** Exponent of the `O(p^k)` term, when present. */
	readonly orderExponent: number | undefined;
}

interface RawTerm {
	readonly base: number;
	readonly exponent: number;
	readonly digit: number;
}

const ORDER = /^O\((\d+)(?:\^(-?\d+))?\)$/;
const CONSTANT = /^(\d+)$/;
const PRODUCT = /^(\d+)\*(\d+)(?:\^(-?\d+))?$/;
const QUOTIENT = /^(\d+)\/(\d+)(?:\^(\d+))?$/;
const POWER = /^(\d+)\^(-?\d+)$/;

function parseTerm(term: string, prime: number): RawTerm | undefined {
	let m = CONSTANT.exec(term);
	if (m) {
		const value = Number(m[1]);
		// a lone `p` is the bare power p^1
		return value === prime ? { digit: 1, base: prime, exponent: 1 } : { digit: value, base: prime, exponent: 0 };
	}
	m = PRODUCT.exec(term);
	if (m) return { digit: Number(m[1]), base: Number(m[2]), exponent: m[3] === undefined ? 1 : Number(m[3]) };
	m = QUOTIENT.exec(term);
	if (m) return { digit: Number(m[1]), base: Number(m[2]), exponent: m[3] === undefined ? -1 : -Number(m[3]) };
	m = POWER.exec(term);
	if (m) return { digit: 1, base: Number(m[1]), exponent: Number(m[2]) };
	return undefined;
}

function invalid(message: string, text: string): Result<never, InvalidInputError> {
	return err(new InvalidInputError(`parseSeries: ${message}`, { text }));
}

/**
 * Parses series notation for the given prime.
 * @example parseSeries("1/5 + 2 + 3*5", 5) // ok({ valuation: -1, digits: [1, 2, 3], orderExponent: undefined })
 */
export function parseSeries(text: string, prime: number): Result<ParsedSeries, InvalidInputError> {
	const compact = text.replace(/\s+/g, "");
	if (compact.length === 0) return invalid("empty input", text);

	const pieces = compact.split("+");
	let orderExponent: number | undefined;
	const coefficients = new Map<number, number>();

	for (const [index, piece] of pieces.entries()) {
		const order = ORDER.exec(piece);
		if (order) {
			if (index !== pieces.length - 1) return invalid("O(...) must be the last term", text);
			if (Number(order[1]) !== prime) return invalid(`O(...) base ${order[1]} is not ${prime}`, text);
			orderExponent = order[2] === undefined ? 1 : Number(order[2]);
			continue;
		}

		const term = parseTerm(piece, prime);
		if (term === undefined) return invalid(`cannot read term "${piece}"`, text);
		if (term.base !== prime) return invalid(`term "${piece}" uses base ${term.base}, expected ${prime}`, text);
		if (!Number.isSafeInteger(term.exponent)) return invalid(`exponent out of range in "${piece}"`, text);
		if (term.digit >= prime) return invalid(`digit ${term.digit} is not below ${prime}`, text);
		if (coefficients.has(term.exponent)) return invalid(`exponent ${term.exponent} appears twice`, text);
		coefficients.set(term.exponent, term.digit);
	}

	const exponents = [...coefficients.entries()].filter(([, digit]) => digit !== 0).map(([e]) => e);
	if (exponents.length === 0) {
		return ok({ valuation: 0, digits: [], orderExponent });
	}

	const valuation = Math.min(...exponents);
	const top = Math.max(...exponents);
	if (orderExponent !== undefined && orderExponent <= top) {
		return invalid(`O(${prime}^${orderExponent}) does not lie above the listed terms`, text);
	}

	const digits: number[] = [];
	for (let e = valuation; e <= top; e++) {
		digits.push(coefficients.get(e) ?? 0);
	}
	return ok({ valuation, digits, orderExponent });
}

/**
 * Construction inputs, resolved once at the boundary.
 *
 * Each variant has its own conversion path in PAdicNumber; nothing downstream
 * inspects runtime types again.
 */

import { Rational, toBigInt } from "../rational/rational.js";
import type { IntegerLike } from "../rational/rational.js";
import type { InvalidInputError } from "../shared/errors.js";
import { map, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { PAdicNumber } from "./padic-number.js";

export type PadicInput =
	| { readonly kind: "integer"; readonly value: bigint }
	| { readonly kind: "rational"; readonly value: Rational }
	| { readonly kind: "padic"; readonly value: PAdicNumber }
	| {
			readonly kind: "digits";
			readonly valuation: number;
			readonly digits: readonly number[];
			/** False when the digits are a truncation of a longer series. */
			readonly exact: boolean;
	  };

/** Anything PAdicNumber.from accepts. */
export type PadicValue = IntegerLike | Rational | PAdicNumber;

export function toPadicInput(value: PadicValue): Result<PadicInput, InvalidInputError> {
	if (typeof value === "bigint" || typeof value === "number") {
		return map(toBigInt(value), (n): PadicInput => ({ kind: "integer", value: n }));
	}
	if (value instanceof Rational) {
		return ok<PadicInput>({ kind: "rational", value });
	}
	return ok<PadicInput>({ kind: "padic", value });
}

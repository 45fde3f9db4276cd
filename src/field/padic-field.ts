/**
 * PadicField — Q_p at a fixed working precision.
 *
 * Bundles the prime, the precision new numbers get, the number of terms shown
 * when formatting, and a logger. Every conversion and operation is logged at
 * debug level; operands from another prime are rejected.
 */

import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { DEFAULT_PRECISION, DEFAULT_SHOW_DIGITS, PAdicNumber, validateField } from "../padic/padic-number.js";
import type { PadicValue } from "../padic/input.js";
import { DEFAULT_PADIC_CONFIG } from "../shared/config.js";
import type { PadicConfig } from "../shared/config.js";
import { PrimeMismatchError } from "../shared/errors.js";
import type { PadicError } from "../shared/errors.js";
import { ok, unwrap } from "../shared/result.js";
import type { Result } from "../shared/result.js";

export interface PadicFieldOptions {
	readonly prime: number;
	readonly precision?: number;
	readonly showDigits?: number;
	readonly logger?: Logger;
}

const optionsSchema = z.object({
	prime: z.number(),
	precision: z.number().optional(),
	showDigits: z.number().int().positive().optional(),
});

function summarize(n: PAdicNumber): Record<string, unknown> {
	return {
		valuation: n.valuation,
		digits: n.digits.length,
		tail: n.tail.kind,
		zero: n.isZero,
	};
}

export class PadicField {
	readonly prime: number;
	readonly precision: number;
	readonly showDigits: number;
	private readonly logger: Logger;

	private constructor(prime: number, precision: number, showDigits: number, logger: Logger) {
		this.prime = prime;
		this.precision = precision;
		this.showDigits = showDigits;
		this.logger = logger;
	}

	/**
	 * Validates the options and builds the field.
	 * @example PadicField.create({ prime: 5, precision: 12 })
	 */
	static create(options: PadicFieldOptions): Result<PadicField, PadicError> {
		const shape = validate(optionsSchema, {
			prime: options.prime,
			precision: options.precision,
			showDigits: options.showDigits,
		});
		if (!shape.ok) return shape;

		const { prime } = shape.value;
		const precision = shape.value.precision ?? DEFAULT_PRECISION;
		const showDigits = shape.value.showDigits ?? DEFAULT_SHOW_DIGITS;
		const field = validateField(prime, precision);
		if (!field.ok) return field;

		const logger = (options.logger ?? silentLogger).child({ prime, precision });
		logger.debug({ showDigits }, "field created");
		return ok(new PadicField(prime, precision, showDigits, logger));
	}

	static fromConfig(
		prime: number,
		config: PadicConfig = DEFAULT_PADIC_CONFIG,
		logger?: Logger,
	): Result<PadicField, PadicError> {
		return PadicField.create({
			prime,
			precision: config.defaultPrecision,
			showDigits: config.showDigits,
			...(logger !== undefined && { logger }),
		});
	}

	// ── Construction ───────────────────────────────────────────────

	tryOf(value: PadicValue): Result<PAdicNumber, PadicError> {
		const result = PAdicNumber.create(value, this.prime, this.precision);
		if (result.ok) {
			this.logger.debug(summarize(result.value), "converted value");
		} else {
			this.logger.debug({ code: result.error.code }, "conversion rejected");
		}
		return result;
	}

	of(value: PadicValue): PAdicNumber {
		return unwrap(this.tryOf(value));
	}

	fromDigits(valuation: number, digits: readonly number[], exact = true): PAdicNumber {
		const n = unwrap(
			PAdicNumber.fromInput({ kind: "digits", valuation, digits, exact }, this.prime, this.precision),
		);
		this.logger.debug(summarize(n), "built from digits");
		return n;
	}

	parse(text: string): Result<PAdicNumber, PadicError> {
		const result = PAdicNumber.parse(text, this.prime, this.precision);
		if (result.ok) {
			this.logger.debug({ text, ...summarize(result.value) }, "parsed series");
		} else {
			this.logger.debug({ text, code: result.error.code }, "parse rejected");
		}
		return result;
	}

	zero(): PAdicNumber {
		return PAdicNumber.zero(this.prime, this.precision);
	}

	one(): PAdicNumber {
		return this.of(1n);
	}

	contains(n: PAdicNumber): boolean {
		return n.prime === this.prime;
	}

	format(n: PAdicNumber): string {
		this.requireMember(n, "format");
		return n.toSeriesString(this.showDigits);
	}

	// ── Arithmetic ─────────────────────────────────────────────────

	add(a: PAdicNumber, b: PAdicNumber): PAdicNumber {
		return this.apply("add", a, b, () => a.add(b));
	}

	sub(a: PAdicNumber, b: PAdicNumber): PAdicNumber {
		return this.apply("sub", a, b, () => a.sub(b));
	}

	mul(a: PAdicNumber, b: PAdicNumber): PAdicNumber {
		return this.apply("mul", a, b, () => a.mul(b));
	}

	div(a: PAdicNumber, b: PAdicNumber): PAdicNumber {
		return this.apply("div", a, b, () => a.div(b));
	}

	private apply(operation: string, a: PAdicNumber, b: PAdicNumber, run: () => PAdicNumber): PAdicNumber {
		this.requireMember(a, operation);
		this.requireMember(b, operation);
		const result = run();
		this.logger.debug({ operation, ...summarize(result) }, "arithmetic");
		return result;
	}

	private requireMember(n: PAdicNumber, operation: string): void {
		if (!this.contains(n)) {
			throw new PrimeMismatchError(`cannot ${operation} a ${n.prime}-adic number in Q_${this.prime}`, {
				operation,
				field: this.prime,
				operand: n.prime,
			});
		}
	}
}

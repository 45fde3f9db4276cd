/**
 * Field Arithmetic — a configured Q_p with structured logging.
 *
 * Reads PADIC_PRECISION, PADIC_SHOW_DIGITS and PADIC_LOG_LEVEL from the
 * environment, then runs a few operations through a PadicField.
 *
 * Run: PADIC_LOG_LEVEL=debug npx tsx examples/field-arithmetic.ts
 */

import {
	PadicField,
	Rational,
	configFromEnv,
	createLogger,
	isPrimeMismatch,
	resolveConfig,
	unwrap,
} from "../src/index.js";

const config = resolveConfig(configFromEnv());
const logger = createLogger({ level: config.logLevel, name: "field-arithmetic" });
const q7 = unwrap(PadicField.fromConfig(7, config, logger));

const a = q7.of(Rational.of(1, 2));
const b = q7.of(Rational.of(5, 3));

console.log(`a       = ${q7.format(a)}`);
console.log(`b       = ${q7.format(b)}`);
console.log(`a + b   = ${q7.format(q7.add(a, b))}  (${q7.add(a, b).toRational().toString()})`);
console.log(`a * b   = ${q7.format(q7.mul(a, b))}  (${q7.mul(a, b).toRational().toString()})`);
console.log(`a / 49  = ${q7.format(q7.div(a, q7.of(49)))}`);

const q5 = unwrap(PadicField.create({ prime: 5 }));
try {
	q7.add(a, q5.one());
} catch (error) {
	if (!isPrimeMismatch(error)) throw error;
	logger.warn({ code: error.code, ...error.context }, error.message);
}

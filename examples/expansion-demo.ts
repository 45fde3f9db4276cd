/**
 * Expansion Demo — integers and fractions as p-adic series.
 *
 * Expands a handful of rationals over a few primes, prints the series with its
 * valuation and norm, and converts each back.
 *
 * Run: npx tsx examples/expansion-demo.ts
 */

import { PAdicNumber, Rational } from "../src/index.js";

const values = [Rational.of(42), Rational.of(-42), Rational.of(1, 3), Rational.of(7, 25), Rational.of(3, 7)];

for (const prime of [2, 5, 7]) {
	console.log(`\n${prime}-adic expansions:`);
	for (const value of values) {
		const x = PAdicNumber.from(value, prime);
		console.log(
			`  ${value.toString().padStart(6)}  v=${String(x.valuation).padStart(2)}  |x|=${x.norm().toString().padEnd(5)}  ${x.toSeriesString(6)}`,
		);
		console.log(`          back: ${x.toRational().toString()} (${x.tail.kind})`);
	}
}

console.log("\nPrecision and exactness:");
const third = PAdicNumber.from(Rational.of(1, 3), 5);
for (const precision of [2, 3, 8]) {
	const y = third.withPrecision(precision);
	console.log(`  1/3 at precision ${precision}: ${y.toSeriesString()}  exact=${y.isExact}`);
}

/**
 * Series Notation — reading and writing `a + b*p + c*p^2 + O(p^k)`.
 *
 * Run: npx tsx examples/series-notation.ts
 */

import { PAdicNumber } from "../src/index.js";

const inputs = ["1/5 + 2 + 3*5", "2 + 3*5 + O(5^4)", "4 + 4*5 + 4*5^2 + 4*5^3", "O(5^3)", "2 + 7*5"];

for (const text of inputs) {
	const parsed = PAdicNumber.parse(text, 5);
	if (!parsed.ok) {
		console.log(`${text.padEnd(28)} -> ${parsed.error.code}: ${parsed.error.message}`);
		continue;
	}
	const x = parsed.value;
	console.log(
		`${text.padEnd(28)} -> ${x.toRational().toString()} (precision ${x.precision}, exact ${x.isExact})`,
	);
}

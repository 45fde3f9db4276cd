import { bench, describe } from "vitest";
import { PAdicNumber } from "../src/padic/padic-number.js";
import { Rational } from "../src/rational/rational.js";

const a = PAdicNumber.from(Rational.of(3, 7), 5, 40);
const b = PAdicNumber.from(Rational.of(-11, 13), 5, 40);

describe("p-adic arithmetic", () => {
	bench("add at precision 40", () => {
		a.add(b);
	});

	bench("mul at precision 40", () => {
		a.mul(b);
	});

	bench("div at precision 40", () => {
		a.div(b);
	});
});

describe("series round trip", () => {
	const text = a.toSeriesString(40);

	bench("format 40 terms", () => {
		a.toSeriesString(40);
	});

	bench("parse 40 terms", () => {
		PAdicNumber.parse(text, 5);
	});
});

import { bench, describe } from "vitest";
import { expandDigits } from "../src/padic/digit-expander.js";
import { extractValuation } from "../src/padic/valuation.js";

describe("digit expansion", () => {
	bench("3/7 over 5, 20 digits", () => {
		expandDigits(3n, 7n, 5n, 20);
	});

	bench("1/997 over 2, 200 digits", () => {
		expandDigits(1n, 997n, 2n, 200);
	});

	bench("large integer over 3, 100 digits", () => {
		expandDigits(123456789012345678901234567890n, 1n, 3n, 100);
	});
});

describe("valuation extraction", () => {
	bench("5^40 · 7/11", () => {
		extractValuation(7n * 5n ** 40n, 11n, 5n);
	});
});

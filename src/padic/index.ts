export { type ValuationSplit, extractValuation, valuationOf } from "./valuation.js";
export {
	type DigitExpansion,
	type ExpansionTail,
	expandDigits,
	mod,
	modInverse,
} from "./digit-expander.js";
export { type SeriesSpec, horner, reconstructSeries } from "./series-reconstructor.js";
export { type PadicInput, type PadicValue, toPadicInput } from "./input.js";
export {
	type DigitsSpec,
	DEFAULT_PRECISION,
	DEFAULT_SHOW_DIGITS,
	PAdicNumber,
	validateField,
} from "./padic-number.js";

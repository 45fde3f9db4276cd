/**
 * Series notation formatter.
 *
 * Renders `a_k·p^k + a_{k+1}·p^{k+1} + ... + O(p^n)` in the ASCII form
 * `2 + 1*5 + 3*5^2 + O(5^3)`; negative powers are written as divisions,
 * `1/5` and `4/5^2`.
 */

export interface SeriesTerm {
	readonly exponent: number;
	/** Nonzero coefficient in [1, p). */
	readonly digit: number;
}

export interface SeriesTerms {
	readonly prime: number;
	/** Nonzero terms in increasing exponent order. */
	readonly terms: readonly SeriesTerm[];
	/** True when nonzero terms may follow; the formatter then appends `O(p^orderExponent)`. */
	readonly truncated: boolean;
	readonly orderExponent: number;
}

export function formatTerm(term: SeriesTerm, prime: number): string {
	const { exponent, digit } = term;
	if (exponent === 0) return `${digit}`;
	if (exponent === 1) return `${digit}*${prime}`;
	if (exponent === -1) return `${digit}/${prime}`;
	if (exponent < 0) return `${digit}/${prime}^${-exponent}`;
	return `${digit}*${prime}^${exponent}`;
}

export function formatSeries(series: SeriesTerms): string {
	const parts = series.terms.map((t) => formatTerm(t, series.prime));
	if (series.truncated) {
		parts.push(`O(${series.prime}^${series.orderExponent})`);
	}
	return parts.length > 0 ? parts.join(" + ") : "0";
}

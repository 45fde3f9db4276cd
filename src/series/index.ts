export { type SeriesTerm, type SeriesTerms, formatSeries, formatTerm } from "./format.js";
export { type ParsedSeries, parseSeries } from "./parse.js";

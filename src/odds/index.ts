export {
	type OddsValue,
	type DecimalOdds,
	type AmericanOdds,
	type FractionalOdds,
	type OddsRounding,
	type ConversionOptions,
	OddsFormat,
	ODDS_FORMATS,
} from "./types.js";
export { decimalOdds, americanOdds, fractionalOdds } from "./odds-value.js";
export { toDecimal, fromDecimal, convertOdds, complementOdds } from "./converter.js";
export { type Fraction, approximateFraction } from "./fraction.js";
export { parseOdds, parseAnyOdds } from "./parser.js";
export { type OddsFormatOptions, formatOdds, formatDecimalAs } from "./formatter.js";

/**
 * The numeric type for odds, probabilities and money.
 *
 * Facade over the decimal.js-light wrapper. Raw `number` is accepted only at
 * the outer boundary and converted here; all pipeline math stays in Decimal.
 */

export { LibDecimal as Decimal, type RoundingMode } from "../lib/decimal/index.js";

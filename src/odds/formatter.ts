/**
 * Display strings for odds in each notation.
 *
 * Formatting always goes through conventional rounding: American odds are
 * shown as signed integers and fractional odds with a bounded denominator.
 */

import type { Decimal } from "../shared/decimal.js";
import type { InvalidOddsError } from "../shared/errors.js";
import { type Result, flatMap, map } from "../shared/result.js";
import { fromDecimal, toDecimal } from "./converter.js";
import type { OddsFormat, OddsValue } from "./types.js";

export interface OddsFormatOptions {
	/** Decimal places for decimal odds (default 2) */
	readonly precision?: number;
	/** Largest denominator for fractional odds (default 1000) */
	readonly maxDenominator?: number;
}

function render(odds: OddsValue, precision: number): string {
	switch (odds.format) {
		case "decimal":
			return odds.value.toFixed(precision);
		case "american":
			return odds.value.isPositive() ? `+${odds.value.toString()}` : odds.value.toString();
		case "fractional":
			return `${odds.numerator.toString()}/${odds.denominator.toString()}`;
	}
}

/** Show decimal odds in the requested notation, e.g. 2.5 → "+150" or "3/2". */
export function formatDecimalAs(
	decimal: Decimal,
	format: OddsFormat,
	options: OddsFormatOptions = {},
): Result<string, InvalidOddsError> {
	const converted = fromDecimal(decimal, format, {
		rounding: "conventional",
		...(options.maxDenominator !== undefined && { maxDenominator: options.maxDenominator }),
	});
	return map(converted, (odds) => render(odds, options.precision ?? 2));
}

/** Show odds in their own notation. */
export function formatOdds(
	odds: OddsValue,
	options: OddsFormatOptions = {},
): Result<string, InvalidOddsError> {
	return flatMap(toDecimal(odds), (decimal) => formatDecimalAs(decimal, odds.format, options));
}

/**
 * Odds notations and the OddsValue variant.
 *
 * OddsValue is a closed union discriminated by `format`; every conversion
 * switches over it exhaustively, so adding a notation is a compile error
 * until each converter handles it.
 */

import type { Decimal } from "../shared/decimal.js";

export const OddsFormat = {
	Decimal: "decimal",
	American: "american",
	Fractional: "fractional",
} as const;

export type OddsFormat = (typeof OddsFormat)[keyof typeof OddsFormat];

export const ODDS_FORMATS: readonly OddsFormat[] = [
	OddsFormat.Decimal,
	OddsFormat.American,
	OddsFormat.Fractional,
];

/** Total payout multiplier, stake included. Must be > 1. */
export interface DecimalOdds {
	readonly format: "decimal";
	readonly value: Decimal;
}

/**
 * Signed moneyline: +v is profit per 100 staked, -v is the stake needed for
 * 100 profit. Nonzero; integral by convention.
 */
export interface AmericanOdds {
	readonly format: "american";
	readonly value: Decimal;
}

/** Profit ratio numerator/denominator, both > 0. */
export interface FractionalOdds {
	readonly format: "fractional";
	readonly numerator: Decimal;
	readonly denominator: Decimal;
}

export type OddsValue = DecimalOdds | AmericanOdds | FractionalOdds;

/**
 * `exact` keeps the algebraic inverse (round-trips to the same decimal);
 * `conventional` rounds American odds to an integer and fractional odds to
 * the nearest fraction with a bounded denominator.
 */
export type OddsRounding = "exact" | "conventional";

export interface ConversionOptions {
	readonly rounding?: OddsRounding;
	/** Largest denominator for conventional fractional odds (default 1000) */
	readonly maxDenominator?: number;
}

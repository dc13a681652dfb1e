/**
 * OddsConverter — normalizes any notation to decimal odds and back.
 *
 * toDecimal re-validates its input, so hand-built OddsValue literals get the
 * same domain checks as the constructors.
 */

import { Decimal } from "../shared/decimal.js";
import { InvalidOddsError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { approximateFraction } from "./fraction.js";
import { americanOdds, decimalOdds, fractionalOdds } from "./odds-value.js";
import type { ConversionOptions, OddsFormat, OddsValue } from "./types.js";

const ONE = Decimal.one();
const TWO = Decimal.from(2);
const HUNDRED = Decimal.from(100);
const DEFAULT_MAX_DENOMINATOR = 1_000;

/** Canonical decimal odds for any notation. */
export function toDecimal(odds: OddsValue): Result<Decimal, InvalidOddsError> {
	switch (odds.format) {
		case "decimal":
			if (!odds.value.gt(ONE)) {
				return err(
					new InvalidOddsError("Decimal odds must be > 1", { decimal: odds.value.toString() }),
				);
			}
			return ok(odds.value);
		case "american": {
			const v = odds.value;
			if (v.isZero()) {
				return err(new InvalidOddsError("American odds must be nonzero", { american: "0" }));
			}
			// +v: profit per 100 staked; -v: stake per 100 profit
			return ok(v.isPositive() ? ONE.add(v.div(HUNDRED)) : ONE.add(HUNDRED.div(v.abs())));
		}
		case "fractional": {
			const { numerator, denominator } = odds;
			if (!numerator.isPositive() || !denominator.isPositive()) {
				return err(
					new InvalidOddsError("Fractional odds need numerator > 0 and denominator > 0", {
						numerator: numerator.toString(),
						denominator: denominator.toString(),
					}),
				);
			}
			return ok(ONE.add(numerator.div(denominator)));
		}
	}
}

/** Re-express decimal odds in the target notation. */
export function fromDecimal(
	decimal: Decimal,
	target: OddsFormat,
	options: ConversionOptions = {},
): Result<OddsValue, InvalidOddsError> {
	if (!decimal.gt(ONE)) {
		return err(new InvalidOddsError("Decimal odds must be > 1", { decimal: decimal.toString() }));
	}
	const conventional = options.rounding === "conventional";
	const net = decimal.sub(ONE);

	switch (target) {
		case "decimal":
			return decimalOdds(decimal);
		case "american": {
			const exact = decimal.gte(TWO) ? net.mul(HUNDRED) : HUNDRED.div(net).neg();
			return americanOdds(conventional ? exact.round(0) : exact);
		}
		case "fractional": {
			if (!conventional) {
				return fractionalOdds(net, ONE);
			}
			const maxDenominator = options.maxDenominator ?? DEFAULT_MAX_DENOMINATOR;
			const { numerator, denominator } = approximateFraction(net.toNumber(), maxDenominator);
			if (numerator <= 0) {
				return err(
					new InvalidOddsError("Odds too short for a fraction with the given denominator", {
						decimal: decimal.toString(),
						maxDenominator,
					}),
				);
			}
			return fractionalOdds(numerator, denominator);
		}
	}
}

/** Convert between any two notations through decimal odds. */
export function convertOdds(
	odds: OddsValue,
	target: OddsFormat,
	options: ConversionOptions = {},
): Result<OddsValue, InvalidOddsError> {
	const decimal = toDecimal(odds);
	if (!decimal.ok) return decimal;
	return fromDecimal(decimal.value, target, options);
}

/**
 * Decimal odds of the other outcome in a market with no bookmaker margin:
 * d' = d / (d - 1).
 */
export function complementOdds(decimal: Decimal): Result<Decimal, InvalidOddsError> {
	if (!decimal.gt(ONE)) {
		return err(new InvalidOddsError("Decimal odds must be > 1", { decimal: decimal.toString() }));
	}
	return ok(decimal.div(decimal.sub(ONE)));
}

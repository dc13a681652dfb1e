/**
 * OddsValue constructors.
 *
 * Each factory validates the notation's domain and returns a frozen value.
 */

import { Decimal } from "../shared/decimal.js";
import { InvalidOddsError } from "../shared/errors.js";
import { type NumericInput, toDecimalInput } from "../shared/numeric.js";
import { type Result, err, flatMap, ok } from "../shared/result.js";
import type { AmericanOdds, DecimalOdds, FractionalOdds } from "./types.js";

const oddsError = (message: string, context: Record<string, unknown>) =>
	new InvalidOddsError(message, context);

/** Decimal odds; 1.0 pays back only the stake and is rejected. */
export function decimalOdds(value: NumericInput): Result<DecimalOdds, InvalidOddsError> {
	const parsed = toDecimalInput(value, "decimal", oddsError);
	return flatMap(parsed, (d): Result<DecimalOdds, InvalidOddsError> => {
		if (!d.gt(Decimal.one())) {
			return err(oddsError("Decimal odds must be > 1", { decimal: d.toString() }));
		}
		return ok(Object.freeze({ format: "decimal" as const, value: d }));
	});
}

export function americanOdds(value: NumericInput): Result<AmericanOdds, InvalidOddsError> {
	const parsed = toDecimalInput(value, "american", oddsError);
	return flatMap(parsed, (v): Result<AmericanOdds, InvalidOddsError> => {
		if (v.isZero()) {
			return err(oddsError("American odds must be nonzero", { american: v.toString() }));
		}
		return ok(Object.freeze({ format: "american" as const, value: v }));
	});
}

export function fractionalOdds(
	numerator: NumericInput,
	denominator: NumericInput,
): Result<FractionalOdds, InvalidOddsError> {
	const n = toDecimalInput(numerator, "numerator", oddsError);
	if (!n.ok) return n;
	const d = toDecimalInput(denominator, "denominator", oddsError);
	if (!d.ok) return d;
	if (!n.value.isPositive() || !d.value.isPositive()) {
		return err(
			oddsError("Fractional odds need numerator > 0 and denominator > 0", {
				numerator: n.value.toString(),
				denominator: d.value.toString(),
			}),
		);
	}
	return ok(
		Object.freeze({ format: "fractional" as const, numerator: n.value, denominator: d.value }),
	);
}

/**
 * KellyEngine — full and fractional Kelly stake for a single bet.
 *
 *   b = d - 1, q = 1 - p
 *   f* = (b·p - q) / b
 *   applied = clamp(f*, 0, 1) × multiplier
 *   stake = min(applied × bankroll, bankroll)
 *
 * A non-positive f* means no edge: the stake is exactly zero, never a
 * negative (lay) recommendation.
 */

import { checkProbability } from "../probability/implied.js";
import { Decimal } from "../shared/decimal.js";
import {
	DivisionByZeroError,
	InvalidBankrollError,
	InvalidInputError,
	InvalidOddsError,
	type InvalidProbabilityError,
} from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { expectedLogGrowth } from "./growth.js";
import { KellyMultiplier } from "./multiplier.js";
import type { KellyResult } from "./types.js";

const ONE = Decimal.one();

export type KellyFailure =
	| InvalidOddsError
	| InvalidProbabilityError
	| InvalidBankrollError
	| InvalidInputError
	| DivisionByZeroError;

export function computeKelly(
	decimalOdds: Decimal,
	estimatedProbability: Decimal,
	bankroll: Decimal,
	kellyMultiplier: KellyMultiplier | Decimal,
): Result<KellyResult, KellyFailure> {
	const b = decimalOdds.sub(ONE);
	if (b.isZero()) {
		return err(
			new DivisionByZeroError("Net odds are zero: decimal odds of 1 pay nothing", {
				decimal: decimalOdds.toString(),
			}),
		);
	}
	if (b.isNegative()) {
		return err(
			new InvalidOddsError("Decimal odds must be > 1", { decimal: decimalOdds.toString() }),
		);
	}

	const p = checkProbability(estimatedProbability);
	if (!p.ok) return p;

	if (bankroll.isNegative()) {
		return err(
			new InvalidBankrollError("Bankroll must be >= 0", { bankroll: bankroll.toString() }),
		);
	}

	const multiplier =
		kellyMultiplier instanceof KellyMultiplier
			? ok(kellyMultiplier)
			: KellyMultiplier.create(kellyMultiplier);
	if (!multiplier.ok) return multiplier;

	const q = ONE.sub(p.value);
	const fullKellyFraction = b.mul(p.value).sub(q).div(b);
	const clamped = Decimal.min(Decimal.max(fullKellyFraction, Decimal.zero()), ONE);
	const appliedFraction = clamped.mul(multiplier.value.value);
	const recommendedStake = Decimal.min(appliedFraction.mul(bankroll), bankroll);

	const growth = expectedLogGrowth(p.value, b, appliedFraction);
	if (!growth.ok) return growth;

	return ok({
		fullKellyFraction,
		appliedFraction,
		recommendedStake,
		expectedLogGrowth: growth.value,
	});
}

/**
 * ProbabilityModel: probabilities implied by decimal odds.
 *
 * implied = 1 / decimalOdds. No bookmaker overround correction is applied;
 * for a two-way market the implied probabilities of both sides sum to more
 * than 1 whenever the book takes a margin.
 */

import { BetSide, complementProbability } from "../shared/bet-side.js";
import { Decimal } from "../shared/decimal.js";
import { InvalidOddsError, InvalidProbabilityError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

const ONE = Decimal.one();

/** Require p in [0, 1]. */
export function checkProbability(
	probability: Decimal,
	field = "estimatedProbability",
): Result<Decimal, InvalidProbabilityError> {
	if (probability.isNegative() || probability.gt(ONE)) {
		return err(
			new InvalidProbabilityError(`${field} must be in [0, 1]`, {
				[field]: probability.toString(),
			}),
		);
	}
	return ok(probability);
}

export function impliedProbability(decimalOdds: Decimal): Result<Decimal, InvalidOddsError> {
	if (!decimalOdds.gt(ONE)) {
		return err(
			new InvalidOddsError("Decimal odds must be > 1", { decimal: decimalOdds.toString() }),
		);
	}
	return ok(ONE.div(decimalOdds));
}

/**
 * Decimal odds at which a bet with win probability p breaks even.
 * `null` when p = 0: no finite price is fair.
 */
export function fairOdds(probability: Decimal): Result<Decimal | null, InvalidProbabilityError> {
	const checked = checkProbability(probability);
	if (!checked.ok) return checked;
	return ok(probability.isZero() ? null : ONE.div(probability));
}

/**
 * Decimal odds priced by the market's probability of the event, for the
 * chosen side. The probability must be strictly inside (0, 1).
 */
export function oddsFromMarketProbability(
	marketProbability: Decimal,
	side: BetSide,
): Result<Decimal, InvalidProbabilityError> {
	if (!marketProbability.isPositive() || !marketProbability.lt(ONE)) {
		return err(
			new InvalidProbabilityError("marketProbability must be in (0, 1)", {
				marketProbability: marketProbability.toString(),
			}),
		);
	}
	const priced =
		side === BetSide.OnEvent ? marketProbability : complementProbability(marketProbability);
	return ok(ONE.div(priced));
}

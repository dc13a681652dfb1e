import type { KellyMultiplier } from "../kelly/multiplier.js";
import type { OddsValue } from "../odds/types.js";
import type { Decimal } from "../shared/decimal.js";

/** One immutable snapshot of the calculator's inputs. */
export interface BetInput {
	readonly odds: OddsValue;
	/** Bettor's win probability for the backed side, in [0, 1] */
	readonly estimatedProbability: Decimal;
	readonly bankroll: Decimal;
	readonly kellyMultiplier: KellyMultiplier;
}

/** Everything derived from one BetInput. */
export interface Evaluation {
	readonly decimalOdds: Decimal;
	/** Profit per unit staked on a win, decimalOdds - 1 */
	readonly netOdds: Decimal;
	readonly impliedProbability: Decimal;
	readonly edge: Decimal;
	readonly evPerUnitStake: Decimal;
	readonly fullKellyFraction: Decimal;
	readonly appliedFraction: Decimal;
	readonly recommendedStake: Decimal;
	readonly expectedLogGrowth: Decimal;
	/** Break-even decimal odds for the bettor's probability; null at p = 0 */
	readonly fairOdds: Decimal | null;
}

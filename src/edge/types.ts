import type { Decimal } from "../shared/decimal.js";

export interface EdgeMetrics {
	/** Market's win probability, 1 / decimalOdds */
	readonly impliedProbability: Decimal;
	/** estimatedProbability - impliedProbability, in [-1, 1] */
	readonly edge: Decimal;
	/** Expected net profit per unit staked */
	readonly evPerUnitStake: Decimal;
}

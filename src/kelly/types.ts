import type { Decimal } from "../shared/decimal.js";

export interface KellyResult {
	/** (b·p - q) / b; negative means the bet has no edge */
	readonly fullKellyFraction: Decimal;
	/** clamp(fullKellyFraction, 0, 1) × kellyMultiplier */
	readonly appliedFraction: Decimal;
	/** appliedFraction × bankroll, never above bankroll */
	readonly recommendedStake: Decimal;
	/** Expected log-growth of the bankroll per bet at appliedFraction */
	readonly expectedLogGrowth: Decimal;
}

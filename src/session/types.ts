import type { KellyMultiplier } from "../kelly/multiplier.js";
import type { Logger } from "../lib/logger/index.js";
import type { OddsValue } from "../odds/types.js";
import type { BetSide } from "../shared/bet-side.js";
import type { CalculatorConfig } from "../shared/config.js";
import type { Decimal } from "../shared/decimal.js";

/**
 * Everything the user has entered. `odds` may be absent, in which case the
 * price comes from `marketProbability` for the chosen side.
 */
export interface BetSnapshot {
	readonly odds: OddsValue | null;
	/** Market's probability of the event itself, not of the backed side */
	readonly marketProbability: Decimal;
	readonly side: BetSide;
	/** Bettor's probability of the backed side */
	readonly estimatedProbability: Decimal;
	readonly bankroll: Decimal;
	readonly kellyMultiplier: KellyMultiplier;
}

/** Fields left out, or given as undefined, keep their current value. */
export type SnapshotPatch = { readonly [K in keyof BetSnapshot]?: BetSnapshot[K] | undefined };

export interface SessionOptions {
	readonly config?: CalculatorConfig;
	readonly logger?: Logger;
	/** Overrides for the starting snapshot */
	readonly initial?: SnapshotPatch;
}

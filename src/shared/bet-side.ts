/**
 * Which outcome of a two-way event the stake backs.
 *
 * The bettor's probability always refers to the backed side, so flipping
 * sides mirrors it: P(opposite) = 1 - P(event).
 */

import { Decimal } from "./decimal.js";

export const BetSide = {
	OnEvent: "on_event",
	OnOpposite: "on_opposite",
} as const;

export type BetSide = (typeof BetSide)[keyof typeof BetSide];

export function oppositeSide(side: BetSide): BetSide {
	return side === BetSide.OnEvent ? BetSide.OnOpposite : BetSide.OnEvent;
}

/** Probability of the other outcome of a two-way event. */
export function complementProbability(probability: Decimal): Decimal {
	return Decimal.one().sub(probability);
}

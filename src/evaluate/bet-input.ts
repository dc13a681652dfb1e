/**
 * Form payload → BetInput.
 *
 * The payload is shape-checked with zod first; the odds text and the
 * multiplier then go through the same constructors as typed callers use.
 */

import { KellyPreset, resolveMultiplier } from "../kelly/multiplier.js";
import { validate, type ValidationError, z } from "../lib/validation/index.js";
import { parseOdds } from "../odds/parser.js";
import { OddsFormat } from "../odds/types.js";
import { Decimal } from "../shared/decimal.js";
import type { InvalidInputError, InvalidOddsError } from "../shared/errors.js";
import { type Result, ok } from "../shared/result.js";
import type { BetInput } from "./types.js";

export const BetInputSchema = z.object({
	odds: z.object({
		format: z.enum([OddsFormat.Decimal, OddsFormat.American, OddsFormat.Fractional]),
		text: z.string(),
	}),
	estimatedProbability: z.number().finite(),
	bankroll: z.number().finite(),
	kellyMultiplier: z.union([
		z.enum([KellyPreset.Full, KellyPreset.Half, KellyPreset.Quarter]),
		z.number().finite(),
	]),
});

export type BetInputPayload = z.infer<typeof BetInputSchema>;

export type BetInputFailure = ValidationError | InvalidOddsError | InvalidInputError;

/**
 * Range checks on probability and bankroll are left to `evaluateBet` so
 * they report their own error kinds.
 */
export function parseBetInput(raw: unknown): Result<BetInput, BetInputFailure> {
	const payload = validate(BetInputSchema, raw);
	if (!payload.ok) return payload;
	const { odds, estimatedProbability, bankroll, kellyMultiplier } = payload.value;

	const parsedOdds = parseOdds(odds.text, odds.format);
	if (!parsedOdds.ok) return parsedOdds;

	const multiplier = resolveMultiplier(kellyMultiplier);
	if (!multiplier.ok) return multiplier;

	return ok(
		Object.freeze({
			odds: parsedOdds.value,
			estimatedProbability: Decimal.from(estimatedProbability),
			bankroll: Decimal.from(bankroll),
			kellyMultiplier: multiplier.value,
		}),
	);
}

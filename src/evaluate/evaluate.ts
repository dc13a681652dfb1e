/**
 * The whole pipeline for one bet:
 * OddsConverter → ProbabilityModel → EdgeCalculator → KellyEngine.
 *
 * Pure and synchronous. The same inputs always produce the same Evaluation,
 * and a failure at any stage returns that stage's error with no partial
 * result.
 */

import { computeEdge } from "../edge/edge-calculator.js";
import { computeKelly, type KellyFailure } from "../kelly/kelly-engine.js";
import { type KellyPreset, isKellyPreset, KellyMultiplier } from "../kelly/multiplier.js";
import { toDecimal } from "../odds/converter.js";
import type { OddsValue } from "../odds/types.js";
import { checkProbability, fairOdds } from "../probability/implied.js";
import { Decimal } from "../shared/decimal.js";
import {
	InvalidBankrollError,
	InvalidInputError,
	InvalidProbabilityError,
} from "../shared/errors.js";
import { type NumericInput, toDecimalInput } from "../shared/numeric.js";
import { type Result, err, ok } from "../shared/result.js";
import type { BetInput, Evaluation } from "./types.js";

export function evaluateBet(input: BetInput): Result<Evaluation, KellyFailure> {
	const decimalOdds = toDecimal(input.odds);
	if (!decimalOdds.ok) return decimalOdds;
	const d = decimalOdds.value;
	const p = input.estimatedProbability;

	const edge = computeEdge(d, p);
	if (!edge.ok) return edge;

	const kelly = computeKelly(d, p, input.bankroll, input.kellyMultiplier);
	if (!kelly.ok) return kelly;

	const fair = fairOdds(p);
	if (!fair.ok) return fair;

	return ok(
		Object.freeze({
			decimalOdds: d,
			netOdds: d.sub(Decimal.one()),
			impliedProbability: edge.value.impliedProbability,
			edge: edge.value.edge,
			evPerUnitStake: edge.value.evPerUnitStake,
			fullKellyFraction: kelly.value.fullKellyFraction,
			appliedFraction: kelly.value.appliedFraction,
			recommendedStake: kelly.value.recommendedStake,
			expectedLogGrowth: kelly.value.expectedLogGrowth,
			fairOdds: fair.value,
		}),
	);
}

/**
 * Evaluate a bet from plain inputs. Fields are checked in order (odds,
 * probability, bankroll, multiplier) and the first failure is returned.
 * Non-finite numbers are rejected with the error kind of their field.
 *
 * @example
 * ```ts
 * const odds = unwrap(americanOdds(-200));
 * const result = evaluate(odds, 0.7, 1000, "half");
 * if (result.ok) console.log(result.value.recommendedStake.toFixed(2));
 * ```
 */
export function evaluate(
	odds: OddsValue,
	estimatedProbability: NumericInput,
	bankroll: NumericInput,
	kellyMultiplier: KellyPreset | KellyMultiplier | NumericInput,
): Result<Evaluation, KellyFailure> {
	const decimalOdds = toDecimal(odds);
	if (!decimalOdds.ok) return decimalOdds;

	const p = toDecimalInput(
		estimatedProbability,
		"estimatedProbability",
		(message, context) => new InvalidProbabilityError(message, context),
	);
	if (!p.ok) return p;
	const probability = checkProbability(p.value);
	if (!probability.ok) return probability;

	const bank = toDecimalInput(
		bankroll,
		"bankroll",
		(message, context) => new InvalidBankrollError(message, context),
	);
	if (!bank.ok) return bank;
	if (bank.value.isNegative()) {
		return err(
			new InvalidBankrollError("Bankroll must be >= 0", { bankroll: bank.value.toString() }),
		);
	}

	const multiplier = toMultiplier(kellyMultiplier);
	if (!multiplier.ok) return multiplier;

	return evaluateBet({
		odds,
		estimatedProbability: p.value,
		bankroll: bank.value,
		kellyMultiplier: multiplier.value,
	});
}

function toMultiplier(
	value: KellyPreset | KellyMultiplier | NumericInput,
): Result<KellyMultiplier, InvalidInputError> {
	if (value instanceof KellyMultiplier) return ok(value);
	if (isKellyPreset(value)) return ok(KellyMultiplier.fromPreset(value));
	const m = toDecimalInput(
		value,
		"kellyMultiplier",
		(message, context) => new InvalidInputError(message, context),
	);
	if (!m.ok) return m;
	return KellyMultiplier.create(m.value);
}

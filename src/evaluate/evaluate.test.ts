import { describe, expect, it } from "vitest";
import { KellyMultiplier } from "../kelly/multiplier.js";
import { americanOdds, decimalOdds, fractionalOdds } from "../odds/odds-value.js";
import type { OddsValue } from "../odds/types.js";
import { Decimal } from "../shared/decimal.js";
import {
	InvalidBankrollError,
	InvalidInputError,
	InvalidOddsError,
	InvalidProbabilityError,
} from "../shared/errors.js";
import { unwrap } from "../shared/result.js";
import { evaluate, evaluateBet } from "./evaluate.js";

const evenMoney = unwrap(decimalOdds(2));

describe("evaluate", () => {
	describe("known values", () => {
		it("decimal 2, p=0.6, half Kelly, bankroll 1000", () => {
			const r = unwrap(evaluate(evenMoney, 0.6, 1000, "half"));

			expect(r.decimalOdds.toString()).toBe("2");
			expect(r.netOdds.toString()).toBe("1");
			expect(r.impliedProbability.toString()).toBe("0.5");
			expect(r.edge.toString()).toBe("0.1");
			expect(r.evPerUnitStake.toString()).toBe("0.2");
			expect(r.fullKellyFraction.toString()).toBe("0.2");
			expect(r.appliedFraction.toString()).toBe("0.1");
			expect(r.recommendedStake.toString()).toBe("100");
			expect(r.fairOdds?.toFixed(4)).toBe("1.6667");
			// 0.6·ln(1.1) + 0.4·ln(0.9)
			expect(r.expectedLogGrowth.toNumber()).toBeCloseTo(
				0.6 * Math.log(1.1) + 0.4 * Math.log(0.9),
				12,
			);
		});

		it("American -200, p=0.5 → negative edge and zero stake", () => {
			const r = unwrap(evaluate(unwrap(americanOdds(-200)), 0.5, 1000, "full"));

			expect(r.decimalOdds.toString()).toBe("1.5");
			expect(r.netOdds.toString()).toBe("0.5");
			expect(r.impliedProbability.toFixed(4)).toBe("0.6667");
			expect(r.edge.toFixed(4)).toBe("-0.1667");
			expect(r.evPerUnitStake.toString()).toBe("-0.25");
			expect(r.fullKellyFraction.toString()).toBe("-0.5");
			expect(r.recommendedStake.isZero()).toBe(true);
			expect(r.fairOdds?.toString()).toBe("2");
		});

		it("fractional 5/2, p=0.4, full Kelly, bankroll 200", () => {
			const r = unwrap(evaluate(unwrap(fractionalOdds(5, 2)), 0.4, 200, "full"));

			expect(r.decimalOdds.toString()).toBe("3.5");
			expect(r.impliedProbability.toFixed(4)).toBe("0.2857");
			expect(r.evPerUnitStake.toString()).toBe("0.4");
			expect(r.fullKellyFraction.toString()).toBe("0.16");
			expect(r.recommendedStake.toString()).toBe("32");
		});

		it("accepts a custom numeric multiplier", () => {
			const r = unwrap(evaluate(evenMoney, 0.6, 1000, 0.25));
			expect(r.recommendedStake.toString()).toBe("50");
		});

		it("accepts string inputs", () => {
			const r = unwrap(evaluate(evenMoney, "0.6", "1000", "0.5"));
			expect(r.recommendedStake.toString()).toBe("100");
		});
	});

	describe("boundaries", () => {
		it("p = 1 stakes the whole bankroll at full Kelly", () => {
			const r = unwrap(evaluate(evenMoney, 1, 500, "full"));
			expect(r.fullKellyFraction.toString()).toBe("1");
			expect(r.recommendedStake.toString()).toBe("500");
			expect(r.fairOdds?.toString()).toBe("1");
			expect(r.expectedLogGrowth.toNumber()).toBeCloseTo(Math.log(2), 12);
		});

		it("p = 0 has no fair odds and no stake", () => {
			const r = unwrap(evaluate(evenMoney, 0, 500, "full"));
			expect(r.fairOdds).toBeNull();
			expect(r.recommendedStake.isZero()).toBe(true);
		});

		it("bankroll 0 gives a zero stake", () => {
			const r = unwrap(evaluate(evenMoney, 0.6, 0, "full"));
			expect(r.recommendedStake.isZero()).toBe(true);
		});

		it("returns a frozen evaluation", () => {
			const r = unwrap(evaluate(evenMoney, 0.6, 1000, "half"));
			expect(Object.isFrozen(r)).toBe(true);
		});
	});

	describe("rejections", () => {
		it("odds of exactly 1", () => {
			const flat: OddsValue = { format: "decimal", value: Decimal.one() };
			const r = evaluate(flat, 0.6, 1000, "half");
			expect(!r.ok && r.error).toBeInstanceOf(InvalidOddsError);
		});

		it("probability outside [0, 1]", () => {
			const r = evaluate(evenMoney, 1.2, 1000, "half");
			expect(!r.ok && r.error).toBeInstanceOf(InvalidProbabilityError);
			expect(!r.ok && r.error.message).toBe("estimatedProbability must be in [0, 1]");
		});

		it("non-finite probability is a probability error", () => {
			const r = evaluate(evenMoney, Number.NaN, 1000, "half");
			expect(!r.ok && r.error).toBeInstanceOf(InvalidProbabilityError);
			expect(!r.ok && r.error.message).toBe("estimatedProbability is not a finite number");
		});

		it("negative bankroll", () => {
			const r = evaluate(evenMoney, 0.6, -1, "half");
			expect(!r.ok && r.error).toBeInstanceOf(InvalidBankrollError);
		});

		it("non-finite bankroll is a bankroll error", () => {
			const r = evaluate(evenMoney, 0.6, Number.POSITIVE_INFINITY, "half");
			expect(!r.ok && r.error.message).toBe("bankroll is not a finite number");
		});

		it("multiplier out of (0, 1]", () => {
			for (const m of [0, -0.5, 1.5]) {
				const r = evaluate(evenMoney, 0.6, 1000, m);
				expect(!r.ok && r.error).toBeInstanceOf(InvalidInputError);
			}
		});

		it("reports the first failing field", () => {
			const r = evaluate(evenMoney, 1.5, -1, 0);
			expect(!r.ok && r.error).toBeInstanceOf(InvalidProbabilityError);

			const r2 = evaluate(evenMoney, 0.5, -1, 0);
			expect(!r2.ok && r2.error).toBeInstanceOf(InvalidBankrollError);
		});
	});

	describe("determinism", () => {
		it("identical inputs give identical evaluations", () => {
			const input = {
				odds: unwrap(americanOdds(150)),
				estimatedProbability: Decimal.from(0.45),
				bankroll: Decimal.from(1000),
				kellyMultiplier: KellyMultiplier.quarter(),
			};
			const a = unwrap(evaluateBet(input));
			const b = unwrap(evaluateBet(input));
			expect(a.recommendedStake.eq(b.recommendedStake)).toBe(true);
			expect(a.expectedLogGrowth.eq(b.expectedLogGrowth)).toBe(true);
		});
	});
});

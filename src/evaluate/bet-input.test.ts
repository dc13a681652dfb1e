import { describe, expect, it } from "vitest";
import { ValidationError } from "../lib/validation/index.js";
import { InvalidInputError, InvalidOddsError, InvalidProbabilityError } from "../shared/errors.js";
import { unwrap } from "../shared/result.js";
import { parseBetInput } from "./bet-input.js";
import { evaluateBet } from "./evaluate.js";

const payload = {
	odds: { format: "american", text: "+150" },
	estimatedProbability: 0.45,
	bankroll: 1000,
	kellyMultiplier: "quarter",
};

describe("parseBetInput", () => {
	it("builds a BetInput from a form payload", () => {
		const input = unwrap(parseBetInput(payload));

		expect(input.odds.format).toBe("american");
		expect(input.odds.format === "american" && input.odds.value.toString()).toBe("150");
		expect(input.estimatedProbability.toString()).toBe("0.45");
		expect(input.bankroll.toString()).toBe("1000");
		expect(input.kellyMultiplier.name).toBe("QuarterKelly");
	});

	it("feeds evaluateBet", () => {
		// d = 2.5, f* = (1.5·0.45 − 0.55) / 1.5 = 1/12, quarter → 1/48
		const r = unwrap(evaluateBet(unwrap(parseBetInput(payload))));
		expect(r.recommendedStake.toFixed(2)).toBe("20.83");
	});

	it("accepts a numeric multiplier", () => {
		const input = unwrap(parseBetInput({ ...payload, kellyMultiplier: 0.3 }));
		expect(input.kellyMultiplier.name).toBe("Kelly(0.3)");
	});

	it("reports every missing field", () => {
		const r = parseBetInput({});
		expect(!r.ok && r.error).toBeInstanceOf(ValidationError);
		expect(!r.ok && r.error.message).toBe(
			"Malformed fields: odds, estimatedProbability, bankroll, kellyMultiplier",
		);
	});

	it("rejects non-finite numbers at the schema", () => {
		const r = parseBetInput({ ...payload, estimatedProbability: Number.POSITIVE_INFINITY });
		expect(!r.ok && r.error.message).toBe("Malformed fields: estimatedProbability");
	});

	it("rejects unparseable odds text", () => {
		const r = parseBetInput({ ...payload, odds: { format: "decimal", text: "abc" } });
		expect(!r.ok && r.error).toBeInstanceOf(InvalidOddsError);
		expect(!r.ok && r.error.message).toBe('Cannot parse "abc" as decimal odds');
	});

	it("rejects a multiplier above 1", () => {
		const r = parseBetInput({ ...payload, kellyMultiplier: 2 });
		expect(!r.ok && r.error).toBeInstanceOf(InvalidInputError);
		expect(!r.ok && r.error.message).toBe("KellyMultiplier.create: multiplier must be <= 1");
	});

	it("leaves the probability range to evaluateBet", () => {
		const input = unwrap(parseBetInput({ ...payload, estimatedProbability: 1.2 }));
		const r = evaluateBet(input);
		expect(!r.ok && r.error).toBeInstanceOf(InvalidProbabilityError);
	});
});

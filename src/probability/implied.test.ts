import { describe, expect, it } from "vitest";
import { BetSide } from "../shared/bet-side.js";
import { Decimal } from "../shared/decimal.js";
import { InvalidOddsError, InvalidProbabilityError } from "../shared/errors.js";
import { unwrap } from "../shared/result.js";
import {
	checkProbability,
	fairOdds,
	impliedProbability,
	oddsFromMarketProbability,
} from "./implied.js";

describe("impliedProbability", () => {
	it.each([
		{ decimal: "2", expected: "0.5" },
		{ decimal: "4", expected: "0.25" },
		{ decimal: "1.25", expected: "0.8" },
	])("1 / $decimal = $expected", ({ decimal, expected }) => {
		expect(unwrap(impliedProbability(Decimal.from(decimal))).toString()).toBe(expected);
	});

	it.each(["1", "0.8", "0", "-3"])("rejects decimal odds %s", (decimal) => {
		const r = impliedProbability(Decimal.from(decimal));
		expect(!r.ok && r.error).toBeInstanceOf(InvalidOddsError);
	});
});

describe("checkProbability", () => {
	it("accepts the closed interval ends", () => {
		expect(checkProbability(Decimal.zero()).ok).toBe(true);
		expect(checkProbability(Decimal.one()).ok).toBe(true);
	});

	it("names the offending field", () => {
		const r = checkProbability(Decimal.from(1.2), "yourProbability");
		expect(!r.ok && r.error.message).toBe("yourProbability must be in [0, 1]");
		expect(!r.ok && r.error.context).toEqual({ yourProbability: "1.2" });
	});
});

describe("fairOdds", () => {
	it("is the reciprocal of the probability", () => {
		expect(unwrap(fairOdds(Decimal.from(0.4)))?.toString()).toBe("2.5");
		expect(unwrap(fairOdds(Decimal.one()))?.toString()).toBe("1");
	});

	it("is null at p = 0", () => {
		expect(unwrap(fairOdds(Decimal.zero()))).toBeNull();
	});

	it("rejects p outside [0, 1]", () => {
		const r = fairOdds(Decimal.from(-0.1));
		expect(!r.ok && r.error).toBeInstanceOf(InvalidProbabilityError);
	});
});

describe("oddsFromMarketProbability", () => {
	it("prices the event side at 1 / p", () => {
		const d = unwrap(oddsFromMarketProbability(Decimal.from(0.6), BetSide.OnEvent));
		expect(d.toFixed(4)).toBe("1.6667");
	});

	it("prices the opposite side at 1 / (1 - p)", () => {
		const d = unwrap(oddsFromMarketProbability(Decimal.from(0.6), BetSide.OnOpposite));
		expect(d.toString()).toBe("2.5");
	});

	it.each(["0", "1", "1.5"])("rejects market probability %s", (p) => {
		const r = oddsFromMarketProbability(Decimal.from(p), BetSide.OnEvent);
		expect(!r.ok && r.error.message).toBe("marketProbability must be in (0, 1)");
	});
});

import { bench, describe } from "vitest";
import { evaluate } from "../src/evaluate/evaluate.js";
import { computeKelly } from "../src/kelly/kelly-engine.js";
import { KellyMultiplier } from "../src/kelly/multiplier.js";
import { americanOdds } from "../src/odds/odds-value.js";
import { Decimal } from "../src/shared/decimal.js";
import { unwrap } from "../src/shared/result.js";

describe("kelly engine", () => {
	const odds = Decimal.from("2.5");
	const p = Decimal.from("0.45");
	const bankroll = Decimal.from("10000");

	bench("half-kelly 1000x", () => {
		const half = KellyMultiplier.half();
		for (let i = 0; i < 1000; i++) {
			computeKelly(odds, p, bankroll, half);
		}
	});

	bench("quarter-kelly 1000x", () => {
		const quarter = KellyMultiplier.quarter();
		for (let i = 0; i < 1000; i++) {
			computeKelly(odds, p, bankroll, quarter);
		}
	});
});

describe("full evaluation", () => {
	const moneyline = unwrap(americanOdds(150));

	bench("american odds evaluate 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			evaluate(moneyline, 0.45, 10_000, "half");
		}
	});
});

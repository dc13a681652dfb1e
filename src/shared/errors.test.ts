import { describe, expect, it } from "vitest";
import {
	ConfigError,
	DivisionByZeroError,
	ErrorKind,
	InvalidBankrollError,
	InvalidInputError,
	InvalidOddsError,
	InvalidProbabilityError,
	KellyError,
	isDivisionByZero,
	isInvalidBankroll,
	isInvalidInput,
	isInvalidOdds,
	isInvalidProbability,
	isKellyError,
} from "./errors.js";

describe("KellyError hierarchy", () => {
	describe("error kinds", () => {
		const cases: Array<[string, KellyError, ErrorKind, string]> = [
			["InvalidOddsError", new InvalidOddsError("odds 1.0"), ErrorKind.InvalidOdds, "INVALID_ODDS"],
			[
				"InvalidProbabilityError",
				new InvalidProbabilityError("p 1.2"),
				ErrorKind.InvalidProbability,
				"INVALID_PROBABILITY",
			],
			[
				"InvalidBankrollError",
				new InvalidBankrollError("-1"),
				ErrorKind.InvalidBankroll,
				"INVALID_BANKROLL",
			],
			["InvalidInputError", new InvalidInputError("m 0"), ErrorKind.InvalidInput, "INVALID_INPUT"],
			[
				"DivisionByZeroError",
				new DivisionByZeroError("b 0"),
				ErrorKind.DivisionByZero,
				"DIVISION_BY_ZERO",
			],
			["ConfigError", new ConfigError("bad env"), ErrorKind.InvalidInput, "CONFIG_ERROR"],
		];

		it.each(cases)("%s has kind and code", (name, error, kind, code) => {
			expect(error.name).toBe(name);
			expect(error.kind).toBe(kind);
			expect(error.code).toBe(code);
			expect(error).toBeInstanceOf(KellyError);
			expect(error).toBeInstanceOf(Error);
		});
	});

	describe("toJSON", () => {
		it("serializes kind, code and context", () => {
			const error = new InvalidBankrollError("bankroll must be >= 0", { bankroll: "-1" });
			expect(error.toJSON()).toEqual({
				name: "InvalidBankrollError",
				message: "bankroll must be >= 0",
				code: "INVALID_BANKROLL",
				kind: "invalid_bankroll",
				context: { bankroll: "-1" },
			});
		});

		it("includes the hint when one is set", () => {
			expect(new InvalidOddsError("bad").toJSON()).toHaveProperty(
				"hint",
				"Decimal odds must be > 1, American odds nonzero, fractional odds n/d with n, d > 0",
			);
		});

		it("omits the hint when absent", () => {
			expect(new InvalidInputError("bad").toJSON()).not.toHaveProperty("hint");
		});
	});

	describe("type guards", () => {
		it("narrow each subclass", () => {
			expect(isInvalidOdds(new InvalidOddsError("x"))).toBe(true);
			expect(isInvalidProbability(new InvalidProbabilityError("x"))).toBe(true);
			expect(isInvalidBankroll(new InvalidBankrollError("x"))).toBe(true);
			expect(isInvalidInput(new InvalidInputError("x"))).toBe(true);
			expect(isDivisionByZero(new DivisionByZeroError("x"))).toBe(true);
		});

		it("reject other errors", () => {
			expect(isKellyError(new Error("plain"))).toBe(false);
			expect(isInvalidOdds(new InvalidInputError("x"))).toBe(false);
			expect(isKellyError("not an error")).toBe(false);
		});
	});
});

import { describe, expect, it } from "vitest";
import { LibDecimal } from "./index.js";

describe("LibDecimal", () => {
	describe("factories", () => {
		it("creates from string", () => {
			expect(LibDecimal.from("1.5").toString()).toBe("1.5");
			expect(LibDecimal.from(" 2.25 ").toString()).toBe("2.25");
			expect(LibDecimal.from("-200").toString()).toBe("-200");
		});

		it("creates from number", () => {
			expect(LibDecimal.from(1.5).toString()).toBe("1.5");
			expect(LibDecimal.from(0).toString()).toBe("0");
		});

		it("rejects empty string", () => {
			expect(() => LibDecimal.from("  ")).toThrow("empty string");
		});

		it("rejects non-finite numbers", () => {
			expect(() => LibDecimal.from(Number.NaN)).toThrow("invalid number");
			expect(() => LibDecimal.from(Number.POSITIVE_INFINITY)).toThrow("invalid number");
		});
	});

	describe("arithmetic precision", () => {
		it("0.1 + 0.2 = 0.3 exactly", () => {
			expect(LibDecimal.from("0.1").add(LibDecimal.from("0.2")).toString()).toBe("0.3");
		});

		it("1 - 0.6 = 0.4 exactly", () => {
			expect(LibDecimal.one().sub(LibDecimal.from(0.6)).toString()).toBe("0.4");
		});

		it("divides with 40 significant digits", () => {
			expect(LibDecimal.one().div(LibDecimal.from(3)).toString()).toBe(
				"0.3333333333333333333333333333333333333333",
			);
		});

		it("throws on division by zero", () => {
			expect(() => LibDecimal.one().div(LibDecimal.zero())).toThrow("division by zero");
		});
	});

	describe("round", () => {
		it("rounds half up by default", () => {
			expect(LibDecimal.from("296.5").round(0).toString()).toBe("297");
			expect(LibDecimal.from("1.005").round(2).toString()).toBe("1.01");
		});

		it("supports floor and ceil", () => {
			expect(LibDecimal.from("2.7").round(0, "floor").toString()).toBe("2");
			expect(LibDecimal.from("2.1").round(0, "ceil").toString()).toBe("3");
			expect(LibDecimal.from("-2.1").round(0, "floor").toString()).toBe("-3");
		});
	});

	describe("ln", () => {
		it("ln(1) is zero", () => {
			expect(LibDecimal.one().ln().isZero()).toBe(true);
		});

		it("matches Math.log to double precision", () => {
			expect(LibDecimal.from(2).ln().toNumber()).toBeCloseTo(Math.log(2), 12);
		});

		it("throws on non-positive input", () => {
			expect(() => LibDecimal.zero().ln()).toThrow("non-positive");
			expect(() => LibDecimal.from(-1).ln()).toThrow("non-positive");
		});
	});

	describe("comparison", () => {
		const a = LibDecimal.from("0.2");
		const b = LibDecimal.from("0.25");

		it("cmp returns -1, 0, 1", () => {
			expect(a.cmp(b)).toBe(-1);
			expect(a.cmp(LibDecimal.from("0.20"))).toBe(0);
			expect(b.cmp(a)).toBe(1);
		});

		it("min and max pick the right operand", () => {
			expect(LibDecimal.min(a, b)).toBe(a);
			expect(LibDecimal.max(a, b)).toBe(b);
		});

		it("sign predicates", () => {
			expect(LibDecimal.from(-0.5).isNegative()).toBe(true);
			expect(LibDecimal.from(0.5).isPositive()).toBe(true);
			expect(LibDecimal.zero().isPositive()).toBe(false);
		});

		it("isInteger", () => {
			expect(LibDecimal.from("150").isInteger()).toBe(true);
			expect(LibDecimal.from("-296.7").isInteger()).toBe(false);
		});
	});

	describe("conversion", () => {
		it("toString strips trailing zeros", () => {
			expect(LibDecimal.from("1.500").toString()).toBe("1.5");
			expect(LibDecimal.from("2.000").toString()).toBe("2");
		});

		it("toFixed rounds half up", () => {
			expect(LibDecimal.from("0.125").toFixed(2)).toBe("0.13");
			expect(LibDecimal.from("100").toFixed(2)).toBe("100.00");
		});

		it("toNumber", () => {
			expect(LibDecimal.from("1.5").toNumber()).toBe(1.5);
		});
	});
});

/**
 * LibDecimal — domain-agnostic wrapper around decimal.js-light.
 *
 * Odds, probabilities and stakes are computed without IEEE 754 float error.
 * Domain code reaches this through the shared/decimal facade and never
 * imports decimal.js-light directly.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

/** Rounding used when a value is cut to a fixed number of places. */
export type RoundingMode = "half_up" | "floor" | "ceil";

function toLibRounding(mode: RoundingMode): number {
	switch (mode) {
		case "half_up":
			return DecimalLight.ROUND_HALF_UP;
		case "floor":
			return DecimalLight.ROUND_FLOOR;
		case "ceil":
			return DecimalLight.ROUND_CEIL;
	}
}

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a LibDecimal from a string or number.
	 * @throws Error if value is not finite (for numbers) or empty (for strings)
	 * @example LibDecimal.from("2.5")
	 * @example LibDecimal.from(-200)
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	static zero(): LibDecimal {
		return new LibDecimal(new DecimalLight(0));
	}

	static one(): LibDecimal {
		return new LibDecimal(new DecimalLight(1));
	}

	static min(a: LibDecimal, b: LibDecimal): LibDecimal {
		return a.lte(b) ? a : b;
	}

	static max(a: LibDecimal, b: LibDecimal): LibDecimal {
		return a.gte(b) ? a : b;
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.plus(other.raw));
	}

	sub(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.minus(other.raw));
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw));
	}

	/**
	 * Divides this value by another LibDecimal.
	 * @throws Error if dividing by zero
	 */
	div(other: LibDecimal): LibDecimal {
		if (other.raw.isZero()) {
			throw new Error("LibDecimal.div: division by zero");
		}
		return new LibDecimal(this.raw.dividedBy(other.raw));
	}

	neg(): LibDecimal {
		return new LibDecimal(this.raw.negated());
	}

	abs(): LibDecimal {
		return new LibDecimal(this.raw.absoluteValue());
	}

	/**
	 * Natural logarithm at full working precision.
	 * @throws Error if value is zero or negative
	 */
	ln(): LibDecimal {
		if (!this.raw.greaterThan(0)) {
			throw new Error("LibDecimal.ln: ln of non-positive");
		}
		return new LibDecimal(this.raw.naturalLogarithm());
	}

	/**
	 * Rounds to a fixed number of decimal places.
	 * @example LibDecimal.from("296.7").round(0) // "297"
	 */
	round(places: number, mode: RoundingMode = "half_up"): LibDecimal {
		return new LibDecimal(this.raw.toDecimalPlaces(places, toLibRounding(mode)));
	}

	// ── Comparison ─────────────────────────────────────────────────

	/** @returns -1 if this < other, 0 if equal, 1 if this > other */
	cmp(other: LibDecimal): -1 | 0 | 1 {
		return this.raw.comparedTo(other.raw) as -1 | 0 | 1;
	}

	eq(other: LibDecimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: LibDecimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: LibDecimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: LibDecimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: LibDecimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	isInteger(): boolean {
		return this.raw.isInteger();
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Plain notation without trailing zeros.
	 * @example LibDecimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	/**
	 * Fixed-point string, rounded half-up.
	 * @example LibDecimal.from("0.33333").toFixed(2) // "0.33"
	 */
	toFixed(places: number): string {
		return this.raw.toFixed(places, DecimalLight.ROUND_HALF_UP);
	}

	/** May lose precision; for display and float-only APIs. */
	toNumber(): number {
		return this.raw.toNumber();
	}
}

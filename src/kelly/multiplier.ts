/**
 * The fraction of full Kelly actually staked.
 *
 * Presets (full, half, quarter) are names for common values, not the only
 * allowed ones: any custom multiplier in (0, 1] is accepted. Zero is
 * rejected; "never bet" is expressed by ignoring the result.
 */

import { Decimal } from "../shared/decimal.js";
import { InvalidInputError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

export const KellyPreset = {
	Full: "full",
	Half: "half",
	Quarter: "quarter",
} as const;

export type KellyPreset = (typeof KellyPreset)[keyof typeof KellyPreset];

export const KELLY_PRESETS: Readonly<Record<KellyPreset, string>> = {
	full: "1",
	half: "0.5",
	quarter: "0.25",
};

export function isKellyPreset(value: unknown): value is KellyPreset {
	return value === KellyPreset.Full || value === KellyPreset.Half || value === KellyPreset.Quarter;
}

export class KellyMultiplier {
	readonly name: string;
	readonly value: Decimal;
	readonly preset: KellyPreset | "custom";

	private constructor(value: Decimal, name: string, preset: KellyPreset | "custom") {
		this.value = value;
		this.name = name;
		this.preset = preset;
	}

	static full(): KellyMultiplier {
		return KellyMultiplier.fromPreset(KellyPreset.Full);
	}

	static half(): KellyMultiplier {
		return KellyMultiplier.fromPreset(KellyPreset.Half);
	}

	static quarter(): KellyMultiplier {
		return KellyMultiplier.fromPreset(KellyPreset.Quarter);
	}

	static fromPreset(preset: KellyPreset): KellyMultiplier {
		const names: Record<KellyPreset, string> = {
			full: "Kelly",
			half: "HalfKelly",
			quarter: "QuarterKelly",
		};
		return new KellyMultiplier(Decimal.from(KELLY_PRESETS[preset]), names[preset], preset);
	}

	/** Custom multiplier; must lie in (0, 1]. */
	static create(value: number | Decimal): Result<KellyMultiplier, InvalidInputError> {
		if (typeof value === "number" && !Number.isFinite(value)) {
			return err(
				new InvalidInputError("KellyMultiplier.create: multiplier must be finite", { value }),
			);
		}
		const m = typeof value === "number" ? Decimal.from(value) : value;
		if (!m.isPositive()) {
			return err(
				new InvalidInputError("KellyMultiplier.create: multiplier must be > 0", {
					value: m.toString(),
				}),
			);
		}
		if (m.gt(Decimal.one())) {
			return err(
				new InvalidInputError("KellyMultiplier.create: multiplier must be <= 1", {
					value: m.toString(),
				}),
			);
		}
		return ok(new KellyMultiplier(m, `Kelly(${m.toString()})`, "custom"));
	}
}

/** Accept either a preset name or a raw multiplier. */
export function resolveMultiplier(
	value: KellyPreset | number | Decimal,
): Result<KellyMultiplier, InvalidInputError> {
	if (isKellyPreset(value)) {
		return ok(KellyMultiplier.fromPreset(value));
	}
	return KellyMultiplier.create(value);
}

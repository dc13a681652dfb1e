export const StakeClass = {
	NoBet: "no_bet",
	Moderate: "moderate",
	Aggressive: "aggressive",
} as const;

export type StakeClass = (typeof StakeClass)[keyof typeof StakeClass];

export interface ReportOptions {
	/** Decimal places for percentages, money and decimal odds (default 2) */
	readonly precision?: number;
	/** Largest denominator shown in fractional odds (default 1000) */
	readonly maxDenominator?: number;
	/** Emit ANSI colour codes (default true) */
	readonly color?: boolean;
}

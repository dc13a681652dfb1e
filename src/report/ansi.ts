import type { Decimal } from "../shared/decimal.js";

export const RESET = "\x1b[0m";
export const GREEN = "\x1b[32m";
export const RED = "\x1b[31m";
export const YELLOW = "\x1b[33m";
export const BOLD = "\x1b[1m";

export function colorize(text: string, color: string): string {
	return `${color}${text}${RESET}`;
}

export function bold(text: string): string {
	return `${BOLD}${text}${RESET}`;
}

/** Green for a positive value, red for a negative one, none for zero. */
export function signColor(value: Decimal): string | null {
	if (value.isPositive()) return GREEN;
	if (value.isNegative()) return RED;
	return null;
}

/**
 * Odds text parsing for form inputs.
 *
 * Accepted shapes:
 *   decimal     "2.5", ".5" is rejected by the > 1 check
 *   american    "+150", "-200", "1,500"
 *   fractional  "5/2", "11 / 10"
 */

import { InvalidOddsError } from "../shared/errors.js";
import { type Result, err } from "../shared/result.js";
import { americanOdds, decimalOdds, fractionalOdds } from "./odds-value.js";
import type { OddsFormat, OddsValue } from "./types.js";

const DECIMAL_PATTERN = /^\+?(\d+(\.\d*)?|\.\d+)$/;
const AMERICAN_PATTERN = /^[+-]?\d+$/;
const FRACTIONAL_PATTERN = /^(\d+(?:\.\d+)?)\s*\/\s*(\d+(?:\.\d+)?)$/;

function unparseable(text: string, format: OddsFormat): InvalidOddsError {
	return new InvalidOddsError(`Cannot parse "${text}" as ${format} odds`, { text, format });
}

/** Parse odds text written in a known notation. */
export function parseOdds(text: string, format: OddsFormat): Result<OddsValue, InvalidOddsError> {
	const trimmed = text.trim();
	if (trimmed.length === 0) {
		return err(new InvalidOddsError("Odds text is empty", { format }));
	}

	switch (format) {
		case "decimal":
			return DECIMAL_PATTERN.test(trimmed)
				? decimalOdds(trimmed.replace(/^\+/, ""))
				: err(unparseable(trimmed, format));
		case "american": {
			const digits = trimmed.replaceAll(",", "");
			return AMERICAN_PATTERN.test(digits)
				? americanOdds(digits.replace(/^\+/, ""))
				: err(unparseable(trimmed, format));
		}
		case "fractional": {
			const match = FRACTIONAL_PATTERN.exec(trimmed);
			const [, numerator, denominator] = match ?? [];
			if (numerator === undefined || denominator === undefined) {
				return err(unparseable(trimmed, format));
			}
			return fractionalOdds(numerator, denominator);
		}
	}
}

/**
 * Parse odds text of unknown notation: decimal first, then American, then
 * fractional. A bare "150" therefore reads as decimal 150, not +150.
 */
export function parseAnyOdds(text: string): Result<OddsValue, InvalidOddsError> {
	for (const format of ["decimal", "american", "fractional"] as const) {
		const parsed = parseOdds(text, format);
		if (parsed.ok) return parsed;
	}
	return err(new InvalidOddsError(`Cannot parse "${text.trim()}" as odds`, { text }));
}

/**
 * Boundary conversion from caller-supplied numbers to Decimal.
 *
 * The error factory lets each field report its own failure kind: a NaN
 * bankroll is an InvalidBankrollError, a NaN probability an
 * InvalidProbabilityError, and so on.
 */

import { Decimal } from "./decimal.js";
import { type Result, err, ok, tryCatch } from "./result.js";

export type NumericInput = number | string | Decimal;

export function toDecimalInput<E>(
	value: NumericInput,
	field: string,
	makeError: (message: string, context: Record<string, unknown>) => E,
): Result<Decimal, E> {
	if (value instanceof Decimal) return ok(value);
	const parsed = tryCatch(() => Decimal.from(value));
	if (!parsed.ok) {
		return err(makeError(`${field} is not a finite number`, { [field]: String(value) }));
	}
	return parsed;
}

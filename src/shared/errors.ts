/**
 * KellyError hierarchy: structured failure kinds for the stake calculator.
 *
 * Every failure is a pure function of its inputs and recurs until the input
 * is corrected, so there is no retry classification: only the `kind` the
 * presentation layer shows to the user.
 */

/** Failure kinds surfaced by the calculator. */
export const ErrorKind = {
	InvalidOdds: "invalid_odds",
	InvalidProbability: "invalid_probability",
	InvalidBankroll: "invalid_bankroll",
	InvalidInput: "invalid_input",
	DivisionByZero: "division_by_zero",
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/** Base error class for every calculator failure. */
export class KellyError extends Error {
	readonly kind: ErrorKind;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		kind: ErrorKind,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "KellyError";
		this.kind = kind;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			kind: this.kind,
			...(this.hint !== undefined && { hint: this.hint }),
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Odds value outside the domain of its notation, or unparseable odds text. */
export class InvalidOddsError extends KellyError {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super(
			message,
			"INVALID_ODDS",
			ErrorKind.InvalidOdds,
			context,
			"Decimal odds must be > 1, American odds nonzero, fractional odds n/d with n, d > 0",
		);
		this.name = "InvalidOddsError";
	}
}

/** Estimated probability outside [0, 1]. */
export class InvalidProbabilityError extends KellyError {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super(message, "INVALID_PROBABILITY", ErrorKind.InvalidProbability, context);
		this.name = "InvalidProbabilityError";
	}
}

/** Negative or non-finite bankroll. */
export class InvalidBankrollError extends KellyError {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super(message, "INVALID_BANKROLL", ErrorKind.InvalidBankroll, context);
		this.name = "InvalidBankrollError";
	}
}

/** Kelly multiplier outside (0, 1], or a malformed input payload. */
export class InvalidInputError extends KellyError {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super(message, "INVALID_INPUT", ErrorKind.InvalidInput, context);
		this.name = "InvalidInputError";
	}
}

/** Net odds of zero reached the Kelly formula. Unreachable through validated odds. */
export class DivisionByZeroError extends KellyError {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super(message, "DIVISION_BY_ZERO", ErrorKind.DivisionByZero, context);
		this.name = "DivisionByZeroError";
	}
}

/** Malformed environment configuration. Thrown at startup, never from the core. */
export class ConfigError extends KellyError {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super(message, "CONFIG_ERROR", ErrorKind.InvalidInput, context);
		this.name = "ConfigError";
	}
}

// ── Type guards ──────────────────────────────────────────────────────

export function isKellyError(e: unknown): e is KellyError {
	return e instanceof KellyError;
}

export function isInvalidOdds(e: unknown): e is InvalidOddsError {
	return e instanceof InvalidOddsError;
}

export function isInvalidProbability(e: unknown): e is InvalidProbabilityError {
	return e instanceof InvalidProbabilityError;
}

export function isInvalidBankroll(e: unknown): e is InvalidBankrollError {
	return e instanceof InvalidBankrollError;
}

export function isInvalidInput(e: unknown): e is InvalidInputError {
	return e instanceof InvalidInputError;
}

export function isDivisionByZero(e: unknown): e is DivisionByZeroError {
	return e instanceof DivisionByZeroError;
}

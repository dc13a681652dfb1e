/**
 * Calculator configuration.
 *
 * Display and rounding settings for the presentation side of the
 * calculator. The pure core takes none of these implicitly; callers pass the
 * values they need.
 */

import { type KellyPreset, isKellyPreset } from "../kelly/multiplier.js";
import type { LogLevel } from "../lib/logger/index.js";
import { ConfigError } from "./errors.js";

export interface CalculatorConfig {
	/** Multiplier preset used when the caller does not choose one */
	readonly defaultMultiplier: KellyPreset;
	/** Decimal places for percentages, money and decimal odds in reports */
	readonly displayPrecision: number;
	/** Largest denominator used when odds are rounded to a fraction */
	readonly maxFractionDenominator: number;
	readonly logLevel: LogLevel;
}

export const DEFAULT_CALCULATOR_CONFIG: CalculatorConfig = {
	defaultMultiplier: "half",
	displayPrecision: 2,
	maxFractionDenominator: 1_000,
	logLevel: "info",
};

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/** Mutable builder shape for constructing Partial<CalculatorConfig>. */
interface MutableCalculatorConfig {
	defaultMultiplier?: KellyPreset;
	displayPrecision?: number;
	maxFractionDenominator?: number;
	logLevel?: LogLevel;
}

/**
 * Reads config values from environment variables.
 * Supported: EDGERUNNER_DEFAULT_MULTIPLIER, EDGERUNNER_DISPLAY_PRECISION,
 * EDGERUNNER_MAX_FRACTION_DENOMINATOR, EDGERUNNER_LOG_LEVEL.
 * @throws ConfigError if a variable holds a malformed value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<CalculatorConfig> {
	const result: MutableCalculatorConfig = {};

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const multiplier = env["EDGERUNNER_DEFAULT_MULTIPLIER"];
	if (multiplier) {
		if (!isKellyPreset(multiplier)) {
			throw new ConfigError(
				`Invalid EDGERUNNER_DEFAULT_MULTIPLIER: "${multiplier}" must be full, half or quarter`,
			);
		}
		result.defaultMultiplier = multiplier;
	}

	const precision = parseIntEnv(env, "EDGERUNNER_DISPLAY_PRECISION", 0);
	if (precision !== undefined) {
		result.displayPrecision = precision;
	}

	const maxDenominator = parseIntEnv(env, "EDGERUNNER_MAX_FRACTION_DENOMINATOR", 1);
	if (maxDenominator !== undefined) {
		result.maxFractionDenominator = maxDenominator;
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const level = env["EDGERUNNER_LOG_LEVEL"];
	if (level) {
		if (!isLogLevel(level)) {
			throw new ConfigError(`Invalid EDGERUNNER_LOG_LEVEL: "${level}"`);
		}
		result.logLevel = level;
	}

	return result;
}

/** Defaults, then environment, then explicit overrides. */
export function resolveConfig(
	overrides: Partial<CalculatorConfig> = {},
	env: NodeJS.ProcessEnv = process.env,
): CalculatorConfig {
	return { ...DEFAULT_CALCULATOR_CONFIG, ...configFromEnv(env), ...overrides };
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseIntEnv(env: NodeJS.ProcessEnv, key: string, min: number): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < min) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be an integer >= ${min}`);
	}
	return parsed;
}

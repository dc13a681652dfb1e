// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	tryCatch,
	ErrorKind,
	KellyError,
	InvalidOddsError,
	InvalidProbabilityError,
	InvalidBankrollError,
	InvalidInputError,
	DivisionByZeroError,
	ConfigError,
	isKellyError,
	isInvalidOdds,
	isInvalidProbability,
	isInvalidBankroll,
	isInvalidInput,
	isDivisionByZero,
	Decimal,
	type RoundingMode,
	BetSide,
	oppositeSide,
	complementProbability,
	type NumericInput,
	type CalculatorConfig,
	DEFAULT_CALCULATOR_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./shared/index.js";

// ── Odds ─────────────────────────────────────────────────────────────
export {
	type OddsValue,
	type DecimalOdds,
	type AmericanOdds,
	type FractionalOdds,
	type OddsRounding,
	type ConversionOptions,
	type OddsFormatOptions,
	type Fraction,
	OddsFormat,
	ODDS_FORMATS,
	decimalOdds,
	americanOdds,
	fractionalOdds,
	toDecimal,
	fromDecimal,
	convertOdds,
	complementOdds,
	approximateFraction,
	parseOdds,
	parseAnyOdds,
	formatOdds,
	formatDecimalAs,
} from "./odds/index.js";

// ── Probability & Edge ───────────────────────────────────────────────
export {
	checkProbability,
	impliedProbability,
	fairOdds,
	oddsFromMarketProbability,
} from "./probability/index.js";
export { type EdgeMetrics, computeEdge } from "./edge/index.js";

// ── Kelly ────────────────────────────────────────────────────────────
export {
	type KellyResult,
	type KellyFailure,
	computeKelly,
	KellyMultiplier,
	KellyPreset,
	KELLY_PRESETS,
	isKellyPreset,
	resolveMultiplier,
	expectedLogGrowth,
} from "./kelly/index.js";

// ── Evaluation ───────────────────────────────────────────────────────
export {
	type BetInput,
	type Evaluation,
	type BetInputPayload,
	type BetInputFailure,
	BetInputSchema,
	evaluate,
	evaluateBet,
	parseBetInput,
} from "./evaluate/index.js";

// ── Session & Report ─────────────────────────────────────────────────
export {
	type BetSnapshot,
	type SessionOptions,
	type SnapshotPatch,
	type SessionResult,
	CalculatorSession,
} from "./session/index.js";
export { type ReportOptions, ReportRenderer, StakeClass, classifyStake } from "./report/index.js";

// ── Lib ──────────────────────────────────────────────────────────────
export {
	type Logger,
	type LogLevel,
	type LoggerConfig,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";
export { ValidationError, type ValidationIssue, validate } from "./lib/validation/index.js";

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
} from "./result.js";

export {
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
} from "./errors.js";

export { Decimal, type RoundingMode } from "./decimal.js";
export { BetSide, oppositeSide, complementProbability } from "./bet-side.js";
export { type NumericInput, toDecimalInput } from "./numeric.js";
export {
	type CalculatorConfig,
	DEFAULT_CALCULATOR_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";

import type { Evaluation } from "../evaluate/types.js";
import { complementOdds } from "../odds/converter.js";
import { formatDecimalAs } from "../odds/formatter.js";
import { ODDS_FORMATS } from "../odds/types.js";
import type { CalculatorConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import type { KellyError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { GREEN, RED, YELLOW, bold, colorize, signColor } from "./ansi.js";
import { type ReportOptions, StakeClass } from "./types.js";

const HUNDRED = Decimal.from(100);
const AGGRESSIVE_THRESHOLD = Decimal.from("0.25");
const RULE = "════════════════════════════════════════";

/** no_bet at f* <= 0, aggressive above a quarter of the bankroll. */
export function classifyStake(fullKellyFraction: Decimal): StakeClass {
	if (!fullKellyFraction.isPositive()) return StakeClass.NoBet;
	if (fullKellyFraction.gt(AGGRESSIVE_THRESHOLD)) return StakeClass.Aggressive;
	return StakeClass.Moderate;
}

interface Style {
	readonly precision: number;
	readonly maxDenominator: number | undefined;
	paint(text: string, color: string | null): string;
	strong(text: string): string;
}

function makeStyle(options: ReportOptions): Style {
	const color = options.color ?? true;
	return {
		precision: options.precision ?? 2,
		maxDenominator: options.maxDenominator,
		paint: (text, c) => (color && c !== null ? colorize(text, c) : text),
		strong: (text) => (color ? bold(text) : text),
	};
}

function percent(value: Decimal, precision: number): string {
	return `${value.mul(HUNDRED).toFixed(precision)}%`;
}

function signed(text: string, value: Decimal): string {
	return value.isNegative() ? text : `+${text}`;
}

function renderOdds(decimal: Decimal, style: Style): string {
	const shown = ODDS_FORMATS.map((format) => {
		const text = formatDecimalAs(decimal, format, {
			precision: style.precision,
			...(style.maxDenominator !== undefined && { maxDenominator: style.maxDenominator }),
		});
		// conventional fractions fail only for odds a hair above 1
		return text.ok ? text.value : "—";
	});
	return shown.join(" | ");
}

function stakeColor(stakeClass: StakeClass): string {
	if (stakeClass === StakeClass.NoBet) return RED;
	if (stakeClass === StakeClass.Aggressive) return YELLOW;
	return GREEN;
}

function renderEvaluation(evaluation: Evaluation, style: Style): string {
	const { precision } = style;
	const stakeClass = classifyStake(evaluation.fullKellyFraction);
	const edgeColor = signColor(evaluation.edge);
	const fair = evaluation.fairOdds === null ? "—" : renderOdds(evaluation.fairOdds, style);
	const complement = complementOdds(evaluation.decimalOdds);
	const opposite = complement.ok ? renderOdds(complement.value, style) : "—";

	return [
		style.strong("═══ KELLY STAKE ═══"),
		RULE,
		`Odds:                ${renderOdds(evaluation.decimalOdds, style)}`,
		`Opposite side:       ${opposite}`,
		`Fair odds:           ${fair}`,
		`Implied probability: ${percent(evaluation.impliedProbability, precision)}`,
		`Edge:                ${style.paint(signed(percent(evaluation.edge, precision), evaluation.edge), edgeColor)}`,
		`EV per 1 staked:     ${style.paint(signed(evaluation.evPerUnitStake.toFixed(precision), evaluation.evPerUnitStake), signColor(evaluation.evPerUnitStake))}`,
		"",
		`Full Kelly:          ${percent(evaluation.fullKellyFraction, precision)}`,
		`Applied fraction:    ${percent(evaluation.appliedFraction, precision)}`,
		`Recommended stake:   ${style.strong(`$${evaluation.recommendedStake.toFixed(precision)}`)}`,
		`Log growth per bet:  ${percent(evaluation.expectedLogGrowth, precision)}`,
		`Sizing:              ${style.paint(stakeClass, stakeColor(stakeClass))}`,
	].join("\n");
}

/** Pure renderer: one evaluation result to terminal text. */
export const ReportRenderer = {
	render(result: Result<Evaluation, KellyError>, options: ReportOptions = {}): string {
		const style = makeStyle(options);
		if (!result.ok) {
			return style.paint(`Invalid input: ${result.error.message}`, RED);
		}
		return renderEvaluation(result.value, style);
	},

	/** Options taken from the calculator config. */
	optionsFrom(config: CalculatorConfig, color = true): ReportOptions {
		return {
			precision: config.displayPrecision,
			maxDenominator: config.maxFractionDenominator,
			color,
		};
	},
};

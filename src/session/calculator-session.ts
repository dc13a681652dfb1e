import { evaluateBet } from "../evaluate/evaluate.js";
import type { Evaluation } from "../evaluate/types.js";
import { KellyMultiplier } from "../kelly/multiplier.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { complementOdds, fromDecimal, toDecimal } from "../odds/converter.js";
import { decimalOdds } from "../odds/odds-value.js";
import type { OddsFormat, OddsValue } from "../odds/types.js";
import { oddsFromMarketProbability } from "../probability/implied.js";
import { BetSide, complementProbability, oppositeSide } from "../shared/bet-side.js";
import { type CalculatorConfig, DEFAULT_CALCULATOR_CONFIG } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import type { InvalidOddsError, KellyError } from "../shared/errors.js";
import { type Result, err, flatMap } from "../shared/result.js";
import type { BetSnapshot, SessionOptions, SnapshotPatch } from "./types.js";

export type SessionResult = Result<Evaluation, KellyError>;

/** A field given as undefined keeps its current value; `odds: null` clears the odds. */
function applyPatch(base: BetSnapshot, patch: SnapshotPatch): BetSnapshot {
	return Object.freeze({
		odds: patch.odds === undefined ? base.odds : patch.odds,
		marketProbability: patch.marketProbability ?? base.marketProbability,
		side: patch.side ?? base.side,
		estimatedProbability: patch.estimatedProbability ?? base.estimatedProbability,
		bankroll: patch.bankroll ?? base.bankroll,
		kellyMultiplier: patch.kellyMultiplier ?? base.kellyMultiplier,
	});
}

/**
 * Model-view-update state for an interactive calculator.
 *
 * Holds one frozen snapshot and the result of evaluating it. Every change
 * builds a new snapshot and re-evaluates synchronously, so the last input
 * always wins.
 */
export class CalculatorSession {
	private readonly config: CalculatorConfig;
	private readonly logger: Logger;
	private snapshot: BetSnapshot;
	private result: SessionResult;

	constructor(options: SessionOptions = {}) {
		this.config = options.config ?? DEFAULT_CALCULATOR_CONFIG;
		this.logger = (options.logger ?? silentLogger()).child({ module: "session" });
		const defaults: BetSnapshot = {
			odds: null,
			marketProbability: Decimal.from("0.6"),
			side: BetSide.OnEvent,
			estimatedProbability: Decimal.from("0.55"),
			bankroll: Decimal.from(1000),
			kellyMultiplier: KellyMultiplier.fromPreset(this.config.defaultMultiplier),
		};
		this.snapshot = applyPatch(defaults, options.initial ?? {});
		this.result = this.evaluateSnapshot();
	}

	get current(): BetSnapshot {
		return this.snapshot;
	}

	get lastResult(): SessionResult {
		return this.result;
	}

	update(patch: SnapshotPatch): SessionResult {
		this.snapshot = applyPatch(this.snapshot, patch);
		this.result = this.evaluateSnapshot();
		return this.result;
	}

	/**
	 * Back the other outcome. Entered odds become the complement price in the
	 * same notation and the bettor's probability p becomes 1 - p.
	 */
	flipSide(): SessionResult {
		const { odds, side, estimatedProbability } = this.snapshot;
		let flipped: OddsValue | null = null;
		if (odds !== null) {
			const complement = flatMap(toDecimal(odds), complementOdds);
			if (!complement.ok) return this.reject(complement.error);
			const reexpressed = this.express(complement.value, odds.format);
			if (!reexpressed.ok) return this.reject(reexpressed.error);
			flipped = reexpressed.value;
		}
		this.logger.debug({ from: side, to: oppositeSide(side) }, "bet side flipped");
		return this.update({
			odds: flipped,
			side: oppositeSide(side),
			estimatedProbability: complementProbability(estimatedProbability),
		});
	}

	/**
	 * Re-express entered odds in another notation with conventional rounding.
	 * With no odds entered only the evaluation is refreshed.
	 */
	convertOddsFormat(format: OddsFormat): SessionResult {
		const { odds } = this.snapshot;
		if (odds === null) return this.update({});
		const converted = flatMap(toDecimal(odds), (d) => this.express(d, format));
		if (!converted.ok) return this.reject(converted.error);
		return this.update({ odds: converted.value });
	}

	/** Decimal price in effect: entered odds, else the market-implied price. */
	effectiveOdds(): Result<Decimal, KellyError> {
		const { odds, marketProbability, side } = this.snapshot;
		return odds === null ? oddsFromMarketProbability(marketProbability, side) : toDecimal(odds);
	}

	private express(decimal: Decimal, format: OddsFormat): Result<OddsValue, InvalidOddsError> {
		const conventional = fromDecimal(decimal, format, {
			rounding: "conventional",
			maxDenominator: this.config.maxFractionDenominator,
		});
		// too short for a bounded fraction: keep the exact value
		return conventional.ok ? conventional : fromDecimal(decimal, format);
	}

	private evaluateSnapshot(): SessionResult {
		const { estimatedProbability, bankroll, kellyMultiplier } = this.snapshot;
		const price = this.effectiveOdds();
		const odds = price.ok ? decimalOdds(price.value) : price;
		const result: SessionResult = odds.ok
			? evaluateBet({ odds: odds.value, estimatedProbability, bankroll, kellyMultiplier })
			: odds;
		if (!result.ok) {
			this.logger.debug(
				{ code: result.error.code, kind: result.error.kind, context: result.error.context },
				"evaluation rejected",
			);
		}
		return result;
	}

	private reject(error: KellyError): SessionResult {
		this.logger.debug({ code: error.code, kind: error.kind }, "session change rejected");
		return err(error);
	}
}

/**
 * Kelly calculator — one interactive session driven from code.
 *
 * Prices a bet from the market probability, enters American odds, flips to
 * the opposite outcome and prints a report after each step.
 * Run: npx tsx examples/kelly-calculator.ts
 */

import {
	CalculatorSession,
	Decimal,
	ReportRenderer,
	americanOdds,
	createLogger,
	evaluateBet,
	parseBetInput,
	resolveConfig,
	unwrap,
} from "../src/index.js";

const config = resolveConfig();
const logger = createLogger({ level: config.logLevel });
const reportOptions = ReportRenderer.optionsFrom(config, process.stdout.isTTY === true);

function show(title: string, text: string): void {
	console.log(`\n${title}\n${text}`);
}

// ── Session ─────────────────────────────────────────────────────────

const session = new CalculatorSession({ config, logger });
show("Market-implied price", ReportRenderer.render(session.lastResult, reportOptions));

session.update({ odds: unwrap(americanOdds(150)), estimatedProbability: Decimal.from("0.45") });
show("+150 at 45%", ReportRenderer.render(session.lastResult, reportOptions));

session.flipSide();
show("Opposite side", ReportRenderer.render(session.lastResult, reportOptions));

// ── Form payload ────────────────────────────────────────────────────

const payload = {
	odds: { format: "fractional", text: "5/2" },
	estimatedProbability: 0.4,
	bankroll: 500,
	kellyMultiplier: "quarter",
};

const input = parseBetInput(payload);
if (!input.ok) {
	logger.error({ fields: input.error.context }, input.error.message);
} else {
	show("Form payload 5/2 at 40%", ReportRenderer.render(evaluateBet(input.value), reportOptions));
}

/**
 * The bettor's edge over the market price.
 *
 *   edge            = p - 1/d
 *   evPerUnitStake  = p·(d - 1) - (1 - p)
 *
 * EV is positive exactly when edge is positive.
 */

import { checkProbability, impliedProbability } from "../probability/implied.js";
import { Decimal } from "../shared/decimal.js";
import type { InvalidOddsError, InvalidProbabilityError } from "../shared/errors.js";
import { type Result, ok } from "../shared/result.js";
import type { EdgeMetrics } from "./types.js";

export function computeEdge(
	decimalOdds: Decimal,
	estimatedProbability: Decimal,
): Result<EdgeMetrics, InvalidOddsError | InvalidProbabilityError> {
	const p = checkProbability(estimatedProbability);
	if (!p.ok) return p;
	const implied = impliedProbability(decimalOdds);
	if (!implied.ok) return implied;

	const q = Decimal.one().sub(p.value);
	const net = decimalOdds.sub(Decimal.one());

	return ok({
		impliedProbability: implied.value,
		edge: p.value.sub(implied.value),
		evPerUnitStake: p.value.mul(net).sub(q),
	});
}

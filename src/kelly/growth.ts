/**
 * Expected logarithmic bankroll growth of a single bet:
 *
 *   g(f) = p·ln(1 + f·b) + q·ln(1 - f)
 *
 * Full Kelly is the f that maximizes g; fractional Kelly trades some growth
 * for lower variance.
 */

import { Decimal } from "../shared/decimal.js";
import { InvalidInputError, InvalidOddsError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

const ONE = Decimal.one();

export function expectedLogGrowth(
	probability: Decimal,
	netOdds: Decimal,
	fraction: Decimal,
): Result<Decimal, InvalidInputError | InvalidOddsError> {
	if (!netOdds.isPositive()) {
		return err(new InvalidOddsError("Net odds must be > 0", { netOdds: netOdds.toString() }));
	}
	if (fraction.isNegative() || fraction.gt(ONE)) {
		return err(
			new InvalidInputError("Stake fraction must be in [0, 1]", { fraction: fraction.toString() }),
		);
	}
	if (fraction.isZero()) return ok(Decimal.zero());

	const q = ONE.sub(probability);
	const winTerm = probability.isZero()
		? Decimal.zero()
		: probability.mul(ONE.add(fraction.mul(netOdds)).ln());
	if (q.isZero()) return ok(winTerm);

	const remaining = ONE.sub(fraction);
	if (!remaining.isPositive()) {
		// losing at f = 1 leaves nothing: ln(0)
		return err(
			new InvalidInputError("Stake fraction of 1 with a chance of losing has no finite growth", {
				fraction: fraction.toString(),
				probability: probability.toString(),
			}),
		);
	}
	return ok(winTerm.add(q.mul(remaining.ln())));
}

/**
 * Continued-fraction approximation of a positive real.
 *
 * Walks the convergents h/k of x and stops at the last one whose
 * denominator fits under `maxDenominator`.
 */

export interface Fraction {
	readonly numerator: number;
	readonly denominator: number;
}

const RESIDUE_EPSILON = 1e-9;

export function approximateFraction(x: number, maxDenominator: number, maxIterations = 100): Fraction {
	let remainder = x;
	let term = Math.floor(remainder);
	let prevNum = 1;
	let prevDen = 0;
	let num = term;
	let den = 1;

	for (let i = 0; i < maxIterations; i++) {
		const frac = remainder - term;
		if (Math.abs(frac) < RESIDUE_EPSILON) break;
		remainder = 1 / frac;
		term = Math.floor(remainder);
		const nextNum = prevNum + term * num;
		const nextDen = prevDen + term * den;
		if (nextDen > maxDenominator) break;
		prevNum = num;
		prevDen = den;
		num = nextNum;
		den = nextDen;
	}

	return { numerator: num, denominator: den };
}

/**
 * Kelly criterion sizing.
 *
 * Full and fractional Kelly stakes, multiplier presets and the expected
 * log-growth of a stake.
 */

export type { KellyResult } from "./types.js";
export { type KellyFailure, computeKelly } from "./kelly-engine.js";
export {
	KellyMultiplier,
	KellyPreset,
	KELLY_PRESETS,
	isKellyPreset,
	resolveMultiplier,
} from "./multiplier.js";
export { expectedLogGrowth } from "./growth.js";

export type { BetInput, Evaluation } from "./types.js";
export { evaluate, evaluateBet } from "./evaluate.js";
export {
	BetInputSchema,
	type BetInputPayload,
	type BetInputFailure,
	parseBetInput,
} from "./bet-input.js";

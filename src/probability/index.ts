export {
	checkProbability,
	impliedProbability,
	fairOdds,
	oddsFromMarketProbability,
} from "./implied.js";

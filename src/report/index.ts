export { ReportRenderer, classifyStake } from "./renderer.js";
export { StakeClass, type ReportOptions } from "./types.js";
export { colorize, bold, signColor } from "./ansi.js";

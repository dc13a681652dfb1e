export type { EdgeMetrics } from "./types.js";
export { computeEdge } from "./edge-calculator.js";

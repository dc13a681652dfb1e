export type { BetSnapshot, SessionOptions, SnapshotPatch } from "./types.js";
export { CalculatorSession, type SessionResult } from "./calculator-session.js";

export { PositionStatus } from "./types.js";
export type { Position, CreatePositionInput } from "./types.js";
export { isLivePosition, canTransitionPosition, transitionPosition } from "./position-status.js";
export { computePnl, isStopLossBreached } from "./pnl.js";
export { encodePosition, decodePosition } from "./codec.js";
export { PositionLedger } from "./position-ledger.js";
export type { PositionLedgerOptions } from "./position-ledger.js";

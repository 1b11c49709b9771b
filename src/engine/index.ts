export { TradingEngine } from "./trading-engine.js";
export type {
	PositionFailure,
	PositionSummary,
	TradingEngineOptions,
	UpdateReport,
} from "./trading-engine.js";
export { KeyedLock } from "./keyed-lock.js";

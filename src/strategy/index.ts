export { DataType, SignalType, priceOf } from "./types.js";
export type {
	Candle,
	CandlePoint,
	DataPoint,
	LastSignalSummary,
	PricePoint,
	Signal,
	Strategy,
	StrategyStatePatch,
	StrategyStateRecord,
} from "./types.js";

export type { SizingConfig, StrategyContext } from "./strategy-context.js";
export {
	StrategyStateKeeper,
	decodeStrategyState,
	encodeStrategyState,
} from "./strategy-state.js";
export type { StrategyStateKeeperOptions } from "./strategy-state.js";
export { validateSignal } from "./validate-signal.js";

export {
	MA_CROSSOVER_KIND,
	MaCrossoverStrategy,
	maCrossoverParamsSchema,
} from "./strategies/ma-crossover.js";
export type { MaCrossoverParams } from "./strategies/ma-crossover.js";
export { MA_CROSSOVER_PRESETS, maCrossoverPreset } from "./presets.js";
export type { MaCrossoverPreset } from "./presets.js";

export { StrategyRegistry, createDefaultRegistry } from "./registry.js";
export type { StrategyFactory } from "./registry.js";
export { StrategyManager, stopLossFor } from "./strategy-manager.js";
export type {
	AddStrategyRequest,
	ProcessReport,
	SignalExecutor,
	StrategyFailure,
	StrategyManagerOptions,
	StrategySummary,
} from "./strategy-manager.js";

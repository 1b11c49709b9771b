// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type OrderId,
	type TradeId,
	type PositionId,
	type StrategyId,
	orderId,
	tradeId,
	positionId,
	strategyId,
	idToString,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	Decimal,
	Side,
	oppositeSide,
	type Metadata,
	type JsonObject,
	type Clock,
	SystemClock,
	FakeClock,
	toIso,
	fromIso,
	type CoreConfig,
	type CoreConfigOverrides,
	type TradingConfig,
	DEFAULT_CORE_CONFIG,
	resolveConfig,
	configFromEnv,
	ErrorCategory,
	TradingError,
	ValidationError,
	NotFoundError,
	InvalidStateError,
	ExecutionError,
	StoreUnavailableError,
	ConfigError,
	SystemError,
	classifyError,
	errorMessage,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LoggerConfig, createLogger, silentLogger } from "./lib/logger/index.js";
export { validate, formatIssues } from "./lib/validation/index.js";
export { TypedEmitter, type EventMap } from "./lib/events/index.js";

// ── Events ───────────────────────────────────────────────────────────
export {
	EventType,
	EventCategory,
	categoryOf,
	parseEventType,
	type BusEvent,
	type EventPayload,
	EventBus,
	type EventHandler,
	type EventBusOptions,
	type EmitReport,
} from "./events/index.js";

// ── Storage ──────────────────────────────────────────────────────────
export {
	type StateStore,
	type StoreValue,
	MemoryStateStore,
	FileStateStore,
	type FileStateStoreConfig,
	orderKey,
	tradeKey,
	positionKey,
	strategyStateKey,
} from "./store/index.js";

// ── Ledgers ──────────────────────────────────────────────────────────
export {
	OrderKind,
	OrderStatus,
	type Order,
	type Trade,
	type TradeFilter,
	type OrderFilter,
	OrderLedger,
} from "./order/index.js";
export {
	PositionStatus,
	type Position,
	computePnl,
	isStopLossBreached,
	PositionLedger,
} from "./position/index.js";

// ── Execution ────────────────────────────────────────────────────────
export {
	type ExecutionClient,
	type QuoteRequest,
	type Quote,
	type SwapResult,
	splitSymbol,
	PaperExecutionClient,
	type PaperExecutionClientConfig,
} from "./execution/index.js";
export {
	TradingEngine,
	type TradingEngineOptions,
	type PositionSummary,
	type UpdateReport,
} from "./engine/index.js";

// ── Strategies ───────────────────────────────────────────────────────
export { calcSMA, smaSeries, detectCross, CrossDirection } from "./analytics/index.js";
export {
	DataType,
	SignalType,
	priceOf,
	type Candle,
	type DataPoint,
	type Signal,
	type Strategy,
	type StrategyContext,
	type StrategyStateRecord,
	StrategyStateKeeper,
	validateSignal,
	MA_CROSSOVER_KIND,
	MaCrossoverStrategy,
	maCrossoverParamsSchema,
	type MaCrossoverParams,
	MA_CROSSOVER_PRESETS,
	maCrossoverPreset,
	StrategyRegistry,
	type StrategyFactory,
	createDefaultRegistry,
	StrategyManager,
	type AddStrategyRequest,
	type StrategySummary,
	type ProcessReport,
} from "./strategy/index.js";

// ── Runtime ──────────────────────────────────────────────────────────
export { AsyncQueue, DataIngestionLoop, type IngestionSink } from "./ingestion/index.js";
export {
	TradingSystem,
	type TradingSystemOptions,
	type SystemStatus,
	type TradeHistory,
} from "./system/index.js";

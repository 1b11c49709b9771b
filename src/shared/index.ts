export {
	type OrderId,
	type TradeId,
	type PositionId,
	type StrategyId,
	orderId,
	tradeId,
	positionId,
	strategyId,
	newOrderId,
	newTradeId,
	newPositionId,
	randomToken,
	idToString,
} from "./identifiers.js";

export { type Result, type Ok, type Err, ok, err, unwrap, isOk, isErr } from "./result.js";

export {
	ErrorCategory,
	TradingError,
	type ValidationIssue,
	ValidationError,
	NotFoundError,
	InvalidStateError,
	ExecutionError,
	StoreUnavailableError,
	ConfigError,
	SystemError,
	classifyError,
	errorMessage,
	isValidationError,
	isNotFoundError,
	isInvalidStateError,
	isExecutionError,
	isStoreUnavailableError,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export { Side, oppositeSide, sideSign, sideSchema } from "./side.js";
export {
	type JsonPrimitive,
	type JsonValue,
	type JsonObject,
	type Metadata,
	jsonValueSchema,
	jsonObjectSchema,
} from "./json.js";
export { type Clock, SystemClock, FakeClock, toIso, fromIso } from "./time.js";
export {
	type LogLevel,
	type TradingConfig,
	type EventsConfig,
	type CoreConfig,
	type CoreConfigOverrides,
	DEFAULT_CORE_CONFIG,
	resolveConfig,
	configFromEnv,
} from "./config.js";

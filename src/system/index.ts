export { TradingSystem } from "./trading-system.js";
export type {
	IdFactories,
	IngestionStatus,
	SystemStatus,
	TradeHistory,
	TradingSystemOptions,
} from "./trading-system.js";

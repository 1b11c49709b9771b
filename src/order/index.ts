export { OrderKind, OrderStatus } from "./types.js";
export type {
	Order,
	Trade,
	CreateOrderInput,
	OrderUpdate,
	CreateTradeInput,
	TradeFilter,
	OrderFilter,
} from "./types.js";
export { isTerminalOrderStatus, canTransitionOrder, transitionOrder } from "./order-status.js";
export { encodeOrder, decodeOrder, encodeTrade, decodeTrade } from "./codec.js";
export { OrderLedger } from "./order-ledger.js";
export type { OrderLedgerOptions } from "./order-ledger.js";

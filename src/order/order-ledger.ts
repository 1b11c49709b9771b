/**
 * OrderLedger: authoritative record of orders and trades.
 *
 * Write-through: every mutation is written to the StateStore first and only
 * then becomes visible in the in-memory cache, so a failed write leaves both
 * at the previous value. Lookups fall back to the store on a cache miss.
 * Listing (listOrders, getTrades) covers what this process has seen.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { InvalidStateError, NotFoundError } from "../shared/errors.js";
import {
	type OrderId,
	type PositionId,
	type TradeId,
	newOrderId,
	newTradeId,
} from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { readRecord, writeRecord } from "../store/store-access.js";
import { type StateStore, orderKey, tradeKey } from "../store/types.js";
import { decodeOrder, decodeTrade, encodeOrder, encodeTrade } from "./codec.js";
import { transitionOrder } from "./order-status.js";
import {
	type CreateOrderInput,
	type CreateTradeInput,
	type Order,
	type OrderFilter,
	OrderStatus,
	type OrderUpdate,
	type Trade,
	type TradeFilter,
} from "./types.js";

export interface OrderLedgerOptions {
	readonly store: StateStore;
	readonly clock?: Clock;
	readonly logger?: Logger;
	readonly newOrderId?: () => OrderId;
	readonly newTradeId?: () => TradeId;
}

export class OrderLedger {
	private readonly orders = new Map<string, Order>();
	private readonly trades = new Map<string, Trade>();
	private readonly store: StateStore;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly nextOrderId: () => OrderId;
	private readonly nextTradeId: () => TradeId;

	constructor(options: OrderLedgerOptions) {
		this.store = options.store;
		this.clock = options.clock ?? SystemClock;
		this.logger = (options.logger ?? silentLogger()).child({ component: "order-ledger" });
		this.nextOrderId = options.newOrderId ?? newOrderId;
		this.nextTradeId = options.newTradeId ?? newTradeId;
	}

	// ── Orders ─────────────────────────────────────────────────────

	/** New order in PENDING. */
	async createOrder(input: CreateOrderInput): Promise<Order> {
		const order: Order = {
			id: this.nextOrderId(),
			symbol: input.symbol,
			side: input.side,
			size: input.size,
			price: input.price ?? null,
			kind: input.kind,
			status: OrderStatus.Pending,
			submittedAtMs: this.clock.now(),
			filledPrice: null,
			filledSize: null,
			filledAtMs: null,
			error: null,
			metadata: input.metadata ?? {},
		};
		await this.saveOrder(order);
		this.logger.info(
			{ orderId: order.id, symbol: order.symbol, side: order.side, size: order.size },
			"order created",
		);
		return order;
	}

	/**
	 * Move an order forward. FILLED stamps the fill time.
	 * @throws NotFoundError if the order is unknown
	 * @throws InvalidStateError if the transition is not allowed
	 */
	async updateOrder(id: OrderId, update: OrderUpdate): Promise<Order> {
		const current = await this.requireOrder(id);
		const status = unwrap(transitionOrder(current.status, update.status));
		const updated: Order = {
			...current,
			status,
			filledPrice: update.filledPrice ?? current.filledPrice,
			filledSize: update.filledSize ?? current.filledSize,
			filledAtMs: status === OrderStatus.Filled ? this.clock.now() : current.filledAtMs,
			error: update.error ?? current.error,
			metadata: update.metadata ? { ...current.metadata, ...update.metadata } : current.metadata,
		};
		await this.saveOrder(updated);
		this.logger.info({ orderId: id, from: current.status, to: status }, "order updated");
		return updated;
	}

	/** PENDING → CANCELLED, recording the reason as the order's error text. */
	async cancelOrder(id: OrderId, reason?: string): Promise<Order> {
		return this.updateOrder(id, {
			status: OrderStatus.Cancelled,
			...(reason !== undefined && { error: reason }),
		});
	}

	/** Cache first, then the store; null when neither knows the id. */
	async getOrder(id: OrderId): Promise<Order | null> {
		const cached = this.orders.get(id);
		if (cached) return cached;

		const raw = await readRecord(this.store, orderKey(id), this.logger);
		if (raw === null) return null;
		const order = unwrap(decodeOrder(raw));
		this.orders.set(id, order);
		return order;
	}

	listOrders(filter: OrderFilter = {}): readonly Order[] {
		return [...this.orders.values()]
			.filter((o) => filter.status === undefined || o.status === filter.status)
			.filter((o) => filter.symbol === undefined || o.symbol === filter.symbol)
			.sort((a, b) => a.submittedAtMs - b.submittedAtMs);
	}

	// ── Trades ─────────────────────────────────────────────────────

	/**
	 * Record a fill against an existing order; side and symbol come from the order.
	 * @throws NotFoundError if the order is unknown
	 */
	async createTrade(input: CreateTradeInput): Promise<Trade> {
		const order = await this.requireOrder(input.orderId);
		const trade: Trade = {
			id: this.nextTradeId(),
			orderId: order.id,
			positionId: input.positionId,
			symbol: order.symbol,
			side: order.side,
			size: input.size,
			price: input.price,
			fee: input.fee,
			timestampMs: this.clock.now(),
			metadata: input.metadata ?? {},
		};
		await this.saveTrade(trade);
		this.logger.info(
			{ tradeId: trade.id, orderId: order.id, price: trade.price, size: trade.size },
			"trade recorded",
		);
		return trade;
	}

	/**
	 * Set the trade's position reference. Setting the same id again is a no-op.
	 * @throws InvalidStateError if a different position is already attached
	 */
	async attachPosition(id: TradeId, position: PositionId): Promise<Trade> {
		const trade = await this.getTrade(id);
		if (trade === null) {
			throw new NotFoundError("Trade", id);
		}
		if (trade.positionId === position) return trade;
		if (trade.positionId !== null) {
			throw new InvalidStateError(`Trade ${id} already references ${trade.positionId}`, {
				tradeId: id,
				positionId: trade.positionId,
				attempted: position,
			});
		}
		const updated: Trade = { ...trade, positionId: position };
		await this.saveTrade(updated);
		return updated;
	}

	async getTrade(id: TradeId): Promise<Trade | null> {
		const cached = this.trades.get(id);
		if (cached) return cached;

		const raw = await readRecord(this.store, tradeKey(id), this.logger);
		if (raw === null) return null;
		const trade = unwrap(decodeTrade(raw));
		this.trades.set(id, trade);
		return trade;
	}

	tradesForOrder(id: OrderId): readonly Trade[] {
		return this.getTrades().filter((t) => t.orderId === id);
	}

	/** Trades filtered by symbol and inclusive time range, oldest first. */
	getTrades(filter: TradeFilter = {}): readonly Trade[] {
		const { symbol, fromMs, toMs } = filter;
		return [...this.trades.values()]
			.filter((t) => symbol === undefined || t.symbol === symbol)
			.filter((t) => fromMs === undefined || t.timestampMs >= fromMs)
			.filter((t) => toMs === undefined || t.timestampMs <= toMs)
			.sort((a, b) => a.timestampMs - b.timestampMs);
	}

	// ── Internal ──────────────────────────────────────────────────

	private async requireOrder(id: OrderId): Promise<Order> {
		const order = await this.getOrder(id);
		if (order === null) {
			throw new NotFoundError("Order", id);
		}
		return order;
	}

	private async saveOrder(order: Order): Promise<void> {
		await writeRecord(this.store, orderKey(order.id), encodeOrder(order), this.logger);
		this.orders.set(order.id, order);
	}

	private async saveTrade(trade: Trade): Promise<void> {
		await writeRecord(this.store, tradeKey(trade.id), encodeTrade(trade), this.logger);
		this.trades.set(trade.id, trade);
	}
}

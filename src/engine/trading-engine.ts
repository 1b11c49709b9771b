/**
 * TradingEngine: the only component that turns decisions into ledger state.
 *
 * Market orders go order → quote → swap → trade → position → FILLED.
 * A quote or swap failure marks the order FAILED, emits order_failed and
 * system_error, and is rethrown as ExecutionError. Nothing is retried here.
 *
 * Repricing and closing a position share one per-position lock. A manual
 * close that loses to a stop-loss close sees the position CLOSED; a
 * reprice or stop-loss close that loses to a manual close skips it.
 */

import type { EventBus } from "../events/event-bus.js";
import { EventType } from "../events/event-types.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import {
	type ExecutionClient,
	type SwapResult,
	checkSwapResult,
	splitSymbol,
} from "../execution/index.js";
import { encodeOrder, encodeTrade } from "../order/codec.js";
import type { OrderLedger } from "../order/order-ledger.js";
import { type Order, OrderKind, OrderStatus, type Trade, type TradeFilter } from "../order/types.js";
import { encodePosition } from "../position/codec.js";
import type { PositionLedger } from "../position/position-ledger.js";
import { isLivePosition } from "../position/position-status.js";
import { type Position, PositionStatus } from "../position/types.js";
import { Decimal } from "../shared/decimal.js";
import {
	ExecutionError,
	InvalidStateError,
	NotFoundError,
	ValidationError,
	classifyError,
	errorMessage,
} from "../shared/errors.js";
import type { OrderId, PositionId } from "../shared/identifiers.js";
import type { Metadata } from "../shared/json.js";
import { type Side, oppositeSide } from "../shared/side.js";
import { KeyedLock } from "./keyed-lock.js";

export interface TradingEngineOptions {
	readonly orders: OrderLedger;
	readonly positions: PositionLedger;
	readonly client: ExecutionClient;
	readonly bus: EventBus;
	readonly logger?: Logger;
}

export interface PositionFailure {
	readonly positionId: PositionId;
	readonly error: Error;
}

/** Outcome of a batch over positions; one failure never aborts the rest. */
export interface UpdateReport {
	readonly updated: readonly Position[];
	readonly closed: readonly Position[];
	readonly failed: readonly PositionFailure[];
}

export interface PositionSummary {
	readonly totalPositions: number;
	readonly totalUnrealizedPnl: number;
	readonly activeSymbols: readonly string[];
	readonly positions: readonly Position[];
}

export class TradingEngine {
	private readonly orders: OrderLedger;
	private readonly positions: PositionLedger;
	private readonly client: ExecutionClient;
	private readonly bus: EventBus;
	private readonly logger: Logger;
	private readonly positionLock = new KeyedLock();

	constructor(options: TradingEngineOptions) {
		this.orders = options.orders;
		this.positions = options.positions;
		this.client = options.client;
		this.bus = options.bus;
		this.logger = (options.logger ?? silentLogger()).child({ component: "trading-engine" });
	}

	// ── Opening ────────────────────────────────────────────────────

	/**
	 * Buy or sell `size` of `symbol` at market and open a position on the fill.
	 * @returns the FILLED order; trade and position are in the ledgers
	 * @throws ValidationError for a malformed symbol or non-positive size
	 * @throws ExecutionError if quoting or swapping fails (the order is FAILED)
	 */
	async executeMarketOrder(
		symbol: string,
		side: Side,
		size: number,
		stopLoss?: number,
		metadata: Metadata = {},
	): Promise<Order> {
		assertPositive("size", size);
		if (stopLoss !== undefined) assertPositive("stopLoss", stopLoss);
		splitSymbol(symbol);

		const order = await this.orders.createOrder({
			symbol,
			side,
			size,
			kind: OrderKind.Market,
			metadata,
		});
		await this.bus.emit(EventType.OrderPlaced, encodeOrder(order));

		const swap = await this.swapFor(order);

		const trade = await this.orders.createTrade({
			orderId: order.id,
			positionId: null,
			price: swap.price,
			size: swap.size,
			fee: swap.fee,
			metadata: { txId: swap.txId },
		});
		const position = await this.positions.createPosition({
			symbol,
			side,
			size: trade.size,
			entryPrice: trade.price,
			...(stopLoss !== undefined && { stopLoss }),
			metadata,
		});
		const attached = await this.orders.attachPosition(trade.id, position.id);
		const filled = await this.orders.updateOrder(order.id, {
			status: OrderStatus.Filled,
			filledPrice: trade.price,
			filledSize: trade.size,
		});

		await this.bus.emit(EventType.TradeExecuted, encodeTrade(attached));
		await this.bus.emit(EventType.PositionOpened, encodePosition(position));
		await this.bus.emit(EventType.OrderFilled, encodeOrder(filled));
		this.logger.info(
			{ orderId: filled.id, positionId: position.id, price: trade.price, size: trade.size },
			"market order filled",
		);
		return filled;
	}

	// ── Closing ────────────────────────────────────────────────────

	/**
	 * Close the full size of a position with an opposite-side market order.
	 * @throws NotFoundError if the position is unknown
	 * @throws InvalidStateError if it is already CLOSED
	 * @throws ExecutionError if quoting or swapping fails (position unchanged)
	 */
	async closePosition(id: PositionId, metadata: Metadata = {}): Promise<Position> {
		return this.positionLock.run(id, () => this.closeUnlocked(id, metadata));
	}

	/**
	 * Best-effort close of every OPEN or CLOSING position, concurrently.
	 * Used on shutdown.
	 */
	async closeAllPositions(reason: string): Promise<UpdateReport> {
		const live = this.positions.openPositions();
		const settled = await Promise.allSettled(
			live.map((p) => this.closePosition(p.id, { reason })),
		);

		const closed: Position[] = [];
		const failed: PositionFailure[] = [];
		settled.forEach((outcome, i) => {
			const position = live[i];
			if (position === undefined) return;
			if (outcome.status === "fulfilled") {
				closed.push(outcome.value);
			} else {
				failed.push({ positionId: position.id, error: classifyError(outcome.reason) });
			}
		});
		if (failed.length > 0) {
			this.logger.error({ reason, failed: failed.length }, "some positions failed to close");
		}
		return { updated: [], closed, failed };
	}

	// ── Repricing ──────────────────────────────────────────────────

	/**
	 * Reprice every live position on `symbol`, then close those in CLOSING.
	 * A failure on one position is reported and the batch continues.
	 */
	async updatePositions(symbol: string, currentPrice: number): Promise<UpdateReport> {
		assertPositive("currentPrice", currentPrice);

		const updated: Position[] = [];
		const closing: Position[] = [];
		const failed: PositionFailure[] = [];

		for (const position of this.positions.openPositions(symbol)) {
			try {
				const marked = await this.positionLock.run(position.id, () =>
					this.markIfLive(position.id, currentPrice),
				);
				if (marked === null) continue;
				updated.push(marked);
				await this.bus.emit(EventType.PositionUpdated, encodePosition(marked));
				if (marked.status === PositionStatus.Closing) {
					if (position.status === PositionStatus.Open) {
						await this.bus.emit(EventType.PositionClosing, encodePosition(marked));
					}
					closing.push(marked);
				}
			} catch (error: unknown) {
				failed.push({ positionId: position.id, error: classifyError(error) });
				this.logger.error(
					{ positionId: position.id, error: errorMessage(error) },
					"position update failed",
				);
			}
		}

		const closed: Position[] = [];
		for (const position of closing) {
			try {
				const done = await this.positionLock.run(position.id, () =>
					this.closeIfLive(position.id, { reason: "stop_loss" }),
				);
				if (done !== null) closed.push(done);
			} catch (error: unknown) {
				failed.push({ positionId: position.id, error: classifyError(error) });
				this.logger.error(
					{ positionId: position.id, error: errorMessage(error) },
					"stop-loss close failed",
				);
			}
		}

		return { updated, closed, failed };
	}

	// ── Orders ─────────────────────────────────────────────────────

	/** Cancel a PENDING order. */
	async cancelOrder(id: OrderId, reason?: string): Promise<Order> {
		const cancelled = await this.orders.cancelOrder(id, reason);
		await this.bus.emit(EventType.OrderCancelled, encodeOrder(cancelled));
		return cancelled;
	}

	// ── Projections ────────────────────────────────────────────────

	getPositionSummary(): PositionSummary {
		const positions = this.positions.openPositions();
		return {
			totalPositions: positions.length,
			totalUnrealizedPnl: Decimal.sum(
				positions.map((p) => Decimal.from(p.unrealizedPnl)),
			).toNumber(),
			activeSymbols: [...new Set(positions.map((p) => p.symbol))],
			positions,
		};
	}

	/** Position opened by a filled order, or null. */
	positionForOrder(id: OrderId): PositionId | null {
		const trade = this.orders.tradesForOrder(id).find((t) => t.positionId !== null);
		return trade?.positionId ?? null;
	}

	/** Trades filtered by symbol and time range, oldest first. */
	getTradeHistory(filter: TradeFilter = {}): readonly Trade[] {
		return this.orders.getTrades(filter);
	}

	// ── Internal ──────────────────────────────────────────────────

	/** Reprice under the position's lock; null if it closed meanwhile. */
	private async markIfLive(id: PositionId, currentPrice: number): Promise<Position | null> {
		const current = await this.positions.getPosition(id);
		if (current === null || !isLivePosition(current.status)) return null;
		return this.positions.markPrice(id, currentPrice);
	}

	private async closeIfLive(id: PositionId, metadata: Metadata): Promise<Position | null> {
		const current = await this.positions.getPosition(id);
		if (current === null || !isLivePosition(current.status)) {
			this.logger.debug({ positionId: id }, "position closed before its stop-loss close ran");
			return null;
		}
		return this.closeUnlocked(id, metadata);
	}

	private async closeUnlocked(id: PositionId, metadata: Metadata): Promise<Position> {
		const position = await this.positions.getPosition(id);
		if (position === null) {
			throw new NotFoundError("Position", id);
		}
		if (position.status === PositionStatus.Closed) {
			throw new InvalidStateError(`Position already closed: ${id}`, {
				positionId: id,
				status: position.status,
			});
		}

		const order = await this.orders.createOrder({
			symbol: position.symbol,
			side: oppositeSide(position.side),
			size: position.size,
			kind: OrderKind.Market,
			metadata: { ...metadata, positionId: id },
		});
		await this.bus.emit(EventType.OrderPlaced, encodeOrder(order));

		const swap = await this.swapFor(order);

		const trade = await this.orders.createTrade({
			orderId: order.id,
			positionId: id,
			price: swap.price,
			size: swap.size,
			fee: swap.fee,
			metadata: { txId: swap.txId },
		});
		const filled = await this.orders.updateOrder(order.id, {
			status: OrderStatus.Filled,
			filledPrice: trade.price,
			filledSize: trade.size,
		});
		const closed = await this.positions.closePosition(id, trade.price, metadata);

		await this.bus.emit(EventType.TradeExecuted, encodeTrade(trade));
		await this.bus.emit(EventType.OrderFilled, encodeOrder(filled));
		await this.bus.emit(EventType.PositionClosed, encodePosition(closed));
		this.logger.info(
			{ positionId: id, closePrice: trade.price, realizedPnl: closed.realizedPnl },
			"position closed",
		);
		return closed;
	}

	/** Quote and swap for a PENDING order; on failure mark it FAILED and rethrow. */
	private async swapFor(order: Order): Promise<SwapResult> {
		const { base, quote } = splitSymbol(order.symbol);
		try {
			const offer = await this.client.getQuote({
				inputToken: base,
				outputToken: quote,
				amount: order.size,
				side: order.side,
			});
			return checkSwapResult(await this.client.executeSwap(offer));
		} catch (error: unknown) {
			const message = errorMessage(error);
			const failed = await this.orders.updateOrder(order.id, {
				status: OrderStatus.Failed,
				error: message,
			});
			await this.bus.emit(EventType.OrderFailed, encodeOrder(failed));
			await this.bus.emit(EventType.SystemError, {
				source: "trading-engine",
				orderId: order.id,
				symbol: order.symbol,
				error: message,
			});
			this.logger.error({ orderId: order.id, error: message }, "execution failed");
			throw error instanceof ExecutionError
				? error
				: new ExecutionError(`Execution failed for ${order.symbol}: ${message}`, {
						orderId: order.id,
						cause: error,
					});
		}
	}
}

function assertPositive(field: string, value: number): void {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ValidationError(`${field} must be a positive number`, [
			{ path: [field], message: `got ${value}` },
		]);
	}
}

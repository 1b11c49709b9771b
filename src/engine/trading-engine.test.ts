import { beforeEach, describe, expect, it, vi } from "vitest";
import { EventType } from "../events/event-types.js";
import { OrderKind, OrderStatus } from "../order/types.js";
import { PositionStatus } from "../position/types.js";
import {
	ExecutionError,
	InvalidStateError,
	NotFoundError,
	StoreUnavailableError,
	ValidationError,
} from "../shared/errors.js";
import { orderId, positionId } from "../shared/identifiers.js";
import { Side } from "../shared/side.js";
import { type EngineHarness, createEngineHarness } from "../testing/engine-harness.js";
import { FlakyStore } from "../testing/flaky-store.js";

describe("TradingEngine", () => {
	let h: EngineHarness;

	beforeEach(() => {
		h = createEngineHarness();
		h.client.setPrice("SOL-USDC", 100);
	});

	describe("executeMarketOrder", () => {
		it("fills the order, records the trade and opens a position", async () => {
			const order = await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 2, 95, {
				strategyId: "ma-1",
			});

			expect(order).toMatchObject({
				id: "ord_00000001",
				status: OrderStatus.Filled,
				kind: OrderKind.Market,
				filledPrice: 100,
				filledSize: 2,
				filledAtMs: 1_700_000_000_000,
			});

			const [trade] = h.engine.getTradeHistory();
			expect(trade).toMatchObject({
				id: "trade_00000001",
				orderId: "ord_00000001",
				positionId: "pos_00000001",
				side: "buy",
				price: 100,
				size: 2,
				metadata: { txId: "paper-tx-1" },
			});

			const position = await h.positions.getPosition(positionId("pos_00000001"));
			expect(position).toMatchObject({
				status: PositionStatus.Open,
				entryPrice: 100,
				size: 2,
				stopLoss: 95,
				metadata: { strategyId: "ma-1" },
			});
		});

		it("emits order, trade and position events in order", async () => {
			const seen: string[] = [];
			for (const type of [
				EventType.OrderPlaced,
				EventType.TradeExecuted,
				EventType.PositionOpened,
				EventType.OrderFilled,
			]) {
				h.bus.subscribe(type, (event) => {
					seen.push(event.eventType);
				});
			}

			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 1);

			expect(seen).toEqual(["order_placed", "trade_executed", "position_opened", "order_filled"]);
		});

		it("marks the order FAILED when the venue has no market", async () => {
			const attempt = h.engine.executeMarketOrder("ETH-USDC", Side.Buy, 1);

			await expect(attempt).rejects.toThrow(ExecutionError);
			await expect(attempt).rejects.toThrow("No market for ETH-USDC");

			const order = await h.orders.getOrder(orderId("ord_00000001"));
			expect(order?.status).toBe(OrderStatus.Failed);
			expect(order?.error).toBe("No market for ETH-USDC");
			expect(h.positions.listPositions()).toEqual([]);
			expect(h.bus.getHistory(EventType.OrderFailed)).toHaveLength(1);
			expect(h.bus.getHistory(EventType.SystemError)[0]?.payload).toMatchObject({
				source: "trading-engine",
				orderId: "ord_00000001",
			});
		});

		it("wraps a non-execution failure in ExecutionError", async () => {
			vi.spyOn(h.client, "executeSwap").mockRejectedValueOnce(new Error("socket hang up"));

			await expect(h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 1)).rejects.toThrow(
				"Execution failed for SOL-USDC: socket hang up",
			);
			const order = await h.orders.getOrder(orderId("ord_00000001"));
			expect(order?.status).toBe(OrderStatus.Failed);
		});

		it.each([
			["zero size", "SOL-USDC", 0],
			["negative size", "SOL-USDC", -1],
			["malformed symbol", "SOLUSDC", 1],
		] as const)("rejects %s before creating an order", async (_label, symbol, size) => {
			await expect(h.engine.executeMarketOrder(symbol, Side.Buy, size)).rejects.toThrow(
				ValidationError,
			);
			expect(h.orders.listOrders()).toEqual([]);
		});

		it("refuses a fill the ledgers could not read back", async () => {
			vi.spyOn(h.client, "executeSwap").mockResolvedValueOnce({
				price: 0,
				size: 1,
				fee: 0,
				txId: "paper-tx-1",
			});

			const attempt = h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 1);

			await expect(attempt).rejects.toThrow(ExecutionError);
			await expect(attempt).rejects.toThrow("Invalid swap result: price");
			const order = await h.orders.getOrder(orderId("ord_00000001"));
			expect(order?.status).toBe(OrderStatus.Failed);
			expect(order?.error).toBe("Invalid swap result: price: Number must be greater than 0");
			expect(h.engine.getTradeHistory()).toEqual([]);
			expect(h.positions.listPositions()).toEqual([]);
		});

		it("surfaces store failures as StoreUnavailableError", async () => {
			const store = new FlakyStore();
			h = createEngineHarness({ store });
			h.client.setPrice("SOL-USDC", 100);
			store.failWrites = true;

			await expect(h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 1)).rejects.toThrow(
				StoreUnavailableError,
			);
		});
	});

	describe("closePosition", () => {
		it("books realized PnL at the closing swap price", async () => {
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 2);
			h.client.setPrice("SOL-USDC", 110);

			const closed = await h.engine.closePosition(positionId("pos_00000001"));

			expect(closed.status).toBe(PositionStatus.Closed);
			expect(closed.realizedPnl).toBe(20);
			expect(closed.unrealizedPnl).toBe(0);

			const closing = h.engine.getTradeHistory()[1];
			expect(closing).toMatchObject({ side: "sell", size: 2, price: 110, positionId: "pos_00000001" });
			expect(h.bus.getHistory(EventType.PositionClosed)).toHaveLength(1);
		});

		it("rejects an unknown position", async () => {
			await expect(h.engine.closePosition(positionId("pos_missing"))).rejects.toThrow(
				NotFoundError,
			);
		});

		it("serializes concurrent closes; the second sees CLOSED", async () => {
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 1);
			const id = positionId("pos_00000001");

			const [first, second] = await Promise.allSettled([
				h.engine.closePosition(id),
				h.engine.closePosition(id),
			]);

			expect(first.status).toBe("fulfilled");
			expect(second.status).toBe("rejected");
			if (second.status === "rejected") {
				expect(second.reason).toBeInstanceOf(InvalidStateError);
			}
			// one opening and one closing trade only
			expect(h.engine.getTradeHistory()).toHaveLength(2);
		});

		it("stop-loss repricing never reopens a position a manual close finished", async () => {
			const store = new FlakyStore();
			store.writeDelay = (_key, value) => (value.status === "closing" ? 30 : 0);
			h = createEngineHarness({ store });
			h.client.setPrice("SOL-USDC", 100);
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 1, 95);
			h.client.setPrice("SOL-USDC", 94);
			const id = positionId("pos_00000001");

			const [manual, batch] = await Promise.allSettled([
				h.engine.closePosition(id),
				h.engine.updatePositions("SOL-USDC", 94),
			]);

			expect(manual.status).toBe("fulfilled");
			expect(batch).toEqual({
				status: "fulfilled",
				value: { updated: [], closed: [], failed: [] },
			});
			expect(h.client.swapHistory()).toHaveLength(2);
			expect((await h.positions.getPosition(id))?.status).toBe(PositionStatus.Closed);
		});

		it("a manual close queued behind a stop-loss reprice closes once", async () => {
			const store = new FlakyStore();
			store.writeDelay = (_key, value) => (value.status === "closing" ? 30 : 0);
			h = createEngineHarness({ store });
			h.client.setPrice("SOL-USDC", 100);
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 1, 95);
			h.client.setPrice("SOL-USDC", 94);
			const id = positionId("pos_00000001");

			const [batch, manual] = await Promise.allSettled([
				h.engine.updatePositions("SOL-USDC", 94),
				h.engine.closePosition(id, { reason: "manual" }),
			]);

			expect(manual.status).toBe("fulfilled");
			expect(batch.status).toBe("fulfilled");
			if (batch.status === "fulfilled") {
				expect(batch.value.updated.map((p) => p.status)).toEqual([PositionStatus.Closing]);
				expect(batch.value.closed).toEqual([]);
				expect(batch.value.failed).toEqual([]);
			}
			expect(h.client.swapHistory()).toHaveLength(2);
			expect(await h.positions.getPosition(id)).toMatchObject({
				status: PositionStatus.Closed,
				metadata: { reason: "manual" },
			});
		});

		it("leaves the position open when the venue returns a malformed fill", async () => {
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 1);
			vi.spyOn(h.client, "executeSwap").mockResolvedValueOnce({
				price: 101,
				size: Number.NaN,
				fee: 0,
				txId: "paper-tx-2",
			});

			await expect(h.engine.closePosition(positionId("pos_00000001"))).rejects.toThrow(
				"Invalid swap result: size",
			);
			const position = await h.positions.getPosition(positionId("pos_00000001"));
			expect(position?.status).toBe(PositionStatus.Open);
			expect(h.engine.getTradeHistory()).toHaveLength(1);
		});

		it("leaves the position untouched when the closing swap fails", async () => {
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 1);
			vi.spyOn(h.client, "executeSwap").mockRejectedValueOnce(new Error("venue down"));

			await expect(h.engine.closePosition(positionId("pos_00000001"))).rejects.toThrow(
				ExecutionError,
			);
			const position = await h.positions.getPosition(positionId("pos_00000001"));
			expect(position?.status).toBe(PositionStatus.Open);
			const closeOrder = await h.orders.getOrder(orderId("ord_00000002"));
			expect(closeOrder?.status).toBe(OrderStatus.Failed);
		});
	});

	describe("updatePositions", () => {
		it("reprices live positions on the symbol", async () => {
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 2);

			const report = await h.engine.updatePositions("SOL-USDC", 110);

			expect(report.updated).toHaveLength(1);
			expect(report.updated[0]?.unrealizedPnl).toBe(20);
			expect(report.closed).toEqual([]);
			expect(report.failed).toEqual([]);
			expect(h.bus.getHistory(EventType.PositionUpdated)).toHaveLength(1);
		});

		it("ignores positions on other symbols", async () => {
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 2);

			const report = await h.engine.updatePositions("ETH-USDC", 3000);

			expect(report.updated).toEqual([]);
		});

		it("keeps a long open above its stop-loss", async () => {
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 2, 95);

			const report = await h.engine.updatePositions("SOL-USDC", 96);

			expect(report.updated[0]?.status).toBe(PositionStatus.Open);
			expect(report.closed).toEqual([]);
		});

		it("closes a long once price crosses below its stop-loss", async () => {
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 2, 95);
			h.client.setPrice("SOL-USDC", 94);

			const report = await h.engine.updatePositions("SOL-USDC", 94);

			expect(report.closed).toHaveLength(1);
			expect(report.closed[0]).toMatchObject({
				status: PositionStatus.Closed,
				realizedPnl: -12,
				metadata: { reason: "stop_loss" },
			});
			expect(h.bus.getHistory(EventType.PositionClosing)).toHaveLength(1);
		});

		it("isolates a failed stop-loss close and retries it on the next update", async () => {
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 1, 95);
			h.clock.advance(1_000);
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 1, 95);
			h.client.setPrice("SOL-USDC", 94);
			vi.spyOn(h.client, "executeSwap").mockRejectedValueOnce(new Error("venue down"));

			const report = await h.engine.updatePositions("SOL-USDC", 94);

			expect(report.failed.map((f) => f.positionId)).toEqual(["pos_00000001"]);
			expect(report.failed[0]?.error).toBeInstanceOf(ExecutionError);
			expect(report.closed.map((p) => p.id)).toEqual(["pos_00000002"]);
			const stuck = await h.positions.getPosition(positionId("pos_00000001"));
			expect(stuck?.status).toBe(PositionStatus.Closing);

			const retry = await h.engine.updatePositions("SOL-USDC", 94);

			expect(retry.closed.map((p) => p.id)).toEqual(["pos_00000001"]);
			expect(h.bus.getHistory(EventType.PositionClosing)).toHaveLength(2);
		});
	});

	describe("closeAllPositions", () => {
		it("closes every live position and reports failures", async () => {
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 1);
			await h.engine.executeMarketOrder("SOL-USDC", Side.Sell, 1);

			const report = await h.engine.closeAllPositions("system_shutdown");

			expect(report.closed).toHaveLength(2);
			expect(report.failed).toEqual([]);
			expect(h.positions.openPositions()).toEqual([]);
			expect(report.closed.every((p) => p.metadata.reason === "system_shutdown")).toBe(true);
		});
	});

	describe("cancelOrder", () => {
		it("cancels a pending order and emits order_cancelled", async () => {
			const pending = await h.orders.createOrder({
				symbol: "SOL-USDC",
				side: Side.Buy,
				size: 1,
				kind: OrderKind.Limit,
				price: 90,
			});

			const cancelled = await h.engine.cancelOrder(pending.id, "user request");

			expect(cancelled.status).toBe(OrderStatus.Cancelled);
			expect(cancelled.error).toBe("user request");
			expect(h.bus.getHistory(EventType.OrderCancelled)).toHaveLength(1);
		});
	});

	describe("projections", () => {
		it("summarizes open positions", async () => {
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 2);
			await h.engine.executeMarketOrder("SOL-USDC", Side.Sell, 1);
			await h.engine.updatePositions("SOL-USDC", 110);

			const summary = h.engine.getPositionSummary();

			expect(summary.totalPositions).toBe(2);
			expect(summary.totalUnrealizedPnl).toBe(10);
			expect(summary.activeSymbols).toEqual(["SOL-USDC"]);
		});

		it("filters trade history by symbol and time", async () => {
			h.client.setPrice("ETH-USDC", 3000);
			await h.engine.executeMarketOrder("SOL-USDC", Side.Buy, 1);
			h.clock.advance(60_000);
			await h.engine.executeMarketOrder("ETH-USDC", Side.Buy, 1);

			expect(h.engine.getTradeHistory({ symbol: "ETH-USDC" })).toHaveLength(1);
			expect(h.engine.getTradeHistory({ fromMs: 1_700_000_030_000 })).toHaveLength(1);
			expect(h.engine.getTradeHistory()).toHaveLength(2);
		});
	});
});

import { describe, expect, it, vi } from "vitest";
import { ValidationError } from "../shared/errors.js";
import { FakeClock } from "../shared/time.js";
import { EventBus } from "./event-bus.js";
import { EventType, parseEventType } from "./event-types.js";

describe("EventBus", () => {
	describe("subscribe / emit", () => {
		it("delivers a stamped event to a subscriber", async () => {
			const clock = new FakeClock(1_700_000_000_000);
			const bus = new EventBus({ clock });
			const handler = vi.fn();

			bus.subscribe(EventType.OrderPlaced, handler);
			const report = await bus.emit(EventType.OrderPlaced, { orderId: "ord_1" });

			expect(report).toEqual({ delivered: 1, failures: [] });
			expect(handler).toHaveBeenCalledWith({
				eventType: "order_placed",
				timestamp: "2023-11-14T22:13:20.000Z",
				payload: { orderId: "ord_1" },
			});
		});

		it("does not deliver to handlers of other types", async () => {
			const bus = new EventBus();
			const handler = vi.fn();

			bus.subscribe(EventType.OrderFilled, handler);
			await bus.emit(EventType.OrderPlaced, {});

			expect(handler).not.toHaveBeenCalled();
		});

		it("awaits async handlers", async () => {
			const bus = new EventBus();
			const seen: string[] = [];
			bus.subscribe(EventType.TradeExecuted, async () => {
				await new Promise((resolve) => setTimeout(resolve, 5));
				seen.push("slow");
			});

			await bus.emit(EventType.TradeExecuted, {});

			expect(seen).toEqual(["slow"]);
		});

		it("returned function unsubscribes", async () => {
			const bus = new EventBus();
			const handler = vi.fn();

			const off = bus.subscribe(EventType.PriceUpdate, handler);
			off();
			await bus.emit(EventType.PriceUpdate, { price: 1 });

			expect(handler).not.toHaveBeenCalled();
			expect(bus.subscriberCount(EventType.PriceUpdate)).toBe(0);
		});

		it("unsubscribe reports whether the handler was registered", () => {
			const bus = new EventBus();
			const handler = vi.fn();

			bus.subscribe(EventType.SystemStatus, handler);
			expect(bus.unsubscribe(EventType.SystemStatus, handler)).toBe(true);
			expect(bus.unsubscribe(EventType.SystemStatus, handler)).toBe(false);
		});

		it("subscribing the same handler twice delivers once", async () => {
			const bus = new EventBus();
			const handler = vi.fn();

			bus.subscribe(EventType.OrderFilled, handler);
			bus.subscribe(EventType.OrderFilled, handler);
			const report = await bus.emit(EventType.OrderFilled, { orderId: "ord_1" });

			expect(handler).toHaveBeenCalledTimes(1);
			expect(report.delivered).toBe(1);
			expect(bus.subscriberCount(EventType.OrderFilled)).toBe(1);
			expect(bus.unsubscribe(EventType.OrderFilled, handler)).toBe(true);
			expect(bus.subscriberCount(EventType.OrderFilled)).toBe(0);
		});

		it("emit with no subscribers still records history", async () => {
			const bus = new EventBus();
			const report = await bus.emit(EventType.VolumeSpike, { symbol: "SOL-USDC" });

			expect(report.delivered).toBe(0);
			expect(bus.getHistory(EventType.VolumeSpike)).toHaveLength(1);
		});
	});

	describe("handler isolation", () => {
		it("a throwing handler does not block the others or the caller", async () => {
			const onHandlerError = vi.fn();
			const bus = new EventBus({ onHandlerError });
			const good = vi.fn();
			const boom = new Error("handler exploded");

			bus.subscribe(EventType.PositionOpened, () => {
				throw boom;
			});
			bus.subscribe(EventType.PositionOpened, async () => {
				throw new Error("async failure");
			});
			bus.subscribe(EventType.PositionOpened, good);

			const report = await bus.emit(EventType.PositionOpened, { positionId: "pos_1" });

			expect(good).toHaveBeenCalledTimes(1);
			expect(report.delivered).toBe(1);
			expect(report.failures).toHaveLength(2);
			expect(report.failures[0]).toBe(boom);
			expect(onHandlerError).toHaveBeenCalledTimes(2);
		});

		it("an error callback that throws is contained", async () => {
			const bus = new EventBus({
				onHandlerError: () => {
					throw new Error("callback broke");
				},
			});
			bus.subscribe(EventType.SystemError, () => {
				throw new Error("first");
			});

			await expect(bus.emit(EventType.SystemError, {})).resolves.toMatchObject({
				delivered: 0,
			});
		});

		it("a handler subscribed during dispatch waits for the next emit", async () => {
			const bus = new EventBus();
			const late = vi.fn();
			bus.subscribe(EventType.StrategySignal, () => {
				bus.subscribe(EventType.StrategySignal, late);
			});

			await bus.emit(EventType.StrategySignal, {});
			expect(late).not.toHaveBeenCalled();

			await bus.emit(EventType.StrategySignal, {});
			expect(late).toHaveBeenCalledTimes(1);
		});
	});

	describe("history", () => {
		it("keeps exactly 1000 events after 1001 emits, oldest evicted", async () => {
			const bus = new EventBus();
			for (let seq = 0; seq < 1001; seq++) {
				await bus.emit(EventType.PriceUpdate, { seq });
			}

			const history = bus.getHistory(EventType.PriceUpdate);
			expect(history).toHaveLength(1000);
			expect(history[0]?.payload.seq).toBe(1);
			expect(history[999]?.payload.seq).toBe(1000);
		});

		it("honours a configured capacity", async () => {
			const bus = new EventBus({ historyLimit: 3 });
			for (let seq = 0; seq < 5; seq++) {
				await bus.emit(EventType.OrderFilled, { seq });
			}

			expect(bus.getHistory(EventType.OrderFilled).map((e) => e.payload.seq)).toEqual([2, 3, 4]);
		});

		it("limit returns the most recent entries in insertion order", async () => {
			const bus = new EventBus();
			for (let seq = 0; seq < 5; seq++) {
				await bus.emit(EventType.TradeExecuted, { seq });
			}

			expect(bus.getHistory(EventType.TradeExecuted, 2).map((e) => e.payload.seq)).toEqual([3, 4]);
			expect(bus.getHistory(EventType.TradeExecuted, 0)).toHaveLength(5);
			expect(bus.getHistory(EventType.TradeExecuted, 50)).toHaveLength(5);
		});

		it("history is per type", async () => {
			const bus = new EventBus();
			await bus.emit(EventType.OrderPlaced, {});

			expect(bus.getHistory(EventType.OrderFilled)).toEqual([]);
		});

		it("clearHistory empties one or all buffers", async () => {
			const bus = new EventBus();
			await bus.emit(EventType.OrderPlaced, {});
			await bus.emit(EventType.OrderFilled, {});

			bus.clearHistory(EventType.OrderPlaced);
			expect(bus.getHistory(EventType.OrderPlaced)).toHaveLength(0);
			expect(bus.getHistory(EventType.OrderFilled)).toHaveLength(1);

			bus.clearHistory();
			expect(bus.getHistory(EventType.OrderFilled)).toHaveLength(0);
		});
	});

	describe("unknown event types", () => {
		it("parseEventType rejects strings outside the closed set", () => {
			expect(parseEventType("margin_call")).toBe(EventType.MarginCall);
			expect(() => parseEventType("lunch_break")).toThrow(ValidationError);
		});
	});

	it("rejects a non-positive history limit", () => {
		expect(() => new EventBus({ historyLimit: 0 })).toThrow(ValidationError);
	});
});

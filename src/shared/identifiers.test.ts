import { describe, expect, it } from "vitest";
import {
	idToString,
	newOrderId,
	newPositionId,
	newTradeId,
	orderId,
	positionId,
	randomToken,
	strategyId,
	tradeId,
} from "./identifiers.js";

describe("identifiers", () => {
	it("factories trim and brand raw strings", () => {
		expect(idToString(orderId("  ord_1  "))).toBe("ord_1");
		expect(idToString(tradeId("trade_1"))).toBe("trade_1");
		expect(idToString(positionId("pos_1"))).toBe("pos_1");
		expect(idToString(strategyId("ma-1"))).toBe("ma-1");
	});

	it("factories reject empty values", () => {
		expect(() => orderId("")).toThrow("OrderId cannot be empty");
		expect(() => strategyId("   ")).toThrow("StrategyId cannot be empty");
	});

	it("randomToken yields 8 hex chars by default", () => {
		expect(randomToken()).toMatch(/^[0-9a-f]{8}$/);
		expect(randomToken(2)).toMatch(/^[0-9a-f]{4}$/);
	});

	it("generated ids carry the entity prefix", () => {
		expect(newOrderId()).toMatch(/^ord_[0-9a-f]{8}$/);
		expect(newTradeId()).toMatch(/^trade_[0-9a-f]{8}$/);
		expect(newPositionId()).toMatch(/^pos_[0-9a-f]{8}$/);
	});

	it("generated ids differ between calls", () => {
		const ids = new Set(Array.from({ length: 50 }, () => newOrderId()));
		expect(ids.size).toBe(50);
	});
});

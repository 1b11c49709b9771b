import { describe, expect, it } from "vitest";
import { strategyId } from "../shared/identifiers.js";
import { Side } from "../shared/side.js";
import { type Signal, SignalType } from "./types.js";
import { validateSignal } from "./validate-signal.js";

const NOW = 1_700_000_000_000;

const signal = (overrides: Partial<Signal> = {}): Signal => ({
	strategyId: strategyId("ma-1"),
	symbol: "SOL-USDC",
	side: Side.Buy,
	size: 4,
	price: 100,
	signalType: SignalType.Entry,
	confidence: 0.8,
	timestampMs: NOW,
	expiryMs: null,
	metadata: {},
	...overrides,
});

const approving = { validateSignal: () => true };

describe("validateSignal", () => {
	it("accepts a well-formed signal", () => {
		const s = signal();
		expect(validateSignal(approving, s, NOW)).toEqual({ ok: true, value: s });
	});

	it("accepts when the strategy has no hook", () => {
		expect(validateSignal({}, signal(), NOW).ok).toBe(true);
	});

	it.each([
		["zero price", { price: 0 }, "price"],
		["negative price", { price: -1 }, "price"],
		["zero size", { size: 0 }, "size"],
		["expired", { expiryMs: NOW - 1 }, "expiryMs"],
	] as const)("rejects %s", (_label, overrides, field) => {
		const result = validateSignal(approving, signal(overrides), NOW);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.issues[0]?.path).toEqual([field]);
		}
	});

	it("accepts a signal expiring exactly now", () => {
		expect(validateSignal(approving, signal({ expiryMs: NOW }), NOW).ok).toBe(true);
	});

	it("does not consult the hook when generic checks fail", () => {
		let consulted = false;
		const hook = {
			validateSignal: () => {
				consulted = true;
				return true;
			},
		};

		validateSignal(hook, signal({ size: 0 }), NOW);

		expect(consulted).toBe(false);
	});

	it("rejects when the strategy hook vetoes", () => {
		const result = validateSignal({ validateSignal: () => false }, signal(), NOW);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe("Signal from ma-1 vetoed by strategy");
		}
	});
});

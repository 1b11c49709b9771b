import { describe, expect, it } from "vitest";
import { InvalidStateError, ValidationError } from "../shared/errors.js";
import { testStrategyContext } from "../testing/strategy-context.js";
import { StrategyRegistry, createDefaultRegistry } from "./registry.js";
import { MaCrossoverStrategy } from "./strategies/ma-crossover.js";

describe("StrategyRegistry", () => {
	it("ships the moving-average crossover by default", () => {
		const registry = createDefaultRegistry();

		expect(registry.kinds()).toEqual(["ma_crossover"]);
		const strategy = registry.create("ma_crossover", testStrategyContext(), {});
		expect(strategy).toBeInstanceOf(MaCrossoverStrategy);
		expect(strategy.kind).toBe("ma_crossover");
	});

	it("lists kinds sorted", () => {
		const registry = createDefaultRegistry()
			.register("zeta", () => {
				throw new Error("unused");
			})
			.register("alpha", () => {
				throw new Error("unused");
			});

		expect(registry.kinds()).toEqual(["alpha", "ma_crossover", "zeta"]);
		expect(registry.has("alpha")).toBe(true);
		expect(registry.has("beta")).toBe(false);
	});

	it("refuses to register a kind twice", () => {
		const registry = createDefaultRegistry();

		expect(() =>
			registry.register("ma_crossover", () => {
				throw new Error("unused");
			}),
		).toThrow(InvalidStateError);
	});

	it("names the known kinds when asked for an unknown one", () => {
		try {
			new StrategyRegistry().register("a", () => {
				throw new Error("unused");
			}).create("grid", testStrategyContext(), {});
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(ValidationError);
			expect(error).toMatchObject({
				message: "Unknown strategy kind: grid",
				issues: [{ path: ["kind"], message: "expected one of: a" }],
			});
		}
	});

	it("surfaces parameter validation from the factory", () => {
		expect(() =>
			createDefaultRegistry().create("ma_crossover", testStrategyContext(), {
				fastPeriod: 30,
				slowPeriod: 20,
			}),
		).toThrow("Invalid ma_crossover parameters");
	});
});

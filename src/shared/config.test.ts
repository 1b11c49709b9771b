import { describe, expect, it } from "vitest";
import { DEFAULT_CORE_CONFIG, configFromEnv, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("CoreConfig", () => {
	describe("DEFAULT_CORE_CONFIG", () => {
		it("has the documented defaults", () => {
			expect(DEFAULT_CORE_CONFIG.trading.accountSize).toBe(1_000);
			expect(DEFAULT_CORE_CONFIG.trading.assumedStopLossFraction).toBe(0.05);
			expect(DEFAULT_CORE_CONFIG.trading.defaultStopLossPercent).toBe(0.05);
			expect(DEFAULT_CORE_CONFIG.trading.minPositionSize).toBe(0);
			expect(DEFAULT_CORE_CONFIG.trading.maxPositionSize).toBe(Number.POSITIVE_INFINITY);
			expect(DEFAULT_CORE_CONFIG.events.historyLimit).toBe(1_000);
			expect(DEFAULT_CORE_CONFIG.logLevel).toBe("info");
		});
	});

	describe("resolveConfig", () => {
		it("returns defaults when given nothing", () => {
			expect(resolveConfig()).toEqual(DEFAULT_CORE_CONFIG);
		});

		it("merges partial overrides per section", () => {
			const config = resolveConfig({ trading: { accountSize: 5_000 }, logLevel: "debug" });
			expect(config.trading.accountSize).toBe(5_000);
			expect(config.trading.assumedStopLossFraction).toBe(0.05);
			expect(config.logLevel).toBe("debug");
		});

		it("rejects non-positive account size", () => {
			expect(() => resolveConfig({ trading: { accountSize: 0 } })).toThrow(ConfigError);
		});

		it("rejects a fractional history limit", () => {
			expect(() => resolveConfig({ events: { historyLimit: 2.5 } })).toThrow(
				/events\.historyLimit/,
			);
		});

		it("rejects min above max", () => {
			expect(() =>
				resolveConfig({ trading: { minPositionSize: 10, maxPositionSize: 5 } }),
			).toThrow("trading.minPositionSize: minPositionSize must not exceed maxPositionSize");
		});
	});

	describe("configFromEnv", () => {
		it("returns no overrides for an empty environment", () => {
			expect(configFromEnv({})).toEqual({});
		});

		it("reads numeric and level variables", () => {
			const overrides = configFromEnv({
				TRADEPILOT_ACCOUNT_SIZE: "2500",
				TRADEPILOT_DEFAULT_STOP_LOSS: " 0.1 ",
				TRADEPILOT_EVENT_HISTORY_LIMIT: "50",
				TRADEPILOT_LOG_LEVEL: "WARN",
			});
			expect(overrides).toEqual({
				trading: { accountSize: 2_500, defaultStopLossPercent: 0.1 },
				events: { historyLimit: 50 },
				logLevel: "warn",
			});
		});

		it("ignores blank variables", () => {
			expect(configFromEnv({ TRADEPILOT_ACCOUNT_SIZE: "  " })).toEqual({});
		});

		it("throws ConfigError on malformed numbers", () => {
			expect(() => configFromEnv({ TRADEPILOT_MAX_POSITION_SIZE: "lots" })).toThrow(
				'Invalid TRADEPILOT_MAX_POSITION_SIZE: "lots" must be a finite number',
			);
		});

		it("throws ConfigError on unknown log levels", () => {
			expect(() => configFromEnv({ TRADEPILOT_LOG_LEVEL: "loud" })).toThrow(ConfigError);
		});

		it("feeds resolveConfig", () => {
			const config = resolveConfig(configFromEnv({ TRADEPILOT_MIN_POSITION_SIZE: "0.5" }));
			expect(config.trading.minPositionSize).toBe(0.5);
		});
	});
});

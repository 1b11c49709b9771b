import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { calcSMA, smaSeries } from "./indicators.js";

const prices = fc.array(fc.integer({ min: 1, max: 100_000 }), { minLength: 1, maxLength: 60 });

describe("SMA (property-based)", () => {
	it("lies between the min and max of its window", () => {
		fc.assert(
			fc.property(prices, fc.integer({ min: 1, max: 60 }), (raw, period) => {
				const values = raw.map((p) => Decimal.from(p));
				const sma = calcSMA(values, period);
				if (values.length < period) {
					expect(sma).toBeNull();
					return;
				}
				const window = raw.slice(raw.length - period);
				expect(sma?.cmp(Decimal.from(Math.min(...window)))).not.toBe(-1);
				expect(sma?.cmp(Decimal.from(Math.max(...window)))).not.toBe(1);
			}),
		);
	});

	it("series length is values - period + 1 and agrees with calcSMA at every step", () => {
		fc.assert(
			fc.property(prices, fc.integer({ min: 1, max: 20 }), (raw, period) => {
				const values = raw.map((p) => Decimal.from(p));
				const series = smaSeries(values, period);
				expect(series).toHaveLength(Math.max(0, values.length - period + 1));
				series.forEach((value, i) => {
					expect(value.toString()).toBe(calcSMA(values.slice(0, i + period), period)?.toString());
				});
			}),
		);
	});
});

import { bench, describe } from "vitest";
import { calcSMA, detectCross, smaSeries } from "../src/analytics/indicators.js";
import { Decimal } from "../src/shared/decimal.js";

// Deterministic zig-zag so runs compare against each other.
const walk = (length: number): Decimal[] =>
	Array.from({ length }, (_, i) => Decimal.from((100 + Math.sin(i / 7) * 5 + (i % 3) * 0.01).toFixed(2)));

const short = walk(100);
const long = walk(1_000);

describe("moving averages", () => {
	bench("calcSMA 20 / 100 samples", () => {
		calcSMA(short, 20);
	});

	bench("calcSMA 200 / 1000 samples", () => {
		calcSMA(long, 200);
	});

	bench("smaSeries 50 / 1000 samples", () => {
		smaSeries(long, 50);
	});
});

describe("crossover scan", () => {
	const fast = smaSeries(long, 10);
	const slow = smaSeries(long, 30);
	const offset = fast.length - slow.length;

	bench("detectCross over 1000 samples", () => {
		for (let i = 1; i < slow.length; i++) {
			const pf = fast[i - 1 + offset];
			const ps = slow[i - 1];
			const f = fast[i + offset];
			const s = slow[i];
			if (pf && ps && f && s) detectCross(pf, ps, f, s);
		}
	});
});

import { Decimal } from "../shared/decimal.js";

/**
 * Simple Moving Average over the last `period` values.
 * Returns null if insufficient data or invalid period.
 */
export function calcSMA(values: readonly Decimal[], period: number): Decimal | null {
	if (!Number.isInteger(period) || period < 1 || values.length < period) return null;
	return Decimal.sum(values.slice(values.length - period)).div(Decimal.from(period));
}

/**
 * SMA at every position where a full window fits, oldest first.
 * `values.length - period + 1` entries; empty when there is not enough data.
 *
 * Uses a running sum, so the cost is linear in the input.
 */
export function smaSeries(values: readonly Decimal[], period: number): Decimal[] {
	if (!Number.isInteger(period) || period < 1 || values.length < period) return [];

	const divisor = Decimal.from(period);
	let sum = Decimal.sum(values.slice(0, period));
	const series = [sum.div(divisor)];
	for (let i = period; i < values.length; i++) {
		const entering = values[i];
		const leaving = values[i - period];
		if (entering === undefined || leaving === undefined) break;
		sum = sum.add(entering).sub(leaving);
		series.push(sum.div(divisor));
	}
	return series;
}

// ── Crossovers ───────────────────────────────────────────────────────

/** Direction of a fast/slow moving-average cross. */
export const CrossDirection = {
	Up: "up",
	Down: "down",
} as const;

export type CrossDirection = (typeof CrossDirection)[keyof typeof CrossDirection];

/**
 * Compares `fast − slow` between two consecutive samples.
 * ≤0 → >0 is an upward cross, ≥0 → <0 a downward one, anything else null.
 */
export function detectCross(
	prevFast: Decimal,
	prevSlow: Decimal,
	fast: Decimal,
	slow: Decimal,
): CrossDirection | null {
	const before = prevFast.sub(prevSlow).sign();
	const after = fast.sub(slow).sign();
	if (before <= 0 && after > 0) return CrossDirection.Up;
	if (before >= 0 && after < 0) return CrossDirection.Down;
	return null;
}

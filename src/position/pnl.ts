/**
 * PnL and stop-loss arithmetic.
 */

import { Decimal } from "../shared/decimal.js";
import { Side, sideSign } from "../shared/side.js";

/**
 * `(price − entry) × size`, sign-flipped for a sell position.
 *
 * @example
 * ```ts
 * computePnl(Side.Buy, 100, 110, 2); // 20
 * computePnl(Side.Sell, 100, 110, 2); // -20
 * ```
 */
export function computePnl(side: Side, entryPrice: number, price: number, size: number): number {
	return Decimal.from(price)
		.sub(Decimal.from(entryPrice))
		.mul(Decimal.from(size))
		.mul(Decimal.from(sideSign(side)))
		.toNumber();
}

/** A buy stop triggers at or below the stop, a sell stop at or above it. */
export function isStopLossBreached(side: Side, stopLoss: number, price: number): boolean {
	return side === Side.Buy ? price <= stopLoss : price >= stopLoss;
}

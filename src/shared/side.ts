/**
 * Side: direction of an order, trade or position.
 *
 * A "buy" position profits when price rises, a "sell" position when it
 * falls. Closing a position trades the opposite side for the full size.
 */

import { z } from "../lib/validation/index.js";

export const Side = {
	Buy: "buy",
	Sell: "sell",
} as const;

export type Side = (typeof Side)[keyof typeof Side];

/** Return the opposite side (buy becomes sell and vice versa). */
export function oppositeSide(side: Side): Side {
	return side === Side.Buy ? Side.Sell : Side.Buy;
}

/** +1 for buy, −1 for sell: the sign applied to a price move to get PnL. */
export function sideSign(side: Side): 1 | -1 {
	return side === Side.Buy ? 1 : -1;
}

export const sideSchema = z.nativeEnum(Side);

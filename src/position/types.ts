/**
 * Position domain types.
 */

import type { PositionId } from "../shared/identifiers.js";
import type { Metadata } from "../shared/json.js";
import type { Side } from "../shared/side.js";

/** OPEN → CLOSING → CLOSED, or OPEN → CLOSED on a manual close. */
export const PositionStatus = {
	Open: "open",
	Closing: "closing",
	Closed: "closed",
} as const;

export type PositionStatus = (typeof PositionStatus)[keyof typeof PositionStatus];

export interface Position {
	readonly id: PositionId;
	readonly symbol: string;
	readonly side: Side;
	/** Fixed at creation; there are no partial closes */
	readonly size: number;
	readonly entryPrice: number;
	readonly currentPrice: number;
	readonly status: PositionStatus;
	readonly unrealizedPnl: number;
	readonly realizedPnl: number;
	readonly stopLoss: number | null;
	readonly entryTimeMs: number;
	readonly lastUpdateMs: number;
	readonly metadata: Metadata;
}

export interface CreatePositionInput {
	readonly symbol: string;
	readonly side: Side;
	readonly size: number;
	readonly entryPrice: number;
	readonly stopLoss?: number;
	readonly metadata?: Metadata;
}

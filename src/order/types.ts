/**
 * Order and trade domain types.
 */

import type { OrderId, PositionId, TradeId } from "../shared/identifiers.js";
import type { Metadata } from "../shared/json.js";
import type { Side } from "../shared/side.js";

// ── Order kind ──────────────────────────────────────────────────────

export const OrderKind = {
	Market: "market",
	Limit: "limit",
} as const;

export type OrderKind = (typeof OrderKind)[keyof typeof OrderKind];

// ── Order status ────────────────────────────────────────────────────

/** Forward-only lifecycle: PENDING → FILLED | FAILED | CANCELLED. */
export const OrderStatus = {
	Pending: "pending",
	Filled: "filled",
	Failed: "failed",
	Cancelled: "cancelled",
} as const;

export type OrderStatus = (typeof OrderStatus)[keyof typeof OrderStatus];

// ── Entities ────────────────────────────────────────────────────────

export interface Order {
	readonly id: OrderId;
	readonly symbol: string;
	readonly side: Side;
	readonly size: number;
	/** Requested price; null for market orders */
	readonly price: number | null;
	readonly kind: OrderKind;
	readonly status: OrderStatus;
	readonly submittedAtMs: number;
	readonly filledPrice: number | null;
	readonly filledSize: number | null;
	readonly filledAtMs: number | null;
	readonly error: string | null;
	readonly metadata: Metadata;
}

/** Immutable record of one fill. */
export interface Trade {
	readonly id: TradeId;
	readonly orderId: OrderId;
	/** Set once, after the position it opened or closed is known */
	readonly positionId: PositionId | null;
	readonly symbol: string;
	readonly side: Side;
	readonly size: number;
	readonly price: number;
	readonly fee: number;
	readonly timestampMs: number;
	readonly metadata: Metadata;
}

// ── Inputs ──────────────────────────────────────────────────────────

export interface CreateOrderInput {
	readonly symbol: string;
	readonly side: Side;
	readonly size: number;
	readonly kind: OrderKind;
	readonly price?: number;
	readonly metadata?: Metadata;
}

export interface OrderUpdate {
	readonly status: OrderStatus;
	readonly filledPrice?: number;
	readonly filledSize?: number;
	readonly error?: string;
	/** Merged over the existing metadata */
	readonly metadata?: Metadata;
}

export interface CreateTradeInput {
	readonly orderId: OrderId;
	readonly positionId: PositionId | null;
	readonly price: number;
	readonly size: number;
	readonly fee: number;
	readonly metadata?: Metadata;
}

export interface TradeFilter {
	readonly symbol?: string;
	/** Inclusive lower bound, epoch ms */
	readonly fromMs?: number;
	/** Inclusive upper bound, epoch ms */
	readonly toMs?: number;
}

export interface OrderFilter {
	readonly status?: OrderStatus;
	readonly symbol?: string;
}

/**
 * Domain identifiers: branded types for compile-time safety.
 *
 * Each identifier wraps a string with a unique brand, preventing accidental
 * mixing (e.g., passing a PositionId where an OrderId is expected).
 * Generated ids are a short random token prefixed by the entity type.
 */

import { randomBytes } from "node:crypto";

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Ledger-assigned order identifier (`ord_…`). */
export type OrderId = Brand<string, "OrderId">;
/** Ledger-assigned trade identifier (`trade_…`). */
export type TradeId = Brand<string, "TradeId">;
/** Ledger-assigned position identifier (`pos_…`). */
export type PositionId = Brand<string, "PositionId">;
/** Caller-chosen strategy instance identifier. */
export type StrategyId = Brand<string, "StrategyId">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated OrderId from a raw string. Throws if empty. */
export function orderId(value: string): OrderId {
	return createBrandedId(value, "OrderId");
}

/** Create a validated TradeId from a raw string. Throws if empty. */
export function tradeId(value: string): TradeId {
	return createBrandedId(value, "TradeId");
}

/** Create a validated PositionId from a raw string. Throws if empty. */
export function positionId(value: string): PositionId {
	return createBrandedId(value, "PositionId");
}

/** Create a validated StrategyId from a raw string. Throws if empty. */
export function strategyId(value: string): StrategyId {
	return createBrandedId(value, "StrategyId");
}

// ── Generation ───────────────────────────────────────────────────────

/** Short random hex token. Uniqueness is assumed; there is no collision check. */
export function randomToken(bytes = 4): string {
	return randomBytes(bytes).toString("hex");
}

export function newOrderId(): OrderId {
	return orderId(`ord_${randomToken()}`);
}

export function newTradeId(): TradeId {
	return tradeId(`trade_${randomToken()}`);
}

export function newPositionId(): PositionId {
	return positionId(`pos_${randomToken()}`);
}

// ── Utility: extract raw string ──────────────────────────────────────

/** Extract the raw string from any branded identifier type. */
export function idToString(id: OrderId | TradeId | PositionId | StrategyId): string {
	return id as string;
}

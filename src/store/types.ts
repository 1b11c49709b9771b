/**
 * StateStore: the key-value contract the ledgers write through.
 */

import type { JsonObject } from "../shared/json.js";

export type StoreValue = JsonObject;

export interface StateStore {
	get(key: string): Promise<StoreValue | null>;
	/**
	 * @param ttlSeconds - expire the entry after this many seconds; omitted or 0 keeps it
	 * @returns false when the backend refused the write
	 */
	set(key: string, value: StoreValue, ttlSeconds?: number): Promise<boolean>;
	/** @returns whether an entry was removed */
	delete(key: string): Promise<boolean>;
}

// ── Keys ─────────────────────────────────────────────────────────────

export function orderKey(id: string): string {
	return `order:${id}`;
}

export function tradeKey(id: string): string {
	return `trade:${id}`;
}

export function positionKey(id: string): string {
	return `position:${id}`;
}

export function strategyStateKey(id: string): string {
	return `strategy:${id}:state`;
}

/**
 * MemoryStateStore: in-process StateStore for tests and single-run sessions.
 *
 * Values are deep-copied on the way in and out, so callers never share
 * references with the store.
 */

import { type Clock, SystemClock } from "../shared/time.js";
import { TtlMap } from "./ttl-map.js";
import type { StateStore, StoreValue } from "./types.js";

export interface MemoryStateStoreOptions {
	readonly clock?: Clock;
}

export class MemoryStateStore implements StateStore {
	private readonly map: TtlMap;

	constructor(options: MemoryStateStoreOptions = {}) {
		this.map = new TtlMap(options.clock ?? SystemClock);
	}

	async get(key: string): Promise<StoreValue | null> {
		return this.map.get(key);
	}

	async set(key: string, value: StoreValue, ttlSeconds?: number): Promise<boolean> {
		this.map.put(key, value, this.map.expiryFor(ttlSeconds));
		return true;
	}

	async delete(key: string): Promise<boolean> {
		return this.map.delete(key);
	}

	/** Live keys under a prefix (e.g. "order:"). */
	keys(prefix?: string): string[] {
		return this.map.keys(prefix);
	}

	clear(): void {
		this.map.clear();
	}
}

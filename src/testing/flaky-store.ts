import { MemoryStateStore } from "../store/memory-store.js";
import type { StateStore, StoreValue } from "../store/types.js";

/**
 * In-process StateStore whose backend can be switched into failure modes,
 * standing in for an unreachable cache in tests.
 */
export class FlakyStore implements StateStore {
	readonly inner = new MemoryStateStore();
	failReads = false;
	failWrites = false;
	/** set() resolves false instead of throwing */
	refuseWrites = false;
	writes = 0;
	/** Milliseconds to hold a given write before it lands; 0 for none. */
	writeDelay: (key: string, value: StoreValue) => number = () => 0;

	async get(key: string): Promise<StoreValue | null> {
		if (this.failReads) throw new Error("connection refused");
		return this.inner.get(key);
	}

	async set(key: string, value: StoreValue, ttlSeconds?: number): Promise<boolean> {
		if (this.failWrites) throw new Error("connection refused");
		if (this.refuseWrites) return false;
		const delay = this.writeDelay(key, value);
		if (delay > 0) await new Promise((resolve) => setTimeout(resolve, delay));
		this.writes++;
		return this.inner.set(key, value, ttlSeconds);
	}

	async delete(key: string): Promise<boolean> {
		if (this.failWrites) throw new Error("connection refused");
		return this.inner.delete(key);
	}
}

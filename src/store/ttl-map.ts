import type { Clock } from "../shared/time.js";
import type { StoreValue } from "./types.js";

interface Entry {
	readonly value: StoreValue;
	readonly expiresAtMs: number | null;
}

/** Map of deep-copied values with optional absolute expiry; backs both store implementations. */
export class TtlMap {
	private readonly entries = new Map<string, Entry>();

	constructor(private readonly clock: Clock) {}

	get(key: string): StoreValue | null {
		const entry = this.entries.get(key);
		if (!entry) return null;
		if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.clock.now()) {
			this.entries.delete(key);
			return null;
		}
		return structuredClone(entry.value);
	}

	put(key: string, value: StoreValue, expiresAtMs: number | null): void {
		this.entries.set(key, { value: structuredClone(value), expiresAtMs });
	}

	delete(key: string): boolean {
		return this.entries.delete(key);
	}

	/** Absolute expiry for a relative TTL; null when the entry never expires. */
	expiryFor(ttlSeconds: number | undefined): number | null {
		return ttlSeconds !== undefined && ttlSeconds > 0 ? this.clock.now() + ttlSeconds * 1_000 : null;
	}

	/** Live keys, optionally restricted to a prefix. */
	keys(prefix = ""): string[] {
		const now = this.clock.now();
		const live: string[] = [];
		for (const [key, entry] of this.entries) {
			if (entry.expiresAtMs !== null && entry.expiresAtMs <= now) continue;
			if (key.startsWith(prefix)) live.push(key);
		}
		return live;
	}

	/** Live entries with their absolute expiry. */
	snapshot(): Array<{ key: string; value: StoreValue; expiresAtMs: number | null }> {
		const now = this.clock.now();
		const out: Array<{ key: string; value: StoreValue; expiresAtMs: number | null }> = [];
		for (const [key, entry] of this.entries) {
			if (entry.expiresAtMs !== null && entry.expiresAtMs <= now) continue;
			out.push({ key, value: structuredClone(entry.value), expiresAtMs: entry.expiresAtMs });
		}
		return out;
	}

	clear(): void {
		this.entries.clear();
	}
}

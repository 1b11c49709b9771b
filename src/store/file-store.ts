/**
 * FileStateStore -- StateStore persisted as a JSONL operation log.
 *
 * Every set/delete appends one JSON line; restore() replays the log into
 * memory, reporting corrupt lines instead of silently dropping them.
 * Writes are serialized through a promise queue so lines never interleave.
 */

import { appendFile, readFile, rename, writeFile } from "node:fs/promises";
import { validate, z } from "../lib/validation/index.js";
import { jsonObjectSchema } from "../shared/json.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { TtlMap } from "./ttl-map.js";
import type { StateStore, StoreValue } from "./types.js";

/** Configuration for creating a FileStateStore instance. */
export interface FileStateStoreConfig {
	readonly filePath: string;
	readonly clock?: Clock;
}

/** A line in the log that could not be parsed as a known operation. */
export interface CorruptLine {
	readonly lineNumber: number;
	readonly raw: string;
}

/** Result of replaying the log. */
export interface RestoreResult {
	readonly applied: number;
	readonly corruptLines: readonly CorruptLine[];
}

const logEntrySchema = z.discriminatedUnion("op", [
	z.object({
		op: z.literal("set"),
		key: z.string().min(1),
		value: jsonObjectSchema,
		expiresAtMs: z.number().nullable(),
	}),
	z.object({
		op: z.literal("delete"),
		key: z.string().min(1),
	}),
]);

type LogEntry = z.infer<typeof logEntrySchema>;

export class FileStateStore implements StateStore {
	private readonly filePath: string;
	private readonly map: TtlMap;
	private closed = false;
	private writeQueue: Promise<void> = Promise.resolve();

	private constructor(config: FileStateStoreConfig) {
		this.filePath = config.filePath;
		this.map = new TtlMap(config.clock ?? SystemClock);
	}

	static create(config: FileStateStoreConfig): FileStateStore {
		return new FileStateStore(config);
	}

	async get(key: string): Promise<StoreValue | null> {
		this.assertOpen();
		return this.map.get(key);
	}

	async set(key: string, value: StoreValue, ttlSeconds?: number): Promise<boolean> {
		this.assertOpen();
		const expiresAtMs = this.map.expiryFor(ttlSeconds);
		await this.append({ op: "set", key, value, expiresAtMs });
		this.map.put(key, value, expiresAtMs);
		return true;
	}

	async delete(key: string): Promise<boolean> {
		this.assertOpen();
		const existed = this.map.get(key) !== null;
		await this.append({ op: "delete", key });
		this.map.delete(key);
		return existed;
	}

	/**
	 * Replays the log file into memory. A missing file is an empty store.
	 * Entries already expired at replay time are skipped.
	 */
	async restore(): Promise<RestoreResult> {
		let content: string;
		try {
			content = await readFile(this.filePath, "utf-8");
		} catch (err: unknown) {
			if (isNodeError(err) && err.code === "ENOENT") {
				return { applied: 0, corruptLines: [] };
			}
			throw err;
		}

		this.map.clear();
		const lines = content.split("\n");
		const corruptLines: CorruptLine[] = [];
		let applied = 0;

		for (let i = 0; i < lines.length; i++) {
			const trimmed = lines[i]?.trim() ?? "";
			if (trimmed.length === 0) {
				continue;
			}
			const entry = parseLine(trimmed);
			if (entry === null) {
				corruptLines.push({ lineNumber: i + 1, raw: trimmed.slice(0, 200) });
				continue;
			}
			if (entry.op === "set") {
				this.map.put(entry.key, entry.value, entry.expiresAtMs);
			} else {
				this.map.delete(entry.key);
			}
			applied++;
		}

		return { applied, corruptLines };
	}

	/**
	 * Rewrites the log as one `set` line per live entry, dropping history,
	 * deletes and expired values. The new file replaces the old one atomically.
	 */
	async compact(): Promise<void> {
		this.assertOpen();
		const task = async (): Promise<void> => {
			const body = this.map
				.snapshot()
				.map((e) => JSON.stringify({ op: "set", ...e }))
				.join("\n");
			const tmp = `${this.filePath}.tmp`;
			await writeFile(tmp, body.length > 0 ? `${body}\n` : "", "utf-8");
			await rename(tmp, this.filePath);
		};
		this.writeQueue = this.writeQueue.catch(() => {}).then(task);
		await this.writeQueue;
	}

	/** Waits for all pending writes to complete. */
	async flush(): Promise<void> {
		await this.writeQueue.catch(() => {});
	}

	/** Marks the store as closed, draining any pending writes first. */
	async close(): Promise<void> {
		this.closed = true;
		await this.flush();
	}

	private async append(entry: LogEntry): Promise<void> {
		const line = `${JSON.stringify(entry)}\n`;
		this.writeQueue = this.writeQueue
			.catch(() => {})
			.then(() => appendFile(this.filePath, line, "utf-8"));
		await this.writeQueue;
	}

	private assertOpen(): void {
		if (this.closed) {
			throw new Error(`FileStateStore ${this.filePath} is closed`);
		}
	}
}

function parseLine(line: string): LogEntry | null {
	let raw: unknown;
	try {
		raw = JSON.parse(line);
	} catch {
		return null;
	}
	const result = validate(logEntrySchema, raw);
	return result.ok ? result.value : null;
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}

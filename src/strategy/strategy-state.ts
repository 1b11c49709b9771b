/**
 * StrategyStateKeeper: persisted per-strategy state at `strategy:{id}:state`.
 *
 * Same write-through discipline as the ledgers. The record is stored flat
 * with ISO timestamps and decoded with zod on load.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import type { ValidationError } from "../shared/errors.js";
import { type StrategyId, positionId, strategyId } from "../shared/identifiers.js";
import { jsonObjectSchema } from "../shared/json.js";
import { type Result, unwrap } from "../shared/result.js";
import { sideSchema } from "../shared/side.js";
import { type Clock, SystemClock, fromIso, toIso } from "../shared/time.js";
import { readRecord, writeRecord } from "../store/store-access.js";
import { type StateStore, type StoreValue, strategyStateKey } from "../store/types.js";
import type { StrategyStatePatch, StrategyStateRecord } from "./types.js";

const isoSchema = z.string().datetime();

const stateRecordSchema = z
	.object({
		strategyId: z.string().min(1),
		symbol: z.string().min(1),
		active: z.boolean(),
		lastUpdate: isoSchema,
		positionSize: z.number().min(0),
		currentPosition: z.string().min(1).nullable(),
		lastSignal: z
			.object({ side: sideSchema, price: z.number(), timestamp: isoSchema })
			.nullable(),
		metadata: jsonObjectSchema,
	})
	.transform(
		(r): StrategyStateRecord => ({
			strategyId: strategyId(r.strategyId),
			symbol: r.symbol,
			active: r.active,
			lastUpdateMs: fromIso(r.lastUpdate),
			positionSize: r.positionSize,
			currentPosition: r.currentPosition === null ? null : positionId(r.currentPosition),
			lastSignal:
				r.lastSignal === null
					? null
					: {
							side: r.lastSignal.side,
							price: r.lastSignal.price,
							timestampMs: fromIso(r.lastSignal.timestamp),
						},
			metadata: r.metadata,
		}),
	);

export function encodeStrategyState(state: StrategyStateRecord): StoreValue {
	return {
		strategyId: state.strategyId,
		symbol: state.symbol,
		active: state.active,
		lastUpdate: toIso(state.lastUpdateMs),
		positionSize: state.positionSize,
		currentPosition: state.currentPosition,
		lastSignal:
			state.lastSignal === null
				? null
				: {
						side: state.lastSignal.side,
						price: state.lastSignal.price,
						timestamp: toIso(state.lastSignal.timestampMs),
					},
		metadata: state.metadata,
	};
}

export function decodeStrategyState(raw: StoreValue): Result<StrategyStateRecord, ValidationError> {
	return validate(stateRecordSchema, raw, "Invalid strategy state record");
}

export interface StrategyStateKeeperOptions {
	readonly strategyId: StrategyId;
	readonly symbol: string;
	readonly store: StateStore;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export class StrategyStateKeeper {
	private readonly id: StrategyId;
	private readonly symbol: string;
	private readonly store: StateStore;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private state: StrategyStateRecord | null = null;

	constructor(options: StrategyStateKeeperOptions) {
		this.id = options.strategyId;
		this.symbol = options.symbol;
		this.store = options.store;
		this.clock = options.clock ?? SystemClock;
		this.logger = (options.logger ?? silentLogger()).child({
			component: "strategy-state",
			strategyId: options.strategyId,
		});
	}

	/** Stored record, or a fresh active one written back when none exists. */
	async load(): Promise<StrategyStateRecord> {
		const raw = await readRecord(this.store, strategyStateKey(this.id), this.logger);
		if (raw !== null) {
			this.state = unwrap(decodeStrategyState(raw));
			return this.state;
		}
		return this.save({
			strategyId: this.id,
			symbol: this.symbol,
			active: true,
			lastUpdateMs: this.clock.now(),
			positionSize: 0,
			currentPosition: null,
			lastSignal: null,
			metadata: {},
		});
	}

	/** Last loaded or written record; null before load(). */
	current(): StrategyStateRecord | null {
		return this.state;
	}

	async update(patch: StrategyStatePatch): Promise<StrategyStateRecord> {
		const base = this.state ?? (await this.load());
		return this.save({ ...base, ...patch, lastUpdateMs: this.clock.now() });
	}

	async deactivate(): Promise<StrategyStateRecord> {
		return this.update({ active: false });
	}

	private async save(state: StrategyStateRecord): Promise<StrategyStateRecord> {
		await writeRecord(this.store, strategyStateKey(this.id), encodeStrategyState(state), this.logger);
		this.state = state;
		return state;
	}
}

/**
 * Strategy runtime types.
 *
 * A strategy is a capability contract rather than a base class: anything
 * that can take data points, produce at most one signal per point and
 * optionally veto its own signals can run under the StrategyManager.
 */

import type { PositionId, StrategyId } from "../shared/identifiers.js";
import type { JsonObject, Metadata } from "../shared/json.js";
import type { Side } from "../shared/side.js";

// ── Market data ─────────────────────────────────────────────────────

/** Tag carried by every DataPoint; strategies declare the tags they need. */
export const DataType = {
	Candle: "candle",
	Price: "price",
} as const;

export type DataType = (typeof DataType)[keyof typeof DataType];

export interface Candle {
	readonly open: number;
	readonly high: number;
	readonly low: number;
	readonly close: number;
	readonly volume: number;
}

interface DataPointBase {
	readonly symbol: string;
	readonly timestampMs: number;
	readonly metadata: Metadata;
}

export interface CandlePoint extends DataPointBase {
	readonly dataType: typeof DataType.Candle;
	readonly value: Candle;
}

export interface PricePoint extends DataPointBase {
	readonly dataType: typeof DataType.Price;
	readonly value: number;
}

export type DataPoint = CandlePoint | PricePoint;

/** Last traded price a data point carries. */
export function priceOf(point: DataPoint): number {
	switch (point.dataType) {
		case DataType.Candle:
			return point.value.close;
		case DataType.Price:
			return point.value;
	}
}

// ── Signals ─────────────────────────────────────────────────────────

/** Entry opens a position; exit closes the strategy's positions. */
export const SignalType = {
	Entry: "entry",
	Exit: "exit",
} as const;

export type SignalType = (typeof SignalType)[keyof typeof SignalType];

export interface Signal {
	readonly strategyId: StrategyId;
	readonly symbol: string;
	readonly side: Side;
	readonly size: number;
	/** Reference price the signal was generated at */
	readonly price: number;
	readonly signalType: SignalType;
	/** 0..1 */
	readonly confidence: number;
	readonly timestampMs: number;
	readonly expiryMs: number | null;
	readonly metadata: Metadata;
}

// ── Persisted state ─────────────────────────────────────────────────

export interface LastSignalSummary {
	readonly side: Side;
	readonly price: number;
	readonly timestampMs: number;
}

export interface StrategyStateRecord {
	readonly strategyId: StrategyId;
	readonly symbol: string;
	readonly active: boolean;
	readonly lastUpdateMs: number;
	readonly positionSize: number;
	readonly currentPosition: PositionId | null;
	readonly lastSignal: LastSignalSummary | null;
	readonly metadata: JsonObject;
}

export type StrategyStatePatch = Partial<
	Pick<
		StrategyStateRecord,
		"active" | "positionSize" | "currentPosition" | "lastSignal" | "metadata"
	>
>;

// ── Capability contract ─────────────────────────────────────────────

export interface Strategy {
	readonly id: StrategyId;
	readonly symbol: string;
	/** Registry tag this instance was built from, e.g. "ma_crossover" */
	readonly kind: string;
	readonly dataRequirements: ReadonlySet<DataType>;

	/** Load persisted state; a strategy with no stored state starts active. */
	initialize(): Promise<void>;
	processData(point: DataPoint): Promise<void>;
	/** At most one signal for the data seen so far; null while inactive. */
	generateSignal(): Promise<Signal | null>;
	/** Strategy-specific veto, run after the generic checks. */
	validateSignal?(signal: Signal): boolean;
	/** Mark inactive and drop buffered data. The state record is kept. */
	cleanup(): Promise<void>;
	isActive(): boolean;
}

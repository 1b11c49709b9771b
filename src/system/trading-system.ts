/**
 * TradingSystem: composition root.
 *
 * Wires bus, ledgers, engine, strategy manager and ingestion loop over one
 * StateStore and one ExecutionClient. Market data enters through
 * processMarketData() and is handled by the loop one point at a time:
 * strategies first, then position repricing, then price_update.
 */

import { TradingEngine, type PositionSummary } from "../engine/index.js";
import { EventBus } from "../events/event-bus.js";
import { EventType } from "../events/event-types.js";
import type { ExecutionClient } from "../execution/types.js";
import { DataIngestionLoop } from "../ingestion/index.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { OrderLedger } from "../order/order-ledger.js";
import type { Trade, TradeFilter } from "../order/types.js";
import { PositionLedger } from "../position/position-ledger.js";
import { type CoreConfig, type CoreConfigOverrides, resolveConfig } from "../shared/config.js";
import type { OrderId, PositionId, TradeId } from "../shared/identifiers.js";
import type { Metadata } from "../shared/json.js";
import { type Clock, SystemClock, toIso } from "../shared/time.js";
import type { StateStore } from "../store/types.js";
import {
	type AddStrategyRequest,
	type Candle,
	type DataPoint,
	DataType,
	type StrategyRegistry,
	StrategyManager,
	type StrategySummary,
	priceOf,
} from "../strategy/index.js";

export interface IdFactories {
	readonly newOrderId?: () => OrderId;
	readonly newTradeId?: () => TradeId;
	readonly newPositionId?: () => PositionId;
}

export interface TradingSystemOptions {
	readonly store: StateStore;
	readonly executionClient: ExecutionClient;
	readonly config?: CoreConfigOverrides;
	/** Defaults to a pino logger at config.logLevel */
	readonly logger?: Logger;
	readonly clock?: Clock;
	readonly registry?: StrategyRegistry;
	readonly ids?: IdFactories;
}

export interface IngestionStatus {
	readonly pending: number;
	readonly processed: number;
	readonly failed: number;
}

export interface SystemStatus {
	readonly running: boolean;
	readonly timestamp: string;
	readonly strategies: readonly StrategySummary[];
	readonly positions: PositionSummary;
	readonly ingestion: IngestionStatus;
}

export interface TradeHistory {
	readonly totalTrades: number;
	readonly trades: readonly Trade[];
}

const candleSchema = z
	.object({
		open: z.number().positive().finite(),
		high: z.number().positive().finite(),
		low: z.number().positive().finite(),
		close: z.number().positive().finite(),
		volume: z.number().min(0).finite(),
	})
	.refine((c) => c.low <= c.high, { message: "low must not exceed high", path: ["low"] });

const priceSchema = z.number().positive().finite();

export class TradingSystem {
	readonly config: CoreConfig;
	readonly bus: EventBus;
	readonly engine: TradingEngine;
	readonly strategies: StrategyManager;
	readonly ingestion: DataIngestionLoop<DataPoint>;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private running = false;

	/** @throws ConfigError if the merged configuration is invalid */
	constructor(options: TradingSystemOptions) {
		this.config = resolveConfig(options.config);
		this.clock = options.clock ?? SystemClock;
		const root = options.logger ?? createLogger({ level: this.config.logLevel });
		this.logger = root.child({ component: "trading-system" });

		this.bus = new EventBus({
			historyLimit: this.config.events.historyLimit,
			clock: this.clock,
			logger: root,
		});
		const orders = new OrderLedger({
			store: options.store,
			clock: this.clock,
			logger: root,
			...(options.ids?.newOrderId ? { newOrderId: options.ids.newOrderId } : {}),
			...(options.ids?.newTradeId ? { newTradeId: options.ids.newTradeId } : {}),
		});
		const positions = new PositionLedger({
			store: options.store,
			clock: this.clock,
			logger: root,
			...(options.ids?.newPositionId ? { newPositionId: options.ids.newPositionId } : {}),
		});
		this.engine = new TradingEngine({
			orders,
			positions,
			client: options.executionClient,
			bus: this.bus,
			logger: root,
		});
		this.strategies = new StrategyManager({
			executor: this.engine,
			bus: this.bus,
			store: options.store,
			trading: this.config.trading,
			clock: this.clock,
			logger: root,
			...(options.registry ? { registry: options.registry } : {}),
		});
		this.ingestion = new DataIngestionLoop<DataPoint>((point) => this.handlePoint(point), {
			logger: root,
		});
	}

	get isRunning(): boolean {
		return this.running;
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	async start(): Promise<void> {
		if (this.running) {
			this.logger.warn("trading system already running");
			return;
		}
		this.running = true;
		this.ingestion.start();
		this.logger.info("trading system started");
		await this.bus.emit(EventType.SystemStatus, { status: "started" });
	}

	/**
	 * Cancel ingestion, then close every live position best-effort.
	 * Queued data points are left unprocessed.
	 */
	async stop(): Promise<void> {
		if (!this.running) {
			this.logger.warn("trading system not running");
			return;
		}
		this.running = false;
		await this.bus.emit(EventType.SystemStatus, { status: "stopping" });
		await this.ingestion.stop();

		const report = await this.engine.closeAllPositions("system_shutdown");
		for (const failure of report.failed) {
			this.logger.error(
				{ positionId: failure.positionId, error: failure.error.message },
				"position not closed on shutdown",
			);
		}
		this.logger.info(
			{ closed: report.closed.length, failed: report.failed.length },
			"trading system stopped",
		);
		await this.bus.emit(EventType.SystemStatus, {
			status: "stopped",
			closedPositions: report.closed.length,
			failedPositions: report.failed.map((f) => f.positionId),
		});
	}

	/** Resolves once every accepted data point has been handled. */
	whenIdle(): Promise<void> {
		return this.ingestion.whenIdle();
	}

	// ── Market data ────────────────────────────────────────────────

	/**
	 * Queue one market data point for processing.
	 * @returns false when the system is not running and the point was ignored
	 * @throws ValidationError for a malformed value
	 */
	processMarketData(
		symbol: string,
		dataType: typeof DataType.Candle,
		value: Candle,
		timestampMs?: number,
		metadata?: Metadata,
	): boolean;
	processMarketData(
		symbol: string,
		dataType: typeof DataType.Price,
		value: number,
		timestampMs?: number,
		metadata?: Metadata,
	): boolean;
	processMarketData(
		symbol: string,
		dataType: DataType,
		value: Candle | number,
		timestampMs?: number,
		metadata: Metadata = {},
	): boolean {
		if (!this.running) {
			this.logger.warn({ symbol, dataType }, "trading system not running, market data ignored");
			return false;
		}
		const ts = timestampMs ?? this.clock.now();
		this.ingestion.enqueue(toDataPoint(symbol, dataType, value, ts, metadata));
		return true;
	}

	// ── Strategies ─────────────────────────────────────────────────

	addStrategy(request: AddStrategyRequest): Promise<StrategySummary> {
		return this.strategies.addStrategy(request);
	}

	removeStrategy(id: string): Promise<void> {
		return this.strategies.removeStrategy(id);
	}

	// ── Queries ────────────────────────────────────────────────────

	getSystemStatus(): SystemStatus {
		return {
			running: this.running,
			timestamp: toIso(this.clock.now()),
			strategies: this.strategies.getStrategySummary(),
			positions: this.engine.getPositionSummary(),
			ingestion: {
				pending: this.ingestion.pending,
				processed: this.ingestion.processed,
				failed: this.ingestion.failed,
			},
		};
	}

	getTradeHistory(filter: TradeFilter = {}): TradeHistory {
		const trades = this.engine.getTradeHistory(filter);
		return { totalTrades: trades.length, trades };
	}

	// ── Internal ──────────────────────────────────────────────────

	private async handlePoint(point: DataPoint): Promise<void> {
		await this.strategies.processData(point);
		const price = priceOf(point);
		await this.engine.updatePositions(point.symbol, price);
		await this.bus.emit(EventType.PriceUpdate, {
			symbol: point.symbol,
			dataType: point.dataType,
			price,
			timestamp: toIso(point.timestampMs),
		});
	}
}

function toDataPoint(
	symbol: string,
	dataType: DataType,
	value: Candle | number,
	timestampMs: number,
	metadata: Metadata,
): DataPoint {
	switch (dataType) {
		case DataType.Candle: {
			const candle = validate(candleSchema, value, `Invalid candle for ${symbol}`);
			if (!candle.ok) throw candle.error;
			return { dataType, symbol, timestampMs, value: candle.value, metadata };
		}
		case DataType.Price: {
			const price = validate(priceSchema, value, `Invalid price for ${symbol}`);
			if (!price.ok) throw price.error;
			return { dataType, symbol, timestampMs, value: price.value, metadata };
		}
	}
}

/**
 * StrategyManager: runs strategy instances and forwards their signals.
 *
 * Each data point goes to every running strategy that requires its data
 * type and trades its symbol, one strategy at a time in the order they
 * were added. A validated signal is published as strategy_signal and then
 * executed: entries through executeMarketOrder, exits by closing the
 * strategy's live positions on the symbol. A failure inside one strategy
 * is logged and emitted as system_error; the others still run.
 */

import type { TradingEngine } from "../engine/trading-engine.js";
import type { EventBus } from "../events/event-bus.js";
import { EventType } from "../events/event-types.js";
import { splitSymbol } from "../execution/symbol.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { DEFAULT_CORE_CONFIG, type TradingConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import {
	InvalidStateError,
	NotFoundError,
	type TradingError,
	classifyError,
	errorMessage,
} from "../shared/errors.js";
import { type StrategyId, strategyId } from "../shared/identifiers.js";
import type { JsonObject } from "../shared/json.js";
import { Side } from "../shared/side.js";
import { type Clock, SystemClock, toIso } from "../shared/time.js";
import type { StateStore } from "../store/types.js";
import { type StrategyRegistry, createDefaultRegistry } from "./registry.js";
import { StrategyStateKeeper } from "./strategy-state.js";
import { type DataPoint, type DataType, type Signal, SignalType, type Strategy } from "./types.js";
import { validateSignal } from "./validate-signal.js";

/** What the manager needs from the engine. */
export type SignalExecutor = Pick<
	TradingEngine,
	"executeMarketOrder" | "closePosition" | "getPositionSummary" | "positionForOrder"
>;

export interface StrategyManagerOptions {
	readonly executor: SignalExecutor;
	readonly bus: EventBus;
	readonly store: StateStore;
	readonly registry?: StrategyRegistry;
	readonly trading?: TradingConfig;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export interface AddStrategyRequest {
	readonly id: string;
	/** Registry tag, e.g. "ma_crossover" */
	readonly kind: string;
	readonly symbol: string;
	readonly params?: unknown;
}

export interface StrategySummary {
	readonly id: StrategyId;
	readonly kind: string;
	readonly symbol: string;
	readonly active: boolean;
	readonly dataRequirements: readonly DataType[];
}

export interface StrategyFailure {
	readonly strategyId: StrategyId;
	readonly error: TradingError;
}

/** What one data point did across all routed strategies. */
export interface ProcessReport {
	readonly routed: number;
	readonly signals: readonly Signal[];
	readonly rejected: number;
	readonly failures: readonly StrategyFailure[];
}

interface RunningStrategy {
	readonly strategy: Strategy;
	readonly state: StrategyStateKeeper;
}

export class StrategyManager {
	private readonly running = new Map<StrategyId, RunningStrategy>();
	private readonly executor: SignalExecutor;
	private readonly bus: EventBus;
	private readonly store: StateStore;
	private readonly registry: StrategyRegistry;
	private readonly trading: TradingConfig;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly rootLogger: Logger;

	constructor(options: StrategyManagerOptions) {
		this.executor = options.executor;
		this.bus = options.bus;
		this.store = options.store;
		this.registry = options.registry ?? createDefaultRegistry();
		this.trading = options.trading ?? DEFAULT_CORE_CONFIG.trading;
		this.clock = options.clock ?? SystemClock;
		this.rootLogger = options.logger ?? silentLogger();
		this.logger = this.rootLogger.child({ component: "strategy-manager" });
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	/**
	 * Build a strategy through the registry, initialize it and start routing to it.
	 * @throws InvalidStateError if the id is already running
	 * @throws ValidationError for an unknown kind, bad parameters or a malformed symbol
	 */
	async addStrategy(request: AddStrategyRequest): Promise<StrategySummary> {
		const id = strategyId(request.id);
		if (this.running.has(id)) {
			throw new InvalidStateError(`Strategy already running: ${id}`, { strategyId: id });
		}
		splitSymbol(request.symbol);

		const state = new StrategyStateKeeper({
			strategyId: id,
			symbol: request.symbol,
			store: this.store,
			clock: this.clock,
			logger: this.rootLogger,
		});
		const strategy = this.registry.create(
			request.kind,
			{
				id,
				symbol: request.symbol,
				state,
				clock: this.clock,
				logger: this.rootLogger,
				sizing: {
					accountSize: this.trading.accountSize,
					assumedStopLossFraction: this.trading.assumedStopLossFraction,
				},
			},
			request.params ?? {},
		);
		await strategy.initialize();
		this.running.set(id, { strategy, state });

		const summary = summarize(strategy);
		await this.bus.emit(EventType.StrategyStarted, summaryPayload(summary));
		this.logger.info({ strategyId: id, kind: request.kind, symbol: request.symbol }, "strategy added");
		return summary;
	}

	/**
	 * Stop routing to a strategy. Its persisted state is kept, marked inactive.
	 * @throws NotFoundError if no strategy with that id is running
	 */
	async removeStrategy(id: string): Promise<void> {
		const key = strategyId(id);
		const entry = this.running.get(key);
		if (entry === undefined) {
			throw new NotFoundError("Strategy", id);
		}
		await entry.strategy.cleanup();
		this.running.delete(key);
		await this.bus.emit(EventType.StrategyStopped, { strategyId: key });
		this.logger.info({ strategyId: key }, "strategy removed");
	}

	// ── Data ───────────────────────────────────────────────────────

	async processData(point: DataPoint): Promise<ProcessReport> {
		const signals: Signal[] = [];
		const failures: StrategyFailure[] = [];
		let routed = 0;
		let rejected = 0;

		for (const [id, entry] of this.running) {
			const { strategy } = entry;
			if (strategy.symbol !== point.symbol || !strategy.dataRequirements.has(point.dataType)) {
				continue;
			}
			routed++;
			try {
				await strategy.processData(point);
				const signal = await strategy.generateSignal();
				if (signal === null) continue;

				const checked = validateSignal(strategy, signal, this.clock.now());
				if (!checked.ok) {
					rejected++;
					this.logger.warn(
						{ strategyId: id, issues: checked.error.issues },
						checked.error.message,
					);
					continue;
				}

				signals.push(signal);
				await this.bus.emit(EventType.StrategySignal, signalPayload(signal));
				await this.forward(entry, signal);
			} catch (error: unknown) {
				const classified = classifyError(error);
				failures.push({ strategyId: id, error: classified });
				this.logger.error({ strategyId: id, error: errorMessage(error) }, "strategy failed");
				await this.bus.emit(EventType.SystemError, {
					source: "strategy-manager",
					strategyId: id,
					symbol: point.symbol,
					error: classified.message,
				});
			}
		}

		return { routed, signals, rejected, failures };
	}

	getStrategySummary(): readonly StrategySummary[] {
		return [...this.running.values()].map((e) => summarize(e.strategy));
	}

	// ── Internal ──────────────────────────────────────────────────

	private async forward(entry: RunningStrategy, signal: Signal): Promise<void> {
		switch (signal.signalType) {
			case SignalType.Entry:
				return this.enter(entry, signal);
			case SignalType.Exit:
				return this.exit(entry, signal);
		}
	}

	private async enter(entry: RunningStrategy, signal: Signal): Promise<void> {
		const { minPositionSize, maxPositionSize, defaultStopLossPercent } = this.trading;
		if (signal.size < minPositionSize) {
			this.logger.info(
				{ strategyId: signal.strategyId, size: signal.size, minPositionSize },
				"signal below minimum size dropped",
			);
			return;
		}
		const size = Math.min(signal.size, maxPositionSize);

		const order = await this.executor.executeMarketOrder(
			signal.symbol,
			signal.side,
			size,
			stopLossFor(signal.side, signal.price, defaultStopLossPercent),
			{
				strategyId: signal.strategyId,
				signalType: signal.signalType,
				confidence: signal.confidence,
			},
		);

		const state = await entry.state.update({
			currentPosition: this.executor.positionForOrder(order.id),
			positionSize: order.filledSize ?? size,
		});
		await this.bus.emit(EventType.StrategyUpdated, {
			strategyId: state.strategyId,
			currentPosition: state.currentPosition,
			positionSize: state.positionSize,
		});
	}

	private async exit(entry: RunningStrategy, signal: Signal): Promise<void> {
		const owned = this.executor
			.getPositionSummary()
			.positions.filter(
				(p) => p.symbol === signal.symbol && p.metadata.strategyId === signal.strategyId,
			);
		for (const position of owned) {
			await this.executor.closePosition(position.id, {
				reason: "strategy_exit",
				strategyId: signal.strategyId,
			});
		}
		const state = await entry.state.update({ currentPosition: null, positionSize: 0 });
		await this.bus.emit(EventType.StrategyUpdated, {
			strategyId: state.strategyId,
			currentPosition: null,
			positionSize: 0,
		});
	}
}

/** Stop at `percent` against the entry; none when percent is 0. */
export function stopLossFor(side: Side, price: number, percent: number): number | undefined {
	if (percent <= 0) return undefined;
	const offset = Decimal.from(price).mul(Decimal.from(percent));
	const stop = side === Side.Buy ? Decimal.from(price).sub(offset) : Decimal.from(price).add(offset);
	return stop.toNumber();
}

function summarize(strategy: Strategy): StrategySummary {
	return {
		id: strategy.id,
		kind: strategy.kind,
		symbol: strategy.symbol,
		active: strategy.isActive(),
		dataRequirements: [...strategy.dataRequirements],
	};
}

function summaryPayload(summary: StrategySummary): JsonObject {
	return { ...summary, dataRequirements: [...summary.dataRequirements] };
}

function signalPayload(signal: Signal): JsonObject {
	return {
		strategyId: signal.strategyId,
		symbol: signal.symbol,
		side: signal.side,
		size: signal.size,
		price: signal.price,
		signalType: signal.signalType,
		confidence: signal.confidence,
		timestamp: toIso(signal.timestampMs),
		expiry: signal.expiryMs === null ? null : toIso(signal.expiryMs),
		metadata: signal.metadata,
	};
}

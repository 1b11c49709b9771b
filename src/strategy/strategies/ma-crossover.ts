import {
	CrossDirection,
	detectCross,
	smaSeries,
} from "../../analytics/indicators.js";
import type { Logger } from "../../lib/logger/index.js";
import { validate, z } from "../../lib/validation/index.js";
import { Decimal } from "../../shared/decimal.js";
import type { ValidationError } from "../../shared/errors.js";
import type { StrategyId } from "../../shared/identifiers.js";
import { type Result, ok } from "../../shared/result.js";
import { Side } from "../../shared/side.js";
import type { Clock } from "../../shared/time.js";
import type { SizingConfig, StrategyContext } from "../strategy-context.js";
import type { StrategyStateKeeper } from "../strategy-state.js";
import { type DataPoint, DataType, type Signal, SignalType, type Strategy } from "../types.js";

export const MA_CROSSOVER_KIND = "ma_crossover";

const SIGNAL_CONFIDENCE = 0.8;

export const maCrossoverParamsSchema = z
	.object({
		fastPeriod: z.number().int().positive().default(10),
		slowPeriod: z.number().int().positive().default(21),
		minVolume: z.number().min(0).default(1_000_000),
		riskFactor: z.number().positive().max(1).default(0.02),
	})
	.refine((p) => p.fastPeriod < p.slowPeriod, {
		message: "fastPeriod must be shorter than slowPeriod",
		path: ["fastPeriod"],
	});

export type MaCrossoverParams = z.infer<typeof maCrossoverParamsSchema>;

/**
 * Moving-average crossover on candle closes.
 *
 * Buys when the fast SMA crosses above the slow SMA and sells on the
 * opposite cross, once per crossing, and only when the latest candle's
 * volume meets `minVolume`. Closes and volumes are kept for at most
 * 2 × slowPeriod samples.
 */
export class MaCrossoverStrategy implements Strategy {
	readonly kind = MA_CROSSOVER_KIND;
	readonly dataRequirements: ReadonlySet<DataType> = new Set([DataType.Candle]);
	readonly id: StrategyId;
	readonly symbol: string;
	readonly params: MaCrossoverParams;

	private readonly state: StrategyStateKeeper;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly sizing: SizingConfig;

	private closes: Decimal[] = [];
	private volumes: number[] = [];
	// last two values of each series, aligned on the latest sample
	private fast: Decimal[] = [];
	private slow: Decimal[] = [];
	private lastCross: CrossDirection | null = null;

	private constructor(context: StrategyContext, params: MaCrossoverParams) {
		this.id = context.id;
		this.symbol = context.symbol;
		this.params = params;
		this.clock = context.clock;
		this.sizing = context.sizing;
		this.logger = context.logger.child({ component: "ma-crossover", strategyId: context.id });
		this.state = context.state;
	}

	/** Validates `params` (missing fields take their defaults). */
	static create(
		context: StrategyContext,
		params: unknown = {},
	): Result<MaCrossoverStrategy, ValidationError> {
		const parsed = validate(maCrossoverParamsSchema, params, "Invalid ma_crossover parameters");
		if (!parsed.ok) return parsed;
		return ok(new MaCrossoverStrategy(context, parsed.value));
	}

	private get maxPeriod(): number {
		return Math.max(this.params.fastPeriod, this.params.slowPeriod);
	}

	/** Samples currently buffered. */
	get bufferedSamples(): number {
		return this.closes.length;
	}

	async initialize(): Promise<void> {
		const state = await this.state.load();
		this.logger.info({ active: state.active, params: this.params }, "strategy initialized");
	}

	isActive(): boolean {
		return this.state.current()?.active ?? false;
	}

	async processData(point: DataPoint): Promise<void> {
		if (point.dataType !== DataType.Candle) return;

		this.closes.push(Decimal.from(point.value.close));
		this.volumes.push(point.value.volume);
		const cap = this.maxPeriod * 2;
		if (this.closes.length > cap) {
			this.closes.splice(0, this.closes.length - cap);
			this.volumes.splice(0, this.volumes.length - cap);
		}

		if (this.closes.length >= this.maxPeriod) {
			this.fast = smaSeries(this.closes, this.params.fastPeriod).slice(-2);
			this.slow = smaSeries(this.closes, this.params.slowPeriod).slice(-2);
		}
	}

	async generateSignal(): Promise<Signal | null> {
		if (!this.isActive()) return null;

		const [prevFast, fast] = this.fast;
		const [prevSlow, slow] = this.slow;
		const price = this.closes.at(-1);
		const volume = this.volumes.at(-1);
		if (
			prevFast === undefined ||
			fast === undefined ||
			prevSlow === undefined ||
			slow === undefined ||
			price === undefined ||
			volume === undefined
		) {
			return null;
		}
		if (volume < this.params.minVolume) return null;

		const cross = detectCross(prevFast, prevSlow, fast, slow);
		if (cross === null || cross === this.lastCross) return null;
		this.lastCross = cross;

		const side = cross === CrossDirection.Up ? Side.Buy : Side.Sell;
		const signal: Signal = {
			strategyId: this.id,
			symbol: this.symbol,
			side,
			size: this.positionSize(price).toNumber(),
			price: price.toNumber(),
			signalType: SignalType.Entry,
			confidence: SIGNAL_CONFIDENCE,
			timestampMs: this.clock.now(),
			expiryMs: null,
			metadata: {
				fastMa: fast.toNumber(),
				slowMa: slow.toNumber(),
				riskFactor: this.params.riskFactor,
			},
		};

		await this.state.update({
			lastSignal: { side, price: signal.price, timestampMs: signal.timestampMs },
		});
		this.logger.info({ side, price: signal.price, size: signal.size }, "crossover signal");
		return signal;
	}

	/**
	 * Rejects unless the window is full, volume is sufficient and the
	 * last close moved in the signal's direction.
	 */
	validateSignal(signal: Signal): boolean {
		if (this.closes.length < this.maxPeriod) return false;

		const volume = this.volumes.at(-1);
		if (volume === undefined || volume < this.params.minVolume) return false;

		const last = this.closes.at(-1);
		const prev = this.closes.at(-2);
		if (last === undefined || prev === undefined) return false;
		const move = last.sub(prev).sign();
		return signal.side === Side.Buy ? move >= 0 : move <= 0;
	}

	async cleanup(): Promise<void> {
		await this.state.deactivate();
		this.closes = [];
		this.volumes = [];
		this.fast = [];
		this.slow = [];
		this.lastCross = null;
		this.logger.info("strategy stopped");
	}

	/** Risk budget over the assumed stop distance: accountSize × risk / (price × stop). */
	private positionSize(price: Decimal): Decimal {
		const budget = Decimal.from(this.sizing.accountSize).mul(Decimal.from(this.params.riskFactor));
		return budget.div(price.mul(Decimal.from(this.sizing.assumedStopLossFraction)));
	}
}

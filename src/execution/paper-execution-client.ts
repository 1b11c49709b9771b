/**
 * PaperExecutionClient: simulated venue for paper trading and tests.
 *
 * Quotes off a reference price set with setPrice(), moved against the
 * taker by slippage and a linear price-impact model. No network calls,
 * fully deterministic when given a FakeClock.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigError, ExecutionError, ValidationError } from "../shared/errors.js";
import { Side } from "../shared/side.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { ExecutionClient, Quote, QuoteRequest, SwapResult } from "./types.js";

/**
 * Configuration for the paper execution client.
 *
 * @example
 * ```ts
 * const client = new PaperExecutionClient({ slippageBps: 5, feeBps: 10 });
 * client.setPrice("SOL-USDC", 101.25);
 * ```
 */
export interface PaperExecutionClientConfig {
	readonly slippageBps: number;
	readonly feeBps: number;
	/** Price impact, in percent, per unit of size */
	readonly impactPctPerUnit: number;
	/** Quotes with a larger impact are refused */
	readonly maxPriceImpactPct: number;
	readonly quoteTtlMs: number;
	readonly maxSwapHistory: number;
	readonly clock: Clock;
	readonly logger: Logger;
}

/** Record of a simulated swap. */
export interface SwapRecord {
	readonly quote: Quote;
	readonly result: SwapResult;
	readonly timestampMs: number;
}

export class PaperExecutionClient implements ExecutionClient {
	private readonly config: PaperExecutionClientConfig;
	private readonly prices = new Map<string, number>();
	private readonly outstanding = new Set<string>();
	private readonly swaps: SwapRecord[] = [];
	private quoteCounter = 0;
	private txCounter = 0;

	constructor(config?: Partial<PaperExecutionClientConfig>) {
		this.config = {
			slippageBps: config?.slippageBps ?? 0,
			feeBps: config?.feeBps ?? 0,
			impactPctPerUnit: config?.impactPctPerUnit ?? 0,
			maxPriceImpactPct: config?.maxPriceImpactPct ?? 100,
			quoteTtlMs: config?.quoteTtlMs ?? 30_000,
			maxSwapHistory: config?.maxSwapHistory ?? 10_000,
			clock: config?.clock ?? SystemClock,
			logger: (config?.logger ?? silentLogger()).child({ component: "paper-execution" }),
		};
		if (this.config.slippageBps < 0 || this.config.feeBps < 0) {
			throw new ConfigError("slippageBps and feeBps must be non-negative", {
				slippageBps: this.config.slippageBps,
				feeBps: this.config.feeBps,
			});
		}
	}

	/** Set the reference price for a "BASE-QUOTE" pair. */
	setPrice(symbol: string, price: number): void {
		if (!(price > 0)) {
			throw new ValidationError(`Reference price for ${symbol} must be positive`, [
				{ path: ["price"], message: `got ${price}` },
			]);
		}
		this.prices.set(symbol, price);
	}

	async getQuote(request: QuoteRequest): Promise<Quote> {
		const pair = `${request.inputToken}-${request.outputToken}`;
		const reference = this.prices.get(pair);
		if (reference === undefined) {
			throw new ExecutionError(`No market for ${pair}`, { pair });
		}
		if (!(request.amount > 0)) {
			throw new ExecutionError(`Quote amount must be positive, got ${request.amount}`, { pair });
		}

		const impactPct = Decimal.from(request.amount).mul(Decimal.from(this.config.impactPctPerUnit));
		if (impactPct.cmp(Decimal.from(this.config.maxPriceImpactPct)) > 0) {
			throw new ExecutionError(`Price impact ${impactPct.toString()}% exceeds limit`, {
				pair,
				priceImpactPct: impactPct.toNumber(),
				maxPriceImpactPct: this.config.maxPriceImpactPct,
			});
		}

		const adverse = Decimal.from(this.config.slippageBps)
			.div(Decimal.from(10_000))
			.add(impactPct.div(Decimal.from(100)));
		const factor =
			request.side === Side.Buy
				? Decimal.from(1).add(adverse)
				: Decimal.from(1).sub(adverse);
		const price = Decimal.from(reference).mul(factor);
		const fee = price
			.mul(Decimal.from(request.amount))
			.mul(Decimal.from(this.config.feeBps))
			.div(Decimal.from(10_000));

		this.quoteCounter++;
		const quote: Quote = {
			...request,
			quoteId: `paper-quote-${this.quoteCounter}`,
			price: price.toNumber(),
			size: request.amount,
			fee: fee.toNumber(),
			priceImpactPct: impactPct.toNumber(),
			expiresAtMs: this.config.clock.now() + this.config.quoteTtlMs,
		};
		this.outstanding.add(quote.quoteId);
		return quote;
	}

	/** Execute a quote issued by this client. Each quote executes at most once. */
	async executeSwap(quote: Quote): Promise<SwapResult> {
		if (!this.outstanding.has(quote.quoteId)) {
			throw new ExecutionError(`Unknown or already used quote ${quote.quoteId}`, {
				quoteId: quote.quoteId,
			});
		}
		this.outstanding.delete(quote.quoteId);

		const nowMs = this.config.clock.now();
		if (nowMs > quote.expiresAtMs) {
			throw new ExecutionError(`Quote ${quote.quoteId} expired`, {
				quoteId: quote.quoteId,
				expiresAtMs: quote.expiresAtMs,
			});
		}

		this.txCounter++;
		const result: SwapResult = {
			price: quote.price,
			size: quote.size,
			fee: quote.fee,
			txId: `paper-tx-${this.txCounter}`,
		};
		this.pushSwap({ quote, result, timestampMs: nowMs });
		this.config.logger.debug(
			{ txId: result.txId, side: quote.side, price: result.price, size: result.size },
			"paper swap executed",
		);
		return result;
	}

	/** Simulated swaps in chronological order. */
	swapHistory(): readonly SwapRecord[] {
		return [...this.swaps];
	}

	private pushSwap(record: SwapRecord): void {
		if (this.swaps.length >= this.config.maxSwapHistory) {
			this.swaps.shift();
		}
		this.swaps.push(record);
	}
}

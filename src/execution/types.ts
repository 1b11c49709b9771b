/**
 * ExecutionClient: the quote/swap contract of the trading venue.
 *
 * The core treats the venue as opaque: ask for a quote on a token pair,
 * then execute exactly that quote.
 */

import type { Side } from "../shared/side.js";

export interface QuoteRequest {
	/** Base token, e.g. "SOL" of "SOL-USDC" */
	readonly inputToken: string;
	/** Quote token, e.g. "USDC" of "SOL-USDC" */
	readonly outputToken: string;
	/** Size in base-token units */
	readonly amount: number;
	readonly side: Side;
}

export interface Quote extends QuoteRequest {
	readonly quoteId: string;
	/** Expected execution price in quote-token units */
	readonly price: number;
	readonly size: number;
	readonly fee: number;
	readonly priceImpactPct: number;
	readonly expiresAtMs: number;
}

export interface SwapResult {
	readonly price: number;
	readonly size: number;
	readonly fee: number;
	readonly txId: string;
}

export interface ExecutionClient {
	getQuote(request: QuoteRequest): Promise<Quote>;
	executeSwap(quote: Quote): Promise<SwapResult>;
}

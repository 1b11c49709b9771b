export type { ExecutionClient, QuoteRequest, Quote, SwapResult } from "./types.js";
export { splitSymbol } from "./symbol.js";
export { checkSwapResult, swapResultSchema } from "./swap-result.js";
export type { TokenPair } from "./symbol.js";
export { PaperExecutionClient } from "./paper-execution-client.js";
export type { PaperExecutionClientConfig, SwapRecord } from "./paper-execution-client.js";

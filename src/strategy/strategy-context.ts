import type { Logger } from "../lib/logger/index.js";
import type { StrategyId } from "../shared/identifiers.js";
import type { Clock } from "../shared/time.js";
import type { StrategyStateKeeper } from "./strategy-state.js";

/** Sizing inputs shared by every strategy; not derived from live equity. */
export interface SizingConfig {
	readonly accountSize: number;
	/** Stop distance the risk budget assumes (0.05 = 5%) */
	readonly assumedStopLossFraction: number;
}

/** Everything a strategy instance is built with besides its own parameters. */
export interface StrategyContext {
	readonly id: StrategyId;
	readonly symbol: string;
	/** Shared with the manager, which records opened positions in it */
	readonly state: StrategyStateKeeper;
	readonly clock: Clock;
	readonly logger: Logger;
	readonly sizing: SizingConfig;
}

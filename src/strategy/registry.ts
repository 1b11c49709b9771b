import { InvalidStateError, ValidationError } from "../shared/errors.js";
import { unwrap } from "../shared/result.js";
import { MA_CROSSOVER_KIND, MaCrossoverStrategy } from "./strategies/ma-crossover.js";
import type { StrategyContext } from "./strategy-context.js";
import type { Strategy } from "./types.js";

/**
 * Builds a strategy from its context and raw parameters.
 * @throws ValidationError if the parameters are invalid
 */
export type StrategyFactory = (context: StrategyContext, params: unknown) => Strategy;

/** Strategy kind tag → factory. */
export class StrategyRegistry {
	private readonly factories = new Map<string, StrategyFactory>();

	/** @throws InvalidStateError if the kind is already registered */
	register(kind: string, factory: StrategyFactory): this {
		if (this.factories.has(kind)) {
			throw new InvalidStateError(`Strategy kind already registered: ${kind}`, { kind });
		}
		this.factories.set(kind, factory);
		return this;
	}

	has(kind: string): boolean {
		return this.factories.has(kind);
	}

	kinds(): readonly string[] {
		return [...this.factories.keys()].sort();
	}

	/** @throws ValidationError for an unknown kind or invalid parameters */
	create(kind: string, context: StrategyContext, params: unknown): Strategy {
		const factory = this.factories.get(kind);
		if (factory === undefined) {
			throw new ValidationError(`Unknown strategy kind: ${kind}`, [
				{ path: ["kind"], message: `expected one of: ${this.kinds().join(", ")}` },
			]);
		}
		return factory(context, params);
	}
}

/** Registry with every built-in strategy. */
export function createDefaultRegistry(): StrategyRegistry {
	return new StrategyRegistry().register(MA_CROSSOVER_KIND, (context, params) =>
		unwrap(MaCrossoverStrategy.create(context, params)),
	);
}

import { ValidationError, type ValidationIssue } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Signal, Strategy } from "./types.js";

/**
 * Generic checks every signal passes before it reaches the engine:
 * positive price and size, not expired, then the strategy's own hook.
 */
export function validateSignal(
	strategy: Pick<Strategy, "validateSignal">,
	signal: Signal,
	nowMs: number,
): Result<Signal, ValidationError> {
	const issues: ValidationIssue[] = [];
	if (!(signal.price > 0)) {
		issues.push({ path: ["price"], message: `must be positive, got ${signal.price}` });
	}
	if (!(signal.size > 0)) {
		issues.push({ path: ["size"], message: `must be positive, got ${signal.size}` });
	}
	if (signal.expiryMs !== null && signal.expiryMs < nowMs) {
		issues.push({ path: ["expiryMs"], message: "signal has expired" });
	}
	if (issues.length > 0) {
		return err(new ValidationError(`Signal from ${signal.strategyId} rejected`, issues));
	}

	if (strategy.validateSignal !== undefined && !strategy.validateSignal(signal)) {
		return err(
			new ValidationError(`Signal from ${signal.strategyId} vetoed by strategy`, [
				{ path: [], message: "strategy-specific validation failed" },
			]),
		);
	}
	return ok(signal);
}

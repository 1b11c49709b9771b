import { formatIssues, validate, z } from "../lib/validation/index.js";
import { ExecutionError } from "../shared/errors.js";
import type { SwapResult } from "./types.js";

export const swapResultSchema = z.object({
	price: z.number().positive().finite(),
	size: z.number().positive().finite(),
	fee: z.number().min(0).finite(),
	txId: z.string().min(1),
});

/**
 * Venue fills are checked before they reach the ledgers; a record the
 * codecs would refuse to read back is never written.
 * @throws ExecutionError naming the offending fields
 */
export function checkSwapResult(result: unknown): SwapResult {
	const checked = validate(swapResultSchema, result, "Invalid swap result");
	if (checked.ok) return checked.value;
	throw new ExecutionError(`Invalid swap result: ${formatIssues(checked.error.issues)}`, {
		cause: checked.error,
	});
}

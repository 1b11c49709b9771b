/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Stored records, configuration and strategy parameters are all decoded
 * through validate(). Re-exports `z` so schemas are built from one import path.
 */

import { z } from "zod";
import { ValidationError, type ValidationIssue } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };
export { ValidationError };
export type { ValidationIssue };

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	message = "Validation failed",
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError(message, issues));
}

/** Render issues as `path: message` lines for logs and error text. */
export function formatIssues(issues: readonly ValidationIssue[]): string {
	return issues
		.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
		.join("; ");
}

/**
 * TradingError hierarchy: structured error classification.
 *
 * Every error has a category (retryable, non-retryable, fatal). The core
 * never retries on its own; the category tells callers what a retry could
 * achieve and tells the system which failures end the operation.
 */

/** Error severity categories. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing TradingError subclasses with optional cause chain. */
interface TradingErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for all core operations. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error containing one or more validation issues. */
export class ValidationError extends TradingError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[] = []) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, { issues });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Lookup of an order, trade, position or strategy found nothing. */
export class NotFoundError extends TradingError {
	readonly entity: string;
	readonly id: string;

	constructor(entity: string, id: string, context: Record<string, unknown> = {}) {
		super(`${entity} not found: ${id}`, "NOT_FOUND", ErrorCategory.NonRetryable, {
			entity,
			id,
			...context,
		});
		this.name = "NotFoundError";
		this.entity = entity;
		this.id = id;
	}
}

/** Operation attempted against an entity in a terminal or incompatible state. */
export class InvalidStateError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_STATE", ErrorCategory.NonRetryable, rest);
		this.name = "InvalidStateError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** The execution client failed to quote or swap. The triggering order is marked failed. */
export class ExecutionError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "EXECUTION_FAILED", ErrorCategory.Retryable, rest);
		this.name = "ExecutionError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** The backing state store could not be reached. Fatal for the operation in progress. */
export class StoreUnavailableError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "STORE_UNAVAILABLE", ErrorCategory.Fatal, rest);
		this.name = "StoreUnavailableError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/** Normalize anything thrown into a TradingError; existing TradingErrors pass through. */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (error instanceof Error) {
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

/** Human-readable message for any thrown value. */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

// ── Type guards ──────────────────────────────────────────────────────

export function isValidationError(e: unknown): e is ValidationError {
	return e instanceof ValidationError;
}

export function isNotFoundError(e: unknown): e is NotFoundError {
	return e instanceof NotFoundError;
}

export function isInvalidStateError(e: unknown): e is InvalidStateError {
	return e instanceof InvalidStateError;
}

export function isExecutionError(e: unknown): e is ExecutionError {
	return e instanceof ExecutionError;
}

export function isStoreUnavailableError(e: unknown): e is StoreUnavailableError {
	return e instanceof StoreUnavailableError;
}

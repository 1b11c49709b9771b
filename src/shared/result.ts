/**
 * Outcome of a pure domain check.
 *
 * Status transitions, signal validation and record decoding return one of
 * these instead of throwing. The ledgers and the engine unwrap at their
 * boundary, so callers further out only ever see a thrown TradingError.
 */

import type { TradingError } from "./errors.js";

export interface Ok<T> {
	readonly ok: true;
	readonly value: T;
}

export interface Err<E extends TradingError> {
	readonly ok: false;
	readonly error: E;
}

export type Result<T, E extends TradingError = TradingError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
	return { ok: true, value };
}

export function err<E extends TradingError>(error: E): Err<E> {
	return { ok: false, error };
}

export const isOk = <T, E extends TradingError>(result: Result<T, E>): result is Ok<T> =>
	result.ok;

export const isErr = <T, E extends TradingError>(result: Result<T, E>): result is Err<E> =>
	!result.ok;

/** The carried value, or the carried error thrown as is. */
export function unwrap<T, E extends TradingError>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error;
}

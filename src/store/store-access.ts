import type { Logger } from "../lib/logger/index.js";
import { StoreUnavailableError, errorMessage } from "../shared/errors.js";
import type { StateStore, StoreValue } from "./types.js";

/**
 * Read one key, surfacing any backend failure as StoreUnavailableError.
 */
export async function readRecord(
	store: StateStore,
	key: string,
	logger: Logger,
): Promise<StoreValue | null> {
	try {
		return await store.get(key);
	} catch (error: unknown) {
		logger.error({ key, error: errorMessage(error) }, "store read failed");
		throw new StoreUnavailableError(`Store read failed for ${key}`, { key, cause: error });
	}
}

/**
 * Write one key. A thrown error and a refused write (false) both surface
 * as StoreUnavailableError.
 */
export async function writeRecord(
	store: StateStore,
	key: string,
	value: StoreValue,
	logger: Logger,
): Promise<void> {
	let accepted: boolean;
	try {
		accepted = await store.set(key, value);
	} catch (error: unknown) {
		logger.error({ key, error: errorMessage(error) }, "store write failed");
		throw new StoreUnavailableError(`Store write failed for ${key}`, { key, cause: error });
	}
	if (!accepted) {
		logger.error({ key }, "store refused write");
		throw new StoreUnavailableError(`Store rejected write for ${key}`, { key });
	}
}

export type { StateStore, StoreValue } from "./types.js";
export { orderKey, tradeKey, positionKey, strategyStateKey } from "./types.js";
export { MemoryStateStore } from "./memory-store.js";
export type { MemoryStateStoreOptions } from "./memory-store.js";
export { FileStateStore } from "./file-store.js";
export type { FileStateStoreConfig, CorruptLine, RestoreResult } from "./file-store.js";
export { readRecord, writeRecord } from "./store-access.js";

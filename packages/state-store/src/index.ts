/**
 * @escrowhook/state-store: Durable keyed record storage.
 *
 * Backs the trade store and the dead-letter queue. Two implementations
 * share one contract (atomic keyed read/write, list, update):
 * - InMemoryRecordStore for tests and development
 * - JsonlRecordStore for durable, crash-tolerant storage on disk
 */

export type {
  StoredRecord,
  ExpectedVersion,
  PutOptions,
  ListOptions,
  Updater,
  RecordStore,
  StoreErrorCode,
} from "./types.js";
export { StoreError } from "./types.js";

export { InMemoryRecordStore } from "./in-memory-store.js";

export { JsonlRecordStore } from "./jsonl-store.js";
export type { JsonlRecordStoreOptions } from "./jsonl-store.js";

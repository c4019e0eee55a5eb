/**
 * @escrowhook/state-store: In-memory RecordStore implementation.
 *
 * Suitable for:
 * - Unit and integration tests
 * - Development without a data directory
 *
 * Not suitable for production (all state lost on process exit).
 */

import type {
  ListOptions,
  PutOptions,
  RecordStore,
  StoredRecord,
  Updater,
} from "./types.js";
import { applyListOptions, checkExpectedVersion, validateKey } from "./types.js";

export class InMemoryRecordStore<T> implements RecordStore<T> {
  /** Map iteration order is first-insertion order */
  private readonly _records = new Map<string, StoredRecord<T>>();

  get(key: string): StoredRecord<T> | undefined {
    validateKey(key);
    return this._records.get(key);
  }

  put(key: string, value: T, options?: PutOptions): StoredRecord<T> {
    validateKey(key);

    const current = this._records.get(key);
    const currentVersion = current?.version ?? 0;
    checkExpectedVersion(key, currentVersion, options?.expectedVersion);

    const record: StoredRecord<T> = {
      key,
      value,
      version: currentVersion + 1,
      updatedAt: new Date().toISOString(),
    };
    this._records.set(key, record);
    return record;
  }

  update(key: string, updater: Updater<T>): StoredRecord<T> {
    const current = this.get(key);
    const next = updater(current?.value);
    return this.put(key, next, {
      expectedVersion: current?.version ?? "no_record",
    });
  }

  list(options?: ListOptions<T>): readonly StoredRecord<T>[] {
    return applyListOptions([...this._records.values()], options);
  }

  has(key: string): boolean {
    return this._records.has(key);
  }

  get size(): number {
    return this._records.size;
  }

  clear(): void {
    this._records.clear();
  }
}

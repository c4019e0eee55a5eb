/**
 * @escrowhook/state-store: Core types.
 *
 * A keyed record store with per-key versions.
 *
 * Design principles:
 * - Every write produces a new version of the record (1-based)
 * - Writes can be conditioned on the version the caller read
 *   (optimistic concurrency, no locks)
 * - update() is an atomic read-modify-write on a single key
 * - Records are never deleted through this interface
 */

// =============================================================================
// Stored Record
// =============================================================================

export interface StoredRecord<T> {
  readonly key: string;
  readonly value: T;

  /** Monotonically increasing per key, starting at 1 */
  readonly version: number;

  /** When this version was written */
  readonly updatedAt: string;
}

// =============================================================================
// Write Options
// =============================================================================

/**
 * Expected version for optimistic concurrency control.
 *
 * - A number: the record must be at exactly this version before the write
 * - "no_record": the key must not exist yet
 * - "any": no concurrency check
 */
export type ExpectedVersion = number | "no_record" | "any";

export interface PutOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface ListOptions<T> {
  /** Keep only records whose value matches */
  readonly filter?: ((value: T) => boolean) | undefined;

  /** Maximum number of records to return */
  readonly limit?: number | undefined;
}

/**
 * Read-modify-write callback.
 *
 * Receives the current value (undefined when the key is new) and returns
 * the value to store.
 */
export type Updater<T> = (current: T | undefined) => T;

// =============================================================================
// Record Store Interface
// =============================================================================

/**
 * Durable keyed store used for trades and dead-letter entries.
 *
 * Invariants:
 * - Versions per key are contiguous (1, 2, 3, ...)
 * - A conditional write against a stale version never lands
 * - A record visible after a write survives a restart (durable backends)
 */
export interface RecordStore<T> {
  get(key: string): StoredRecord<T> | undefined;

  /**
   * Write a new version of a record.
   *
   * @throws StoreError CONCURRENCY_CONFLICT if expectedVersion does not match
   */
  put(key: string, value: T, options?: PutOptions): StoredRecord<T>;

  /**
   * Atomically read, transform and write one record.
   *
   * @throws StoreError CONCURRENCY_CONFLICT if the record moved underneath
   */
  update(key: string, updater: Updater<T>): StoredRecord<T>;

  /** Records in first-write order */
  list(options?: ListOptions<T>): readonly StoredRecord<T>[];

  has(key: string): boolean;

  readonly size: number;
}

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_KEY"
  | "STORE_UNAVAILABLE";

export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly key?: string,
  ) {
    super(message);
    this.name = "StoreError";
  }
}

// =============================================================================
// Shared checks
// =============================================================================

export function validateKey(key: string): void {
  if (key.length === 0) {
    throw new StoreError("INVALID_KEY", "Record key must be a non-empty string");
  }
}

/**
 * Throw CONCURRENCY_CONFLICT unless the current version satisfies
 * the expectation. `currentVersion` is 0 for a missing key.
 */
export function checkExpectedVersion(
  key: string,
  currentVersion: number,
  expected: ExpectedVersion | undefined,
): void {
  if (expected === undefined || expected === "any") {
    return;
  }

  if (expected === "no_record") {
    if (currentVersion !== 0) {
      throw new StoreError(
        "CONCURRENCY_CONFLICT",
        `Record "${key}" already exists (version ${currentVersion}), expected no_record`,
        key,
      );
    }
    return;
  }

  if (currentVersion !== expected) {
    throw new StoreError(
      "CONCURRENCY_CONFLICT",
      `Record "${key}" is at version ${currentVersion}, expected ${expected}`,
      key,
    );
  }
}

/**
 * Apply list() options to records already in first-write order.
 */
export function applyListOptions<T>(
  records: readonly StoredRecord<T>[],
  options?: ListOptions<T>,
): readonly StoredRecord<T>[] {
  const filter = options?.filter;
  let result = filter !== undefined
    ? records.filter((r) => filter(r.value))
    : [...records];

  const limit = options?.limit;
  if (limit !== undefined && limit >= 0) {
    result = result.slice(0, limit);
  }

  return result;
}

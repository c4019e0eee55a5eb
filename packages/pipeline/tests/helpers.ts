/**
 * Test helpers for @escrowhook/pipeline.
 */

import type { ConfirmationEvent } from "@escrowhook/types";
import {
  InMemoryRecordStore,
  StoreError,
} from "@escrowhook/state-store";
import type {
  ListOptions,
  PutOptions,
  RecordStore,
  StoredRecord,
  Updater,
} from "@escrowhook/state-store";

let eventCounter = 0;

export function makeEvent(overrides: Partial<ConfirmationEvent> = {}): ConfirmationEvent {
  eventCounter++;
  return {
    eventId: `evt-${eventCounter}`,
    tradeId: "T1",
    network: "btc",
    txHash: "tx-1",
    confirmationCount: 1,
    eventType: "confirmation",
    timestamp: "2026-03-01T00:00:00.000Z",
    data: {},
    retryCount: 0,
    ...overrides,
  };
}

/**
 * Manually advanced clock.
 */
export function manualClock(start = "2026-03-01T00:00:00.000Z") {
  let now = Date.parse(start);
  return {
    clock: () => new Date(now),
    advance: (ms: number) => {
      now += ms;
    },
  };
}

/**
 * RecordStore whose writes can be made to fail.
 *
 * - `down = true` fails every write
 * - `failWrites(n)` fails the next n writes
 */
export class FlakyRecordStore<T> implements RecordStore<T> {
  down = false;
  private readonly _inner = new InMemoryRecordStore<T>();
  private _failuresLeft = 0;

  failWrites(n: number): void {
    this._failuresLeft = n;
  }

  get(key: string): StoredRecord<T> | undefined {
    return this._inner.get(key);
  }

  put(key: string, value: T, options?: PutOptions): StoredRecord<T> {
    this._maybeFail(key);
    return this._inner.put(key, value, options);
  }

  update(key: string, updater: Updater<T>): StoredRecord<T> {
    this._maybeFail(key);
    return this._inner.update(key, updater);
  }

  list(options?: ListOptions<T>): readonly StoredRecord<T>[] {
    return this._inner.list(options);
  }

  has(key: string): boolean {
    return this._inner.has(key);
  }

  get size(): number {
    return this._inner.size;
  }

  private _maybeFail(key: string): void {
    if (this.down) {
      throw new StoreError("STORE_UNAVAILABLE", "Store is down", key);
    }
    if (this._failuresLeft > 0) {
      this._failuresLeft--;
      throw new StoreError("STORE_UNAVAILABLE", "Store is down", key);
    }
  }
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e: unknown) {
    return e;
  }
  return undefined;
}

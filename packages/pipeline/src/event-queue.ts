/**
 * @escrowhook/pipeline: Bounded in-process event queue.
 *
 * Hand-off between webhook handlers (producers) and the event
 * processor (single consumer).
 *
 * - FIFO
 * - Bounded: tryEnqueue never waits; a full queue is reported so the
 *   receiver can signal backpressure (503) instead of dropping
 * - dequeue() suspends while empty
 * - After close(), no new events are accepted; events already queued
 *   are still handed out, then dequeue() resolves undefined
 */

import type { ConfirmationEvent, Result } from "@escrowhook/types";
import { err, ok } from "@escrowhook/types";

export type QueueErrorCode = "QUEUE_FULL" | "QUEUE_CLOSED";

export class QueueError extends Error {
  constructor(
    public readonly code: QueueErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "QueueError";
  }
}

export const DEFAULT_QUEUE_CAPACITY = 1000;

type Waiter = (event: ConfirmationEvent | undefined) => void;

export class EventQueue {
  private readonly _items: ConfirmationEvent[] = [];
  private readonly _waiters: Waiter[] = [];
  private readonly _capacity: number;
  private _closed = false;

  constructor(capacity: number = DEFAULT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Queue capacity must be an integer >= 1, got ${capacity}`);
    }
    this._capacity = capacity;
  }

  /**
   * Add an event without waiting.
   *
   * @returns The queue depth after the enqueue, or QUEUE_FULL / QUEUE_CLOSED
   */
  tryEnqueue(event: ConfirmationEvent): Result<number, QueueError> {
    if (this._closed) {
      return err(new QueueError("QUEUE_CLOSED", "Event queue is closed"));
    }

    // A waiting consumer means the buffer is empty: hand over directly
    const waiter = this._waiters.shift();
    if (waiter !== undefined) {
      waiter(event);
      return ok(0);
    }

    if (this._items.length >= this._capacity) {
      return err(
        new QueueError("QUEUE_FULL", `Event queue is at capacity (${this._capacity})`),
      );
    }

    this._items.push(event);
    return ok(this._items.length);
  }

  /**
   * Take the oldest event, waiting while the queue is empty.
   *
   * Resolves undefined once the queue is closed and drained.
   */
  dequeue(): Promise<ConfirmationEvent | undefined> {
    const next = this._items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this._closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this._waiters.push(resolve);
    });
  }

  /**
   * Stop accepting events. Idle consumers are released.
   */
  close(): void {
    if (this._closed) {
      return;
    }
    this._closed = true;
    for (const waiter of this._waiters.splice(0)) {
      waiter(undefined);
    }
  }

  get size(): number {
    return this._items.length;
  }

  get capacity(): number {
    return this._capacity;
  }

  get isClosed(): boolean {
    return this._closed;
  }
}

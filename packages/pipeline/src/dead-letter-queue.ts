/**
 * DeadLetterQueue: durable holding area for events whose retries ran out.
 *
 * Entries are keyed by eventId: adding the same event again updates the
 * existing entry. Entries are never deleted here; they move between
 * open → superseded (replayed) → resolved, and a replay that fails again
 * reopens the entry.
 */

import type { RecordStore } from "@escrowhook/state-store";
import type {
  ConfirmationEvent,
  DeadLetterEntry,
  Network,
  Result,
} from "@escrowhook/types";
import type { QueueError } from "./event-queue.js";

// =============================================================================
// Errors
// =============================================================================

export type DeadLetterErrorCode =
  | "DLQ_ENTRY_NOT_FOUND"
  | "DLQ_ENTRY_RESOLVED"
  | "QUEUE_FULL"
  | "QUEUE_CLOSED";

export class DeadLetterError extends Error {
  constructor(
    public readonly code: DeadLetterErrorCode,
    message: string,
    public readonly eventId?: string,
  ) {
    super(message);
    this.name = "DeadLetterError";
  }
}

// =============================================================================
// Queries
// =============================================================================

export interface DeadLetterListQuery {
  readonly network?: Network | undefined;
  readonly limit?: number | undefined;
  /** Include resolved entries. Default: false */
  readonly includeResolved?: boolean | undefined;
}

export type EnqueueFn = (event: ConfirmationEvent) => Result<number, QueueError>;

export const REPLAY_RESOLUTION_NOTE = "Resolved by successful replay";

// =============================================================================
// DeadLetterQueue
// =============================================================================

export class DeadLetterQueue {
  private readonly _store: RecordStore<DeadLetterEntry>;
  private readonly _clock: () => Date;

  constructor(store: RecordStore<DeadLetterEntry>, clock: () => Date = () => new Date()) {
    this._store = store;
    this._clock = clock;
  }

  /**
   * Insert a failed event, or update its entry in place.
   */
  add(event: ConfirmationEvent, error: Error | string, retryCount: number): DeadLetterEntry {
    const now = this._clock().toISOString();
    const errorMessage = typeof error === "string" ? error : error.message;

    const record = this._store.update(event.eventId, (current) => {
      if (current === undefined) {
        return {
          eventId: event.eventId,
          tradeId: event.tradeId,
          network: event.network,
          errorMessage,
          retryCount,
          event,
          status: "open",
          firstFailedAt: now,
          lastFailedAt: now,
          failureCount: 1,
          replayCount: 0,
        };
      }
      return {
        ...current,
        errorMessage,
        retryCount,
        event,
        status: "open",
        lastFailedAt: now,
        failureCount: current.failureCount + 1,
        resolvedAt: undefined,
        resolutionNotes: undefined,
      };
    });

    return record.value;
  }

  get(eventId: string): DeadLetterEntry | undefined {
    return this._store.get(eventId)?.value;
  }

  /**
   * Unresolved entries, newest failure first.
   */
  list(query: DeadLetterListQuery = {}): readonly DeadLetterEntry[] {
    const includeResolved = query.includeResolved === true;
    const network = query.network;

    const entries = this._store
      .list({
        filter: (e) =>
          (includeResolved || e.status !== "resolved") &&
          (network === undefined || e.network === network),
      })
      .map((r) => r.value)
      .reverse();

    // Stable sort: equal timestamps keep the most recently written first
    entries.sort((a, b) => b.lastFailedAt.localeCompare(a.lastFailedAt));

    const limit = query.limit;
    return limit !== undefined && limit >= 0 ? entries.slice(0, limit) : entries;
  }

  count(query: Pick<DeadLetterListQuery, "includeResolved"> = {}): number {
    return this.list({ includeResolved: query.includeResolved }).length;
  }

  /**
   * Close an entry by hand. The record is kept for audit.
   * Resolving an already resolved entry returns it unchanged.
   */
  resolve(eventId: string, notes: string): DeadLetterEntry {
    const existing = this._require(eventId);
    if (existing.status === "resolved") {
      return existing;
    }

    const now = this._clock().toISOString();
    return this._store.put(
      eventId,
      { ...existing, status: "resolved", resolvedAt: now, resolutionNotes: notes },
      { expectedVersion: this._version(eventId) },
    ).value;
  }

  /**
   * Mark the entry superseded, then re-enqueue the original event.
   *
   * The status is written before the event is handed to the queue, so a
   * replayed event that applies always finds a superseded entry to
   * resolve (markReplaySucceeded). When the queue refuses the event the
   * previous entry is restored.
   */
  replay(eventId: string, enqueue: EnqueueFn): DeadLetterEntry {
    const existing = this._require(eventId);
    if (existing.status === "resolved") {
      throw new DeadLetterError(
        "DLQ_ENTRY_RESOLVED",
        `Dead-letter entry '${eventId}' is already resolved`,
        eventId,
      );
    }

    const superseded = this._store.put(
      eventId,
      { ...existing, status: "superseded", replayCount: existing.replayCount + 1 },
      { expectedVersion: this._version(eventId) },
    );

    const enqueued = enqueue({ ...existing.event, retryCount: 0 });
    if (!enqueued.ok) {
      this._store.put(eventId, existing, { expectedVersion: superseded.version });
      throw new DeadLetterError(enqueued.error.code, enqueued.error.message, eventId);
    }

    return superseded.value;
  }

  /**
   * Called once a replayed event has applied.
   *
   * @returns The resolved entry, or undefined when there was nothing to resolve
   */
  markReplaySucceeded(eventId: string): DeadLetterEntry | undefined {
    const existing = this._store.get(eventId)?.value;
    if (existing === undefined || existing.status !== "superseded") {
      return undefined;
    }

    const now = this._clock().toISOString();
    return this._store.put(
      eventId,
      {
        ...existing,
        status: "resolved",
        resolvedAt: now,
        resolutionNotes: REPLAY_RESOLUTION_NOTE,
      },
      { expectedVersion: this._version(eventId) },
    ).value;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _require(eventId: string): DeadLetterEntry {
    const existing = this._store.get(eventId)?.value;
    if (existing === undefined) {
      throw new DeadLetterError(
        "DLQ_ENTRY_NOT_FOUND",
        `No dead-letter entry for event '${eventId}'`,
        eventId,
      );
    }
    return existing;
  }

  private _version(eventId: string): number {
    return this._store.get(eventId)?.version ?? 0;
  }
}

/**
 * TradeRepository: durable trade state over a RecordStore.
 *
 * Each mutation is a read-modify-write on a single key, committed with
 * the version that was read. A concurrent writer makes the commit fail
 * with CONCURRENCY_CONFLICT rather than overwrite.
 */

import type { RecordStore } from "@escrowhook/state-store";
import type { ConfirmationEvent, Trade, TradeStatus } from "@escrowhook/types";
import { applyConfirmation, markFailed } from "./state-machine.js";
import type { ApplyContext, ApplyResult, TransitionRecord } from "./state-machine.js";

export interface TradeListQuery {
  readonly status?: TradeStatus | undefined;
  readonly limit?: number | undefined;
}

export class TradeRepository {
  private readonly _store: RecordStore<Trade>;

  constructor(store: RecordStore<Trade>) {
    this._store = store;
  }

  get(tradeId: string): Trade | undefined {
    return this._store.get(tradeId)?.value;
  }

  /**
   * Apply an event and persist the result.
   *
   * Duplicates are detected before writing and leave the store untouched.
   */
  apply(event: ConfirmationEvent, ctx: ApplyContext): ApplyResult {
    const current = this._store.get(event.tradeId);
    const result = applyConfirmation(current?.value, event, ctx);

    if (!result.duplicate) {
      this._store.put(event.tradeId, result.trade, {
        expectedVersion: current?.version ?? "no_record",
      });
    }

    return result;
  }

  /**
   * Mark a trade failed. An unknown trade is created directly in the
   * failed state so the failure is on record.
   */
  markFailed(
    tradeId: string,
    reason: string,
    now: string,
  ): { readonly trade: Trade; readonly transitions: readonly TransitionRecord[] } {
    const current = this._store.get(tradeId);
    const base: Trade = current?.value ?? {
      tradeId,
      status: "pending",
      confirmations: 0,
      createdAt: now,
      events: [],
    };

    const result = markFailed(base, reason, now);
    if (result.transitions.length > 0) {
      this._store.put(tradeId, result.trade, {
        expectedVersion: current?.version ?? "no_record",
      });
    }
    return result;
  }

  list(query: TradeListQuery = {}): readonly Trade[] {
    const status = query.status;
    return this._store
      .list({
        filter: status !== undefined ? (t) => t.status === status : undefined,
        limit: query.limit,
      })
      .map((r) => r.value);
  }

  countByStatus(): Record<TradeStatus, number> {
    const counts: Record<TradeStatus, number> = {
      pending: 0,
      confirmed: 0,
      completed: 0,
      failed: 0,
    };
    for (const record of this._store.list()) {
      counts[record.value.status]++;
    }
    return counts;
  }
}

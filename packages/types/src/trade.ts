/**
 * Trade aggregate.
 *
 * A trade accumulates confirmations until it is considered settled.
 *
 *   pending → confirmed → completed
 *   (any non-terminal) → failed
 *
 * `confirmations` never decreases. `confirmedAt` and `completedAt` are
 * written once and never rewritten.
 */

import type { ConfirmationEventType } from "./event.js";

export type TradeStatus = "pending" | "confirmed" | "completed" | "failed";

/**
 * How an event affected the trade when it was recorded.
 *
 * - applied: the event was evaluated by the state machine
 * - stale:   a lower confirmation count arriving after a higher one
 * - late:    the trade was already terminal; kept for audit only
 */
export type EventOutcome = "applied" | "stale" | "late";

export interface TradeEventSummary {
  readonly eventId: string;
  readonly txHash: string;
  readonly confirmationCount: number;
  readonly eventType: ConfirmationEventType;
  readonly timestamp: string;
  readonly appliedAt: string;
  readonly outcome: EventOutcome;
  /** SHA-256 over the canonical (txHash, confirmationCount, eventType) */
  readonly fingerprint: string;
}

export interface Trade {
  readonly tradeId: string;
  readonly status: TradeStatus;
  /** Highest confirmation count observed */
  readonly confirmations: number;
  readonly createdAt: string;
  readonly confirmedAt?: string | undefined;
  readonly completedAt?: string | undefined;
  readonly failedAt?: string | undefined;
  readonly failureReason?: string | undefined;
  /** Append-only audit history */
  readonly events: readonly TradeEventSummary[];
}

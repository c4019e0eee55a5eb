/**
 * Trade confirmation state machine.
 *
 * Pure functions: no I/O, no clock reads. The caller supplies `now`.
 *
 *   pending ──(confirmations ≥ threshold)──▶ confirmed
 *   confirmed ──(final_confirmation event)──▶ completed
 *   pending | confirmed ──(markFailed)──▶ failed
 *
 * Rules:
 * - confirmations is the max ever observed (never decreases)
 * - confirmedAt / completedAt are written once
 * - only a final_confirmation event completes a trade, and only once the
 *   trade is confirmed; a final_confirmation below the threshold updates
 *   confirmations and leaves the trade pending
 * - completed and failed are terminal; later events are logged as "late"
 * - an event already in the history (same eventId, or same fingerprint)
 *   is a no-op
 */

import type {
  ConfirmationEvent,
  EventOutcome,
  Trade,
  TradeEventSummary,
  TradeStatus,
} from "@escrowhook/types";
import { eventFingerprint } from "./fingerprint.js";

// =============================================================================
// Errors
// =============================================================================

export type TradeStateErrorCode =
  | "TRADE_MISMATCH"
  | "INVALID_THRESHOLD"
  | "INVALID_TRANSITION";

export class TradeStateError extends Error {
  constructor(
    public readonly code: TradeStateErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "TradeStateError";
  }
}

// =============================================================================
// Transitions
// =============================================================================

export const TRADE_TRANSITIONS: Record<TradeStatus, readonly TradeStatus[]> = {
  pending: ["confirmed", "failed"],
  confirmed: ["completed", "failed"],
  completed: [],
  failed: [],
};

export const DEFAULT_CONFIRMATION_THRESHOLD = 3;

export function canTransition(from: TradeStatus, to: TradeStatus): boolean {
  return TRADE_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: TradeStatus): boolean {
  return TRADE_TRANSITIONS[status].length === 0;
}

/**
 * Record a status change, rejecting any move the transition table does
 * not list.
 */
export function recordTransition(
  transitions: TransitionRecord[],
  from: TradeStatus,
  to: TradeStatus,
): TradeStatus {
  if (!canTransition(from, to)) {
    throw new TradeStateError(
      "INVALID_TRANSITION",
      `Cannot transition trade from '${from}' to '${to}'`,
    );
  }
  transitions.push({ from, to });
  return to;
}

export function validateThreshold(threshold: number): void {
  if (!Number.isInteger(threshold) || threshold < 1) {
    throw new TradeStateError(
      "INVALID_THRESHOLD",
      `Confirmation threshold must be an integer >= 1, got ${threshold}`,
    );
  }
}

// =============================================================================
// Apply
// =============================================================================

export interface TransitionRecord {
  readonly from: TradeStatus;
  readonly to: TradeStatus;
}

export interface ApplyContext {
  readonly threshold: number;
  /** ISO-8601 */
  readonly now: string;
}

export interface ApplyResult {
  readonly trade: Trade;
  /** True when the event was already applied; `trade` is unchanged */
  readonly duplicate: boolean;
  readonly transitions: readonly TransitionRecord[];
}

export function createTrade(tradeId: string, now: string): Trade {
  return {
    tradeId,
    status: "pending",
    confirmations: 0,
    createdAt: now,
    events: [],
  };
}

function summarize(
  event: ConfirmationEvent,
  fingerprint: string,
  outcome: EventOutcome,
  now: string,
): TradeEventSummary {
  return {
    eventId: event.eventId,
    txHash: event.txHash,
    confirmationCount: event.confirmationCount,
    eventType: event.eventType,
    timestamp: event.timestamp,
    appliedAt: now,
    outcome,
    fingerprint,
  };
}

/**
 * Apply one confirmation event to a trade (or to a new trade when
 * `current` is undefined).
 */
export function applyConfirmation(
  current: Trade | undefined,
  event: ConfirmationEvent,
  ctx: ApplyContext,
): ApplyResult {
  validateThreshold(ctx.threshold);

  const trade = current ?? createTrade(event.tradeId, ctx.now);
  if (trade.tradeId !== event.tradeId) {
    throw new TradeStateError(
      "TRADE_MISMATCH",
      `Event ${event.eventId} is for trade '${event.tradeId}', not '${trade.tradeId}'`,
    );
  }

  const fingerprint = eventFingerprint(event);
  const seen = trade.events.some(
    (e) => e.eventId === event.eventId || e.fingerprint === fingerprint,
  );
  if (seen) {
    return { trade, duplicate: true, transitions: [] };
  }

  if (isTerminal(trade.status)) {
    return {
      trade: {
        ...trade,
        events: [...trade.events, summarize(event, fingerprint, "late", ctx.now)],
      },
      duplicate: false,
      transitions: [],
    };
  }

  const outcome: EventOutcome =
    event.confirmationCount < trade.confirmations ? "stale" : "applied";
  const confirmations = Math.max(trade.confirmations, event.confirmationCount);

  const transitions: TransitionRecord[] = [];
  let status = trade.status;
  let confirmedAt = trade.confirmedAt;
  let completedAt = trade.completedAt;

  if (status === "pending" && confirmations >= ctx.threshold) {
    status = recordTransition(transitions, status, "confirmed");
    confirmedAt = confirmedAt ?? ctx.now;
  }

  if (status === "confirmed" && event.eventType === "final_confirmation") {
    status = recordTransition(transitions, status, "completed");
    completedAt = completedAt ?? ctx.now;
  }

  return {
    trade: {
      ...trade,
      status,
      confirmations,
      confirmedAt,
      completedAt,
      events: [...trade.events, summarize(event, fingerprint, outcome, ctx.now)],
    },
    duplicate: false,
    transitions,
  };
}

// =============================================================================
// Failure
// =============================================================================

/**
 * Move a non-terminal trade to failed. Confirmation data is kept.
 * Terminal trades are returned unchanged.
 */
export function markFailed(
  trade: Trade,
  reason: string,
  now: string,
): { readonly trade: Trade; readonly transitions: readonly TransitionRecord[] } {
  if (isTerminal(trade.status)) {
    return { trade, transitions: [] };
  }
  const transitions: TransitionRecord[] = [];
  const status = recordTransition(transitions, trade.status, "failed");
  return {
    trade: {
      ...trade,
      status,
      failedAt: now,
      failureReason: reason,
    },
    transitions,
  };
}

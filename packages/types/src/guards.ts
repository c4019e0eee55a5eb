/**
 * Runtime Type Guards
 *
 * Narrowing functions for escrowhook domain types.
 * Used where records cross a trust boundary: reloaded from disk,
 * read from an operator request, or handed in by a collaborator.
 */

import type { Network } from "./network.js";
import type { ConfirmationEvent, ConfirmationEventType } from "./event.js";
import type { Trade, TradeEventSummary, TradeStatus } from "./trade.js";
import type { DeadLetterEntry, DeadLetterStatus } from "./dead-letter.js";

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === "string";
}

// =============================================================================
// Enums
// =============================================================================

const NETWORK_SET = new Set<string>(["eth", "btc", "sol", "ltc"]);
const EVENT_TYPES = new Set<string>(["confirmation", "final_confirmation"]);
const TRADE_STATUSES = new Set<string>(["pending", "confirmed", "completed", "failed"]);
const DEAD_LETTER_STATUSES = new Set<string>(["open", "superseded", "resolved"]);
const EVENT_OUTCOMES = new Set<string>(["applied", "stale", "late"]);

export function isNetwork(value: unknown): value is Network {
  return typeof value === "string" && NETWORK_SET.has(value);
}

export function isConfirmationEventType(value: unknown): value is ConfirmationEventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}

export function isTradeStatus(value: unknown): value is TradeStatus {
  return typeof value === "string" && TRADE_STATUSES.has(value);
}

export function isDeadLetterStatus(value: unknown): value is DeadLetterStatus {
  return typeof value === "string" && DEAD_LETTER_STATUSES.has(value);
}

// =============================================================================
// Events
// =============================================================================

export function isConfirmationEvent(value: unknown): value is ConfirmationEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    value.eventId.length > 0 &&
    typeof value.tradeId === "string" &&
    value.tradeId.length > 0 &&
    isNetwork(value.network) &&
    typeof value.txHash === "string" &&
    isNonNegativeInteger(value.confirmationCount) &&
    isConfirmationEventType(value.eventType) &&
    typeof value.timestamp === "string" &&
    isRecord(value.data) &&
    isNonNegativeInteger(value.retryCount)
  );
}

// =============================================================================
// Trades
// =============================================================================

function isTradeEventSummary(value: unknown): value is TradeEventSummary {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.txHash === "string" &&
    isNonNegativeInteger(value.confirmationCount) &&
    isConfirmationEventType(value.eventType) &&
    typeof value.timestamp === "string" &&
    typeof value.appliedAt === "string" &&
    typeof value.outcome === "string" &&
    EVENT_OUTCOMES.has(value.outcome) &&
    typeof value.fingerprint === "string"
  );
}

export function isTrade(value: unknown): value is Trade {
  if (!isRecord(value)) return false;
  return (
    typeof value.tradeId === "string" &&
    isTradeStatus(value.status) &&
    isNonNegativeInteger(value.confirmations) &&
    typeof value.createdAt === "string" &&
    isOptionalString(value.confirmedAt) &&
    isOptionalString(value.completedAt) &&
    isOptionalString(value.failedAt) &&
    isOptionalString(value.failureReason) &&
    Array.isArray(value.events) &&
    value.events.every(isTradeEventSummary)
  );
}

// =============================================================================
// Dead letters
// =============================================================================

export function isDeadLetterEntry(value: unknown): value is DeadLetterEntry {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.tradeId === "string" &&
    isNetwork(value.network) &&
    typeof value.errorMessage === "string" &&
    isNonNegativeInteger(value.retryCount) &&
    isConfirmationEvent(value.event) &&
    isDeadLetterStatus(value.status) &&
    typeof value.firstFailedAt === "string" &&
    typeof value.lastFailedAt === "string" &&
    isNonNegativeInteger(value.failureCount) &&
    isNonNegativeInteger(value.replayCount) &&
    isOptionalString(value.resolvedAt) &&
    isOptionalString(value.resolutionNotes)
  );
}

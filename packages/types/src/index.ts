/**
 * @escrowhook/types: Shared domain types.
 *
 * Used across all escrowhook packages:
 * - Networks and confirmation events
 * - The trade aggregate and its audit history
 * - Dead-letter entries
 * - Result<T, E> for explicit failure handling
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

export type { Network } from "./network.js";
export { NETWORKS } from "./network.js";

export type { ConfirmationEvent, ConfirmationEventType } from "./event.js";

export type {
  Trade,
  TradeStatus,
  TradeEventSummary,
  EventOutcome,
} from "./trade.js";

export type { DeadLetterEntry, DeadLetterStatus } from "./dead-letter.js";

export type { Result } from "./result.js";
export { ok, err, toError, tryCatch } from "./result.js";

export {
  isNetwork,
  isConfirmationEventType,
  isTradeStatus,
  isDeadLetterStatus,
  isConfirmationEvent,
  isTrade,
  isDeadLetterEntry,
} from "./guards.js";

/**
 * Dead-letter entries.
 *
 * Keyed by eventId. Entries are never deleted by the service: they are
 * resolved (kept for audit) or superseded by a replay.
 */

import type { ConfirmationEvent } from "./event.js";
import type { Network } from "./network.js";

/**
 * - open:       retries exhausted, awaiting an operator
 * - superseded: replayed; becomes resolved once the replay applies
 * - resolved:   closed by an operator or by a successful replay
 */
export type DeadLetterStatus = "open" | "superseded" | "resolved";

export interface DeadLetterEntry {
  readonly eventId: string;
  readonly tradeId: string;
  readonly network: Network;
  /** Last error message seen before the event was dead-lettered */
  readonly errorMessage: string;
  /** Attempts made in the failing processing run */
  readonly retryCount: number;
  /** The original event, as it was first dead-lettered */
  readonly event: ConfirmationEvent;
  readonly status: DeadLetterStatus;
  readonly firstFailedAt: string;
  readonly lastFailedAt: string;
  /** Number of processing runs that ended in this queue */
  readonly failureCount: number;
  readonly replayCount: number;
  readonly resolvedAt?: string | undefined;
  readonly resolutionNotes?: string | undefined;
}

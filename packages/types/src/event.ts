/**
 * Confirmation events.
 *
 * A ConfirmationEvent is one normalized notification of a transaction's
 * confirmation state for a trade. Events are created by the webhook
 * receiver, never by the provider: `eventId` is always assigned locally.
 */

import type { Network } from "./network.js";

export type ConfirmationEventType = "confirmation" | "final_confirmation";

export interface ConfirmationEvent {
  /** Locally assigned, unique for the lifetime of the system */
  readonly eventId: string;

  /** Trade the transaction's address resolved to */
  readonly tradeId: string;

  /** Network the webhook arrived on */
  readonly network: Network;

  /** On-chain transaction identifier */
  readonly txHash: string;

  /** Confirmations observed at receipt time (non-negative integer) */
  readonly confirmationCount: number;

  readonly eventType: ConfirmationEventType;

  /** ISO-8601 receipt time */
  readonly timestamp: string;

  /**
   * Auxiliary provider fields (inputs, outputs, totals).
   * Must never carry key material.
   */
  readonly data: Readonly<Record<string, unknown>>;

  /** Attempts made so far; 0 at creation */
  readonly retryCount: number;
}

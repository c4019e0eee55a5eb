/**
 * Content fingerprint of a confirmation.
 *
 * Redeliveries of the same notification get fresh event IDs from the
 * receiver; the fingerprint is what identifies them as the same
 * confirmation.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { ConfirmationEvent } from "@escrowhook/types";

export function eventFingerprint(
  event: Pick<ConfirmationEvent, "txHash" | "confirmationCount" | "eventType">,
): string {
  const canonical = canonicalize({
    txHash: event.txHash,
    confirmationCount: event.confirmationCount,
    eventType: event.eventType,
  });
  return createHash("sha256").update(canonical).digest("hex");
}

/**
 * Webhook signature verification.
 *
 * The provider signs the exact request bytes with HMAC-SHA256 under the
 * shared secret and sends the hex digest in X-Signature, optionally as
 * "sha256=<hex>". Verification runs over the bytes as received, never
 * over a re-serialized body.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import { toError } from "@escrowhook/types";

export const SIGNATURE_HEADER = "X-Signature";

const SIGNATURE_PREFIX = "sha256=";
const HEX_PATTERN = /^[0-9a-f]+$/;

export interface SignatureCheck {
  readonly valid: boolean;
  /** Why verification failed. Never contains the secret or the signature. */
  readonly reason?: string | undefined;
}

/**
 * Hex HMAC-SHA256 of `body` under `secret`.
 */
export function computeSignature(body: Uint8Array | string, secret: string): string {
  return createHmac("sha256", secret).update(body).digest("hex");
}

/**
 * Constant-time check of a provided signature. Any error is a failure.
 */
export function verifySignature(
  body: Uint8Array,
  signature: string | undefined,
  secret: string,
): SignatureCheck {
  if (signature === undefined || signature.trim() === "") {
    return { valid: false, reason: "Missing signature" };
  }

  try {
    let provided = signature.trim().toLowerCase();
    if (provided.startsWith(SIGNATURE_PREFIX)) {
      provided = provided.slice(SIGNATURE_PREFIX.length);
    }
    if (!HEX_PATTERN.test(provided)) {
      return { valid: false, reason: "Signature is not a hex digest" };
    }

    const expected = createHmac("sha256", secret).update(body).digest();
    const given = Buffer.from(provided, "hex");
    if (given.length !== expected.length) {
      return { valid: false, reason: "Signature length mismatch" };
    }

    return timingSafeEqual(given, expected)
      ? { valid: true }
      : { valid: false, reason: "Signature mismatch" };
  } catch (e: unknown) {
    return { valid: false, reason: `Signature check failed: ${toError(e).message}` };
  }
}

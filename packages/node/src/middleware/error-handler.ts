/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps coded domain errors (StoreError, QueueError, DeadLetterError,
 * TradeStateError) to HTTP status codes. Anything uncoded is a 500
 * whose message is not sent to the client.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<string, ContentfulStatusCode> = {
  // Record store
  CONCURRENCY_CONFLICT: 409,
  INVALID_KEY: 400,
  STORE_UNAVAILABLE: 503,

  // Event queue (backpressure: the caller should retry later)
  QUEUE_FULL: 503,
  QUEUE_CLOSED: 503,

  // Dead-letter queue
  DLQ_ENTRY_NOT_FOUND: 404,
  DLQ_ENTRY_RESOLVED: 409,

  // Trade state machine
  TRADE_MISMATCH: 409,
  INVALID_THRESHOLD: 400,
};

function getErrorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  const code = getErrorCode(err);
  const status = code !== undefined ? STATUS_MAP[code] ?? 500 : 500;

  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  if (status === 503) {
    c.header("Retry-After", "5");
  }

  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
}

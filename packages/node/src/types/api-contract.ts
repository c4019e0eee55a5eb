/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Authentication context (set by auth middleware on /api/*) */
    auth: AuthContext;

    /** Exact request bytes, read once (set by signature middleware) */
    rawBody: Uint8Array;
  };
}

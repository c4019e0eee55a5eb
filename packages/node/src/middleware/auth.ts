/**
 * Operator authentication middleware.
 *
 * Operators send an API key in the X-Api-Key header; keys and their
 * roles come from API_KEYS. The key itself is never stored on the
 * context or logged: handlers see a positional key ID instead.
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401 or 403.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Keys in API_KEYS order; the position becomes the key ID */
  readonly apiKeys: readonly ApiKeyRecord[];
}

/**
 * Create authentication middleware.
 *
 * Returns 401 when the header is missing or the key is unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  const byKey = new Map<string, AuthContext>();
  config.apiKeys.forEach((record, index) => {
    byKey.set(record.key, { keyId: `key-${index + 1}`, role: record.role });
  });

  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined || apiKey === "") {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const auth = byKey.get(apiKey);
    if (auth === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", auth);
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Create a permission guard middleware.
 *
 * Must run AFTER authMiddleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}

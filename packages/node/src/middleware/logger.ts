/**
 * Request logging middleware.
 *
 * Hands one structured entry per request to a log callback; main.ts
 * wires the callback to pino.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  /** Matched route pattern, e.g. /api/v1/trades/:tradeId */
  readonly route: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      route: c.req.routePath,
      status: c.res.status,
      durationMs: Math.round((performance.now() - start) * 100) / 100,
      requestId: c.get("requestId"),
    });
  };
}

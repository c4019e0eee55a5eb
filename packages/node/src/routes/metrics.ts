/**
 * Metrics route.
 *
 * GET /metrics  Prometheus text exposition format. Unauthenticated so
 *                a scraper needs no operator key.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { MetricsCollector } from "../middleware/metrics.js";

export const PROMETHEUS_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

export function createMetricsRoute(collector: MetricsCollector): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/metrics", (c) => {
    return c.text(collector.render(), 200, {
      "Content-Type": PROMETHEUS_CONTENT_TYPE,
      "Cache-Control": "no-store",
    });
  });

  return routes;
}

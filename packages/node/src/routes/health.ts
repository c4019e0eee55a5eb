/**
 * Health check routes.
 *
 * GET /health  Liveness probe (always 200 if server is running)
 * GET /ready   Readiness probe (503 until the event processor runs)
 */

import { Hono } from "hono";
import type { EventProcessor } from "@escrowhook/pipeline";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(processor: EventProcessor): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const stats = processor.stats();
    const body = {
      status: stats.running ? "ready" : "not_ready",
      processor: stats.running ? "running" : "stopped",
      queueSize: stats.queueSize,
      timestamp: new Date().toISOString(),
    };
    return stats.running ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}

/**
 * Monitoring snapshot.
 *
 * GET /api/v1/status  queue, outcome counters, trades per status and
 *                      the health indicator
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requirePermission } from "../middleware/auth.js";
import { buildStatusSnapshot } from "../services/monitoring.js";
import type { MonitoringDeps } from "../services/monitoring.js";

export function createStatusRoutes(
  deps: MonitoringDeps,
  clock: () => Date = () => new Date(),
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    return c.json({ data: buildStatusSnapshot(deps, clock()) });
  });

  return routes;
}

/**
 * Trade routes (read-only).
 *
 * GET /api/v1/trades            List trades, optionally by status
 * GET /api/v1/trades/:tradeId   One trade with its event history
 */

import { Hono } from "hono";
import type { TradeRepository } from "@escrowhook/pipeline";
import type { AppEnv } from "../types/api-contract.js";
import { ListTradesQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { requirePermission } from "../middleware/auth.js";
import { readQuery } from "../middleware/validate.js";

export function createTradeRoutes(trades: TradeRepository): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("read"));

  routes.get("/", (c) => {
    const query = readQuery(c, ListTradesQuerySchema);
    if (!query.ok) {
      return c.json(query.error, 400);
    }

    const list = trades.list(query.value);
    return c.json({ data: list, count: list.length });
  });

  routes.get("/:tradeId", (c) => {
    const tradeId = c.req.param("tradeId");
    const trade = trades.get(tradeId);
    if (trade === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Trade '${tradeId}' not found`), 404);
    }
    return c.json({ data: trade });
  });

  return routes;
}

/**
 * Dead-letter queue routes.
 *
 * GET    /api/v1/dead-letters                   List entries (read)
 * GET    /api/v1/dead-letters/:eventId          Get one entry (read)
 * POST   /api/v1/dead-letters/:eventId/replay   Re-enqueue (write)
 * POST   /api/v1/dead-letters/:eventId/resolve  Close by hand (write)
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { DeadLetterQueue, EventProcessor } from "@escrowhook/pipeline";
import type { AppEnv } from "../types/api-contract.js";
import { ListDeadLettersQuerySchema, ResolveDeadLetterSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { requirePermission } from "../middleware/auth.js";
import { readJsonBody, readQuery } from "../middleware/validate.js";

export interface DeadLetterRouteDeps {
  readonly processor: EventProcessor;
  readonly deadLetters: DeadLetterQueue;
  readonly logger: Logger;
}

export function createDeadLetterRoutes(deps: DeadLetterRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    const query = readQuery(c, ListDeadLettersQuerySchema);
    if (!query.ok) {
      return c.json(query.error, 400);
    }

    const entries = deps.deadLetters.list(query.value);
    return c.json({ data: entries, count: entries.length });
  });

  routes.get("/:eventId", requirePermission("read"), (c) => {
    const eventId = c.req.param("eventId");
    const entry = deps.deadLetters.get(eventId);
    if (entry === undefined) {
      return c.json(
        createErrorEnvelope("DLQ_ENTRY_NOT_FOUND", `No dead-letter entry for event '${eventId}'`),
        404,
      );
    }
    return c.json({ data: entry });
  });

  // Errors (not found, resolved, queue full) go through the global handler
  routes.post("/:eventId/replay", requirePermission("write"), (c) => {
    const entry = deps.processor.replayDeadLetter(c.req.param("eventId"));
    return c.json({ data: entry }, 202);
  });

  routes.post("/:eventId/resolve", requirePermission("write"), async (c) => {
    const body = await readJsonBody(c, ResolveDeadLetterSchema);
    if (!body.ok) {
      return c.json(body.error, 400);
    }

    const eventId = c.req.param("eventId");
    const entry = deps.deadLetters.resolve(eventId, body.value.notes);
    deps.logger.info(
      { eventId, tradeId: entry.tradeId, keyId: c.get("auth").keyId },
      "Dead-letter entry resolved",
    );
    return c.json({ data: entry });
  });

  return routes;
}

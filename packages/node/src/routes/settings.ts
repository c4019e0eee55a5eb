/**
 * Runtime settings.
 *
 * GET /api/v1/settings/confirmation-threshold  Current threshold (read)
 * PUT /api/v1/settings/confirmation-threshold  Change it (admin)
 *
 * A new threshold applies to events processed after the change;
 * stored trades are not re-evaluated. Not persisted across restarts.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { EventProcessor } from "@escrowhook/pipeline";
import type { AppEnv } from "../types/api-contract.js";
import { SetThresholdSchema } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { readJsonBody } from "../middleware/validate.js";

export function createSettingsRoutes(processor: EventProcessor, logger: Logger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/confirmation-threshold", requirePermission("read"), (c) => {
    return c.json({ data: { threshold: processor.confirmationThreshold } });
  });

  routes.put("/confirmation-threshold", requirePermission("admin"), async (c) => {
    const body = await readJsonBody(c, SetThresholdSchema);
    if (!body.ok) {
      return c.json(body.error, 400);
    }

    const previous = processor.confirmationThreshold;
    processor.setConfirmationThreshold(body.value.threshold);
    logger.info(
      { previous, threshold: body.value.threshold, keyId: c.get("auth").keyId },
      "Threshold updated via API",
    );
    return c.json({ data: { threshold: processor.confirmationThreshold, previous } });
  });

  return routes;
}

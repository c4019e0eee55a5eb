/**
 * Webhook intake.
 *
 * POST /webhooks/:network  signed confirmation notification from the
 *                           blockchain provider (eth | btc | sol | ltc)
 *
 * The provider retries on any non-2xx, so only a bad signature, a bad
 * payload or a full queue answer with an error. Unattributed addresses
 * are acknowledged with 200 and dropped.
 */

import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import type { Logger } from "pino";
import type { ConfirmationEvent, Network } from "@escrowhook/types";
import type { EventProcessor, PipelineMetrics } from "@escrowhook/pipeline";
import type { AppEnv } from "../types/api-contract.js";
import { NetworkSchema, WebhookPayloadSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { signatureMiddleware } from "../middleware/signature.js";
import { parseJsonBytes, validate } from "../middleware/validate.js";
import type { AddressBook } from "../services/address-book.js";

export const QUEUE_RETRY_AFTER_SECONDS = "5";

export interface WebhookRouteDeps {
  readonly processor: EventProcessor;
  readonly addressBook: AddressBook;
  readonly secret: string;
  readonly logger: Logger;
  readonly metrics: PipelineMetrics;
  /** Injectable for tests */
  readonly newEventId?: (() => string) | undefined;
  readonly clock?: (() => Date) | undefined;
}

async function resolveTrade(
  addressBook: AddressBook,
  addresses: readonly string[],
  network: Network,
): Promise<string | undefined> {
  for (const address of addresses) {
    const tradeId = await addressBook.resolveTradeId(address, network);
    if (tradeId !== undefined) {
      return tradeId;
    }
  }
  return undefined;
}

export function createWebhookRoutes(deps: WebhookRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const newEventId = deps.newEventId ?? randomUUID;
  const clock = deps.clock ?? (() => new Date());

  routes.post(
    "/:network{eth|btc|sol|ltc}",
    signatureMiddleware({ secret: deps.secret, logger: deps.logger }),
    async (c) => {
      const networkResult = NetworkSchema.safeParse(c.req.param("network"));
      if (!networkResult.success) {
        return c.json(createErrorEnvelope("NOT_FOUND", "Unknown network"), 404);
      }
      const network = networkResult.data;
      const rawBody = c.get("rawBody");

      const json = parseJsonBytes(rawBody);
      const payload = json.ok ? validate(WebhookPayloadSchema, json.value, "Webhook payload") : json;
      if (!payload.ok) {
        deps.logger.warn(
          { network, bytes: rawBody.byteLength },
          "Webhook payload rejected",
        );
        return c.json(payload.error, 400);
      }

      const { hash, confirmations, type, ...data } = payload.value;

      const tradeId = await resolveTrade(deps.addressBook, data.addresses, network);
      if (tradeId === undefined) {
        deps.logger.info(
          { network, txHash: hash, addresses: data.addresses.length },
          "Webhook for unknown addresses ignored",
        );
        return c.json({ status: "unattributed" }, 200);
      }

      const event: ConfirmationEvent = {
        eventId: newEventId(),
        tradeId,
        network,
        txHash: hash,
        confirmationCount: confirmations,
        eventType: type === "final_confirmation" ? "final_confirmation" : "confirmation",
        timestamp: clock().toISOString(),
        data,
        retryCount: 0,
      };

      const submitted = deps.processor.submit(event);
      if (!submitted.ok) {
        deps.logger.warn(
          { eventId: event.eventId, tradeId, network, code: submitted.error.code },
          "Webhook rejected by event queue",
        );
        c.header("Retry-After", QUEUE_RETRY_AFTER_SECONDS);
        return c.json(
          createErrorEnvelope(submitted.error.code, submitted.error.message),
          503,
        );
      }

      deps.metrics.eventReceived(network);
      deps.logger.info(
        {
          eventId: event.eventId,
          tradeId,
          network,
          confirmations,
          eventType: event.eventType,
          queueSize: submitted.value,
        },
        "Webhook accepted",
      );

      return c.json({ status: "accepted", eventId: event.eventId, tradeId }, 200);
    },
  );

  return routes;
}

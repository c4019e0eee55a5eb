/**
 * Webhook signature middleware.
 *
 * Reads the request body exactly once, verifies X-Signature over those
 * bytes and stores them as `rawBody` for the handler. A request that
 * fails verification gets 401 and never reaches the handler.
 *
 * Rejections are logged with the network and body size only.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { SIGNATURE_HEADER, verifySignature } from "../services/signature.js";

export interface SignatureConfig {
  readonly secret: string;
  readonly logger: Logger;
}

export function signatureMiddleware(config: SignatureConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const rawBody = new Uint8Array(await c.req.arrayBuffer());
    const check = verifySignature(rawBody, c.req.header(SIGNATURE_HEADER), config.secret);

    if (!check.valid) {
      config.logger.warn(
        { network: c.req.param("network"), bytes: rawBody.byteLength, reason: check.reason },
        "Webhook signature rejected",
      );
      return c.json(
        createErrorEnvelope("INVALID_SIGNATURE", "Invalid webhook signature"),
        401,
      );
    }

    c.set("rawBody", rawBody);
    return next();
  };
}

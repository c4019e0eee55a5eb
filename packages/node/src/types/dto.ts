/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const NetworkSchema = z.enum(["eth", "btc", "sol", "ltc"]);

const LimitSchema = z.coerce.number().int().min(1).max(500);

// =============================================================================
// Webhook payload
// =============================================================================

/**
 * Provider payload. Only the fields the pipeline needs are checked;
 * anything else passes through into the event's data bag.
 */
export const WebhookPayloadSchema = z
  .object({
    hash: z.string().min(1),
    confirmations: z.number().int().min(0),
    addresses: z.array(z.string().min(1)).min(1),
    total: z.number().optional(),
    received: z.string().optional(),
    inputs: z.array(z.unknown()).optional(),
    outputs: z.array(z.unknown()).optional(),
    type: z.enum(["confirmation", "final_confirmation"]).optional(),
  })
  .passthrough();

export type WebhookPayload = z.infer<typeof WebhookPayloadSchema>;

// =============================================================================
// Dead letters
// =============================================================================

export const ListDeadLettersQuerySchema = z.object({
  network: NetworkSchema.optional(),
  limit: LimitSchema.default(50),
  includeResolved: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("false"),
});

export type ListDeadLettersQuery = z.infer<typeof ListDeadLettersQuerySchema>;

export const ResolveDeadLetterSchema = z.object({
  notes: z.string().min(1).max(2000),
});

export type ResolveDeadLetterDto = z.infer<typeof ResolveDeadLetterSchema>;

// =============================================================================
// Trades
// =============================================================================

export const ListTradesQuerySchema = z.object({
  status: z.enum(["pending", "confirmed", "completed", "failed"]).optional(),
  limit: LimitSchema.default(100),
});

export type ListTradesQuery = z.infer<typeof ListTradesQuerySchema>;

// =============================================================================
// Settings
// =============================================================================

export const SetThresholdSchema = z.object({
  threshold: z.number().int().min(1).max(1000),
});

export type SetThresholdDto = z.infer<typeof SetThresholdSchema>;

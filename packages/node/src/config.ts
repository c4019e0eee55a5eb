/**
 * @escrowhook/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * A missing WEBHOOK_SECRET is a startup error: the service never runs
 * with unverifiable webhooks.
 */

import { z } from "zod";
import type { ApiKeyRecord, Role } from "./types/auth.js";
import { isRole } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const booleanString = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Webhook authentication
  WEBHOOK_SECRET: z
    .string({ required_error: "WEBHOOK_SECRET is required" })
    .min(1, "WEBHOOK_SECRET must not be empty"),

  // Operator API
  API_KEYS: z.string().default(""),

  // Pipeline
  CONFIRMATION_THRESHOLD: z.coerce.number().int().min(1).default(3),
  QUEUE_CAPACITY: z.coerce.number().int().min(1).default(1000),
  FAIL_TRADES_ON_EXHAUSTION: booleanString.default("false"),

  // Retry
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  RETRY_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(10000),
  RETRY_MULTIPLIER: z.coerce.number().min(1).default(2),

  // Storage
  DATA_DIR: z.string().min(1).optional(),
  ADDRESS_BOOK_PATH: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

/**
 * Parse the API_KEYS env var.
 *
 * Format: "key1:role1,key2:role2"
 */
export function parseApiKeys(raw: string): readonly ApiKeyRecord[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ApiKeyRecord[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role] = parts;
    if (parts.length !== 2 || key === undefined || role === undefined) {
      throw new Error(
        `Invalid API_KEYS entry #${keys.length + 1}. Expected format: key:role`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS (entry #${keys.length + 1})`);
    }
    seen.add(key);

    const parsedRole: Role = role;
    keys.push({ key, role: parsedRole });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

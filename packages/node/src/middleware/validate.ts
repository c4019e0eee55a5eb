/**
 * Zod validation helpers.
 *
 * Each helper returns a Result: the parsed value, or the error
 * envelope a handler sends back with 400.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { Result } from "@escrowhook/types";
import { err, ok } from "@escrowhook/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import type { ErrorEnvelope } from "../types/error.js";

export type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Validate an already-parsed value.
 */
export function validate<T>(
  schema: Schema<T>,
  input: unknown,
  what = "Request body",
): Result<T, ErrorEnvelope> {
  const result = schema.safeParse(input);
  if (!result.success) {
    return err(
      createErrorEnvelope("VALIDATION_ERROR", `${what} validation failed`, {
        issues: formatZodErrors(result.error),
      }),
    );
  }
  return ok(result.data);
}

/**
 * Decode UTF-8 bytes as JSON.
 */
export function parseJsonBytes(raw: Uint8Array): Result<unknown, ErrorEnvelope> {
  try {
    return ok(JSON.parse(new TextDecoder().decode(raw)));
  } catch {
    return err(createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"));
  }
}

/**
 * Read and validate a JSON request body.
 */
export async function readJsonBody<T>(
  c: Context<AppEnv>,
  schema: Schema<T>,
): Promise<Result<T, ErrorEnvelope>> {
  const raw = new Uint8Array(await c.req.arrayBuffer());
  const json = parseJsonBytes(raw);
  if (!json.ok) {
    return json;
  }
  return validate(schema, json.value);
}

/**
 * Validate the query string.
 */
export function readQuery<T>(
  c: Context<AppEnv>,
  schema: Schema<T>,
): Result<T, ErrorEnvelope> {
  return validate(schema, c.req.query(), "Query parameter");
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

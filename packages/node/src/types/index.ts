/**
 * Type barrel: re-exports all public types from @escrowhook/node.
 */

// DTOs
export {
  NetworkSchema,
  WebhookPayloadSchema,
  ListDeadLettersQuerySchema,
  ResolveDeadLetterSchema,
  ListTradesQuerySchema,
  SetThresholdSchema,
} from "./dto.js";
export type {
  WebhookPayload,
  ListDeadLettersQuery,
  ResolveDeadLetterDto,
  ListTradesQuery,
  SetThresholdDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLES, ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";

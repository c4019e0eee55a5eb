/**
 * Middleware barrel: re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validate, parseJsonBytes, readJsonBody, readQuery } from "./validate.js";
export type { Schema } from "./validate.js";
export { authMiddleware, requirePermission, API_KEY_HEADER } from "./auth.js";
export type { AuthConfig } from "./auth.js";
export { signatureMiddleware } from "./signature.js";
export type { SignatureConfig } from "./signature.js";
export {
  metricsMiddleware,
  MetricsCollector,
  createPipelineMetrics,
  PROCESSING_BUCKETS,
} from "./metrics.js";

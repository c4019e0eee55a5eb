/**
 * Route barrel  re-exports all route factories.
 */

export { createHealthRoutes } from "./health.js";
export { createMetricsRoute, PROMETHEUS_CONTENT_TYPE } from "./metrics.js";
export { createWebhookRoutes, QUEUE_RETRY_AFTER_SECONDS } from "./webhooks.js";
export type { WebhookRouteDeps } from "./webhooks.js";
export { createDeadLetterRoutes } from "./dead-letters.js";
export type { DeadLetterRouteDeps } from "./dead-letters.js";
export { createTradeRoutes } from "./trades.js";
export { createSettingsRoutes } from "./settings.js";
export { createStatusRoutes } from "./status.js";

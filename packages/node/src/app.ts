/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Kept apart from main.ts: tests create the app without starting the
 * HTTP server.
 *
 *   /health, /ready, /metrics   open
 *   /webhooks/:network          HMAC signature
 *   /api/v1/*                   X-Api-Key + role
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { DeadLetterQueue, EventProcessor, TradeRepository } from "@escrowhook/pipeline";
import { noopMetrics } from "@escrowhook/pipeline";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import {
  createPipelineMetrics,
  metricsMiddleware,
  MetricsCollector,
} from "./middleware/metrics.js";
import type { AddressBook } from "./services/address-book.js";
import { createHealthRoutes } from "./routes/health.js";
import { createMetricsRoute } from "./routes/metrics.js";
import { createWebhookRoutes } from "./routes/webhooks.js";
import { createDeadLetterRoutes } from "./routes/dead-letters.js";
import { createTradeRoutes } from "./routes/trades.js";
import { createSettingsRoutes } from "./routes/settings.js";
import { createStatusRoutes } from "./routes/status.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly processor: EventProcessor;
  readonly trades: TradeRepository;
  readonly deadLetters: DeadLetterQueue;
  readonly addressBook: AddressBook;
  readonly webhookSecret: string;
  /** Operator API keys. With none configured every /api request is 401. */
  readonly auth: AuthConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Default: a silent pino logger */
  readonly logger?: Logger | undefined;
  /** Shared with the pipeline so both feed one /metrics page */
  readonly metricsCollector?: MetricsCollector | undefined;
  /** Enable metrics collection. Default: true */
  readonly enableMetrics?: boolean | undefined;
  /** Injectable for tests */
  readonly newEventId?: (() => string) | undefined;
  readonly clock?: (() => Date) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly metricsCollector: MetricsCollector;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const metricsCollector = options.metricsCollector ?? new MetricsCollector();
  const enableMetrics = options.enableMetrics !== false;
  const logger = options.logger ?? pino({ level: "silent" });
  const pipelineMetrics = enableMetrics ? createPipelineMetrics(metricsCollector) : noopMetrics;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  if (enableMetrics) {
    app.use("*", metricsMiddleware(metricsCollector));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", "Not found"), 404));

  // ─── Open Routes ────────────────────────────────────────────────
  app.route("/", createHealthRoutes(options.processor));

  if (enableMetrics) {
    app.route("/", createMetricsRoute(metricsCollector));
  }

  // ─── Webhooks (signature-authenticated) ─────────────────────────
  app.route(
    "/webhooks",
    createWebhookRoutes({
      processor: options.processor,
      addressBook: options.addressBook,
      secret: options.webhookSecret,
      logger: logger.child({ component: "webhooks" }),
      metrics: pipelineMetrics,
      newEventId: options.newEventId,
      clock: options.clock,
    }),
  );

  // ─── Operator API ───────────────────────────────────────────────
  const apiLogger = logger.child({ component: "api" });
  app.use("/api/*", authMiddleware(options.auth));

  app.route(
    "/api/v1/dead-letters",
    createDeadLetterRoutes({
      processor: options.processor,
      deadLetters: options.deadLetters,
      logger: apiLogger,
    }),
  );
  app.route("/api/v1/trades", createTradeRoutes(options.trades));
  app.route("/api/v1/settings", createSettingsRoutes(options.processor, apiLogger));
  app.route(
    "/api/v1/status",
    createStatusRoutes(
      {
        processor: options.processor,
        trades: options.trades,
        deadLetters: options.deadLetters,
      },
      options.clock,
    ),
  );

  return { app, metricsCollector };
}

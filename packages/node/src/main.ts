/**
 * @escrowhook/node: Entry point.
 *
 * Loads config, assembles the pipeline, starts the event processor and
 * the HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import { createPipeline } from "./services/pipeline.js";
import { InMemoryAddressBook, loadAddressBookFile } from "./services/address-book.js";
import type { AddressBook } from "./services/address-book.js";
import { createPipelineMetrics, MetricsCollector } from "./middleware/metrics.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const apiKeys = parseApiKeys(config.API_KEYS);
  if (apiKeys.length === 0) {
    logger.warn("No API_KEYS configured: the operator API will reject every request");
  } else {
    logger.info({ apiKeyCount: apiKeys.length }, "Operator API keys loaded");
  }

  let addressBook: AddressBook;
  if (config.ADDRESS_BOOK_PATH !== undefined) {
    const book = await loadAddressBookFile(config.ADDRESS_BOOK_PATH);
    logger.info({ path: config.ADDRESS_BOOK_PATH, addresses: book.size }, "Address book loaded");
    addressBook = book;
  } else {
    logger.warn("ADDRESS_BOOK_PATH not set: every webhook will be unattributed");
    addressBook = new InMemoryAddressBook();
  }

  const metricsCollector = new MetricsCollector();
  const pipeline = createPipeline({
    dataDir: config.DATA_DIR,
    confirmationThreshold: config.CONFIRMATION_THRESHOLD,
    queueCapacity: config.QUEUE_CAPACITY,
    retryPolicy: {
      maxAttempts: config.RETRY_MAX_ATTEMPTS,
      initialDelayMs: config.RETRY_INITIAL_DELAY_MS,
      maxDelayMs: config.RETRY_MAX_DELAY_MS,
      multiplier: config.RETRY_MULTIPLIER,
      jitterMs: 0,
    },
    failTradesOnExhaustion: config.FAIL_TRADES_ON_EXHAUSTION,
    logger,
    metrics: createPipelineMetrics(metricsCollector),
  });

  const { app } = createApp({
    processor: pipeline.processor,
    trades: pipeline.trades,
    deadLetters: pipeline.deadLetters,
    addressBook,
    webhookSecret: config.WEBHOOK_SECRET,
    auth: { apiKeys },
    logger,
    metricsCollector,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  pipeline.processor.start();

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, storage: pipeline.storage },
    "Webhook receiver started",
  );

  // Graceful shutdown: stop intake, then drain accepted events
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await pipeline.processor.stop();
    logger.info(pipeline.processor.stats(), "Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => (): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.fatal({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal("SIGTERM"));
  process.on("SIGINT", onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});

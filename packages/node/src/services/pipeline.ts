/**
 * Pipeline assembly: stores, repository, DLQ and processor.
 *
 * With a data directory, trades and dead letters live in JSONL files
 * under it; without one, everything is in memory and lost on exit.
 * An unusable data directory fails here, before the server starts.
 * Stores that had unreadable lines are compacted on load.
 */

import { join } from "node:path";
import type { Logger } from "pino";
import type { DeadLetterEntry, Trade } from "@escrowhook/types";
import { isDeadLetterEntry, isTrade } from "@escrowhook/types";
import { InMemoryRecordStore, JsonlRecordStore } from "@escrowhook/state-store";
import type { RecordStore } from "@escrowhook/state-store";
import {
  DeadLetterQueue,
  EventProcessor,
  TradeRepository,
} from "@escrowhook/pipeline";
import type { PipelineMetrics, RetryPolicy } from "@escrowhook/pipeline";

export interface PipelineOptions {
  /** Directory for the JSONL stores. In-memory when undefined. */
  readonly dataDir?: string | undefined;
  readonly confirmationThreshold: number;
  readonly queueCapacity: number;
  readonly retryPolicy: RetryPolicy;
  readonly failTradesOnExhaustion: boolean;
  readonly logger: Logger;
  readonly metrics?: PipelineMetrics | undefined;
  readonly sleep?: ((ms: number) => Promise<void>) | undefined;
}

export interface Pipeline {
  readonly processor: EventProcessor;
  readonly trades: TradeRepository;
  readonly deadLetters: DeadLetterQueue;
  /** "jsonl" or "memory" */
  readonly storage: "jsonl" | "memory";
}

export const TRADES_FILE = "trades.jsonl";
export const DEAD_LETTERS_FILE = "dead-letters.jsonl";

export function createPipeline(options: PipelineOptions): Pipeline {
  let tradeStore: RecordStore<Trade>;
  let deadLetterStore: RecordStore<DeadLetterEntry>;

  if (options.dataDir !== undefined) {
    const trades = new JsonlRecordStore<Trade>({
      filePath: join(options.dataDir, TRADES_FILE),
      validate: isTrade,
    });
    const deadLetters = new JsonlRecordStore<DeadLetterEntry>({
      filePath: join(options.dataDir, DEAD_LETTERS_FILE),
      validate: isDeadLetterEntry,
    });

    const skipped = trades.skippedLines + deadLetters.skippedLines;
    if (skipped > 0) {
      options.logger.warn({ skippedLines: skipped }, "Skipped unreadable store lines on load");
      // Rewrite both files with only readable head versions
      const kept = trades.compact() + deadLetters.compact();
      options.logger.info({ records: kept }, "Compacted stores");
    }
    options.logger.info(
      { dataDir: options.dataDir, trades: trades.size, deadLetters: deadLetters.size },
      "Loaded state from disk",
    );

    tradeStore = trades;
    deadLetterStore = deadLetters;
  } else {
    options.logger.warn("DATA_DIR not set: trades and dead letters are kept in memory only");
    tradeStore = new InMemoryRecordStore<Trade>();
    deadLetterStore = new InMemoryRecordStore<DeadLetterEntry>();
  }

  const trades = new TradeRepository(tradeStore);
  const deadLetters = new DeadLetterQueue(deadLetterStore);
  const processor = new EventProcessor({
    trades,
    deadLetters,
    queueCapacity: options.queueCapacity,
    confirmationThreshold: options.confirmationThreshold,
    retryPolicy: options.retryPolicy,
    failTradesOnExhaustion: options.failTradesOnExhaustion,
    logger: options.logger.child({ component: "processor" }),
    metrics: options.metrics,
    sleep: options.sleep,
  });

  return {
    processor,
    trades,
    deadLetters,
    storage: options.dataDir !== undefined ? "jsonl" : "memory",
  };
}

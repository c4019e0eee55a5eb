/**
 * EventProcessor: the single consumer of the event queue.
 *
 * For each event: apply it to the trade under the retry policy; on
 * exhaustion, move it to the dead-letter queue and continue. One bad
 * event never stops the loop, and no dequeued event is dropped.
 *
 * Lifecycle:
 *   start() → loop runs until stop()
 *   stop()  → queue closed to new events, in-flight and already
 *             accepted events are finished, then resolves
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  ConfirmationEvent,
  DeadLetterEntry,
  Result,
  Trade,
} from "@escrowhook/types";
import { toError, tryCatch } from "@escrowhook/types";
import { EventQueue, DEFAULT_QUEUE_CAPACITY } from "./event-queue.js";
import type { QueueError } from "./event-queue.js";
import type { TradeListQuery, TradeRepository } from "./trade-repository.js";
import type { DeadLetterQueue } from "./dead-letter-queue.js";
import {
  DEFAULT_CONFIRMATION_THRESHOLD,
  validateThreshold,
} from "./state-machine.js";
import type { TransitionRecord } from "./state-machine.js";
import {
  DEFAULT_RETRY_POLICY,
  runWithRetry,
  sleep as defaultSleep,
  validateRetryPolicy,
} from "./retry.js";
import type { RetryPolicy } from "./retry.js";
import { noopMetrics } from "./metrics.js";
import type { PipelineMetrics } from "./metrics.js";

// =============================================================================
// Types
// =============================================================================

export interface EventProcessorOptions {
  readonly trades: TradeRepository;
  readonly deadLetters: DeadLetterQueue;
  /** Default: 1000 */
  readonly queueCapacity?: number | undefined;
  /** Default: 3 */
  readonly confirmationThreshold?: number | undefined;
  readonly retryPolicy?: RetryPolicy | undefined;
  /** Default: a silent pino logger */
  readonly logger?: Logger | undefined;
  readonly metrics?: PipelineMetrics | undefined;
  /** Injectable for tests */
  readonly sleep?: ((ms: number) => Promise<void>) | undefined;
  readonly clock?: (() => Date) | undefined;
  /** Mark the trade failed when an event for it is dead-lettered. Default: false */
  readonly failTradesOnExhaustion?: boolean | undefined;
}

export type ProcessOutcome =
  | {
      readonly status: "applied";
      readonly trade: Trade;
      readonly transitions: readonly TransitionRecord[];
      readonly attempts: number;
    }
  | {
      readonly status: "duplicate";
      readonly trade: Trade;
      readonly attempts: number;
    }
  | {
      readonly status: "dead_lettered";
      readonly error: string;
      readonly attempts: number;
    };

export interface ProcessorStats {
  readonly running: boolean;
  readonly queueSize: number;
  readonly queueCapacity: number;
  readonly inFlight: number;
  /** Events that reached an outcome */
  readonly processed: number;
  readonly applied: number;
  readonly duplicates: number;
  readonly deadLettered: number;
  /** Dead-letter writes that failed even after retries */
  readonly deadLetterWriteFailures: number;
}

// =============================================================================
// EventProcessor
// =============================================================================

export class EventProcessor {
  private readonly _queue: EventQueue;
  private readonly _trades: TradeRepository;
  private readonly _deadLetters: DeadLetterQueue;
  private readonly _retryPolicy: RetryPolicy;
  private readonly _logger: Logger;
  private readonly _metrics: PipelineMetrics;
  private readonly _sleep: (ms: number) => Promise<void>;
  private readonly _clock: () => Date;
  private readonly _failTradesOnExhaustion: boolean;

  private _threshold: number;
  private _loop: Promise<void> | undefined;
  private _running = false;

  /** Accepted by submit() and not yet finished */
  private _outstanding = 0;
  private _inFlight = 0;
  private _idleWaiters: (() => void)[] = [];

  private _applied = 0;
  private _duplicates = 0;
  private _deadLettered = 0;
  private _deadLetterWriteFailures = 0;

  constructor(options: EventProcessorOptions) {
    const threshold = options.confirmationThreshold ?? DEFAULT_CONFIRMATION_THRESHOLD;
    validateThreshold(threshold);
    const retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    validateRetryPolicy(retryPolicy);

    this._queue = new EventQueue(options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
    this._trades = options.trades;
    this._deadLetters = options.deadLetters;
    this._threshold = threshold;
    this._retryPolicy = retryPolicy;
    this._logger = options.logger ?? pino({ level: "silent" });
    this._metrics = options.metrics ?? noopMetrics;
    this._sleep = options.sleep ?? defaultSleep;
    this._clock = options.clock ?? (() => new Date());
    this._failTradesOnExhaustion = options.failTradesOnExhaustion === true;
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  start(): void {
    if (this._running || this._queue.isClosed) {
      return;
    }
    this._running = true;
    this._loop = this._run();
    this._logger.info(
      { threshold: this._threshold, queueCapacity: this._queue.capacity },
      "Event processor started",
    );
  }

  /**
   * Stop accepting events and finish everything already accepted.
   */
  async stop(): Promise<void> {
    this._queue.close();
    if (this._loop !== undefined) {
      await this._loop;
    }
    this._logger.info({ processed: this._processed }, "Event processor stopped");
  }

  get isRunning(): boolean {
    return this._running;
  }

  // ─── Intake ─────────────────────────────────────────────────────────

  /**
   * Enqueue without waiting.
   *
   * @returns Queue depth after the enqueue, or QUEUE_FULL / QUEUE_CLOSED
   */
  submit(event: ConfirmationEvent): Result<number, QueueError> {
    const result = this._queue.tryEnqueue(event);
    if (result.ok) {
      this._outstanding++;
    }
    return result;
  }

  /**
   * Re-submit a dead-lettered event.
   *
   * @throws DeadLetterError DLQ_ENTRY_NOT_FOUND / DLQ_ENTRY_RESOLVED / QUEUE_FULL
   */
  replayDeadLetter(eventId: string): DeadLetterEntry {
    const entry = this._deadLetters.replay(eventId, (event) => this.submit(event));
    this._logger.info(
      { eventId, tradeId: entry.tradeId, network: entry.network, replayCount: entry.replayCount },
      "Dead-letter entry replayed",
    );
    return entry;
  }

  // ─── Processing ─────────────────────────────────────────────────────

  /**
   * Apply one event under the retry policy. Never throws.
   */
  async processEvent(event: ConfirmationEvent): Promise<ProcessOutcome> {
    const log = this._logger.child({
      eventId: event.eventId,
      tradeId: event.tradeId,
      network: event.network,
    });

    const outcome = await runWithRetry(
      () =>
        tryCatch(() =>
          this._trades.apply(event, {
            threshold: this._threshold,
            now: this._clock().toISOString(),
          }),
        ),
      this._retryPolicy,
      {
        sleep: this._sleep,
        onRetry: ({ attempt, error, delayMs }) => {
          log.warn(
            { attempt, delayMs, err: error.message },
            "Event processing failed, retrying",
          );
        },
      },
    );

    if (!outcome.ok) {
      await this._deadLetter(event, outcome.error, outcome.attempts, log);
      return {
        status: "dead_lettered",
        error: outcome.error.message,
        attempts: outcome.attempts,
      };
    }

    const { trade, duplicate, transitions } = outcome.value;
    this._resolveReplay(event, log);

    if (duplicate) {
      this._duplicates++;
      log.debug("Duplicate event ignored");
      return { status: "duplicate", trade, attempts: outcome.attempts };
    }

    this._applied++;
    for (const t of transitions) {
      log.info(
        { from: t.from, to: t.to, confirmations: trade.confirmations },
        "Trade status changed",
      );
    }
    log.debug(
      { confirmations: trade.confirmations, status: trade.status },
      "Event applied",
    );
    return { status: "applied", trade, transitions, attempts: outcome.attempts };
  }

  /**
   * Resolve once nothing is queued or in flight.
   * Resolves at once when the loop is not running.
   */
  waitForIdle(): Promise<void> {
    if (this._isIdle() || !this._running) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this._idleWaiters.push(resolve);
    });
  }

  // ─── Queries ────────────────────────────────────────────────────────

  getTrade(tradeId: string): Trade | undefined {
    return this._trades.get(tradeId);
  }

  listTrades(query?: TradeListQuery): readonly Trade[] {
    return this._trades.list(query);
  }

  get confirmationThreshold(): number {
    return this._threshold;
  }

  /**
   * Change the threshold for events processed from now on.
   * Trades already stored are not re-evaluated.
   */
  setConfirmationThreshold(threshold: number): void {
    validateThreshold(threshold);
    const previous = this._threshold;
    this._threshold = threshold;
    this._logger.info({ previous, threshold }, "Confirmation threshold changed");
  }

  stats(): ProcessorStats {
    return {
      running: this._running,
      queueSize: this._queue.size,
      queueCapacity: this._queue.capacity,
      inFlight: this._inFlight,
      processed: this._processed,
      applied: this._applied,
      duplicates: this._duplicates,
      deadLettered: this._deadLettered,
      deadLetterWriteFailures: this._deadLetterWriteFailures,
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private get _processed(): number {
    return this._applied + this._duplicates + this._deadLettered;
  }

  private async _run(): Promise<void> {
    for (;;) {
      const event = await this._queue.dequeue();
      if (event === undefined) {
        break;
      }

      this._inFlight++;
      const start = performance.now();
      try {
        await this.processEvent(event);
      } catch (e: unknown) {
        // processEvent reports failures as outcomes; reaching here is a defect
        this._logger.error(
          { eventId: event.eventId, err: toError(e).message },
          "Unexpected error in event processor",
        );
      } finally {
        this._metrics.eventProcessed(event.network, performance.now() - start);
        this._inFlight--;
        if (this._outstanding > 0) {
          this._outstanding--;
        }
        this._notifyIfIdle();
      }
    }

    this._running = false;
    this._notifyIfIdle();
  }

  private async _deadLetter(
    event: ConfirmationEvent,
    error: Error,
    attempts: number,
    log: Logger,
  ): Promise<void> {
    this._deadLettered++;
    this._metrics.eventDeadLettered(event.network);

    const retryCount = event.retryCount + attempts;
    const failed: ConfirmationEvent = { ...event, retryCount };

    const written = await runWithRetry(
      () => tryCatch(() => this._deadLetters.add(failed, error, retryCount)),
      this._retryPolicy,
      { sleep: this._sleep },
    );

    if (written.ok) {
      log.error(
        { retryCount, err: error.message, failureCount: written.value.failureCount },
        "Event moved to dead-letter queue",
      );
    } else {
      // Last resort: the full event goes to the log so it can be re-fed by hand
      this._deadLetterWriteFailures++;
      log.fatal(
        { retryCount, err: error.message, dlqErr: written.error.message, event: failed },
        "Dead-letter write failed",
      );
    }

    if (this._failTradesOnExhaustion) {
      const marked = tryCatch(() =>
        this._trades.markFailed(event.tradeId, error.message, this._clock().toISOString()),
      );
      if (marked.ok) {
        for (const t of marked.value.transitions) {
          log.warn({ from: t.from, to: t.to }, "Trade status changed");
        }
      } else {
        log.error({ err: marked.error.message }, "Failed to mark trade failed");
      }
    }
  }

  private _resolveReplay(event: ConfirmationEvent, log: Logger): void {
    const resolved = tryCatch(() => this._deadLetters.markReplaySucceeded(event.eventId));
    if (!resolved.ok) {
      log.error({ err: resolved.error.message }, "Failed to resolve replayed dead-letter entry");
    } else if (resolved.value !== undefined) {
      log.info("Replayed dead-letter entry resolved");
    }
  }

  private _isIdle(): boolean {
    return this._outstanding === 0 && this._inFlight === 0;
  }

  private _notifyIfIdle(): void {
    if (!this._isIdle() && this._running) {
      return;
    }
    for (const resolve of this._idleWaiters.splice(0)) {
      resolve();
    }
  }
}

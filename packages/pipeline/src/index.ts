/**
 * @escrowhook/pipeline
 *
 * Event queue, retry engine, trade state machine, dead-letter queue
 * and the processor that ties them together.
 */

// Queue
export { EventQueue, QueueError, DEFAULT_QUEUE_CAPACITY } from "./event-queue.js";
export type { QueueErrorCode } from "./event-queue.js";

// Retry
export {
  DEFAULT_RETRY_POLICY,
  backoffSchedule,
  computeDelay,
  runWithRetry,
  sleep,
  validateRetryPolicy,
} from "./retry.js";
export type {
  RetryAttemptInfo,
  RetryOptions,
  RetryOutcome,
  RetryPolicy,
} from "./retry.js";

// State machine
export {
  DEFAULT_CONFIRMATION_THRESHOLD,
  TRADE_TRANSITIONS,
  TradeStateError,
  applyConfirmation,
  canTransition,
  recordTransition,
  createTrade,
  isTerminal,
  markFailed,
  validateThreshold,
} from "./state-machine.js";
export type {
  ApplyContext,
  ApplyResult,
  TradeStateErrorCode,
  TransitionRecord,
} from "./state-machine.js";
export { eventFingerprint } from "./fingerprint.js";

// Stores
export { TradeRepository } from "./trade-repository.js";
export type { TradeListQuery } from "./trade-repository.js";
export {
  DeadLetterError,
  DeadLetterQueue,
  REPLAY_RESOLUTION_NOTE,
} from "./dead-letter-queue.js";
export type {
  DeadLetterErrorCode,
  DeadLetterListQuery,
  EnqueueFn,
} from "./dead-letter-queue.js";

// Processor
export { EventProcessor } from "./processor.js";
export type {
  EventProcessorOptions,
  ProcessOutcome,
  ProcessorStats,
} from "./processor.js";
export { noopMetrics } from "./metrics.js";
export type { PipelineMetrics } from "./metrics.js";

/**
 * Monitoring: health indicator and status snapshot.
 *
 *   unhealthy: success rate < 80% or more than 10 open dead letters
 *   degraded:  success rate < 95% or more than 5 open dead letters
 *   healthy:   otherwise
 *
 * Success rate is per processed event: the share of events that did
 * not end in the dead-letter queue.
 */

import type { Trade, TradeStatus } from "@escrowhook/types";
import type {
  DeadLetterQueue,
  EventProcessor,
  TradeRepository,
} from "@escrowhook/pipeline";

export type HealthIndicator = "healthy" | "degraded" | "unhealthy";

export interface HealthInput {
  /** Percentage, 0–100 */
  readonly successRate: number;
  /** Unresolved dead-letter entries */
  readonly deadLetterCount: number;
}

export const HEALTH_THRESHOLDS = {
  unhealthySuccessRate: 80,
  degradedSuccessRate: 95,
  unhealthyDeadLetters: 10,
  degradedDeadLetters: 5,
} as const;

export function computeHealth(input: HealthInput): HealthIndicator {
  if (
    input.successRate < HEALTH_THRESHOLDS.unhealthySuccessRate ||
    input.deadLetterCount > HEALTH_THRESHOLDS.unhealthyDeadLetters
  ) {
    return "unhealthy";
  }
  if (
    input.successRate < HEALTH_THRESHOLDS.degradedSuccessRate ||
    input.deadLetterCount > HEALTH_THRESHOLDS.degradedDeadLetters
  ) {
    return "degraded";
  }
  return "healthy";
}

/**
 * Percentage of processed events that were not dead-lettered,
 * rounded to two decimals. 100 before any event is processed.
 */
export function successRate(processed: number, deadLettered: number): number {
  if (processed === 0) {
    return 100;
  }
  return Math.round(((processed - deadLettered) / processed) * 10000) / 100;
}

/**
 * Mean seconds from trade creation to confirmation, over confirmed trades.
 */
export function averageConfirmationSeconds(trades: readonly Trade[]): number | null {
  let total = 0;
  let count = 0;
  for (const trade of trades) {
    if (trade.confirmedAt === undefined) continue;
    const seconds = (Date.parse(trade.confirmedAt) - Date.parse(trade.createdAt)) / 1000;
    if (Number.isFinite(seconds)) {
      total += seconds;
      count++;
    }
  }
  return count === 0 ? null : Math.round((total / count) * 100) / 100;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface LatestTrade {
  readonly tradeId: string;
  readonly status: TradeStatus;
  readonly confirmations: number;
  readonly createdAt: string;
}

export interface StatusSnapshot {
  readonly health: HealthIndicator;
  readonly running: boolean;
  readonly queueSize: number;
  readonly queueCapacity: number;
  readonly processed: number;
  readonly duplicates: number;
  readonly deadLettered: number;
  readonly successRate: number;
  readonly openDeadLetters: number;
  readonly confirmationThreshold: number;
  readonly trades: Record<TradeStatus, number>;
  readonly averageConfirmationSeconds: number | null;
  readonly latestTrades: readonly LatestTrade[];
  readonly timestamp: string;
}

export interface MonitoringDeps {
  readonly processor: EventProcessor;
  readonly trades: TradeRepository;
  readonly deadLetters: DeadLetterQueue;
}

const LATEST_TRADES = 5;

export function buildStatusSnapshot(deps: MonitoringDeps, now: Date = new Date()): StatusSnapshot {
  const stats = deps.processor.stats();
  const openDeadLetters = deps.deadLetters.count();
  const rate = successRate(stats.processed, stats.deadLettered);
  const allTrades = deps.trades.list();

  const latestTrades = [...allTrades]
    .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
    .slice(0, LATEST_TRADES)
    .map((t) => ({
      tradeId: t.tradeId,
      status: t.status,
      confirmations: t.confirmations,
      createdAt: t.createdAt,
    }));

  return {
    health: computeHealth({ successRate: rate, deadLetterCount: openDeadLetters }),
    running: stats.running,
    queueSize: stats.queueSize,
    queueCapacity: stats.queueCapacity,
    processed: stats.processed,
    duplicates: stats.duplicates,
    deadLettered: stats.deadLettered,
    successRate: rate,
    openDeadLetters,
    confirmationThreshold: deps.processor.confirmationThreshold,
    trades: deps.trades.countByStatus(),
    averageConfirmationSeconds: averageConfirmationSeconds(allTrades),
    latestTrades,
    timestamp: now.toISOString(),
  };
}

/**
 * Prometheus metrics middleware + collector.
 *
 * Hand-rolled Prometheus text format, no prom-client dependency.
 * Collects:
 * - http_requests_total (counter, by method + status + route)
 * - http_request_duration_seconds (histogram, by method + route)
 * - named counters and histograms fed by the pipeline
 *   (events_received_total, events_processed_total,
 *   events_dead_lettered_total, event_processing_duration_seconds)
 */

import type { MiddlewareHandler } from "hono";
import type { Network } from "@escrowhook/types";
import type { PipelineMetrics } from "@escrowhook/pipeline";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Metrics Collector
// =============================================================================

type Labels = Readonly<Record<string, string>>;

interface CounterEntry {
  readonly labels: Labels;
  count: number;
}

interface HistogramEntry {
  readonly labels: Labels;
  sum: number;
  count: number;
  buckets: Map<number, number>; // le → count
}

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

/** Wider buckets for pipeline latency, which includes retry waits */
export const PROCESSING_BUCKETS = [0.01, 0.05, 0.1, 0.5, 1, 2.5, 5, 10, 30, 60];

const HELP: Record<string, string> = {
  http_requests_total: "Total HTTP requests",
  http_request_duration_seconds: "HTTP request duration in seconds",
  events_received_total: "Webhook events accepted into the queue",
  events_processed_total: "Events that reached an outcome",
  events_dead_lettered_total: "Events moved to the dead-letter queue",
  event_processing_duration_seconds: "Time from dequeue to outcome in seconds",
};

function labelsKey(labels: Labels): string {
  return Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`)
    .join(",");
}

function renderLabels(labels: Labels, extra?: string): string {
  const parts = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${v}"`);
  if (extra !== undefined) {
    parts.push(extra);
  }
  return parts.length > 0 ? `{${parts.join(",")}}` : "";
}

export class MetricsCollector {
  private readonly _counters = new Map<string, Map<string, CounterEntry>>();
  private readonly _histograms = new Map<string, Map<string, HistogramEntry>>();
  private readonly _histogramBuckets = new Map<string, readonly number[]>();
  private readonly _defaultBuckets: readonly number[];

  constructor(buckets: readonly number[] = DEFAULT_BUCKETS) {
    this._defaultBuckets = buckets;
  }

  /**
   * Record an HTTP request.
   */
  recordRequest(
    method: string,
    path: string,
    status: number,
    durationMs: number,
  ): void {
    this.incrementCounter("http_requests_total", {
      method,
      path,
      status: String(status),
    });
    this.observe("http_request_duration_seconds", durationMs / 1000, { method, path });
  }

  /**
   * Increment a named counter with arbitrary labels.
   */
  incrementCounter(name: string, labels: Labels = {}): void {
    let metric = this._counters.get(name);
    if (metric === undefined) {
      metric = new Map();
      this._counters.set(name, metric);
    }

    const key = labelsKey(labels);
    const entry = metric.get(key);
    if (entry !== undefined) {
      entry.count++;
    } else {
      metric.set(key, { labels: { ...labels }, count: 1 });
    }
  }

  /**
   * Set the buckets for a histogram before its first observation.
   */
  defineHistogram(name: string, buckets: readonly number[]): void {
    this._histogramBuckets.set(name, buckets);
  }

  /**
   * Add one observation (in seconds) to a named histogram.
   */
  observe(name: string, value: number, labels: Labels = {}): void {
    let metric = this._histograms.get(name);
    if (metric === undefined) {
      metric = new Map();
      this._histograms.set(name, metric);
    }

    const key = labelsKey(labels);
    let hist = metric.get(key);
    if (hist === undefined) {
      const buckets = this._histogramBuckets.get(name) ?? this._defaultBuckets;
      hist = {
        labels: { ...labels },
        sum: 0,
        count: 0,
        buckets: new Map(buckets.map((b) => [b, 0])),
      };
      metric.set(key, hist);
    }

    hist.sum += value;
    hist.count++;
    for (const le of hist.buckets.keys()) {
      if (value <= le) {
        hist.buckets.set(le, (hist.buckets.get(le) ?? 0) + 1);
      }
    }
  }

  /**
   * Current value of a counter, 0 when never incremented.
   */
  counterValue(name: string, labels: Labels = {}): number {
    return this._counters.get(name)?.get(labelsKey(labels))?.count ?? 0;
  }

  /**
   * Render metrics in Prometheus text exposition format.
   */
  render(): string {
    const lines: string[] = [];

    const counterNames = new Set(["http_requests_total", ...this._counters.keys()]);
    for (const name of counterNames) {
      lines.push(`# HELP ${name} ${HELP[name] ?? name}`);
      lines.push(`# TYPE ${name} counter`);
      for (const { labels, count } of this._counters.get(name)?.values() ?? []) {
        lines.push(`${name}${renderLabels(labels)} ${count}`);
      }
    }

    const histogramNames = new Set(["http_request_duration_seconds", ...this._histograms.keys()]);
    for (const name of histogramNames) {
      lines.push(`# HELP ${name} ${HELP[name] ?? name}`);
      lines.push(`# TYPE ${name} histogram`);
      for (const hist of this._histograms.get(name)?.values() ?? []) {
        for (const [le, count] of hist.buckets) {
          lines.push(`${name}_bucket${renderLabels(hist.labels, `le="${le}"`)} ${count}`);
        }
        lines.push(`${name}_bucket${renderLabels(hist.labels, 'le="+Inf"')} ${hist.count}`);
        lines.push(`${name}_sum${renderLabels(hist.labels)} ${hist.sum}`);
        lines.push(`${name}_count${renderLabels(hist.labels)} ${hist.count}`);
      }
    }

    return lines.join("\n") + "\n";
  }

  clear(): void {
    this._counters.clear();
    this._histograms.clear();
  }
}

// =============================================================================
// Pipeline adapter
// =============================================================================

/**
 * Feed pipeline events into the collector.
 */
export function createPipelineMetrics(collector: MetricsCollector): PipelineMetrics {
  collector.defineHistogram("event_processing_duration_seconds", PROCESSING_BUCKETS);

  return {
    eventReceived: (network: Network) => {
      collector.incrementCounter("events_received_total", { network });
    },
    eventProcessed: (network: Network, durationMs: number) => {
      collector.incrementCounter("events_processed_total", { network });
      collector.observe("event_processing_duration_seconds", durationMs / 1000, { network });
    },
    eventDeadLettered: (network: Network) => {
      collector.incrementCounter("events_dead_lettered_total", { network });
    },
  };
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create metrics collection middleware.
 *
 * Requests are labelled by matched route pattern, so /api/v1/trades/T1
 * and /api/v1/trades/T2 share one series.
 */
export function metricsMiddleware(
  collector: MetricsCollector,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();
    const durationMs = performance.now() - start;

    collector.recordRequest(c.req.method, c.req.routePath, c.res.status, durationMs);
  };
}

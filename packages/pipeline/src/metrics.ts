/**
 * Metrics hooks emitted by the pipeline.
 *
 * The HTTP layer adapts these to its Prometheus collector; anything
 * else (tests, a push exporter) can implement the interface directly.
 */

import type { Network } from "@escrowhook/types";

export interface PipelineMetrics {
  eventReceived(network: Network): void;
  eventProcessed(network: Network, durationMs: number): void;
  eventDeadLettered(network: Network): void;
}

export const noopMetrics: PipelineMetrics = {
  eventReceived: () => {},
  eventProcessed: () => {},
  eventDeadLettered: () => {},
};

/**
 * Tests for MetricsCollector and the pipeline metrics adapter.
 */

import { describe, it, expect } from "vitest";
import { createPipelineMetrics, MetricsCollector } from "../src/middleware/metrics.js";

describe("MetricsCollector", () => {
  it("render() produces Prometheus format for recorded requests", () => {
    const collector = new MetricsCollector();

    collector.recordRequest("GET", "/health", 200, 5);
    collector.recordRequest("POST", "/webhooks/:network", 200, 12);
    collector.recordRequest("GET", "/health", 200, 3);

    const output = collector.render();

    expect(output).toContain("# HELP http_requests_total Total HTTP requests");
    expect(output).toContain("# TYPE http_requests_total counter");
    expect(output).toContain('http_requests_total{method="GET",path="/health",status="200"} 2');
    expect(output).toContain(
      'http_requests_total{method="POST",path="/webhooks/:network",status="200"} 1',
    );
    expect(output).toContain("# TYPE http_request_duration_seconds histogram");
    expect(output).toContain(
      'http_request_duration_seconds_bucket{method="GET",path="/health",le="+Inf"} 2',
    );
    expect(output).toContain('http_request_duration_seconds_count{method="GET",path="/health"} 2');
  });

  it("render() returns headers only when nothing was recorded", () => {
    const output = new MetricsCollector().render();

    expect(output).toBe(
      [
        "# HELP http_requests_total Total HTTP requests",
        "# TYPE http_requests_total counter",
        "# HELP http_request_duration_seconds HTTP request duration in seconds",
        "# TYPE http_request_duration_seconds histogram",
        "",
      ].join("\n"),
    );
  });

  it("histogram sum reflects total duration", () => {
    const collector = new MetricsCollector();

    collector.recordRequest("GET", "/test", 200, 250);
    collector.recordRequest("GET", "/test", 200, 500);

    expect(collector.render()).toContain(
      'http_request_duration_seconds_sum{method="GET",path="/test"} 0.75\n',
    );
  });

  it("histogram buckets are cumulative", () => {
    const collector = new MetricsCollector();

    collector.recordRequest("GET", "/fast", 200, 5);
    collector.recordRequest("GET", "/fast", 200, 5000);

    const output = collector.render();
    expect(output).toContain(
      'http_request_duration_seconds_bucket{method="GET",path="/fast",le="0.005"} 1',
    );
    expect(output).toContain(
      'http_request_duration_seconds_bucket{method="GET",path="/fast",le="2.5"} 1',
    );
    expect(output).toContain(
      'http_request_duration_seconds_bucket{method="GET",path="/fast",le="5"} 2',
    );
  });

  it("counts named counters by label set", () => {
    const collector = new MetricsCollector();

    collector.incrementCounter("events_received_total", { network: "btc" });
    collector.incrementCounter("events_received_total", { network: "btc" });
    collector.incrementCounter("events_received_total", { network: "eth" });

    expect(collector.counterValue("events_received_total", { network: "btc" })).toBe(2);
    expect(collector.counterValue("events_received_total", { network: "sol" })).toBe(0);
    expect(collector.render()).toContain(
      "# HELP events_received_total Webhook events accepted into the queue",
    );
  });

  it("clear() resets all metrics", () => {
    const collector = new MetricsCollector();

    collector.recordRequest("GET", "/health", 200, 5);
    collector.incrementCounter("events_received_total", { network: "btc" });
    collector.clear();

    const output = collector.render();
    expect(output).not.toContain("http_requests_total{");
    expect(output).not.toContain("events_received_total");
    expect(collector.counterValue("events_received_total", { network: "btc" })).toBe(0);
  });
});

describe("createPipelineMetrics", () => {
  it("records processing time per network in the processing buckets", () => {
    const collector = new MetricsCollector();
    const metrics = createPipelineMetrics(collector);

    metrics.eventProcessed("sol", 20_000);
    metrics.eventDeadLettered("sol");

    const output = collector.render();
    expect(output).toContain('events_processed_total{network="sol"} 1');
    expect(output).toContain('events_dead_lettered_total{network="sol"} 1');
    expect(output).toContain('event_processing_duration_seconds_bucket{network="sol",le="10"} 0');
    expect(output).toContain('event_processing_duration_seconds_bucket{network="sol",le="30"} 1');
    expect(output).toContain('event_processing_duration_seconds_sum{network="sol"} 20');
  });
});

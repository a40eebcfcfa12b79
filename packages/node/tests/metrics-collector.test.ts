/**
 * Tests for MetricsCollector — render(), counters, gauges, clear().
 */

import { describe, it, expect } from "vitest";
import { MetricsCollector, UNMATCHED_PATH } from "../src/middleware/metrics.js";
import { createTestApp, primeHistory } from "./setup.js";

describe("MetricsCollector", () => {
  it("render() produces Prometheus format for recorded requests", () => {
    const collector = new MetricsCollector();

    collector.recordRequest("GET", "/health", 200, 5);
    collector.recordRequest("GET", "/get-gl-batch", 400, 12);
    collector.recordRequest("GET", "/health", 200, 3);

    const output = collector.render();

    expect(output).toContain("# TYPE http_requests_total counter");
    expect(output).toContain(
      'http_requests_total{method="GET",path="/health",status="200"} 2',
    );
    expect(output).toContain(
      'http_requests_total{method="GET",path="/get-gl-batch",status="400"} 1',
    );
    expect(output).toContain("# TYPE http_request_duration_seconds histogram");
    expect(output).toContain(
      'http_request_duration_seconds_bucket{method="GET",path="/health",le="+Inf"} 2',
    );
    expect(output).toContain(
      'http_request_duration_seconds_count{method="GET",path="/health"} 2',
    );
  });

  it("renders labelled counters with sorted labels", () => {
    const collector = new MetricsCollector();
    collector.incrementCounter("glstream_records_generated_total", { phase: "live" });
    collector.incrementCounter("glstream_records_generated_total", { phase: "live" });

    expect(collector.render()).toContain('glstream_records_generated_total{phase="live"} 2');
    expect(collector.counterValue("glstream_records_generated_total", { phase: "live" })).toBe(2);
    expect(collector.counterValue("glstream_records_generated_total", { phase: "historical" })).toBe(0);
  });

  it("renders observations into cumulative buckets", () => {
    const collector = new MetricsCollector([0.1, 1]);
    collector.describe("job_seconds", "Job time");
    collector.observe("job_seconds", 0.0625);
    collector.observe("job_seconds", 0.5);

    expect(collector.render()).toBe(
      [
        "# HELP job_seconds Job time",
        "# TYPE job_seconds histogram",
        'job_seconds_bucket{le="0.1"} 1',
        'job_seconds_bucket{le="1"} 2',
        'job_seconds_bucket{le="+Inf"} 2',
        "job_seconds_sum 0.5625",
        "job_seconds_count 2",
        "",
      ].join("\n"),
    );
  });

  it("reads gauges at render time", () => {
    const collector = new MetricsCollector();
    let value = 1;
    collector.registerGauge("glstream_stream_sessions_active", "Open streaming sessions", () => value);

    expect(collector.render()).toContain("glstream_stream_sessions_active 1\n");
    value = 4;
    expect(collector.render()).toContain("glstream_stream_sessions_active 4\n");
  });

  it("clear() resets counters but keeps gauges", () => {
    const collector = new MetricsCollector();
    collector.recordRequest("GET", "/health", 200, 5);
    collector.incrementCounter("glstream_stream_sessions_total");
    collector.registerGauge("glstream_buffer_records", "Records held in the shared buffer", () => 9);

    collector.clear();
    const output = collector.render();

    expect(output).not.toContain("http_requests_total{");
    expect(output).not.toContain("glstream_stream_sessions_total");
    expect(output).toContain("glstream_buffer_records 9\n");
  });
});

describe("GET /metrics", () => {
  it("exposes HTTP and generation metrics", async () => {
    const { app, service } = createTestApp();
    primeHistory(service);

    await app.request("/health");
    await app.request("/nope");
    const res = await app.request("/metrics");

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("text/plain; version=0.0.4; charset=utf-8");

    const output = await res.text();
    expect(output).toContain('http_requests_total{method="GET",path="/health",status="200"} 1');
    expect(output).toContain(
      `http_requests_total{method="GET",path="${UNMATCHED_PATH}",status="404"} 1`,
    );
    expect(output).toContain('glstream_records_generated_total{phase="historical"} 5');
    expect(output).toContain("glstream_stream_sessions_active 0\n");
    expect(output).toContain("glstream_buffer_records 5\n");
  });
});

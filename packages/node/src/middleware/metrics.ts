/**
 * Prometheus metrics middleware + collector.
 *
 * Hand-rolled Prometheus text format. Counters and histograms are
 * families of labelled series; HTTP requests feed
 * http_requests_total{method,path,status} and
 * http_request_duration_seconds{method,path}, and the service adds its
 * own counters and render-time gauges.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Series
// =============================================================================

type Labels = Readonly<Record<string, string>>;

interface Series<T> {
  readonly labels: Labels;
  value: T;
}

interface HistogramValue {
  sum: number;
  count: number;
  /** Cumulative count per upper bound, aligned with the collector's buckets */
  readonly le: number[];
}

/** One metric name and its series, keyed by the sorted label set. */
interface Family<T> {
  readonly series: Map<string, Series<T>>;
}

function sortedEntries(labels: Labels): [string, string][] {
  return Object.entries(labels).sort(([a], [b]) => a.localeCompare(b));
}

function labelsKeyOf(labels: Labels): string {
  return sortedEntries(labels)
    .map(([k, v]) => `${k}=${v}`)
    .join(",");
}

function formatLabels(labels: Labels, extra?: [string, string]): string {
  const pairs = sortedEntries(labels);
  if (extra !== undefined) pairs.push(extra);
  if (pairs.length === 0) return "";
  return `{${pairs.map(([k, v]) => `${k}="${v}"`).join(",")}}`;
}

function seriesOf<T>(
  families: Map<string, Family<T>>,
  name: string,
  labels: Labels,
  init: () => T,
): Series<T> {
  let family = families.get(name);
  if (family === undefined) {
    family = { series: new Map() };
    families.set(name, family);
  }
  const key = labelsKeyOf(labels);
  let series = family.series.get(key);
  if (series === undefined) {
    series = { labels: { ...labels }, value: init() };
    family.series.set(key, series);
  }
  return series;
}

export const HTTP_REQUESTS_METRIC = "http_requests_total";
export const HTTP_DURATION_METRIC = "http_request_duration_seconds";

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

// =============================================================================
// Metrics Collector
// =============================================================================

export class MetricsCollector {
  private readonly _buckets: readonly number[];
  private readonly _counters = new Map<string, Family<number>>();
  private readonly _histograms = new Map<string, Family<HistogramValue>>();
  private readonly _gauges = new Map<string, { help: string; read: () => number }>();
  private readonly _help = new Map<string, string>([
    [HTTP_REQUESTS_METRIC, "Total HTTP requests"],
    [HTTP_DURATION_METRIC, "HTTP request duration in seconds"],
  ]);

  constructor(buckets: readonly number[] = DEFAULT_BUCKETS) {
    this._buckets = buckets;
  }

  /** Set the HELP text rendered for a counter or histogram. */
  describe(name: string, help: string): void {
    this._help.set(name, help);
  }

  /**
   * Record an HTTP request as a counter increment and a duration observation.
   */
  recordRequest(method: string, path: string, status: number, durationMs: number): void {
    this.incrementCounter(HTTP_REQUESTS_METRIC, { method, path, status: String(status) });
    this.observe(HTTP_DURATION_METRIC, durationMs / 1000, { method, path });
  }

  incrementCounter(name: string, labels: Labels = {}): void {
    seriesOf(this._counters, name, labels, () => 0).value++;
  }

  observe(name: string, value: number, labels: Labels = {}): void {
    const hist = seriesOf(this._histograms, name, labels, () => ({
      sum: 0,
      count: 0,
      le: this._buckets.map(() => 0),
    })).value;
    hist.sum += value;
    hist.count++;
    this._buckets.forEach((bound, i) => {
      if (value <= bound) hist.le[i] = (hist.le[i] ?? 0) + 1;
    });
  }

  /**
   * Register a gauge whose value is read on every render.
   */
  registerGauge(name: string, help: string, read: () => number): void {
    this._gauges.set(name, { help, read });
  }

  /**
   * Render metrics in Prometheus text exposition format.
   * Families without series are left out.
   */
  render(): string {
    const lines: string[] = [];
    const header = (name: string, type: string, help?: string): void => {
      lines.push(`# HELP ${name} ${help ?? this._help.get(name) ?? name}`);
      lines.push(`# TYPE ${name} ${type}`);
    };

    for (const [name, family] of this._counters) {
      header(name, "counter");
      for (const { labels, value } of family.series.values()) {
        lines.push(`${name}${formatLabels(labels)} ${value}`);
      }
    }

    for (const [name, family] of this._histograms) {
      header(name, "histogram");
      for (const { labels, value } of family.series.values()) {
        this._buckets.forEach((bound, i) => {
          lines.push(`${name}_bucket${formatLabels(labels, ["le", String(bound)])} ${value.le[i] ?? 0}`);
        });
        lines.push(`${name}_bucket${formatLabels(labels, ["le", "+Inf"])} ${value.count}`);
        lines.push(`${name}_sum${formatLabels(labels)} ${value.sum}`);
        lines.push(`${name}_count${formatLabels(labels)} ${value.count}`);
      }
    }

    for (const [name, gauge] of this._gauges) {
      header(name, "gauge", gauge.help);
      lines.push(`${name} ${gauge.read()}`);
    }

    return lines.join("\n") + "\n";
  }

  /** Drop every counter and histogram series; gauges stay registered. */
  clear(): void {
    this._counters.clear();
    this._histograms.clear();
  }

  /** Current value of a counter series, 0 when never incremented. */
  counterValue(name: string, labels: Labels = {}): number {
    return this._counters.get(name)?.series.get(labelsKeyOf(labels))?.value ?? 0;
  }
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create metrics collection middleware.
 *
 * Records method, path, status, and duration for every request. Unmatched
 * paths are folded into one label so 404 probes cannot grow the series.
 */
export const UNMATCHED_PATH = "<unmatched>";

export function metricsMiddleware(
  collector: MetricsCollector,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();
    const durationMs = performance.now() - start;

    const path = c.res.status === 404 ? UNMATCHED_PATH : c.req.path;

    collector.recordRequest(
      c.req.method,
      path,
      c.res.status,
      durationMs,
    );
  };
}

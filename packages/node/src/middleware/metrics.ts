/**
 * Prometheus metrics middleware + collector.
 *
 * Hand-rolled Prometheus text format — no prom-client dependency.
 * Collects:
 * - http_requests_total{method,path,status}
 * - http_request_duration_seconds{method,path} (histogram)
 * - custody_operations_total{operation,outcome}, custody_events_total{type}
 * - gauges sampled at scrape time, e.g. custody_queue_depth
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Metrics Collector
// =============================================================================

type Labels = Record<string, string>;

interface CounterSeries {
  readonly labels: Labels;
  count: number;
}

interface HistogramSeries {
  readonly labels: Labels;
  sum: number;
  count: number;
  readonly buckets: number[]; // parallel to LATENCY_BUCKETS
}

/** Vault operations settle in-process; anything past 2.5s is an outlier */
const LATENCY_BUCKETS = [0.005, 0.025, 0.1, 0.5, 2.5];

const COUNTER_HELP: Record<string, string> = {
  http_requests_total: "Total HTTP requests",
  custody_operations_total: "Vault operations by outcome",
  custody_events_total: "Vault events emitted by type",
};

export class MetricsCollector {
  /** name → labels-key → series */
  private readonly _counters = new Map<string, Map<string, CounterSeries>>();
  private readonly _latency = new Map<string, HistogramSeries>();
  private readonly _gauges = new Map<string, { help: string; value: number }>();

  recordRequest(method: string, path: string, status: number, durationMs: number): void {
    this.incrementCounter("http_requests_total", { method, path, status: String(status) });

    const labels = { method, path };
    const key = renderLabels(labels);
    const series = this._latency.get(key) ?? {
      labels,
      sum: 0,
      count: 0,
      buckets: LATENCY_BUCKETS.map(() => 0),
    };
    this._latency.set(key, series);

    const seconds = durationMs / 1000;
    series.sum += seconds;
    series.count++;
    LATENCY_BUCKETS.forEach((le, i) => {
      if (seconds <= le) series.buckets[i] = (series.buckets[i] ?? 0) + 1;
    });
  }

  incrementCounter(name: string, labels: Labels = {}): void {
    let series = this._counters.get(name);
    if (series === undefined) {
      series = new Map();
      this._counters.set(name, series);
    }

    const key = renderLabels(labels);
    const entry = series.get(key);
    if (entry !== undefined) {
      entry.count++;
    } else {
      series.set(key, { labels: { ...labels }, count: 1 });
    }
  }

  /**
   * Current count of a counter series, 0 when never incremented.
   */
  counterValue(name: string, labels: Labels = {}): number {
    return this._counters.get(name)?.get(renderLabels(labels))?.count ?? 0;
  }

  setGauge(name: string, help: string, value: number): void {
    this._gauges.set(name, { help, value });
  }

  /**
   * Render metrics in Prometheus text exposition format.
   */
  render(): string {
    const lines: string[] = [];

    for (const [name, series] of this._counters) {
      lines.push(`# HELP ${name} ${COUNTER_HELP[name] ?? name}`);
      lines.push(`# TYPE ${name} counter`);
      for (const { labels, count } of series.values()) {
        lines.push(`${sample(name, labels)} ${count}`);
      }
    }

    if (this._latency.size > 0) {
      const name = "http_request_duration_seconds";
      lines.push(`# HELP ${name} HTTP request duration in seconds`);
      lines.push(`# TYPE ${name} histogram`);
      for (const { labels, sum, count, buckets } of this._latency.values()) {
        LATENCY_BUCKETS.forEach((le, i) => {
          lines.push(`${sample(`${name}_bucket`, { ...labels, le: String(le) })} ${buckets[i] ?? 0}`);
        });
        lines.push(`${sample(`${name}_bucket`, { ...labels, le: "+Inf" })} ${count}`);
        lines.push(`${sample(`${name}_sum`, labels)} ${sum}`);
        lines.push(`${sample(`${name}_count`, labels)} ${count}`);
      }
    }

    for (const [name, { help, value }] of this._gauges) {
      lines.push(`# HELP ${name} ${help}`);
      lines.push(`# TYPE ${name} gauge`);
      lines.push(`${name} ${value}`);
    }

    return lines.join("\n") + "\n";
  }
}

/** Labels in sorted order, except `le`, which Prometheus expects last. */
function renderLabels(labels: Labels): string {
  return Object.entries(labels)
    .sort(([a], [b]) => (a === "le" ? 1 : b === "le" ? -1 : a.localeCompare(b)))
    .map(([k, v]) => `${k}="${v}"`)
    .join(",");
}

function sample(name: string, labels: Labels): string {
  const rendered = renderLabels(labels);
  return rendered.length > 0 ? `${name}{${rendered}}` : name;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Collapse per-account paths so label cardinality stays bounded.
 */
export function normalizePath(path: string): string {
  return path.replace(/^\/api\/v1\/balances\/[^/]+\/[^/]+$/, "/api/v1/balances/:account/:asset");
}

/**
 * Records method, normalized path, status and duration for every request.
 */
export function metricsMiddleware(collector: MetricsCollector): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();
    collector.recordRequest(
      c.req.method,
      normalizePath(c.req.path),
      c.res.status,
      performance.now() - start,
    );
  };
}

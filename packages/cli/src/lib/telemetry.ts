/**
 * Telemetry and observability helpers
 */

import type { MetricsCollector } from "@cirrus/sdk";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Receives finished metric lines; absent unless verbose
 */
export type MetricSink = (line: string) => void;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ") + "\n";
}

/**
 * Emit a metric line if a sink is given
 */
export function emitMetric(sink: MetricSink | undefined, key: string, fields: Record<string, unknown>): void {
  if (!sink) {
    return;
  }
  sink(formatMetric(key, fields));
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>, sink?: MetricSink): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(sink, label, {
      duration_ms: duration,
      success,
    });
  }
}

/**
 * One `metric http` line per endpoint the invocation called
 */
export function emitRequestMetrics(sink: MetricSink | undefined, metrics: MetricsCollector): void {
  for (const [endpoint, m] of metrics.getAllMetrics()) {
    const [method = "", route = ""] = endpoint.split(" ");
    emitMetric(sink, "http", {
      method,
      route,
      requests: m.requestCount,
      errors: m.errorCount,
      p95_ms: Math.round(metrics.getP95Latency(method, route)),
    });
  }
}

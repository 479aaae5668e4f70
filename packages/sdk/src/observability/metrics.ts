/**
 * Metrics tracking for API requests
 */

export interface EndpointMetrics {
  requestCount: number;
  errorCount: number;
  statusCounts: Record<number, number>;
  latencyMs: number[];
}

const MAX_SAMPLES = 100;

export class MetricsCollector {
  #metrics = new Map<string, EndpointMetrics>();

  #getMetrics(method: string, route: string): EndpointMetrics {
    const key = `${method} ${route}`;
    let metrics = this.#metrics.get(key);
    if (!metrics) {
      metrics = {
        requestCount: 0,
        errorCount: 0,
        statusCounts: {},
        latencyMs: [],
      };
      this.#metrics.set(key, metrics);
    }
    return metrics;
  }

  /**
   * Record a completed request. `status` is 0 for transport failures.
   */
  recordRequest(method: string, route: string, status: number, ms: number): void {
    const metrics = this.#getMetrics(method, route);
    metrics.requestCount++;
    if (status === 0 || status >= 400) {
      metrics.errorCount++;
    }
    metrics.statusCounts[status] = (metrics.statusCounts[status] ?? 0) + 1;
    metrics.latencyMs.push(ms);

    if (metrics.latencyMs.length > MAX_SAMPLES) {
      metrics.latencyMs.shift();
    }
  }

  getMetrics(method: string, route: string): EndpointMetrics | undefined {
    return this.#metrics.get(`${method} ${route}`);
  }

  getAllMetrics(): Map<string, EndpointMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  getP95Latency(method: string, route: string): number {
    const metrics = this.#metrics.get(`${method} ${route}`);
    return metrics ? this.getP95(metrics.latencyMs) : 0;
  }

  reset(): void {
    this.#metrics.clear();
  }
}

/**
 * Replace numeric and UUID path segments with `:id` so that metrics group by
 * endpoint rather than by resource
 */
export function normalizeRoute(path: string): string {
  const pathname = path.split("?")[0] ?? path;
  return pathname
    .split("/")
    .map((segment) =>
      /^\d+$/.test(segment) || /^[0-9a-f]{8}-[0-9a-f-]{27,}$/i.test(segment) ? ":id" : segment
    )
    .join("/");
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();

/**
 * Storage MCP Gateway - Metrics collection
 *
 * In-process counters, gauges and histograms for gating and tool calls.
 */

/**
 * Histogram statistics.
 */
export interface HistogramStats {
  count: number;
  min: number;
  max: number;
  avg: number;
  sum: number;
  p50: number;
  p90: number;
  p95: number;
  p99: number;
}

/**
 * Running timer handle.
 */
interface Timer {
  stop: () => number;
}

/**
 * Metrics collection implementation.
 */
export class Metrics {
  private counters: Map<string, number> = new Map();
  private gauges: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();
  private startTime: number = Date.now();
  private maxHistogramSize: number = 1000;

  /**
   * Increment a counter.
   */
  increment(name: string, value: number = 1): void {
    const current = this.counters.get(name) || 0;
    this.counters.set(name, current + value);
  }

  /**
   * Set a gauge value.
   */
  gauge(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  /**
   * Record a histogram value.
   */
  histogram(name: string, value: number): void {
    let values = this.histograms.get(name);

    if (!values) {
      values = [];
      this.histograms.set(name, values);
    }

    values.push(value);

    // Keep histogram size bounded by trimming oldest values.
    if (values.length > this.maxHistogramSize) {
      values.shift();
    }
  }

  /**
   * Start a timer that records into a duration histogram when stopped.
   */
  startTimer(name: string): Timer {
    const start = Date.now();
    let stopped = false;

    return {
      stop: (): number => {
        if (stopped) return 0;
        stopped = true;
        const duration = Date.now() - start;
        this.histogram(name, duration);
        return duration;
      }
    };
  }

  private calculateHistogramStats(values: number[]): HistogramStats {
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0, sum: 0, p50: 0, p90: 0, p95: 0, p99: 0 };
    }

    const sorted = [...values].sort((a, b) => a - b);
    const sum = values.reduce((a, b) => a + b, 0);

    const percentile = (p: number): number => {
      const index = Math.ceil((p / 100) * sorted.length) - 1;
      return sorted[Math.max(0, index)];
    };

    return {
      count: values.length,
      min: sorted[0],
      max: sorted[sorted.length - 1],
      avg: Math.round((sum / values.length) * 100) / 100,
      sum,
      p50: percentile(50),
      p90: percentile(90),
      p95: percentile(95),
      p99: percentile(99)
    };
  }

  /**
   * Return all metrics as a structured payload.
   */
  getAll(): Record<string, unknown> {
    const histogramStats: Record<string, HistogramStats> = {};

    for (const [name, values] of this.histograms) {
      histogramStats[name] = this.calculateHistogramStats(values);
    }

    return {
      uptime_ms: Date.now() - this.startTime,
      collected_at: new Date().toISOString(),
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      histograms: histogramStats
    };
  }

  getCounter(name: string): number {
    return this.counters.get(name) || 0;
  }

  /**
   * Reset all metrics.
   */
  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
    this.startTime = Date.now();
  }
}

// Singleton instance.
export const metrics = new Metrics();

// Predefined metric name constants.
export const MetricNames = {
  // Counters
  TOOLS_LIST_TOTAL: 'tools_list_total',
  TOOL_CALLS_TOTAL: 'tool_calls_total',
  TOOL_CALLS_SUCCESS: 'tool_calls_success',
  TOOL_CALLS_FAILED: 'tool_calls_failed',
  TOOL_CALLS_DENIED: 'tool_calls_denied',
  CONTEXT_LIMIT_EXCEEDED: 'context_limit_exceeded',
  RPC_ERRORS: 'rpc_errors',
  AUTH_FAILURES: 'auth_failures',

  // Gauges
  CACHED_SESSIONS: 'cached_sessions',

  // Histograms
  LISTED_TOOLS: 'listed_tools',
  CONTEXT_SIZE_TOKENS: 'context_size_tokens',
  TOOL_DURATION_MS: 'tool_duration_ms',
} as const;

/**
 * =============================================================================
 * METRICS SERVICE - Application Performance Monitoring
 * =============================================================================
 *
 * Collects and exposes metrics for Prometheus scraping.
 *
 * METRICS COLLECTED:
 * - HTTP request duration (histogram) and count by status code
 * - Optimization outcomes by kind
 * - Pipeline stage durations
 * - Geocoding cache hit/miss, outbound provider calls
 * - Solver queue depth and wait time
 * - Memory usage
 *
 * ENDPOINT: GET /metrics (Prometheus format)
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';

// =============================================================================
// METRIC TYPES
// =============================================================================

interface CounterMetric {
  name: string;
  help: string;
  labels: Map<string, number>;
}

interface GaugeMetric {
  name: string;
  help: string;
  value: number;
}

interface HistogramSeries {
  bucketCounts: number[]; // cumulative, last slot is +Inf
  sum: number;
  count: number;
}

interface HistogramMetric {
  name: string;
  help: string;
  buckets: number[];
  series: Map<string, HistogramSeries>;
}

// Pre-defined histogram buckets (in milliseconds for latency)
const LATENCY_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000];

const COUNTERS: Array<[string, string]> = [
  ['http_requests_total', 'Total number of HTTP requests'],
  ['optimizations_total', 'Optimization requests by outcome'],
  ['geocoding_requests_total', 'Outbound geocoding requests by provider and outcome'],
  ['geocoding_cache_hits_total', 'Address cache hits'],
  ['geocoding_cache_misses_total', 'Address cache misses'],
  ['routing_requests_total', 'Outbound routing service requests by operation and outcome'],
  ['solver_queue_rejected_total', 'Solves rejected because the queue was full'],
  ['solver_queue_timeout_total', 'Solves that timed out waiting for a slot']
];

const GAUGES: Array<[string, string]> = [
  ['http_active_requests', 'Number of currently active HTTP requests'],
  ['solver_active', 'Solves currently running'],
  ['solver_queue_size', 'Solves waiting for a slot'],
  ['nodejs_memory_heap_used_bytes', 'Node.js heap memory used']
];

const HISTOGRAMS: Array<[string, string]> = [
  ['http_request_duration_ms', 'HTTP request duration in milliseconds'],
  ['pipeline_stage_duration_ms', 'Optimization pipeline stage duration in milliseconds'],
  ['solver_queue_wait_ms', 'Time spent waiting for a solver slot in milliseconds']
];

// =============================================================================
// METRICS STORAGE
// =============================================================================

export class MetricsService {
  private counters: Map<string, CounterMetric> = new Map();
  private gauges: Map<string, GaugeMetric> = new Map();
  private histograms: Map<string, HistogramMetric> = new Map();

  constructor(collectSystemMetrics: boolean = true) {
    for (const [name, help] of COUNTERS) {
      this.counters.set(name, { name, help, labels: new Map() });
    }
    for (const [name, help] of GAUGES) {
      this.gauges.set(name, { name, help, value: 0 });
    }
    for (const [name, help] of HISTOGRAMS) {
      this.histograms.set(name, { name, help, buckets: LATENCY_BUCKETS, series: new Map() });
    }
    if (collectSystemMetrics) {
      this.startSystemMetricsCollection();
    }
  }

  /**
   * Start collecting system metrics periodically
   */
  private startSystemMetricsCollection(): void {
    const timer = setInterval(() => {
      this.setGauge('nodejs_memory_heap_used_bytes', process.memoryUsage().heapUsed);
    }, 15000);
    // Prevent this timer from blocking Jest process exit.
    timer.unref();
  }

  // ===========================================================================
  // COUNTER METHODS
  // ===========================================================================

  incrementCounter(name: string, labels: Record<string, string> = {}, value: number = 1): void {
    const counter = this.counters.get(name);
    if (!counter) {
      logger.warn(`Counter ${name} not found`);
      return;
    }

    const labelKey = this.labelsToKey(labels);
    counter.labels.set(labelKey, (counter.labels.get(labelKey) ?? 0) + value);
  }

  // ===========================================================================
  // GAUGE METHODS
  // ===========================================================================

  setGauge(name: string, value: number): void {
    const gauge = this.gauges.get(name);
    if (gauge) {
      gauge.value = value;
    }
  }

  incrementGauge(name: string, value: number = 1): void {
    const gauge = this.gauges.get(name);
    if (gauge) {
      gauge.value += value;
    }
  }

  decrementGauge(name: string, value: number = 1): void {
    const gauge = this.gauges.get(name);
    if (gauge) {
      gauge.value = Math.max(0, gauge.value - value);
    }
  }

  // ===========================================================================
  // HISTOGRAM METHODS
  // ===========================================================================

  observeHistogram(name: string, value: number, labels: Record<string, string> = {}): void {
    const histogram = this.histograms.get(name);
    if (!histogram) {
      logger.warn(`Histogram ${name} not found`);
      return;
    }

    const labelKey = this.labelsToKey(labels);
    let series = histogram.series.get(labelKey);
    if (!series) {
      series = { bucketCounts: new Array<number>(histogram.buckets.length + 1).fill(0), sum: 0, count: 0 };
      histogram.series.set(labelKey, series);
    }

    for (let i = 0; i < histogram.buckets.length; i++) {
      if (value <= histogram.buckets[i]) {
        series.bucketCounts[i] += 1;
      }
    }
    // +Inf bucket is always incremented.
    series.bucketCounts[histogram.buckets.length] += 1;
    series.sum += value;
    series.count += 1;
  }

  /**
   * Create a timer for measuring duration.
   * Returns the elapsed milliseconds when stopped.
   */
  startTimer(histogramName: string, labels: Record<string, string> = {}): () => number {
    const start = process.hrtime.bigint();
    return () => {
      const duration = Number(process.hrtime.bigint() - start) / 1e6;
      this.observeHistogram(histogramName, duration, labels);
      return duration;
    };
  }

  // ===========================================================================
  // PROMETHEUS FORMAT EXPORT
  // ===========================================================================

  getPrometheusMetrics(): string {
    const lines: string[] = [];

    for (const counter of this.counters.values()) {
      lines.push(`# HELP ${counter.name} ${counter.help}`);
      lines.push(`# TYPE ${counter.name} counter`);
      for (const [labelKey, value] of counter.labels) {
        lines.push(labelKey === '' ? `${counter.name} ${value}` : `${counter.name}{${labelKey}} ${value}`);
      }
    }

    for (const gauge of this.gauges.values()) {
      lines.push(`# HELP ${gauge.name} ${gauge.help}`);
      lines.push(`# TYPE ${gauge.name} gauge`);
      lines.push(`${gauge.name} ${gauge.value}`);
    }

    for (const histogram of this.histograms.values()) {
      lines.push(`# HELP ${histogram.name} ${histogram.help}`);
      lines.push(`# TYPE ${histogram.name} histogram`);

      for (const [labelKey, series] of histogram.series) {
        const labelPart = labelKey ? `${labelKey},` : '';
        histogram.buckets.forEach((bucket, i) => {
          lines.push(`${histogram.name}_bucket{${labelPart}le="${bucket}"} ${series.bucketCounts[i]}`);
        });
        lines.push(`${histogram.name}_bucket{${labelPart}le="+Inf"} ${series.bucketCounts[histogram.buckets.length]}`);
        const suffix = labelKey ? `{${labelKey}}` : '';
        lines.push(`${histogram.name}_sum${suffix} ${series.sum}`);
        lines.push(`${histogram.name}_count${suffix} ${series.count}`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Get metrics as JSON (for health endpoint)
   */
  getMetricsJSON(): Record<string, unknown> {
    return {
      counters: Object.fromEntries(
        Array.from(this.counters.entries()).map(([name, c]) => [name, Object.fromEntries(c.labels)])
      ),
      gauges: Object.fromEntries(
        Array.from(this.gauges.entries()).map(([name, g]) => [name, g.value])
      )
    };
  }

  private labelsToKey(labels: Record<string, string>): string {
    return Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(',');
  }
}

export const metrics = new MetricsService();

// =============================================================================
// EXPRESS MIDDLEWARE
// =============================================================================

/**
 * Middleware to track HTTP request metrics
 */
export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const startTime = process.hrtime.bigint();

  metrics.incrementGauge('http_active_requests');

  res.on('finish', () => {
    const duration = Number(process.hrtime.bigint() - startTime) / 1e6;
    const labels = {
      method: req.method,
      path: getRoutePath(req),
      status: String(res.statusCode)
    };

    metrics.incrementCounter('http_requests_total', labels);
    metrics.observeHistogram('http_request_duration_ms', duration, labels);
    metrics.decrementGauge('http_active_requests');
  });

  next();
}

/**
 * Matched route when available, so unknown paths do not explode label cardinality
 */
function getRoutePath(req: Request): string {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return req.baseUrl + route.path;
  }
  return 'unmatched';
}

/**
 * Metrics endpoint handler
 */
export function metricsHandler(_req: Request, res: Response): void {
  res.set('Content-Type', 'text/plain');
  res.send(metrics.getPrometheusMetrics());
}

/**
 * Metrics Collection Module
 *
 * Counters and histograms for evaluation latency, per-vendor scoring
 * outcomes, disqualifications, confidence distribution and report cache use.
 */

import type { TelemetryClient } from '../logging/logger.js';

/**
 * Metric types supported by the collector
 */
export const MetricType = {
  COUNTER: 'counter',
  HISTOGRAM: 'histogram',
} as const;

export type MetricType = (typeof MetricType)[keyof typeof MetricType];

/**
 * Metric entry for tracking
 */
export interface MetricEntry {
  name: string;
  type: MetricType;
  value: number;
  timestamp: Date;
  tags: Record<string, string>;
}

/**
 * Histogram bucket configuration
 */
export interface HistogramBuckets {
  boundaries: number[];
  counts: number[];
  sum: number;
  count: number;
}

/**
 * Timer result
 */
export interface TimerResult {
  durationMs: number;
  startTime: Date;
  endTime: Date;
}

/**
 * Metrics collector configuration
 */
export interface MetricsCollectorConfig {
  serviceName: string;
  enableConsole: boolean;
  enableTelemetry: boolean;
  telemetryClient?: TelemetryClient;
  defaultTags: Record<string, string>;
}

/**
 * Default metrics collector configuration
 */
export const defaultMetricsConfig: MetricsCollectorConfig = {
  serviceName: 'proposal-evaluation',
  enableConsole: false,
  enableTelemetry: false,
  defaultTags: {},
};

/**
 * Metric names emitted by the evaluation engine
 */
export const MetricNames = {
  REQUEST_LATENCY: 'request_latency_ms',
  REQUEST_COUNT: 'request_count',
  REQUEST_ERROR_COUNT: 'request_error_count',

  EVALUATION_LATENCY: 'evaluation_latency_ms',
  EVALUATION_COUNT: 'evaluation_count',

  VENDOR_SCORING_COUNT: 'vendor_scoring_count',
  VENDOR_SCORING_ERROR_COUNT: 'vendor_scoring_error_count',
  DISQUALIFICATION_COUNT: 'disqualification_count',

  CONFIDENCE_SCORE: 'confidence_score',
  LOW_CONFIDENCE_COUNT: 'low_confidence_count',

  CACHE_HIT_COUNT: 'cache_hit_count',
  CACHE_MISS_COUNT: 'cache_miss_count',
} as const;

/**
 * Default histogram buckets for latency metrics (in milliseconds)
 */
export const DEFAULT_LATENCY_BUCKETS = [1, 5, 10, 25, 50, 100, 250, 500, 1000, 5000];

/**
 * Default histogram buckets for confidence scores (0-1)
 */
export const DEFAULT_CONFIDENCE_BUCKETS = [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1.0];

/**
 * Metrics Collector
 */
export class MetricsCollector {
  private config: MetricsCollectorConfig;
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, HistogramBuckets> = new Map();
  private metricEntries: MetricEntry[] = [];

  constructor(config: Partial<MetricsCollectorConfig> = {}) {
    this.config = { ...defaultMetricsConfig, ...config };
  }

  /**
   * Gets all metric entries (for testing)
   */
  getMetricEntries(): MetricEntry[] {
    return [...this.metricEntries];
  }

  /**
   * Clears all metrics (for testing)
   */
  clear(): void {
    this.counters.clear();
    this.histograms.clear();
    this.metricEntries = [];
  }

  /**
   * Creates a metric key with tags
   */
  private createMetricKey(name: string, tags: Record<string, string>): string {
    const sortedTags = Object.entries(tags)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return sortedTags ? `${name}:${sortedTags}` : name;
  }

  /**
   * Records a metric entry
   */
  private recordEntry(
    name: string,
    type: MetricType,
    value: number,
    tags: Record<string, string> = {}
  ): void {
    const entry: MetricEntry = {
      name,
      type,
      value,
      timestamp: new Date(),
      tags: { ...this.config.defaultTags, ...tags },
    };

    this.metricEntries.push(entry);

    if (this.config.enableConsole) {
      console.log(JSON.stringify(entry));
    }

    if (this.config.enableTelemetry && this.config.telemetryClient) {
      const properties: Record<string, string> = {
        service: this.config.serviceName,
        metricType: type,
        ...entry.tags,
      };

      this.config.telemetryClient.trackMetric(name, value, properties);
    }
  }

  /**
   * Increments a counter metric
   */
  incrementCounter(name: string, value = 1, tags: Record<string, string> = {}): void {
    const key = this.createMetricKey(name, tags);
    const current = this.counters.get(key) || 0;
    this.counters.set(key, current + value);
    this.recordEntry(name, MetricType.COUNTER, value, tags);
  }

  /**
   * Gets the current value of a counter
   */
  getCounter(name: string, tags: Record<string, string> = {}): number {
    const key = this.createMetricKey(name, tags);
    return this.counters.get(key) || 0;
  }

  /**
   * Records a value in a histogram
   */
  recordHistogram(
    name: string,
    value: number,
    tags: Record<string, string> = {},
    buckets: number[] = DEFAULT_LATENCY_BUCKETS
  ): void {
    const key = this.createMetricKey(name, tags);

    let histogram = this.histograms.get(key);
    if (!histogram) {
      histogram = {
        boundaries: buckets,
        counts: new Array(buckets.length + 1).fill(0),
        sum: 0,
        count: 0,
      };
      this.histograms.set(key, histogram);
    }

    // Find the bucket for this value
    let bucketIndex = histogram.boundaries.length;
    for (let i = 0; i < histogram.boundaries.length; i++) {
      if (value <= histogram.boundaries[i]) {
        bucketIndex = i;
        break;
      }
    }

    histogram.counts[bucketIndex]++;
    histogram.sum += value;
    histogram.count++;

    this.recordEntry(name, MetricType.HISTOGRAM, value, tags);
  }

  /**
   * Gets histogram statistics
   */
  getHistogram(
    name: string,
    tags: Record<string, string> = {}
  ): HistogramBuckets | undefined {
    const key = this.createMetricKey(name, tags);
    return this.histograms.get(key);
  }

  /**
   * Starts a timer and returns a function to stop it
   */
  startTimer(): () => TimerResult {
    const startTime = new Date();

    return () => {
      const endTime = new Date();
      return {
        durationMs: endTime.getTime() - startTime.getTime(),
        startTime,
        endTime,
      };
    };
  }

  /**
   * Records request latency
   */
  recordRequestLatency(durationMs: number, tags: Record<string, string> = {}): void {
    this.recordHistogram(MetricNames.REQUEST_LATENCY, durationMs, tags);
    this.incrementCounter(MetricNames.REQUEST_COUNT, 1, tags);
  }

  recordRequestError(tags: Record<string, string> = {}): void {
    this.incrementCounter(MetricNames.REQUEST_ERROR_COUNT, 1, tags);
  }

  /**
   * Records the wall-clock time of a full evaluation run
   */
  recordEvaluationLatency(durationMs: number, tags: Record<string, string> = {}): void {
    this.recordHistogram(MetricNames.EVALUATION_LATENCY, durationMs, tags);
    this.incrementCounter(MetricNames.EVALUATION_COUNT, 1, tags);
  }

  /**
   * Records the outcome of scoring one vendor
   */
  recordVendorScored(outcome: 'scored' | 'failed' | 'disqualified'): void {
    this.incrementCounter(MetricNames.VENDOR_SCORING_COUNT, 1, { outcome });

    if (outcome === 'failed') {
      this.incrementCounter(MetricNames.VENDOR_SCORING_ERROR_COUNT);
    } else if (outcome === 'disqualified') {
      this.incrementCounter(MetricNames.DISQUALIFICATION_COUNT);
    }
  }

  /**
   * Records an overall confidence value; values under the threshold also
   * bump the low-confidence counter
   */
  recordConfidenceScore(
    score: number,
    lowConfidenceThreshold: number,
    tags: Record<string, string> = {}
  ): void {
    this.recordHistogram(MetricNames.CONFIDENCE_SCORE, score, tags, DEFAULT_CONFIDENCE_BUCKETS);

    if (score < lowConfidenceThreshold) {
      this.incrementCounter(MetricNames.LOW_CONFIDENCE_COUNT, 1, tags);
    }
  }

  recordCacheHit(cacheName: string): void {
    this.incrementCounter(MetricNames.CACHE_HIT_COUNT, 1, { cache: cacheName });
  }

  recordCacheMiss(cacheName: string): void {
    this.incrementCounter(MetricNames.CACHE_MISS_COUNT, 1, { cache: cacheName });
  }

  /**
   * Gets average latency from histogram
   */
  getAverageLatency(
    metricName: string,
    tags: Record<string, string> = {}
  ): number {
    const histogram = this.getHistogram(metricName, tags);
    if (!histogram || histogram.count === 0) {
      return 0;
    }
    return histogram.sum / histogram.count;
  }

  /**
   * Flushes metrics to the telemetry sink
   */
  flush(): void {
    if (this.config.enableTelemetry && this.config.telemetryClient) {
      this.config.telemetryClient.flush();
    }
  }

  /**
   * Gets a summary of all metrics
   */
  getSummary(): Record<string, unknown> {
    const histograms: Record<string, unknown> = {};

    for (const [key, histogram] of this.histograms) {
      histograms[key] = {
        count: histogram.count,
        sum: histogram.sum,
        average: histogram.count > 0 ? histogram.sum / histogram.count : 0,
        buckets: histogram.boundaries.map((boundary, i) => ({
          le: boundary,
          count: histogram.counts[i],
        })),
      };
    }

    return {
      counters: Object.fromEntries(this.counters),
      histograms,
    };
  }
}

/**
 * Creates a metrics collector instance
 */
export function createMetricsCollector(
  config: Partial<MetricsCollectorConfig> = {}
): MetricsCollector {
  return new MetricsCollector(config);
}

/**
 * Property 12: Evaluation Logging and Metrics
 *
 * Every evaluation logs one structured summary with its correlation ID and
 * records per-vendor outcomes, confidence and latency metrics.
 *
 * @file src/backend/shared/src/logging/logger.ts
 * @file src/backend/shared/src/metrics/metrics-collector.ts
 */

import fc from 'fast-check';
import { describe, expect, it, beforeEach } from 'vitest';

import {
  InMemoryTelemetryClient,
  MetricNames,
  createLogger,
  createMetricsCollector,
  DEFAULT_CONFIDENCE_BUCKETS,
  type MetricsCollector,
} from '../../src/backend/shared/src/index.js';
import { EvaluationService } from '../../src/backend/api/src/services/evaluation-service.js';
import { buildFixtureScorecard, buildFixtureStore } from '../helpers/fixtures.js';

const propertyConfig = {
  numRuns: 50,
  verbose: false,
};

describe('Property 12: Evaluation Logging and Metrics', () => {
  describe('logger', () => {
    it('binds child loggers to a correlation ID', () => {
      const telemetry = new InMemoryTelemetryClient();
      const logger = createLogger({ enableConsole: false, enableTelemetry: true, telemetryClient: telemetry });

      logger.child('corr-1').info('Scoring started', { vendorCount: 3 });

      expect(telemetry.traces).toEqual([
        {
          message: 'Scoring started',
          severity: 1,
          properties: {
            service: 'proposal-evaluation',
            correlationId: 'corr-1',
            metadata: '{"vendorCount":3}',
          },
        },
      ]);
    });

    it('drops entries below the minimum level', () => {
      const logger = createLogger({ enableConsole: false, minLevel: 'warn' });
      logger.debug('noise');
      logger.info('noise');
      logger.warn('kept');

      expect(logger.getLogEntries().map((entry) => entry.message)).toEqual(['kept']);
    });

    it('logs an evaluation with failures as a warning', () => {
      const logger = createLogger({ enableConsole: false });
      logger.logEvaluation({
        correlationId: 'corr-2',
        evaluationId: 'eval-1',
        vendorCount: 3,
        criterionCount: 4,
        evidenceCount: 10,
        scoredVendors: 2,
        failedVendors: ['globex'],
        disqualifiedVendors: [],
        cacheHit: false,
        processingTimeMs: 12,
      });

      const [entry] = logger.getLogEntries();
      expect(entry.level).toBe('warn');
      expect(entry.message).toBe('Evaluation completed with vendor failures');
      expect(entry.correlationId).toBe('corr-2');
      expect(entry.metadata).toEqual({
        evaluationId: 'eval-1',
        vendorCount: 3,
        criterionCount: 4,
        evidenceCount: 10,
        scoredVendors: 2,
        cacheHit: false,
        processingTimeMs: 12,
        failedVendors: ['globex'],
      });
    });
  });

  describe('metrics collector', () => {
    let metrics: MetricsCollector;

    beforeEach(() => {
      metrics = createMetricsCollector();
    });

    it('counts vendor outcomes by tag', () => {
      metrics.recordVendorScored('scored');
      metrics.recordVendorScored('disqualified');
      metrics.recordVendorScored('failed');

      expect(metrics.getCounter(MetricNames.VENDOR_SCORING_COUNT, { outcome: 'scored' })).toBe(1);
      expect(metrics.getCounter(MetricNames.DISQUALIFICATION_COUNT)).toBe(1);
      expect(metrics.getCounter(MetricNames.VENDOR_SCORING_ERROR_COUNT)).toBe(1);
    });

    it('counts confidence below the threshold as low', () => {
      metrics.recordConfidenceScore(0.3, 0.5);
      metrics.recordConfidenceScore(0.5, 0.5);

      expect(metrics.getCounter(MetricNames.LOW_CONFIDENCE_COUNT)).toBe(1);
      const histogram = metrics.getHistogram(MetricNames.CONFIDENCE_SCORE);
      expect(histogram?.count).toBe(2);
      expect(histogram?.boundaries).toEqual(DEFAULT_CONFIDENCE_BUCKETS);
      // 0.3 lands in the <=0.3 bucket, 0.5 in the <=0.5 bucket
      expect(histogram?.counts[2]).toBe(1);
      expect(histogram?.counts[4]).toBe(1);
    });

    it('summarizes counters and histograms', () => {
      metrics.recordRequestLatency(20, { method: 'POST' });

      const summary = metrics.getSummary();
      expect(summary.counters).toEqual({ 'request_count:method=POST': 1 });
      expect(summary.histograms).toEqual({
        'request_latency_ms:method=POST': expect.objectContaining({ count: 1, sum: 20, average: 20 }),
      });
    });

    it('should average any latency samples exactly', () => {
      fc.assert(
        fc.property(fc.array(fc.integer({ min: 0, max: 10_000 }), { minLength: 1, maxLength: 20 }), (samples) => {
          const local = createMetricsCollector();
          samples.forEach((sample) => local.recordEvaluationLatency(sample));

          const expected = samples.reduce((total, sample) => total + sample, 0) / samples.length;
          expect(local.getAverageLatency(MetricNames.EVALUATION_LATENCY)).toBeCloseTo(expected, 9);
          expect(local.getCounter(MetricNames.EVALUATION_COUNT)).toBe(samples.length);
        }),
        propertyConfig
      );
    });
  });

  describe('evaluation service', () => {
    it('logs one summary per evaluation and records vendor outcomes', async () => {
      const telemetry = new InMemoryTelemetryClient();
      const metrics = createMetricsCollector();
      const service = new EvaluationService({
        logger: createLogger({ enableConsole: false, enableTelemetry: true, telemetryClient: telemetry }),
        metrics,
      });
      const scorecard = buildFixtureScorecard();

      await service.evaluate({
        scorecard,
        evidenceStore: buildFixtureStore(scorecard),
        correlationId: 'corr-eval',
      });

      expect(telemetry.traces).toHaveLength(1);
      const [trace] = telemetry.traces;
      expect(trace.message).toBe('Evaluation completed');
      expect(trace.properties?.correlationId).toBe('corr-eval');
      expect(trace.properties?.metadata).toContain('"disqualifiedVendors":["globex"]');

      expect(metrics.getCounter(MetricNames.VENDOR_SCORING_COUNT, { outcome: 'scored' })).toBe(2);
      expect(metrics.getCounter(MetricNames.VENDOR_SCORING_COUNT, { outcome: 'disqualified' })).toBe(1);
      expect(metrics.getCounter(MetricNames.LOW_CONFIDENCE_COUNT)).toBe(1);
      expect(metrics.getCounter(MetricNames.EVALUATION_COUNT, { cacheHit: 'false' })).toBe(1);
    });
  });
});

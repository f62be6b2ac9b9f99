/**
 * Evaluation Service
 *
 * Runs a full comparison: scores every vendor concurrently, ranks them,
 * attaches the executive summary and caches the result. The cache is an
 * injected collaborator keyed by a hash of (scorecard, evidence, vendor ids,
 * engine config); entries leave it by TTL or explicit invalidation.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  CACHE_KEY_PREFIX,
  DEFAULT_ENGINE_CONFIG,
  InMemoryReportCache,
  computeCacheKey,
  createLogger,
  createMetricsCollector,
  deepFreeze,
  type ComparisonReport,
  type EngineConfig,
  type Logger,
  type MetricsCollector,
  type ReportCache,
  type VendorScoreSummary,
} from '@proposal-eval/shared';
import {
  RuleBasedCriterionScorer,
  compareVendors,
  scoreVendor,
  scoreVendors,
  type CriterionScorer,
  type EvidenceStore,
  type Scorecard,
} from '@proposal-eval/scoring-service';
import { buildExecutiveSummary, type ExecutiveSummary } from '@proposal-eval/explainability';

/**
 * Value held in the report cache
 */
export interface CachedEvaluation {
  report: ComparisonReport;
  summary: ExecutiveSummary;
}

export interface EvaluationServiceDeps {
  config?: EngineConfig;
  cache?: ReportCache<CachedEvaluation>;
  logger?: Logger;
  metrics?: MetricsCollector;
  scorer?: CriterionScorer;
}

export interface EvaluationRequest {
  scorecard: Scorecard;
  evidenceStore: EvidenceStore;
  /** Vendors to compare, in tie-break order; defaults to the store's order */
  vendorIds?: readonly string[];
  correlationId?: string;
}

export interface EvaluationResult {
  evaluationId: string;
  correlationId: string;
  report: ComparisonReport;
  summary: ExecutiveSummary;
  cacheHit: boolean;
  cacheKey: string;
  processingTimeMs: number;
}

const REPORT_CACHE_NAME = 'report';

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class EvaluationService {
  private readonly config: EngineConfig;
  private readonly cache: ReportCache<CachedEvaluation>;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly scorer: CriterionScorer;

  constructor(deps: EvaluationServiceDeps = {}) {
    this.config = deps.config ?? DEFAULT_ENGINE_CONFIG;
    this.cache =
      deps.cache ??
      new InMemoryReportCache<CachedEvaluation>({ defaultTtlSeconds: this.config.cacheTtlSeconds });
    this.logger = deps.logger ?? createLogger();
    this.metrics = deps.metrics ?? createMetricsCollector();
    this.scorer = deps.scorer ?? RuleBasedCriterionScorer.fromConfig(this.config);
  }

  getConfig(): EngineConfig {
    return this.config;
  }

  /**
   * Cache key over everything that determines the report
   */
  computeCacheKey(request: EvaluationRequest): string {
    const { scorecard, evidenceStore } = request;
    const vendorIds = request.vendorIds ?? evidenceStore.vendorIds();

    const evidence = evidenceStore
      .entries()
      .map((entry) => ({
        vendorId: entry.vendorId,
        criterionId: entry.criterionId,
        rawText: entry.rawText,
        extractionConfidence: entry.extractionConfidence,
        attributes: entry.attributes,
      }))
      .sort(
        (a, b) =>
          compareStrings(a.vendorId, b.vendorId) || compareStrings(a.criterionId, b.criterionId)
      );

    const rejections = vendorIds.flatMap((vendorId) =>
      evidenceStore.rejectionsFor(vendorId).map((rejection) => ({
        vendorId,
        index: rejection.index,
        errorCode: rejection.error.code,
        message: rejection.error.message,
      }))
    );

    return computeCacheKey(CACHE_KEY_PREFIX.EVALUATION, {
      scorecard: scorecard.toDescriptor(),
      evidence,
      rejections,
      vendorIds,
      config: this.config,
    });
  }

  /**
   * Scores and compares the requested vendors, serving repeated inputs from cache
   */
  async evaluate(request: EvaluationRequest): Promise<EvaluationResult> {
    const stopTimer = this.metrics.startTimer();
    const evaluationId = uuidv4();
    const correlationId = request.correlationId ?? uuidv4();
    const log = this.logger.child(correlationId);
    const vendorIds = [...(request.vendorIds ?? request.evidenceStore.vendorIds())];
    const cacheKey = this.computeCacheKey({ ...request, vendorIds });

    const cached = await this.cache.get(cacheKey);
    if (cached) {
      this.metrics.recordCacheHit(REPORT_CACHE_NAME);
      const { durationMs } = stopTimer();
      this.metrics.recordEvaluationLatency(durationMs, { cacheHit: 'true' });
      log.logEvaluation({
        correlationId,
        evaluationId,
        vendorCount: vendorIds.length,
        criterionCount: request.scorecard.criteria().length,
        evidenceCount: request.evidenceStore.size,
        scoredVendors: cached.report.summaries.length,
        failedVendors: cached.report.failures.map((failure) => failure.vendorId),
        disqualifiedVendors: cached.summary.disqualifiedVendors,
        cacheHit: true,
        processingTimeMs: durationMs,
      });
      return { evaluationId, correlationId, ...cached, cacheHit: true, cacheKey, processingTimeMs: durationMs };
    }
    this.metrics.recordCacheMiss(REPORT_CACHE_NAME);

    const { summaries, failures } = await scoreVendors(
      vendorIds,
      request.scorecard,
      request.evidenceStore,
      { scorer: this.scorer, config: this.config }
    );

    for (const failure of failures) {
      this.metrics.recordVendorScored('failed');
      log.warn('Vendor could not be scored', { ...failure });
    }
    for (const summary of summaries) {
      this.metrics.recordVendorScored(summary.disqualified ? 'disqualified' : 'scored');
      this.metrics.recordConfidenceScore(
        summary.overallConfidence,
        this.config.lowConfidenceThreshold
      );
    }

    const report = compareVendors(summaries, {
      tieBreakOrder: this.config.tieBreakOrder,
      lowConfidenceThreshold: this.config.lowConfidenceThreshold,
      failures,
      scorecard: request.scorecard,
    });
    const summary = deepFreeze(buildExecutiveSummary(report));

    await this.cache.set(cacheKey, { report, summary }, this.config.cacheTtlSeconds);

    const { durationMs } = stopTimer();
    this.metrics.recordEvaluationLatency(durationMs, { cacheHit: 'false' });
    log.logEvaluation({
      correlationId,
      evaluationId,
      vendorCount: vendorIds.length,
      criterionCount: request.scorecard.criteria().length,
      evidenceCount: request.evidenceStore.size,
      scoredVendors: summaries.length,
      failedVendors: failures.map((failure) => failure.vendorId),
      disqualifiedVendors: summary.disqualifiedVendors,
      cacheHit: false,
      processingTimeMs: durationMs,
    });

    return {
      evaluationId,
      correlationId,
      report,
      summary,
      cacheHit: false,
      cacheKey,
      processingTimeMs: durationMs,
    };
  }

  /**
   * Scores one vendor without comparison or caching.
   * Engine errors propagate to the caller.
   */
  scoreSingleVendor(
    vendorId: string,
    scorecard: Scorecard,
    evidenceStore: EvidenceStore
  ): VendorScoreSummary {
    try {
      const summary = scoreVendor(vendorId, scorecard, evidenceStore, {
        scorer: this.scorer,
        config: this.config,
      });
      this.metrics.recordVendorScored(summary.disqualified ? 'disqualified' : 'scored');
      return summary;
    } catch (error) {
      this.metrics.recordVendorScored('failed');
      throw error;
    }
  }

  async invalidate(cacheKey: string): Promise<boolean> {
    return this.cache.invalidate(cacheKey);
  }

  async invalidateAll(): Promise<void> {
    await this.cache.invalidateAll();
  }

  async cacheSize(): Promise<number> {
    return this.cache.size();
  }
}

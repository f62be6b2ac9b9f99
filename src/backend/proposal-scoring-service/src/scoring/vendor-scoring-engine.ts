/**
 * Vendor Scoring Engine
 *
 * Scores every criterion of the scorecard for one vendor, aggregates each
 * category and rolls categories into the overall score. A compliance failure
 * in any category disqualifies the vendor explicitly.
 *
 * scoreVendor is a pure function of (scorecard, that vendor's evidence);
 * scoreVendors runs vendors as independent tasks so one failure never
 * aborts the others.
 */

import {
  DEFAULT_ENGINE_CONFIG,
  UnknownCriterionError,
  deepFreeze,
  describeError,
  type ComplianceFailure,
  type EngineConfig,
  type Grade,
  type VendorFailure,
  type VendorScoreSummary,
} from '@proposal-eval/shared';
import type { Scorecard } from '../scorecard/scorecard.js';
import type { EvidenceStore } from '../evidence/evidence-store.js';
import { RuleBasedCriterionScorer, type CriterionScorer } from './criterion-scorer.js';
import { aggregateCategory } from './category-aggregator.js';
import { classifyConfidence, weightedConfidence } from './confidence-estimator.js';

export interface ScoreVendorOptions {
  scorer?: CriterionScorer;
  config?: EngineConfig;
}

/**
 * Outcome of scoring a batch of vendors
 */
export interface VendorScoringResult {
  /** Successfully scored vendors, in the requested order */
  summaries: VendorScoreSummary[];
  failures: VendorFailure[];
}

/**
 * Grade thresholds on the overall score
 */
export const GRADE_THRESHOLDS: ReadonlyArray<{ grade: Grade; minScore: number }> = [
  { grade: 'A', minScore: 90 },
  { grade: 'B', minScore: 80 },
  { grade: 'C', minScore: 70 },
  { grade: 'D', minScore: 60 },
];

/**
 * Letter grade for an overall score; disqualified vendors always get F
 */
export function gradeFor(overallScore: number, disqualified = false): Grade {
  if (disqualified) {
    return 'F';
  }
  return GRADE_THRESHOLDS.find((threshold) => overallScore >= threshold.minScore)?.grade ?? 'F';
}

/**
 * Scores one vendor against the full scorecard.
 *
 * Throws UnknownCriterionError when the vendor's evidence references a
 * criterion the scorecard does not define, or when ingestion rejected any
 * of the vendor's records.
 */
export function scoreVendor(
  vendorId: string,
  scorecard: Scorecard,
  evidenceStore: EvidenceStore,
  options: ScoreVendorOptions = {}
): VendorScoreSummary {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const scorer = options.scorer ?? RuleBasedCriterionScorer.fromConfig(config);

  const rejections = evidenceStore.rejectionsFor(vendorId);
  if (rejections.length > 0) {
    throw rejections[0].error;
  }

  for (const evidence of evidenceStore.forVendor(vendorId)) {
    if (!scorecard.hasCriterion(evidence.criterionId)) {
      throw new UnknownCriterionError(evidence.criterionId, vendorId);
    }
  }

  const categoryScores = scorecard.categories.map((category) =>
    aggregateCategory(
      category,
      category.criteria.map((criterion) =>
        scorer.score(criterion, evidenceStore.get(vendorId, criterion.id))
      )
    )
  );

  const complianceFailures: ComplianceFailure[] = categoryScores.flatMap((category) =>
    category.criterionScores
      .filter((score) => score.vetoed)
      .map((score) => ({
        categoryId: category.categoryId,
        criterionId: score.criterionId,
        rationale: score.rationale,
      }))
  );
  const disqualified = complianceFailures.length > 0;

  const weightedScore = categoryScores.reduce(
    (total, category) => total + category.score * category.weight,
    0
  );
  const overallScore = disqualified ? 0 : Math.min(100, Math.max(0, weightedScore));
  const overallConfidence = weightedConfidence(
    categoryScores.map((category) => ({ value: category.confidence, weight: category.weight }))
  );

  return deepFreeze({
    vendorId,
    categoryScores,
    overallScore,
    overallConfidence,
    confidenceBand: classifyConfidence(overallConfidence, config.confidenceBands),
    complianceFailures,
    disqualified,
    grade: gradeFor(overallScore, disqualified),
  });
}

/**
 * Scores vendors concurrently. Failures are reported per vendor with their
 * error code; the remaining vendors are still scored.
 */
export async function scoreVendors(
  vendorIds: readonly string[],
  scorecard: Scorecard,
  evidenceStore: EvidenceStore,
  options: ScoreVendorOptions = {}
): Promise<VendorScoringResult> {
  const settled = await Promise.allSettled(
    vendorIds.map(async (vendorId) => scoreVendor(vendorId, scorecard, evidenceStore, options))
  );

  const summaries: VendorScoreSummary[] = [];
  const failures: VendorFailure[] = [];

  settled.forEach((result, index) => {
    if (result.status === 'fulfilled') {
      summaries.push(result.value);
    } else {
      failures.push({ vendorId: vendorIds[index], ...describeError(result.reason) });
    }
  });

  return { summaries, failures };
}

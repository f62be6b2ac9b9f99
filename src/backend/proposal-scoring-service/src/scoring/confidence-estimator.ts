/**
 * Confidence Estimator
 *
 * Weighted blending of confidences, classification into discrete bands and
 * the low-confidence flags used to route sections to human review.
 * Read-only: nothing here changes a score.
 */

import {
  ConfidenceBand,
  DEFAULT_ENGINE_CONFIG,
  type ConfidenceBands,
  type LowConfidenceFlags,
  type VendorScoreSummary,
} from '@proposal-eval/shared';

/**
 * Value paired with the weight it carries in an average
 */
export interface WeightedValue {
  value: number;
  weight: number;
}

/**
 * Weighted average of confidences, clamped to [0, 1].
 * Returns 0 when the weights sum to zero.
 */
export function weightedConfidence(values: readonly WeightedValue[]): number {
  let weightSum = 0;
  let total = 0;

  for (const { value, weight } of values) {
    weightSum += weight;
    total += value * weight;
  }

  if (!(weightSum > 0)) {
    return 0;
  }

  return Math.min(1, Math.max(0, total / weightSum));
}

/**
 * Overall confidence already computed by the vendor scoring engine
 */
export function overallConfidence(summary: VendorScoreSummary): number {
  return summary.overallConfidence;
}

/**
 * Maps a confidence to its band: high, medium or low
 */
export function classifyConfidence(
  confidence: number,
  bands: ConfidenceBands = DEFAULT_ENGINE_CONFIG.confidenceBands
): ConfidenceBand {
  if (confidence >= bands.high) {
    return ConfidenceBand.HIGH;
  }
  if (confidence >= bands.medium) {
    return ConfidenceBand.MEDIUM;
  }
  return ConfidenceBand.LOW;
}

/**
 * Human-readable explanation of a confidence value
 */
export function describeConfidence(
  confidence: number,
  bands: ConfidenceBands = DEFAULT_ENGINE_CONFIG.confidenceBands
): string {
  const percent = `${(confidence * 100).toFixed(1)}%`;

  switch (classifyConfidence(confidence, bands)) {
    case ConfidenceBand.HIGH:
      return `High confidence (${percent}). Scores rest on well-supported extracted evidence.`;
    case ConfidenceBand.MEDIUM:
      return `Moderate confidence (${percent}). Scores are reasonable but human review is recommended.`;
    case ConfidenceBand.LOW:
      return `Low confidence (${percent}). Human review is required before relying on these scores.`;
  }
}

/**
 * Lists the categories and criteria of one vendor below the threshold
 */
export function lowConfidenceReasons(
  summary: VendorScoreSummary,
  threshold: number = DEFAULT_ENGINE_CONFIG.lowConfidenceThreshold
): string[] {
  const reasons: string[] = [];

  for (const category of summary.categoryScores) {
    if (category.confidence < threshold) {
      reasons.push(
        `${category.categoryName} confidence is ${(category.confidence * 100).toFixed(1)}%`
      );
    }

    const missing = category.criterionScores.filter((score) => !score.evidencePresent);
    if (missing.length > 0) {
      reasons.push(
        `No evidence for ${missing.map((score) => score.criterionId).join(', ')}`
      );
    }
  }

  return reasons;
}

/**
 * Flags every category and criterion whose confidence is below the threshold
 * for any vendor. Vendor ids follow the order of the given summaries.
 */
export function flagLowConfidence(
  summaries: readonly VendorScoreSummary[],
  threshold: number = DEFAULT_ENGINE_CONFIG.lowConfidenceThreshold
): LowConfidenceFlags {
  const categories = new Map<string, string[]>();
  const criteria = new Map<string, { categoryId: string; criterionId: string; vendorIds: string[] }>();

  for (const summary of summaries) {
    for (const category of summary.categoryScores) {
      if (!categories.has(category.categoryId)) {
        categories.set(category.categoryId, []);
      }
      if (category.confidence < threshold) {
        categories.get(category.categoryId)?.push(summary.vendorId);
      }

      for (const score of category.criterionScores) {
        if (!criteria.has(score.criterionId)) {
          criteria.set(score.criterionId, {
            categoryId: category.categoryId,
            criterionId: score.criterionId,
            vendorIds: [],
          });
        }
        if (score.confidence < threshold) {
          criteria.get(score.criterionId)?.vendorIds.push(summary.vendorId);
        }
      }
    }
  }

  return {
    threshold,
    categories: [...categories.entries()]
      .filter(([, vendorIds]) => vendorIds.length > 0)
      .map(([categoryId, vendorIds]) => ({ categoryId, vendorIds })),
    criteria: [...criteria.values()].filter((entry) => entry.vendorIds.length > 0),
  };
}

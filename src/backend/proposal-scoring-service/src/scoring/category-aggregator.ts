/**
 * Category Aggregator
 *
 * Rolls criterion scores up into a category score. Criteria without a score
 * contribute their absent-evidence score rather than being dropped, and a
 * vetoed compliance criterion forces the category to zero.
 */

import {
  UnknownCriterionError,
  deepFreeze,
  type CategoryScore,
  type CriterionScore,
} from '@proposal-eval/shared';
import type { Category } from '../scorecard/scorecard.js';
import { absentCriterionScore } from './criterion-scorer.js';
import { weightedConfidence } from './confidence-estimator.js';

/**
 * Aggregates one category. Scores are matched to criteria by id; a score
 * for a criterion outside the category is rejected.
 */
export function aggregateCategory(
  category: Category,
  criterionScores: readonly CriterionScore[]
): CategoryScore {
  const byId = new Map(criterionScores.map((score) => [score.criterionId, score]));

  for (const criterionId of byId.keys()) {
    if (!category.criteria.some((criterion) => criterion.id === criterionId)) {
      throw new UnknownCriterionError(criterionId);
    }
  }

  const weighted = category.criteria.map((criterion) => ({
    criterion,
    score: byId.get(criterion.id) ?? absentCriterionScore(criterion),
  }));
  const ordered = weighted.map(({ score }) => score);

  const weightedSum = weighted.reduce(
    (total, { criterion, score }) => total + score.normalizedScore * criterion.weight,
    0
  );

  const vetoedCriteria = ordered.filter((score) => score.vetoed).map((score) => score.criterionId);
  const complianceFailure = vetoedCriteria.length > 0;

  return deepFreeze({
    categoryId: category.id,
    categoryName: category.name,
    weight: category.weight,
    score: complianceFailure ? 0 : Math.min(100, Math.max(0, weightedSum)),
    confidence: weightedConfidence(
      weighted.map(({ criterion, score }) => ({
        value: score.confidence,
        weight: criterion.weight,
      }))
    ),
    complianceFailure,
    vetoedCriteria,
    criterionScores: ordered,
  });
}

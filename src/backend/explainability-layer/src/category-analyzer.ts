/**
 * Category Analyzer
 *
 * Reads a vendor score summary and identifies strong and weak categories,
 * compliance failures, missing evidence and low-confidence sections.
 */

import type { CategoryScore, VendorScoreSummary } from '@proposal-eval/shared';

/**
 * Category score at or above which the category counts as a strength
 */
export const STRENGTH_THRESHOLD = 80;

/**
 * Category score below which the category counts as a weakness
 */
export const WEAKNESS_THRESHOLD = 50;

/**
 * Category score below which a weakness is high severity
 */
export const CRITICAL_SCORE_THRESHOLD = 30;

export type RiskSeverity = 'low' | 'medium' | 'high';

/**
 * Category with its contribution to the overall score
 */
export interface AnalyzedCategory {
  category: CategoryScore;
  /** Position when categories are ordered by contribution, 1-based */
  rank: number;
  /** Weighted points contributed to the overall score */
  contribution: number;
  isStrength: boolean;
  isWeakness: boolean;
}

/**
 * Risk or concern surfaced for review
 */
export interface RiskFactor {
  source: 'compliance' | 'category' | 'evidence' | 'confidence';
  subjectId: string;
  severity: RiskSeverity;
  description: string;
}

export interface CategoryAnalysisResult {
  strengths: AnalyzedCategory[];
  weaknesses: AnalyzedCategory[];
  allCategories: AnalyzedCategory[];
  riskFactors: RiskFactor[];
  overallRiskLevel: RiskSeverity;
  /** Criterion ids scored without evidence */
  missingEvidence: string[];
}

export interface CategoryAnalysisOptions {
  strengthThreshold?: number;
  weaknessThreshold?: number;
  lowConfidenceThreshold?: number;
}

export const DEFAULT_ANALYSIS_OPTIONS: Required<CategoryAnalysisOptions> = {
  strengthThreshold: STRENGTH_THRESHOLD,
  weaknessThreshold: WEAKNESS_THRESHOLD,
  lowConfidenceThreshold: 0.5,
};

const SEVERITY_ORDER: Record<RiskSeverity, number> = { high: 0, medium: 1, low: 2 };

/**
 * Severity of a weak category score; null when the score is not a risk
 */
export function determineRiskSeverity(
  score: number,
  weaknessThreshold: number = WEAKNESS_THRESHOLD
): RiskSeverity | null {
  if (score >= weaknessThreshold) {
    return null;
  }
  if (score < CRITICAL_SCORE_THRESHOLD) {
    return 'high';
  }
  if (score < 40) {
    return 'medium';
  }
  return 'low';
}

function collectRiskFactors(
  summary: VendorScoreSummary,
  options: Required<CategoryAnalysisOptions>
): RiskFactor[] {
  const risks: RiskFactor[] = [];

  for (const failure of summary.complianceFailures) {
    const category = summary.categoryScores.find((c) => c.categoryId === failure.categoryId);
    risks.push({
      source: 'compliance',
      subjectId: failure.criterionId,
      severity: 'high',
      description: `Failed compliance criterion ${failure.criterionId} in ${category?.categoryName ?? failure.categoryId}`,
    });
  }

  for (const category of summary.categoryScores) {
    const severity = category.complianceFailure
      ? null
      : determineRiskSeverity(category.score, options.weaknessThreshold);
    if (severity) {
      risks.push({
        source: 'category',
        subjectId: category.categoryId,
        severity,
        description: `${category.categoryName} scored ${category.score.toFixed(0)}/100`,
      });
    }

    for (const score of category.criterionScores) {
      if (!score.evidencePresent) {
        risks.push({
          source: 'evidence',
          subjectId: score.criterionId,
          severity: 'medium',
          description: `No evidence found for ${score.criterionId}`,
        });
      }
    }

    if (category.confidence < options.lowConfidenceThreshold) {
      risks.push({
        source: 'confidence',
        subjectId: category.categoryId,
        severity: 'low',
        description: `${category.categoryName} confidence is ${(category.confidence * 100).toFixed(0)}%`,
      });
    }
  }

  return risks.sort((a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity]);
}

/**
 * Analyzes the categories of one vendor summary
 */
export function analyzeCategories(
  summary: VendorScoreSummary,
  options: CategoryAnalysisOptions = {}
): CategoryAnalysisResult {
  const opts = { ...DEFAULT_ANALYSIS_OPTIONS, ...options };

  const allCategories = summary.categoryScores
    .map((category) => ({ category, contribution: category.score * category.weight }))
    .sort((a, b) => b.contribution - a.contribution)
    .map(({ category, contribution }, index) => ({
      category,
      rank: index + 1,
      contribution,
      isStrength: category.score >= opts.strengthThreshold,
      isWeakness: category.score < opts.weaknessThreshold,
    }));

  const riskFactors = collectRiskFactors(summary, opts);

  let overallRiskLevel: RiskSeverity = 'low';
  if (riskFactors.some((risk) => risk.severity === 'high')) {
    overallRiskLevel = 'high';
  } else if (riskFactors.some((risk) => risk.severity === 'medium')) {
    overallRiskLevel = 'medium';
  }

  return {
    strengths: allCategories
      .filter((c) => c.isStrength)
      .sort((a, b) => b.category.score - a.category.score),
    weaknesses: allCategories
      .filter((c) => c.isWeakness)
      .sort((a, b) => a.category.score - b.category.score),
    allCategories,
    riskFactors,
    overallRiskLevel,
    missingEvidence: summary.categoryScores.flatMap((category) =>
      category.criterionScores
        .filter((score) => !score.evidencePresent)
        .map((score) => score.criterionId)
    ),
  };
}

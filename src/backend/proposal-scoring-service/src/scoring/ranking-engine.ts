/**
 * Comparison & Ranking Engine
 *
 * Ranks vendor summaries by overall score with an explicit tie-break order,
 * builds the per-category matrix and collects low-confidence flags.
 * Disqualified vendors are kept in the report, ranked last as a block.
 * The report carries no timestamps: identical input gives identical output.
 */

import {
  DEFAULT_ENGINE_CONFIG,
  TieBreakRule,
  deepFreeze,
  type CategoryMatrixRow,
  type ComparisonReport,
  type VendorFailure,
  type VendorRanking,
  type VendorScoreSummary,
} from '@proposal-eval/shared';
import type { Scorecard } from '../scorecard/scorecard.js';
import { flagLowConfidence } from './confidence-estimator.js';

/**
 * Scores closer than this are ties
 */
export const SCORE_TIE_EPSILON = 1e-9;

export interface CompareOptions {
  /** Tie-break rules after overall score; input order always comes last */
  tieBreakOrder?: readonly TieBreakRule[];
  lowConfidenceThreshold?: number;
  /** Vendors that could not be scored */
  failures?: readonly VendorFailure[];
  /** Fixes matrix row order; defaults to first-seen category order */
  scorecard?: Scorecard;
}

export interface RankingCandidate {
  summary: VendorScoreSummary;
  inputIndex: number;
}

function compareByRule(a: VendorScoreSummary, b: VendorScoreSummary, rule: TieBreakRule): number {
  switch (rule) {
    case TieBreakRule.COMPLIANCE_FAILURES:
      // Fewer compliance failures wins
      return a.complianceFailures.length - b.complianceFailures.length;
    case TieBreakRule.CONFIDENCE: {
      const diff = b.overallConfidence - a.overallConfidence;
      return Math.abs(diff) > SCORE_TIE_EPSILON ? diff : 0;
    }
  }
}

/**
 * Comparator for ranking: qualified before disqualified, then overall score
 * (descending), then the configured tie-break rules, then input order.
 */
export function compareRankingCandidates(
  a: RankingCandidate,
  b: RankingCandidate,
  tieBreakOrder: readonly TieBreakRule[] = DEFAULT_ENGINE_CONFIG.tieBreakOrder
): number {
  if (a.summary.disqualified !== b.summary.disqualified) {
    return a.summary.disqualified ? 1 : -1;
  }

  const scoreDiff = b.summary.overallScore - a.summary.overallScore;
  if (Math.abs(scoreDiff) > SCORE_TIE_EPSILON) {
    return scoreDiff;
  }

  for (const rule of tieBreakOrder) {
    const diff = compareByRule(a.summary, b.summary, rule);
    if (diff !== 0) {
      return diff;
    }
  }

  return a.inputIndex - b.inputIndex;
}

/**
 * Orders summaries for ranking without building a report
 */
export function rankSummaries(
  summaries: readonly VendorScoreSummary[],
  tieBreakOrder: readonly TieBreakRule[] = DEFAULT_ENGINE_CONFIG.tieBreakOrder
): VendorScoreSummary[] {
  return summaries
    .map((summary, inputIndex) => ({ summary, inputIndex }))
    .sort((a, b) => compareRankingCandidates(a, b, tieBreakOrder))
    .map(({ summary }) => summary);
}

function categoryOrder(
  summaries: readonly VendorScoreSummary[],
  scorecard?: Scorecard
): Array<{ categoryId: string; categoryName: string }> {
  if (scorecard) {
    return scorecard.categories.map((category) => ({
      categoryId: category.id,
      categoryName: category.name,
    }));
  }

  const seen = new Map<string, string>();
  for (const summary of summaries) {
    for (const category of summary.categoryScores) {
      if (!seen.has(category.categoryId)) {
        seen.set(category.categoryId, category.categoryName);
      }
    }
  }
  return [...seen.entries()].map(([categoryId, categoryName]) => ({ categoryId, categoryName }));
}

function buildCategoryMatrix(
  ranked: readonly VendorScoreSummary[],
  scorecard?: Scorecard
): CategoryMatrixRow[] {
  return categoryOrder(ranked, scorecard).map(({ categoryId, categoryName }) => ({
    categoryId,
    categoryName,
    cells: ranked.map((summary) => {
      const category = summary.categoryScores.find((c) => c.categoryId === categoryId);
      return {
        vendorId: summary.vendorId,
        score: category?.score ?? 0,
        confidence: category?.confidence ?? 0,
        complianceFailure: category?.complianceFailure ?? false,
      };
    }),
  }));
}

function buildRankings(ranked: readonly VendorScoreSummary[]): VendorRanking[] {
  const leaderScore = ranked.length > 0 ? ranked[0].overallScore : 0;

  return ranked.map((summary, index) => {
    const previousScore = index > 0 ? ranked[index - 1].overallScore : summary.overallScore;
    return {
      rank: index + 1,
      vendorId: summary.vendorId,
      overallScore: summary.overallScore,
      overallConfidence: summary.overallConfidence,
      confidenceBand: summary.confidenceBand,
      complianceFailureCount: summary.complianceFailures.length,
      disqualified: summary.disqualified,
      grade: summary.grade,
      deltaFromLeader: Math.max(0, leaderScore - summary.overallScore),
      deltaFromPrevious: Math.max(0, previousScore - summary.overallScore),
    };
  });
}

/**
 * Builds the comparison report for a set of scored vendors
 */
export function compareVendors(
  summaries: readonly VendorScoreSummary[],
  options: CompareOptions = {}
): ComparisonReport {
  const ranked = rankSummaries(
    summaries,
    options.tieBreakOrder ?? DEFAULT_ENGINE_CONFIG.tieBreakOrder
  );

  return deepFreeze({
    rankings: buildRankings(ranked),
    categoryMatrix: buildCategoryMatrix(ranked, options.scorecard),
    lowConfidence: flagLowConfidence(
      ranked,
      options.lowConfidenceThreshold ?? DEFAULT_ENGINE_CONFIG.lowConfidenceThreshold
    ),
    failures: (options.failures ?? []).map((failure) => ({ ...failure })),
    summaries: ranked,
  });
}

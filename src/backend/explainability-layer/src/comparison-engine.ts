/**
 * Comparison Engine
 *
 * Explains ranking differences between vendors by comparing their category
 * scores, highlighting the categories that separate adjacent vendors.
 */

import type { ComparisonReport, VendorRanking, VendorScoreSummary } from '@proposal-eval/shared';

/**
 * Difference between two vendors on one category
 */
export interface CategoryDifference {
  categoryId: string;
  categoryName: string;
  higherRankedScore: number;
  lowerRankedScore: number;
  difference: number;
  favorsBetter: boolean;
  explanation: string;
}

export interface RankedVendorRef {
  vendorId: string;
  rank: number;
  overallScore: number;
  disqualified: boolean;
}

/**
 * Comparison result between two adjacent vendors
 */
export interface VendorComparison {
  higherRankedVendor: RankedVendorRef;
  lowerRankedVendor: RankedVendorRef;
  scoreDifference: number;
  keyDifferentiators: CategoryDifference[];
  comparisonNarrative: string;
}

/**
 * Full comparison analysis for a report
 */
export interface ComparisonAnalysis {
  comparisons: VendorComparison[];
  topVendorAdvantages: string[];
  overallNarrative: string;
}

/**
 * Category score difference (in points) considered significant
 */
export const SIGNIFICANT_DIFFERENCE_THRESHOLD = 5;

function generateDifferenceExplanation(
  categoryName: string,
  higherScore: number,
  lowerScore: number,
  favorsBetter: boolean
): string {
  const higher = higherScore.toFixed(0);
  const lower = lowerScore.toFixed(0);

  if (favorsBetter) {
    return `Higher-ranked vendor scores better on ${categoryName} (${higher} vs ${lower})`;
  }
  return `Lower-ranked vendor scores better on ${categoryName} (${lower} vs ${higher}), but other categories outweigh this`;
}

/**
 * Category differences at or above the threshold, largest first
 */
export function compareCategories(
  higher: VendorScoreSummary,
  lower: VendorScoreSummary,
  threshold: number = SIGNIFICANT_DIFFERENCE_THRESHOLD
): CategoryDifference[] {
  const lowerById = new Map(lower.categoryScores.map((c) => [c.categoryId, c]));
  const differences: CategoryDifference[] = [];

  for (const category of higher.categoryScores) {
    const other = lowerById.get(category.categoryId);
    if (!other) {
      continue;
    }

    const diff = category.score - other.score;
    if (Math.abs(diff) >= threshold) {
      differences.push({
        categoryId: category.categoryId,
        categoryName: category.categoryName,
        higherRankedScore: category.score,
        lowerRankedScore: other.score,
        difference: diff,
        favorsBetter: diff > 0,
        explanation: generateDifferenceExplanation(
          category.categoryName,
          category.score,
          other.score,
          diff > 0
        ),
      });
    }
  }

  return differences.sort((a, b) => Math.abs(b.difference) - Math.abs(a.difference));
}

function generateComparisonNarrative(
  higher: RankedVendorRef,
  lower: RankedVendorRef,
  scoreDifference: number,
  keyDifferentiators: CategoryDifference[]
): string {
  const parts: string[] = [];

  if (lower.disqualified && !higher.disqualified) {
    parts.push(`${higher.vendorId} ranks above ${lower.vendorId}, which is disqualified by a compliance failure.`);
    return parts.join(' ');
  }

  if (scoreDifference === 0) {
    parts.push(`${higher.vendorId} and ${lower.vendorId} are tied on overall score; tie-break rules decided the order.`);
  } else {
    parts.push(
      `${higher.vendorId} ranks above ${lower.vendorId} by ${scoreDifference.toFixed(1)} points.`
    );
  }

  const advantages = keyDifferentiators.filter((d) => d.favorsBetter).slice(0, 3);
  if (advantages.length === 1) {
    parts.push(`The primary advantage is ${advantages[0].categoryName}.`);
  } else if (advantages.length > 1) {
    const names = advantages.map((d) => d.categoryName);
    const last = names.pop();
    parts.push(`Key advantages include ${names.join(', ')}, and ${last}.`);
  }

  const disadvantages = keyDifferentiators.filter((d) => !d.favorsBetter);
  if (disadvantages.length > 0 && disadvantages.length <= 2) {
    const names = disadvantages.map((d) => d.categoryName);
    parts.push(
      `${lower.vendorId} scores higher on ${names.join(' and ')}, but the overall score favors ${higher.vendorId}.`
    );
  }

  return parts.join(' ');
}

function toRef(row: VendorRanking): RankedVendorRef {
  return {
    vendorId: row.vendorId,
    rank: row.rank,
    overallScore: row.overallScore,
    disqualified: row.disqualified,
  };
}

function summaryFor(report: ComparisonReport, vendorId: string): VendorScoreSummary | undefined {
  return report.summaries.find((summary) => summary.vendorId === vendorId);
}

/**
 * Compares two ranked vendors of a report
 */
export function compareVendorPair(
  report: ComparisonReport,
  higher: VendorRanking,
  lower: VendorRanking
): VendorComparison {
  const higherSummary = summaryFor(report, higher.vendorId);
  const lowerSummary = summaryFor(report, lower.vendorId);
  const keyDifferentiators =
    higherSummary && lowerSummary ? compareCategories(higherSummary, lowerSummary) : [];
  const scoreDifference = Math.max(0, higher.overallScore - lower.overallScore);

  return {
    higherRankedVendor: toRef(higher),
    lowerRankedVendor: toRef(lower),
    scoreDifference,
    keyDifferentiators,
    comparisonNarrative: generateComparisonNarrative(
      toRef(higher),
      toRef(lower),
      scoreDifference,
      keyDifferentiators
    ),
  };
}

/**
 * Comparisons for every adjacent pair in the ranking
 */
export function compareAdjacentVendors(report: ComparisonReport): VendorComparison[] {
  const comparisons: VendorComparison[] = [];

  for (let i = 0; i < report.rankings.length - 1; i++) {
    comparisons.push(compareVendorPair(report, report.rankings[i], report.rankings[i + 1]));
  }

  return comparisons;
}

/**
 * Categories where the leader beats every other qualified vendor significantly
 */
function identifyTopVendorAdvantages(report: ComparisonReport): string[] {
  const qualified = report.rankings.filter((row) => !row.disqualified);
  if (qualified.length < 2) {
    return [];
  }

  const advantages = new Set<string>();
  for (let i = 1; i < qualified.length; i++) {
    const comparison = compareVendorPair(report, qualified[0], qualified[i]);
    for (const diff of comparison.keyDifferentiators) {
      if (diff.favorsBetter) {
        advantages.add(diff.categoryName);
      }
    }
  }

  return Array.from(advantages);
}

function generateOverallNarrative(report: ComparisonReport, topAdvantages: string[]): string {
  const qualified = report.rankings.filter((row) => !row.disqualified);

  if (report.rankings.length === 0) {
    return 'No vendors available for comparison.';
  }
  if (qualified.length === 0) {
    return 'No qualified vendors; every vendor failed a compliance requirement.';
  }
  if (qualified.length === 1) {
    return `${qualified[0].vendorId} is the only qualified vendor.`;
  }

  const top = qualified[0];
  const parts = [
    `${top.vendorId} is ranked first with a score of ${top.overallScore.toFixed(1)}.`,
  ];

  if (topAdvantages.length === 1) {
    parts.push(`The primary differentiator is ${topAdvantages[0]}.`);
  } else if (topAdvantages.length > 1) {
    const names = [...topAdvantages];
    const last = names.pop();
    parts.push(`Key differentiators include ${names.join(', ')}, and ${last}.`);
  }

  const spread = top.overallScore - qualified[qualified.length - 1].overallScore;
  if (spread < 10) {
    parts.push('Scores are closely clustered; consider reviewing all options.');
  } else if (spread > 30) {
    parts.push('There is significant differentiation between vendors.');
  }

  return parts.join(' ');
}

/**
 * Performs a complete comparison analysis for a report
 */
export function analyzeComparisons(report: ComparisonReport): ComparisonAnalysis {
  const topVendorAdvantages = identifyTopVendorAdvantages(report);

  return {
    comparisons: compareAdjacentVendors(report),
    topVendorAdvantages,
    overallNarrative: generateOverallNarrative(report, topVendorAdvantages),
  };
}

/**
 * Narrative Generator
 *
 * Produces human-readable explanations from vendor summaries and the
 * executive summary of a comparison report: recommended vendor, winning
 * score, confidence level and the vendors that were set aside.
 */

import {
  ConfidenceBand,
  DEFAULT_ENGINE_CONFIG,
  type ComparisonReport,
  type ConfidenceBands,
  type Grade,
  type VendorScoreSummary,
} from '@proposal-eval/shared';
import { describeConfidence } from '@proposal-eval/scoring-service';
import {
  analyzeCategories,
  type AnalyzedCategory,
  type RiskFactor,
  type CategoryAnalysisOptions,
} from './category-analyzer.js';

/**
 * Vendor explanation containing all narrative components
 */
export interface VendorExplanation {
  vendorId: string;
  summary: string;
  strengths: string[];
  weaknesses: string[];
  strengthsNarrative: string;
  weaknessNarrative: string | null;
  riskNarrative: string | null;
  confidenceNarrative: string;
  fullNarrative: string;
}

/**
 * Why a vendor was disqualified
 */
export interface DisqualificationReason {
  vendorId: string;
  reason: string;
  details: string[];
}

export type ConfidenceLevel = 'High' | 'Medium' | 'Low';

/**
 * Executive summary of a comparison run
 */
export interface ExecutiveSummary {
  recommendedVendor: string | null;
  winningScore: number;
  grade: Grade | null;
  confidenceLevel: ConfidenceLevel | null;
  vendorsEvaluated: number;
  disqualifiedVendors: string[];
  failedVendors: string[];
  reviewRequired: boolean;
  narrative: string;
}

export interface NarrativeOptions extends CategoryAnalysisOptions {
  verboseMode?: boolean;
  confidenceBands?: ConfidenceBands;
}

export const DEFAULT_NARRATIVE_OPTIONS: Required<NarrativeOptions> = {
  strengthThreshold: 80,
  weaknessThreshold: 50,
  lowConfidenceThreshold: DEFAULT_ENGINE_CONFIG.lowConfidenceThreshold,
  verboseMode: false,
  confidenceBands: DEFAULT_ENGINE_CONFIG.confidenceBands,
};

export const NO_QUALIFIED_VENDOR = 'No qualified vendor';

const CONFIDENCE_LEVELS: Record<ConfidenceBand, ConfidenceLevel> = {
  high: 'High',
  medium: 'Medium',
  low: 'Low',
};

/**
 * Joins names as "a", "a and b" or "a, b, and c"
 */
function joinNames(names: string[]): string {
  if (names.length <= 1) {
    return names.join('');
  }
  if (names.length === 2) {
    return `${names[0]} and ${names[1]}`;
  }
  return `${names.slice(0, -1).join(', ')}, and ${names[names.length - 1]}`;
}

function describeCategory(analyzed: AnalyzedCategory): string {
  return `${analyzed.category.categoryName} (${analyzed.category.score.toFixed(0)})`;
}

function generateSummary(summary: VendorScoreSummary, rank?: number): string {
  if (summary.disqualified) {
    const count = summary.complianceFailures.length;
    return `Disqualified: failed ${count} compliance ${count === 1 ? 'criterion' : 'criteria'}.`;
  }

  const lead = rank === undefined ? 'Overall score of' : `Ranked #${rank} with an overall score of`;
  let text = `${lead} ${summary.overallScore.toFixed(1)} (grade ${summary.grade})`;
  const confidencePercent = (summary.overallConfidence * 100).toFixed(0);

  if (summary.confidenceBand === ConfidenceBand.HIGH) {
    text += ` with high confidence (${confidencePercent}%)`;
  } else if (summary.confidenceBand === ConfidenceBand.LOW) {
    text += ` with limited confidence (${confidencePercent}%)`;
  }

  return text + '.';
}

function generateStrengthsNarrative(strengths: AnalyzedCategory[]): string {
  if (strengths.length === 0) {
    return 'No category reached the strength threshold.';
  }
  if (strengths.length === 1) {
    return `The primary strength is ${describeCategory(strengths[0])}.`;
  }
  return `Key strengths include ${joinNames(strengths.map(describeCategory))}.`;
}

function generateWeaknessNarrative(weaknesses: AnalyzedCategory[]): string | null {
  if (weaknesses.length === 0) {
    return null;
  }
  return `Areas of concern: ${weaknesses.map(describeCategory).join(', ')}.`;
}

function generateRiskNarrative(riskFactors: RiskFactor[]): string | null {
  if (riskFactors.length === 0) {
    return null;
  }

  const parts: string[] = [];
  const groups: Array<[RiskFactor['severity'], string]> = [
    ['high', 'Critical concerns'],
    ['medium', 'Moderate concerns'],
    ['low', 'Minor concerns'],
  ];

  for (const [severity, label] of groups) {
    const descriptions = riskFactors
      .filter((risk) => risk.severity === severity)
      .map((risk) => risk.description);
    if (descriptions.length > 0) {
      parts.push(`${label}: ${descriptions.join('; ')}`);
    }
  }

  return parts.join('. ') + '.';
}

/**
 * Generates a complete explanation for one vendor
 */
export function explainVendor(
  summary: VendorScoreSummary,
  rank?: number,
  options: NarrativeOptions = {}
): VendorExplanation {
  const opts = { ...DEFAULT_NARRATIVE_OPTIONS, ...options };
  const analysis = analyzeCategories(summary, opts);

  const summaryText = generateSummary(summary, rank);
  const strengthsNarrative = generateStrengthsNarrative(analysis.strengths);
  const weaknessNarrative = generateWeaknessNarrative(analysis.weaknesses);
  const riskNarrative = generateRiskNarrative(analysis.riskFactors);
  const confidenceNarrative = describeConfidence(summary.overallConfidence, opts.confidenceBands);

  const parts = [summaryText, strengthsNarrative];
  if (weaknessNarrative) {
    parts.push(weaknessNarrative);
  }
  if (opts.verboseMode) {
    if (riskNarrative) {
      parts.push(riskNarrative);
    }
    parts.push(confidenceNarrative);
  }

  return {
    vendorId: summary.vendorId,
    summary: summaryText,
    strengths: analysis.strengths.map((c) => c.category.categoryName),
    weaknesses: analysis.weaknesses.map((c) => c.category.categoryName),
    strengthsNarrative,
    weaknessNarrative,
    riskNarrative,
    confidenceNarrative,
    fullNarrative: parts.join(' '),
  };
}

/**
 * Explains why a vendor was disqualified; null for qualified vendors
 */
export function generateDisqualificationReason(
  summary: VendorScoreSummary
): DisqualificationReason | null {
  if (!summary.disqualified) {
    return null;
  }

  return {
    vendorId: summary.vendorId,
    reason: 'Vendor failed one or more compliance requirements',
    details: summary.complianceFailures.map(
      (failure) => `${failure.categoryId}/${failure.criterionId}: ${failure.rationale}`
    ),
  };
}

/**
 * Builds the executive summary of a comparison report
 */
export function buildExecutiveSummary(report: ComparisonReport): ExecutiveSummary {
  const qualified = report.rankings.filter((row) => !row.disqualified);
  const disqualifiedVendors = report.rankings
    .filter((row) => row.disqualified)
    .map((row) => row.vendorId);
  const failedVendors = report.failures.map((failure) => failure.vendorId);
  const top = qualified.length > 0 ? qualified[0] : undefined;
  const runnerUp = qualified.length > 1 ? qualified[1] : undefined;

  const reviewRequired =
    top === undefined ||
    top.confidenceBand === ConfidenceBand.LOW ||
    report.lowConfidence.categories.length > 0 ||
    failedVendors.length > 0;

  const parts: string[] = [];
  if (top) {
    const level = CONFIDENCE_LEVELS[top.confidenceBand];
    parts.push(
      `${top.vendorId} is recommended with an overall score of ${top.overallScore.toFixed(1)} (grade ${top.grade}) and ${level.toLowerCase()} confidence.`
    );
    if (runnerUp) {
      parts.push(
        `It leads ${runnerUp.vendorId} by ${(top.overallScore - runnerUp.overallScore).toFixed(1)} points.`
      );
    }
  } else {
    parts.push(`${NO_QUALIFIED_VENDOR}: every evaluated vendor was disqualified or could not be scored.`);
  }

  if (disqualifiedVendors.length > 0) {
    parts.push(`Disqualified: ${disqualifiedVendors.join(', ')}.`);
  }
  if (failedVendors.length > 0) {
    parts.push(`Not scored: ${failedVendors.join(', ')}.`);
  }
  if (reviewRequired) {
    parts.push('Human review is recommended before award.');
  }

  return {
    recommendedVendor: top?.vendorId ?? null,
    winningScore: top?.overallScore ?? 0,
    grade: top?.grade ?? null,
    confidenceLevel: top ? CONFIDENCE_LEVELS[top.confidenceBand] : null,
    vendorsEvaluated: report.rankings.length + failedVendors.length,
    disqualifiedVendors,
    failedVendors,
    reviewRequired,
    narrative: parts.join(' '),
  };
}

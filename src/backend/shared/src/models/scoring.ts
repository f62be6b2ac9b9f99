/**
 * Scoring Data Models and Zod Schemas
 *
 * Defines the canonical output shapes of the engine: criterion scores,
 * category rollups, vendor summaries and the cross-vendor comparison report.
 * Every score is on a 0-100 scale and every confidence in [0, 1].
 */

import { z } from 'zod';

/**
 * Discrete confidence bands used for emphasis in presentation
 */
export const ConfidenceBand = {
  HIGH: 'high',
  MEDIUM: 'medium',
  LOW: 'low',
} as const;

export type ConfidenceBand = (typeof ConfidenceBand)[keyof typeof ConfidenceBand];

export const ConfidenceBandSchema = z.enum(['high', 'medium', 'low']);

/**
 * Letter grade for an overall score
 */
export const GradeSchema = z.enum(['A', 'B', 'C', 'D', 'F']);

export type Grade = z.infer<typeof GradeSchema>;

const score = z.number().min(0).max(100);
const confidence = z.number().min(0).max(1);

/**
 * Score of one (vendor, criterion) pair
 */
export const CriterionScoreSchema = z.object({
  criterionId: z.string().min(1),
  rawScore: z.number().finite(),
  normalizedScore: score,
  confidence,
  rationale: z.string(),
  vetoed: z.boolean(),
  evidencePresent: z.boolean(),
  warnings: z.array(z.string()),
});

export type CriterionScore = z.infer<typeof CriterionScoreSchema>;

/**
 * Weighted rollup of a category's criterion scores
 */
export const CategoryScoreSchema = z.object({
  categoryId: z.string().min(1),
  categoryName: z.string().min(1),
  weight: z.number().min(0).max(1),
  score,
  confidence,
  complianceFailure: z.boolean(),
  vetoedCriteria: z.array(z.string()),
  criterionScores: z.array(CriterionScoreSchema),
});

export type CategoryScore = z.infer<typeof CategoryScoreSchema>;

/**
 * Compliance failure surfaced from a vetoed criterion
 */
export const ComplianceFailureSchema = z.object({
  categoryId: z.string().min(1),
  criterionId: z.string().min(1),
  rationale: z.string(),
});

export type ComplianceFailure = z.infer<typeof ComplianceFailureSchema>;

/**
 * Result of scoring one vendor against the full scorecard
 */
export const VendorScoreSummarySchema = z.object({
  vendorId: z.string().min(1),
  categoryScores: z.array(CategoryScoreSchema),
  overallScore: score,
  overallConfidence: confidence,
  confidenceBand: ConfidenceBandSchema,
  complianceFailures: z.array(ComplianceFailureSchema),
  disqualified: z.boolean(),
  grade: GradeSchema,
});

export type VendorScoreSummary = z.infer<typeof VendorScoreSummarySchema>;

/**
 * One row of the ranking
 */
export const VendorRankingSchema = z.object({
  rank: z.number().int().min(1),
  vendorId: z.string().min(1),
  overallScore: score,
  overallConfidence: confidence,
  confidenceBand: ConfidenceBandSchema,
  complianceFailureCount: z.number().int().min(0),
  disqualified: z.boolean(),
  grade: GradeSchema,
  deltaFromLeader: z.number().min(0).max(100),
  deltaFromPrevious: z.number().min(0).max(100),
});

export type VendorRanking = z.infer<typeof VendorRankingSchema>;

/**
 * Category row of the cross-vendor matrix; cells follow ranking order
 */
export const CategoryMatrixRowSchema = z.object({
  categoryId: z.string().min(1),
  categoryName: z.string().min(1),
  cells: z.array(
    z.object({
      vendorId: z.string().min(1),
      score,
      confidence,
      complianceFailure: z.boolean(),
    })
  ),
});

export type CategoryMatrixRow = z.infer<typeof CategoryMatrixRowSchema>;

/**
 * Low-confidence flags for human review
 */
export const LowConfidenceFlagsSchema = z.object({
  threshold: confidence,
  categories: z.array(
    z.object({
      categoryId: z.string().min(1),
      vendorIds: z.array(z.string()),
    })
  ),
  criteria: z.array(
    z.object({
      categoryId: z.string().min(1),
      criterionId: z.string().min(1),
      vendorIds: z.array(z.string()),
    })
  ),
});

export type LowConfidenceFlags = z.infer<typeof LowConfidenceFlagsSchema>;

/**
 * Vendor that could not be scored
 */
export const VendorFailureSchema = z.object({
  vendorId: z.string().min(1),
  errorCode: z.string().min(1),
  message: z.string(),
});

export type VendorFailure = z.infer<typeof VendorFailureSchema>;

/**
 * Cross-vendor comparison report
 */
export const ComparisonReportSchema = z.object({
  rankings: z.array(VendorRankingSchema),
  categoryMatrix: z.array(CategoryMatrixRowSchema),
  lowConfidence: LowConfidenceFlagsSchema,
  failures: z.array(VendorFailureSchema),
  summaries: z.array(VendorScoreSummarySchema),
});

export type ComparisonReport = z.infer<typeof ComparisonReportSchema>;

/**
 * Validates a comparison report against the output schema
 */
export function validateComparisonReport(data: unknown): ComparisonReport {
  return ComparisonReportSchema.parse(data);
}

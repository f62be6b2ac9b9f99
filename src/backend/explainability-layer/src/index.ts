/**
 * Explainability Layer
 *
 * Human-readable explanations of vendor scores, ranking differences and
 * the executive summary of a comparison.
 */

export const VERSION = '1.0.0';

// Category Analyzer
export {
  analyzeCategories,
  determineRiskSeverity,
  STRENGTH_THRESHOLD,
  WEAKNESS_THRESHOLD,
  CRITICAL_SCORE_THRESHOLD,
  DEFAULT_ANALYSIS_OPTIONS,
  type AnalyzedCategory,
  type RiskFactor,
  type RiskSeverity,
  type CategoryAnalysisResult,
  type CategoryAnalysisOptions,
} from './category-analyzer.js';

// Narrative Generator
export {
  explainVendor,
  generateDisqualificationReason,
  buildExecutiveSummary,
  DEFAULT_NARRATIVE_OPTIONS,
  NO_QUALIFIED_VENDOR,
  type VendorExplanation,
  type DisqualificationReason,
  type ExecutiveSummary,
  type ConfidenceLevel,
  type NarrativeOptions,
} from './narrative-generator.js';

// Comparison Engine
export {
  compareCategories,
  compareVendorPair,
  compareAdjacentVendors,
  analyzeComparisons,
  SIGNIFICANT_DIFFERENCE_THRESHOLD,
  type CategoryDifference,
  type RankedVendorRef,
  type VendorComparison,
  type ComparisonAnalysis,
} from './comparison-engine.js';

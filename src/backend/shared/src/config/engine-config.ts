/**
 * Engine Configuration
 *
 * Stateless settings read once at startup: review thresholds, the free-text
 * fallback policy, tie-break order and cache lifetime. A loaded config is
 * frozen and shared read-only by every evaluation.
 */

import { z } from 'zod';
import { deepFreeze } from '../utils/immutable.js';

/**
 * Tie-break rules applied after overall score, in configured order.
 * Input order is always the final rule.
 */
export const TieBreakRule = {
  COMPLIANCE_FAILURES: 'complianceFailures',
  CONFIDENCE: 'confidence',
} as const;

export type TieBreakRule = (typeof TieBreakRule)[keyof typeof TieBreakRule];

export const TieBreakRuleSchema = z.enum(['complianceFailures', 'confidence']);

/**
 * Confidence band lower bounds
 */
export const ConfidenceBandsSchema = z
  .object({
    high: z.number().min(0).max(1),
    medium: z.number().min(0).max(1),
  })
  .refine((bands) => bands.medium <= bands.high, {
    message: 'medium band must not exceed high band',
  });

export type ConfidenceBands = z.infer<typeof ConfidenceBandsSchema>;

/**
 * Full engine configuration schema
 */
export const EngineConfigSchema = z.object({
  /** Category/criterion confidence below this is flagged for human review */
  lowConfidenceThreshold: z.number().min(0).max(1),
  /** Confidence multiplier for free-text evidence without a numeric signal */
  freeTextConfidenceMultiplier: z.number().min(0).max(1),
  /** Read the first number in rawText when no numeric attribute is present */
  extractNumbersFromText: z.boolean(),
  /** Allowed deviation of weight sums from 1.0 */
  weightTolerance: z.number().positive().max(0.01),
  tieBreakOrder: z.array(TieBreakRuleSchema).max(2),
  confidenceBands: ConfidenceBandsSchema,
  cacheTtlSeconds: z.number().int().min(0),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Default engine configuration
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = deepFreeze<EngineConfig>({
  lowConfidenceThreshold: 0.5,
  freeTextConfidenceMultiplier: 0.5,
  extractNumbersFromText: false,
  weightTolerance: 1e-6,
  tieBreakOrder: [TieBreakRule.COMPLIANCE_FAILURES, TieBreakRule.CONFIDENCE],
  confidenceBands: { high: 0.75, medium: 0.5 },
  cacheTtlSeconds: 900,
});

/**
 * Environment variable names read by loadEngineConfig
 */
export const ENGINE_CONFIG_ENV = {
  LOW_CONFIDENCE_THRESHOLD: 'LOW_CONFIDENCE_THRESHOLD',
  FREE_TEXT_CONFIDENCE_MULTIPLIER: 'FREE_TEXT_CONFIDENCE_MULTIPLIER',
  EXTRACT_NUMBERS_FROM_TEXT: 'EXTRACT_NUMBERS_FROM_TEXT',
  TIE_BREAK_ORDER: 'TIE_BREAK_ORDER',
  REPORT_CACHE_TTL_SECONDS: 'REPORT_CACHE_TTL_SECONDS',
} as const;

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return Number(value);
}

/**
 * Merges overrides onto the defaults, validates and freezes the result.
 * Throws a ZodError for out-of-range values.
 */
export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return deepFreeze(EngineConfigSchema.parse({ ...DEFAULT_ENGINE_CONFIG, ...overrides }));
}

/**
 * Loads engine configuration from environment variables
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const tieBreakOrder = env[ENGINE_CONFIG_ENV.TIE_BREAK_ORDER];

  return createEngineConfig({
    lowConfidenceThreshold: numberFromEnv(
      env[ENGINE_CONFIG_ENV.LOW_CONFIDENCE_THRESHOLD],
      DEFAULT_ENGINE_CONFIG.lowConfidenceThreshold
    ),
    freeTextConfidenceMultiplier: numberFromEnv(
      env[ENGINE_CONFIG_ENV.FREE_TEXT_CONFIDENCE_MULTIPLIER],
      DEFAULT_ENGINE_CONFIG.freeTextConfidenceMultiplier
    ),
    extractNumbersFromText: env[ENGINE_CONFIG_ENV.EXTRACT_NUMBERS_FROM_TEXT] === 'true',
    tieBreakOrder:
      tieBreakOrder === undefined
        ? [...DEFAULT_ENGINE_CONFIG.tieBreakOrder]
        : TieBreakRuleSchema.array().parse(
            tieBreakOrder
              .split(',')
              .map((rule) => rule.trim())
              .filter((rule) => rule.length > 0)
          ),
    cacheTtlSeconds: numberFromEnv(
      env[ENGINE_CONFIG_ENV.REPORT_CACHE_TTL_SECONDS],
      DEFAULT_ENGINE_CONFIG.cacheTtlSeconds
    ),
  });
}

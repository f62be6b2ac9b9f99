/**
 * Criterion Scorer
 *
 * Scores one (criterion, evidence) pair to a bounded raw/normalized score and
 * a confidence. Scorers are swappable behind the CriterionScorer interface;
 * the rule-based scorer here reads structured attributes and falls back to a
 * configurable free-text policy.
 */

import {
  EvidenceAttribute,
  deepFreeze,
  isEvidencePresent,
  malformedAttribute,
  type CriterionScore,
  type EngineConfig,
  type Evidence,
  type EvidenceLookup,
  type ScoringScale,
} from '@proposal-eval/shared';
import type { Criterion } from '../scorecard/scorecard.js';

/**
 * Scoring capability consumed by the vendor scoring engine
 */
export interface CriterionScorer {
  score(criterion: Criterion, evidence: EvidenceLookup): CriterionScore;
}

/**
 * Policy for evidence that carries no structured numeric signal.
 * The midpoint fallback is a heuristic and stays configurable.
 */
export interface FreeTextPolicy {
  /** Multiplier applied to extraction confidence for midpoint scores */
  confidenceMultiplier: number;
  /** Read the first number in rawText before falling back to the midpoint */
  extractNumbersFromText: boolean;
}

export const DEFAULT_FREE_TEXT_POLICY: FreeTextPolicy = {
  confidenceMultiplier: 0.5,
  extractNumbersFromText: false,
};

export const NO_EVIDENCE_RATIONALE = 'no evidence found';

const NUMBER_IN_TEXT = /\d[\d,]*(?:\.\d+)?/;

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(max, Math.max(min, value));
}

/**
 * Linear rescale of a raw score from the criterion scale to [0, 100]
 */
export function normalizeScore(raw: number, scale: ScoringScale): number {
  const span = scale.max - scale.min;
  if (!Number.isFinite(span) || !(span > 0)) {
    return 0;
  }
  return clamp(((raw - scale.min) / span) * 100, 0, 100);
}

/**
 * Reads a number from a structured attribute or free text.
 * Plain numeric strings parse as a whole; otherwise the first number in the
 * text is used with thousands separators removed. A string that parses as a
 * whole to an infinite value (such as "1e400") is not numeric.
 */
export function extractNumericValue(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }

  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return undefined;
  }

  const whole = Number(trimmed);
  if (Number.isFinite(whole)) {
    return whole;
  }
  if (!Number.isNaN(whole)) {
    return undefined;
  }

  const match = NUMBER_IN_TEXT.exec(trimmed);
  if (!match) {
    return undefined;
  }

  const parsed = Number.parseFloat(match[0].replace(/,/g, ''));
  return Number.isFinite(parsed) ? parsed : undefined;
}

function buildScore(
  criterion: Criterion,
  rawScore: number,
  confidence: number,
  parts: string[],
  options: { vetoed?: boolean; evidencePresent?: boolean; warnings?: string[] } = {}
): CriterionScore {
  return deepFreeze({
    criterionId: criterion.id,
    rawScore,
    normalizedScore: normalizeScore(rawScore, criterion.scale),
    confidence: clamp(confidence, 0, 1),
    rationale: parts.join('; '),
    vetoed: options.vetoed ?? false,
    evidencePresent: options.evidencePresent ?? true,
    warnings: options.warnings ?? [],
  });
}

/**
 * Score for a criterion with no evidence: zero confidence and the scale
 * minimum as raw score, which normalizes to 0. On a scale whose minimum is not
 * 0 (such as [1, 5]) the raw score is therefore the minimum, not a literal 0.
 */
export function absentCriterionScore(criterion: Criterion): CriterionScore {
  return buildScore(criterion, criterion.scale.min, 0, [NO_EVIDENCE_RATIONALE], {
    evidencePresent: false,
  });
}

/**
 * Rule-based scorer over structured evidence attributes
 */
export class RuleBasedCriterionScorer implements CriterionScorer {
  private readonly policy: FreeTextPolicy;

  constructor(policy: Partial<FreeTextPolicy> = {}) {
    this.policy = { ...DEFAULT_FREE_TEXT_POLICY, ...policy };
  }

  static fromConfig(config: EngineConfig): RuleBasedCriterionScorer {
    return new RuleBasedCriterionScorer({
      confidenceMultiplier: config.freeTextConfidenceMultiplier,
      extractNumbersFromText: config.extractNumbersFromText,
    });
  }

  score(criterion: Criterion, evidence: EvidenceLookup): CriterionScore {
    if (!isEvidencePresent(evidence)) {
      return absentCriterionScore(criterion);
    }

    return criterion.compliance
      ? this.scoreCompliance(criterion, evidence)
      : this.scoreWeighted(criterion, evidence);
  }

  private scoreCompliance(criterion: Criterion, evidence: Evidence): CriterionScore {
    const flag = evidence.attributes[EvidenceAttribute.COMPLIANT];

    if (typeof flag !== 'boolean') {
      const warning = malformedAttribute(
        EvidenceAttribute.COMPLIANT,
        flag === undefined ? 'attribute missing' : `expected boolean, got ${typeof flag}`
      );
      const message = `${warning.attribute}: ${warning.detail}`;
      return buildScore(criterion, criterion.scale.min, 0, [message, 'compliance not demonstrated'], {
        warnings: [message],
      });
    }

    return buildScore(
      criterion,
      flag ? criterion.scale.max : criterion.scale.min,
      evidence.extractionConfidence,
      [flag ? 'compliance requirement met' : 'compliance requirement not met'],
      { vetoed: !flag }
    );
  }

  private scoreWeighted(criterion: Criterion, evidence: Evidence): CriterionScore {
    const { min, max } = criterion.scale;
    const parts: string[] = [];
    const warnings: string[] = [];

    let value: number | undefined;
    let source: string = EvidenceAttribute.NUMERIC_VALUE;

    const attribute = evidence.attributes[EvidenceAttribute.NUMERIC_VALUE];
    if (attribute !== undefined) {
      value = extractNumericValue(attribute);
      if (value === undefined) {
        const warning = malformedAttribute(EvidenceAttribute.NUMERIC_VALUE, 'not numeric, ignored');
        warnings.push(`${warning.attribute}: ${warning.detail}`);
      }
    }

    if (value === undefined && this.policy.extractNumbersFromText) {
      value = extractNumericValue(evidence.rawText);
      source = 'rawText';
    }

    if (value === undefined) {
      parts.push(...warnings, 'free-text evidence without a numeric signal, neutral midpoint');
      return buildScore(
        criterion,
        min + (max - min) / 2,
        evidence.extractionConfidence * this.policy.confidenceMultiplier,
        parts,
        { warnings }
      );
    }

    parts.push(...warnings);
    parts.push(source === 'rawText' ? `numeric value ${value} read from text` : `numeric value ${value}`);

    const clamped = clamp(value, min, max);
    if (clamped !== value) {
      const warning = malformedAttribute(
        source,
        `value ${value} outside scale [${min}, ${max}], clamped to ${clamped}`
      );
      const message = `${warning.attribute}: ${warning.detail}`;
      warnings.push(message);
      parts.push(message);
    }

    return buildScore(criterion, clamped, evidence.extractionConfidence, parts, { warnings });
  }
}

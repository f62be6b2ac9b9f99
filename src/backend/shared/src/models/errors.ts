/**
 * Evaluation Error Kinds
 *
 * Error classes raised by the scoring engine. Each carries a stable `code`
 * so the API layer and the comparison report can surface failures without
 * depending on class identity.
 */

import type { ZodError } from 'zod';

/**
 * Stable error codes
 */
export const EvaluationErrorCode = {
  INVALID_SCORECARD: 'INVALID_SCORECARD',
  UNKNOWN_CRITERION: 'UNKNOWN_CRITERION',
  INVALID_EVIDENCE: 'INVALID_EVIDENCE',
  MALFORMED_EVIDENCE_ATTRIBUTE: 'MALFORMED_EVIDENCE_ATTRIBUTE',
  SCORING_FAILED: 'SCORING_FAILED',
} as const;

export type EvaluationErrorCode = (typeof EvaluationErrorCode)[keyof typeof EvaluationErrorCode];

/**
 * Base class for all engine errors
 */
export class EvaluationError extends Error {
  readonly code: EvaluationErrorCode;

  constructor(code: EvaluationErrorCode, message: string) {
    super(message);
    this.name = 'EvaluationError';
    this.code = code;
  }
}

/**
 * Raised at construction time when weights, scales or ids are inconsistent.
 * Carries every violation found, not only the first.
 */
export class InvalidScorecardError extends EvaluationError {
  readonly violations: string[];

  constructor(violations: string[]) {
    super(
      EvaluationErrorCode.INVALID_SCORECARD,
      `Invalid scorecard: ${violations.join('; ')}`
    );
    this.name = 'InvalidScorecardError';
    this.violations = [...violations];
  }
}

/**
 * Raised when evidence or a lookup names a criterion the scorecard does not define
 */
export class UnknownCriterionError extends EvaluationError {
  readonly criterionId: string;
  readonly vendorId?: string;

  constructor(criterionId: string, vendorId?: string) {
    super(
      EvaluationErrorCode.UNKNOWN_CRITERION,
      vendorId
        ? `Unknown criterion "${criterionId}" referenced by vendor "${vendorId}"`
        : `Unknown criterion "${criterionId}"`
    );
    this.name = 'UnknownCriterionError';
    this.criterionId = criterionId;
    this.vendorId = vendorId;
  }
}

/**
 * Raised when an evidence record does not match the record schema
 */
export class InvalidEvidenceError extends EvaluationError {
  readonly violations: string[];

  constructor(violations: string[]) {
    super(EvaluationErrorCode.INVALID_EVIDENCE, `Invalid evidence: ${violations.join('; ')}`);
    this.name = 'InvalidEvidenceError';
    this.violations = [...violations];
  }
}

/**
 * Non-fatal: describes an evidence attribute that could not be used as given.
 * The scorer records it as a warning on the criterion score; it is never thrown.
 */
export interface MalformedEvidenceAttribute {
  code: typeof EvaluationErrorCode.MALFORMED_EVIDENCE_ATTRIBUTE;
  attribute: string;
  detail: string;
}

/**
 * Creates a malformed-attribute warning
 */
export function malformedAttribute(attribute: string, detail: string): MalformedEvidenceAttribute {
  return {
    code: EvaluationErrorCode.MALFORMED_EVIDENCE_ATTRIBUTE,
    attribute,
    detail,
  };
}

/**
 * Type guard for engine errors
 */
export function isEvaluationError(error: unknown): error is EvaluationError {
  return error instanceof EvaluationError;
}

/**
 * Converts any thrown value into a code/message pair for reports and responses
 */
export function describeError(error: unknown): { errorCode: string; message: string } {
  if (isEvaluationError(error)) {
    return { errorCode: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { errorCode: EvaluationErrorCode.SCORING_FAILED, message: error.message };
  }
  return { errorCode: EvaluationErrorCode.SCORING_FAILED, message: String(error) };
}

/**
 * Flattens zod issues into "path: message" strings
 */
export function formatSchemaIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

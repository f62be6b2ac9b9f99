/**
 * Evidence Data Models and Zod Schemas
 *
 * Evidence records are produced upstream by document extraction and keyed by
 * (vendorId, criterionId). The engine only reads them.
 */

import { z } from 'zod';

/**
 * Well-known structured attribute keys
 */
export const EvidenceAttribute = {
  NUMERIC_VALUE: 'numericValue',
  COMPLIANT: 'compliant',
} as const;

/**
 * Evidence record schema, as received from the extraction collaborator
 */
export const EvidenceRecordSchema = z.object({
  vendorId: z.string().min(1).max(200),
  criterionId: z.string().min(1).max(100),
  rawText: z.string().max(20000).default(''),
  structuredAttributes: z.record(z.unknown()).optional(),
  extractionConfidence: z.number().min(0).max(1),
});

export type EvidenceRecord = z.infer<typeof EvidenceRecordSchema>;
export type EvidenceRecordInput = z.input<typeof EvidenceRecordSchema>;

/**
 * Evidence payload stored against a (vendor, criterion) pair
 */
export const EvidenceInputSchema = EvidenceRecordSchema.omit({
  vendorId: true,
  criterionId: true,
});

export type EvidenceInput = z.input<typeof EvidenceInputSchema>;

/**
 * Stored, immutable evidence
 */
export interface Evidence {
  readonly kind: 'evidence';
  readonly vendorId: string;
  readonly criterionId: string;
  readonly rawText: string;
  readonly extractionConfidence: number;
  readonly attributes: Readonly<Record<string, unknown>>;
}

/**
 * Sentinel for "no evidence was extracted for this criterion"
 */
export interface AbsentEvidence {
  readonly kind: 'absent';
}

export const ABSENT_EVIDENCE: AbsentEvidence = Object.freeze({ kind: 'absent' as const });

export type EvidenceLookup = Evidence | AbsentEvidence;

/**
 * Narrows a lookup result to present evidence
 */
export function isEvidencePresent(lookup: EvidenceLookup): lookup is Evidence {
  return lookup.kind === 'evidence';
}

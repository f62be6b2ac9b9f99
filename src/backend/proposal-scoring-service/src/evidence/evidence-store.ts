/**
 * Evidence Store
 *
 * Per-vendor evidence keyed by criterion id, populated from extraction output.
 * Every put is checked against the scorecard; stored evidence is frozen.
 * Lookups return an explicit absent sentinel so callers can tell "no
 * evidence" apart from zero-confidence evidence.
 */

import {
  EvidenceRecordSchema,
  EvidenceInputSchema,
  ABSENT_EVIDENCE,
  EvaluationError,
  InvalidEvidenceError,
  UnknownCriterionError,
  deepFreeze,
  formatSchemaIssues,
  type Evidence,
  type EvidenceInput,
  type EvidenceLookup,
} from '@proposal-eval/shared';
import type { Scorecard } from '../scorecard/scorecard.js';

/**
 * Record refused during bulk ingestion
 */
export interface EvidenceRejection {
  /** Position of the record in the ingested batch */
  index: number;
  vendorId?: string;
  criterionId?: string;
  error: EvaluationError;
}

export interface IngestResult {
  accepted: number;
  rejected: EvidenceRejection[];
}

function optionalString(record: unknown, key: string): string | undefined {
  if (typeof record !== 'object' || record === null || !(key in record)) {
    return undefined;
  }
  const value: unknown = Reflect.get(record, key);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export class EvidenceStore {
  readonly scorecard: Scorecard;
  private readonly records = new Map<string, Map<string, Evidence>>();
  private readonly rejections = new Map<string, EvidenceRejection[]>();
  private readonly vendorOrder: string[] = [];

  constructor(scorecard: Scorecard) {
    this.scorecard = scorecard;
  }

  /**
   * Registers a vendor so it is scored even without any evidence.
   * First registration fixes the vendor's position in insertion order.
   */
  registerVendor(vendorId: string): void {
    if (!this.records.has(vendorId)) {
      this.records.set(vendorId, new Map());
      this.vendorOrder.push(vendorId);
    }
  }

  /**
   * Stores evidence for a (vendor, criterion) pair; last write wins.
   * Throws UnknownCriterionError if the scorecard has no such criterion.
   */
  put(vendorId: string, criterionId: string, evidence: EvidenceInput): Evidence {
    if (!this.scorecard.hasCriterion(criterionId)) {
      throw new UnknownCriterionError(criterionId, vendorId);
    }

    const parsed = EvidenceInputSchema.safeParse(evidence);
    if (!parsed.success) {
      throw new InvalidEvidenceError(formatSchemaIssues(parsed.error));
    }
    if (vendorId.length === 0) {
      throw new InvalidEvidenceError(['vendorId: must not be empty']);
    }

    const stored: Evidence = deepFreeze({
      kind: 'evidence' as const,
      vendorId,
      criterionId,
      rawText: parsed.data.rawText,
      extractionConfidence: parsed.data.extractionConfidence,
      attributes: structuredClone(parsed.data.structuredAttributes ?? {}),
    });

    this.registerVendor(vendorId);
    this.records.get(vendorId)?.set(criterionId, stored);
    return stored;
  }

  /**
   * Returns the stored evidence or the absent sentinel
   */
  get(vendorId: string, criterionId: string): EvidenceLookup {
    return this.records.get(vendorId)?.get(criterionId) ?? ABSENT_EVIDENCE;
  }

  /**
   * Bulk-loads extraction output. Invalid records are collected, not thrown;
   * a vendor with any rejected record is tainted and will not be scored.
   */
  ingest(records: readonly unknown[]): IngestResult {
    const rejected: EvidenceRejection[] = [];
    let accepted = 0;

    records.forEach((record, index) => {
      const vendorId = optionalString(record, 'vendorId');
      const criterionId = optionalString(record, 'criterionId');

      if (vendorId) {
        this.registerVendor(vendorId);
      }

      const parsed = EvidenceRecordSchema.safeParse(record);
      let rejection: EvidenceRejection | undefined;

      if (!parsed.success) {
        rejection = {
          index,
          vendorId,
          criterionId,
          error: new InvalidEvidenceError(formatSchemaIssues(parsed.error)),
        };
      } else if (!this.scorecard.hasCriterion(parsed.data.criterionId)) {
        rejection = {
          index,
          vendorId,
          criterionId,
          error: new UnknownCriterionError(parsed.data.criterionId, parsed.data.vendorId),
        };
      } else {
        const { vendorId: vendor, criterionId: criterion, ...evidence } = parsed.data;
        this.put(vendor, criterion, evidence);
        accepted++;
      }

      if (rejection) {
        rejected.push(rejection);
        if (rejection.vendorId) {
          const existing = this.rejections.get(rejection.vendorId) ?? [];
          this.rejections.set(rejection.vendorId, [...existing, rejection]);
        }
      }
    });

    return { accepted, rejected };
  }

  rejectionsFor(vendorId: string): readonly EvidenceRejection[] {
    return this.rejections.get(vendorId) ?? [];
  }

  isTainted(vendorId: string): boolean {
    return this.rejectionsFor(vendorId).length > 0;
  }

  hasVendor(vendorId: string): boolean {
    return this.records.has(vendorId);
  }

  /**
   * Vendor ids in first-seen order
   */
  vendorIds(): string[] {
    return [...this.vendorOrder];
  }

  /**
   * All evidence for one vendor, in insertion order
   */
  forVendor(vendorId: string): Evidence[] {
    return [...(this.records.get(vendorId)?.values() ?? [])];
  }

  /**
   * All stored evidence, grouped by vendor in first-seen order
   */
  entries(): Evidence[] {
    return this.vendorOrder.flatMap((vendorId) => this.forVendor(vendorId));
  }

  get size(): number {
    let count = 0;
    for (const byCriterion of this.records.values()) {
      count += byCriterion.size;
    }
    return count;
  }
}

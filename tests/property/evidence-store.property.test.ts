/**
 * Property 3: Evidence Store Isolation
 *
 * Evidence is keyed by (vendor, criterion), checked against the scorecard on
 * every put and frozen once stored. Bulk ingestion rejects bad records one
 * by one and taints only the vendors they belong to.
 *
 * @file src/backend/proposal-scoring-service/src/evidence/evidence-store.ts
 */

import fc from 'fast-check';
import { describe, expect, it, beforeEach } from 'vitest';

import { EvidenceStore } from '../../src/backend/proposal-scoring-service/src/evidence/evidence-store.js';
import {
  ABSENT_EVIDENCE,
  EvaluationErrorCode,
  InvalidEvidenceError,
  UnknownCriterionError,
  isEvidencePresent,
} from '../../src/backend/shared/src/index.js';
import { buildFixtureScorecard, FIXTURE_EVIDENCE } from '../helpers/fixtures.js';

const propertyConfig = {
  numRuns: 50,
  verbose: false,
};

describe('Property 3: Evidence Store Isolation', () => {
  const scorecard = buildFixtureScorecard();
  let store: EvidenceStore;

  beforeEach(() => {
    store = new EvidenceStore(scorecard);
  });

  describe('put and get', () => {
    it('returns stored evidence for the exact (vendor, criterion) pair', () => {
      store.put('acme', 'uptime', {
        rawText: 'We guarantee 99.9% uptime',
        structuredAttributes: { numericValue: 99.9 },
        extractionConfidence: 0.9,
      });

      const lookup = store.get('acme', 'uptime');
      expect(isEvidencePresent(lookup)).toBe(true);
      if (isEvidencePresent(lookup)) {
        expect(lookup.rawText).toBe('We guarantee 99.9% uptime');
        expect(lookup.attributes).toEqual({ numericValue: 99.9 });
        expect(lookup.extractionConfidence).toBe(0.9);
      }
    });

    it('returns the absent sentinel for missing pairs', () => {
      store.put('acme', 'uptime', { extractionConfidence: 0.9 });

      expect(store.get('acme', 'support')).toBe(ABSENT_EVIDENCE);
      expect(store.get('globex', 'uptime')).toBe(ABSENT_EVIDENCE);
    });

    it('keeps the last write for a pair', () => {
      store.put('acme', 'price', { structuredAttributes: { numericValue: 40 }, extractionConfidence: 0.5 });
      store.put('acme', 'price', { structuredAttributes: { numericValue: 75 }, extractionConfidence: 0.6 });

      const lookup = store.get('acme', 'price');
      expect(isEvidencePresent(lookup) && lookup.attributes.numericValue).toBe(75);
      expect(store.size).toBe(1);
    });

    it('rejects criteria the scorecard does not define', () => {
      expect(() => store.put('acme', 'nope', { extractionConfidence: 0.5 })).toThrow(
        UnknownCriterionError
      );
      expect(() => store.put('acme', 'nope', { extractionConfidence: 0.5 })).toThrow(
        'Unknown criterion "nope" referenced by vendor "acme"'
      );
      expect(store.hasVendor('acme')).toBe(false);
    });

    it('rejects evidence that fails the record schema', () => {
      expect(() => store.put('acme', 'uptime', { extractionConfidence: 1.5 })).toThrow(
        InvalidEvidenceError
      );
      expect(() => store.put('acme', 'uptime', { extractionConfidence: 1.5 })).toThrow(
        'Invalid evidence: extractionConfidence: Number must be less than or equal to 1'
      );
    });

    it('freezes stored evidence and detaches it from the caller', () => {
      const attributes: Record<string, unknown> = { numericValue: 50, tags: ['a'] };
      const stored = store.put('acme', 'uptime', {
        structuredAttributes: attributes,
        extractionConfidence: 0.7,
      });
      attributes.numericValue = 10;

      expect(Object.isFrozen(stored)).toBe(true);
      expect(Object.isFrozen(stored.attributes)).toBe(true);
      expect(stored.attributes.numericValue).toBe(50);
    });
  });

  describe('bulk ingestion', () => {
    it('loads every fixture record', () => {
      const result = store.ingest(FIXTURE_EVIDENCE);

      expect(result).toEqual({ accepted: 11, rejected: [] });
      expect(store.vendorIds()).toEqual(['acme', 'globex', 'initech']);
      expect(store.forVendor('initech').map((e) => e.criterionId)).toEqual(['uptime', 'price', 'soc2']);
    });

    it('rejects bad records individually and taints only their vendors', () => {
      const result = store.ingest([
        { vendorId: 'acme', criterionId: 'uptime', extractionConfidence: 0.9 },
        { vendorId: 'globex', criterionId: 'uptime', extractionConfidence: 2 },
        { vendorId: 'initech', criterionId: 'nope', extractionConfidence: 0.5 },
        { criterionId: 'price', extractionConfidence: 0.5 },
      ]);

      expect(result.accepted).toBe(1);
      expect(result.rejected.map((r) => r.index)).toEqual([1, 2, 3]);
      expect(result.rejected.map((r) => r.error.code)).toEqual([
        EvaluationErrorCode.INVALID_EVIDENCE,
        EvaluationErrorCode.UNKNOWN_CRITERION,
        EvaluationErrorCode.INVALID_EVIDENCE,
      ]);
      expect(result.rejected[2].vendorId).toBeUndefined();

      expect(store.isTainted('acme')).toBe(false);
      expect(store.isTainted('globex')).toBe(true);
      expect(store.isTainted('initech')).toBe(true);
      expect(store.vendorIds()).toEqual(['acme', 'globex', 'initech']);
      expect(store.size).toBe(1);
    });

    it('registers vendors without evidence', () => {
      store.registerVendor('silent');

      expect(store.hasVendor('silent')).toBe(true);
      expect(store.forVendor('silent')).toEqual([]);
      expect(store.vendorIds()).toEqual(['silent']);
    });

    it('should keep vendors in first-seen order for any record order', () => {
      fc.assert(
        fc.property(fc.shuffledSubarray(FIXTURE_EVIDENCE, { minLength: 1 }), (records) => {
          const local = new EvidenceStore(scorecard);
          local.ingest(records);

          const expected = [...new Set(records.map((record) => record.vendorId))];
          expect(local.vendorIds()).toEqual(expected);
          expect(local.size).toBe(records.length);
        }),
        propertyConfig
      );
    });

    it('should never let one vendor see another vendor\'s evidence', () => {
      fc.assert(
        fc.property(fc.shuffledSubarray(FIXTURE_EVIDENCE), (records) => {
          const local = new EvidenceStore(scorecard);
          local.ingest(records);

          for (const vendorId of local.vendorIds()) {
            for (const evidence of local.forVendor(vendorId)) {
              expect(evidence.vendorId).toBe(vendorId);
            }
          }
        }),
        propertyConfig
      );
    });
  });
});

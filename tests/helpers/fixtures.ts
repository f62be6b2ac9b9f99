/**
 * Shared test fixtures: a three-category scorecard and evidence for three
 * vendors (one strong, one disqualified, one thinly evidenced).
 */

import type { CategoryDescriptorInput, EvidenceRecordInput } from '../../src/backend/shared/src/index.js';
import { EvidenceStore } from '../../src/backend/proposal-scoring-service/src/evidence/evidence-store.js';
import { Scorecard } from '../../src/backend/proposal-scoring-service/src/scorecard/scorecard.js';

export const FIXTURE_CATEGORIES: CategoryDescriptorInput[] = [
  {
    id: 'technical',
    name: 'Technical Capability',
    weight: 0.5,
    criteria: [
      { id: 'uptime', description: 'Guaranteed uptime percentage', weight: 0.5 },
      {
        id: 'support',
        description: 'Support coverage rating',
        weight: 0.5,
        scale: { min: 0, max: 10 },
      },
    ],
  },
  {
    id: 'cost',
    name: 'Cost',
    weight: 0.3,
    criteria: [{ id: 'price', description: 'Price competitiveness', weight: 1 }],
  },
  {
    id: 'compliance',
    name: 'Compliance',
    weight: 0.2,
    criteria: [{ id: 'soc2', description: 'SOC 2 Type II report', weight: 1, compliance: true }],
  },
];

export const FIXTURE_EVIDENCE: EvidenceRecordInput[] = [
  // acme: strong across the board
  {
    vendorId: 'acme',
    criterionId: 'uptime',
    rawText: 'We guarantee 90% uptime',
    structuredAttributes: { numericValue: 90 },
    extractionConfidence: 0.9,
  },
  {
    vendorId: 'acme',
    criterionId: 'support',
    structuredAttributes: { numericValue: 8 },
    extractionConfidence: 0.8,
  },
  {
    vendorId: 'acme',
    criterionId: 'price',
    structuredAttributes: { numericValue: 70 },
    extractionConfidence: 1,
  },
  {
    vendorId: 'acme',
    criterionId: 'soc2',
    structuredAttributes: { compliant: true },
    extractionConfidence: 1,
  },
  // globex: best raw numbers but fails compliance
  {
    vendorId: 'globex',
    criterionId: 'uptime',
    structuredAttributes: { numericValue: 95 },
    extractionConfidence: 0.9,
  },
  {
    vendorId: 'globex',
    criterionId: 'support',
    structuredAttributes: { numericValue: 9 },
    extractionConfidence: 0.9,
  },
  {
    vendorId: 'globex',
    criterionId: 'price',
    structuredAttributes: { numericValue: 60 },
    extractionConfidence: 0.9,
  },
  {
    vendorId: 'globex',
    criterionId: 'soc2',
    structuredAttributes: { compliant: false },
    extractionConfidence: 0.9,
  },
  // initech: free text for uptime, nothing for support
  {
    vendorId: 'initech',
    criterionId: 'uptime',
    rawText: 'We offer great uptime',
    extractionConfidence: 0.6,
  },
  {
    vendorId: 'initech',
    criterionId: 'price',
    structuredAttributes: { numericValue: 80 },
    extractionConfidence: 0.5,
  },
  {
    vendorId: 'initech',
    criterionId: 'soc2',
    structuredAttributes: { compliant: true },
    extractionConfidence: 0.8,
  },
];

export function buildFixtureScorecard(): Scorecard {
  return Scorecard.build(FIXTURE_CATEGORIES);
}

export function buildFixtureStore(scorecard: Scorecard = buildFixtureScorecard()): EvidenceStore {
  const store = new EvidenceStore(scorecard);
  store.ingest(FIXTURE_EVIDENCE);
  return store;
}

/**
 * JSON descriptor form, as sent to the API
 */
export function fixtureScorecardDescriptor(): { categories: CategoryDescriptorInput[] } {
  return { categories: structuredClone(FIXTURE_CATEGORIES) };
}

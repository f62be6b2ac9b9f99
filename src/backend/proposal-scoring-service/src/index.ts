/**
 * Proposal Scoring Service
 *
 * Scoring and comparison engine: scorecard model, evidence store, criterion
 * scoring, category aggregation, vendor scoring, ranking and confidence.
 */

export const VERSION = '1.0.0';

// Scorecard model
export * from './scorecard/index.js';

// Evidence store
export * from './evidence/index.js';

// Scoring, aggregation, ranking and confidence
export * from './scoring/index.js';

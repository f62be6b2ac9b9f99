/**
 * Scoring Module Exports
 *
 * Exports criterion scoring, category aggregation, vendor scoring,
 * ranking and confidence estimation.
 */

export * from './criterion-scorer.js';
export * from './category-aggregator.js';
export * from './confidence-estimator.js';
export * from './vendor-scoring-engine.js';
export * from './ranking-engine.js';

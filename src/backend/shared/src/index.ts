/**
 * Shared Package
 *
 * Data models, error kinds, configuration and the logging, metrics and
 * cache collaborators used across the evaluation engine.
 */

// Scorecard descriptors
export * from './models/scorecard.js';

// Evidence records
export * from './models/evidence.js';

// Scores, summaries and comparison reports
export * from './models/scoring.js';

// Error kinds
export * from './models/errors.js';

// Engine configuration
export * from './config/engine-config.js';

// Immutability helpers
export * from './utils/immutable.js';

// Report cache
export * from './cache/report-cache.js';

// Logging
export * from './logging/logger.js';

// Metrics
export * from './metrics/metrics-collector.js';

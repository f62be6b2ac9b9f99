/**
 * Scorecard Module Exports
 */

export * from './scorecard.js';

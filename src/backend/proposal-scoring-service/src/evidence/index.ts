/**
 * Evidence Module Exports
 */

export * from './evidence-store.js';

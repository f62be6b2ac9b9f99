/**
 * Middleware Exports
 *
 * Central export point for all API middleware.
 */

export * from './request-context.js';

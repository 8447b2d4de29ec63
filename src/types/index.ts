/**
 * Type exports
 */

export * from './analysis.js';
export * from './graph.js';

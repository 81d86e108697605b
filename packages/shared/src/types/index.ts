/**
 * Shared types for rollta
 */

export * from './sample.js';
export * from './result.js';

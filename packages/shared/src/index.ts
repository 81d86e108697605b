/**
 * @rollta/shared - Shared types, schemas, and utilities
 *
 * This package contains code shared between the indicator library and its tooling.
 */

export * from './types/index.js';
export * from './schemas/index.js';
export * from './logger.js';
export * from './config/index.js';
export * from './utils/load-env.js';
export * from './utils/sample.js';

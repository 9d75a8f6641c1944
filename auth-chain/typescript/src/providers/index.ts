/**
 * Providers.
 * @module providers
 */

export * from './types.js';
export * from './common.js';
export * from './factory.js';
export * from './github/index.js';

/**
 * Configuration module.
 * @module config
 */

export * from './defaults.js';
export * from './duration.js';
export * from './environment.js';
export * from './schema.js';
export * from './spec-reader.js';

/**
 * Credential model.
 * @module credentials
 */

export * from './common.js';
export * from './types.js';
export * from './aws.js';
export * from './azure.js';
export * from './gcp.js';
export * from './github.js';
export * from './oidc.js';
export * from './codec.js';
export * from './environment.js';

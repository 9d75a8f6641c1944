/**
 * Credential stores and the keychain capability.
 * @module store
 */

export * from './errors.js';
export * from './keychain.js';
export * from './keyring.js';
export * from './file.js';
export * from './memory.js';
export * from './noop.js';
export * from './factory.js';

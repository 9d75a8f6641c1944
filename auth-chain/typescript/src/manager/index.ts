export * from './chain.js';
export * from './manager.js';

export * from './interfaces.js';
export * from './whoami.js';

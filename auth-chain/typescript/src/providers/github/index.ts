export * from './app.js';
export * from './oidc.js';
export * from './private-key.js';
export * from './user.js';

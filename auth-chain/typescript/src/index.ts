/**
 * Auth chain and credential lifecycle engine.
 *
 * Resolves `[provider, identity...]` chains from configuration, runs each
 * step's protocol and caches the resulting short-lived credentials.
 *
 * @example
 * ```typescript
 * import { AuthManager, credentialEnvironment } from 'auth-chain';
 *
 * const manager = new AuthManager({
 *   providers: {
 *     'github-oidc': {
 *       kind: 'github/oidc',
 *       region: 'us-east-1',
 *       spec: { audience: 'sts.amazonaws.com' },
 *     },
 *   },
 *   identities: {
 *     deploy: {
 *       kind: 'aws/assume-role',
 *       via: { provider: 'github-oidc' },
 *       principal: { assume_role: 'arn:aws:iam::123456789012:role/deploy' },
 *     },
 *   },
 *   keyring: { type: 'memory' },
 * });
 *
 * const info = await manager.authenticate('deploy');
 * const env = info.credentials ? credentialEnvironment(info.credentials) : {};
 * ```
 *
 * @module auth-chain
 */

export * from './errors/index.js';
export * from './telemetry/index.js';
export * from './config/index.js';
export * from './core/index.js';
export * from './credentials/index.js';
export * from './types/index.js';
export * from './store/index.js';
export * from './flows/index.js';
export * from './sts/index.js';
export * from './providers/index.js';
export * from './identities/index.js';
export * from './manager/index.js';

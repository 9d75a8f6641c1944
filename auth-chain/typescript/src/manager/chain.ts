/**
 * Chain resolution from `via` links.
 * @module manager/chain
 */

import type { AuthConfig, IdentityConfig } from '../config/index.js';
import { AuthError, AuthErrorKind } from '../errors/index.js';

/**
 * Builds `[provider, identity1, ..., identityN]` ending at `identityName`.
 */
export function buildAuthenticationChain(
  identityName: string,
  identities: Readonly<Record<string, IdentityConfig>>
): string[] {
  const chain: string[] = [];
  const visited = new Set<string>();
  let current = identityName;

  for (;;) {
    if (visited.has(current)) {
      throw new AuthError(
        AuthErrorKind.CircularDependency,
        `circular dependency detected in identity chain involving "${current}"`,
        { context: { identity: current } }
      );
    }
    visited.add(current);

    const config = identities[current];
    if (!config) {
      throw new AuthError(AuthErrorKind.InvalidAuthConfig, `identity "${current}" not found`, {
        context: { identity: current },
      });
    }

    const provider = config.via?.provider;
    const next = config.via?.identity;
    if (!provider && !next) {
      throw new AuthError(
        AuthErrorKind.InvalidIdentityConfig,
        `identity "${current}" has no via configuration`,
        { context: { identity: current } }
      );
    }

    chain.push(current);
    if (provider) {
      chain.push(provider);
      break;
    }
    if (next) {
      current = next;
    }
  }

  return chain.reverse();
}

/**
 * Finds an identity by exact name, then case-insensitively.
 */
export function resolveIdentityName(
  name: string,
  identities: Readonly<Record<string, IdentityConfig>>
): string | undefined {
  if (Object.prototype.hasOwnProperty.call(identities, name)) {
    return name;
  }
  const lower = name.toLowerCase();
  return Object.keys(identities).find((candidate) => candidate.toLowerCase() === lower);
}

/**
 * Checks every `via` reference and that every chain terminates at a provider.
 */
export function validateChains(config: AuthConfig): void {
  for (const [name, identity] of Object.entries(config.identities)) {
    const provider = identity.via?.provider;
    if (provider && !config.providers[provider]) {
      throw new AuthError(
        AuthErrorKind.InvalidAuthConfig,
        `identity "${name}" references unknown provider "${provider}"`,
        { context: { identity: name, provider } }
      );
    }
    const via = identity.via?.identity;
    if (via && !config.identities[via]) {
      throw new AuthError(
        AuthErrorKind.InvalidAuthConfig,
        `identity "${name}" references unknown identity "${via}"`,
        { context: { identity: name, via } }
      );
    }
    buildAuthenticationChain(name, config.identities);
  }
}

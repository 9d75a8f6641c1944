/**
 * Provider construction by kind.
 * @module providers/factory
 */

import { PROVIDER_KINDS, type ProviderConfig } from '../config/index.js';
import { AuthError, AuthErrorKind } from '../errors/index.js';
import type { Provider } from '../types/index.js';
import { GitHubAppProvider } from './github/app.js';
import { GitHubOidcProvider } from './github/oidc.js';
import { GitHubUserProvider } from './github/user.js';
import type { AuthDependencies } from './types.js';

/**
 * Creates the provider implementation for `config.kind`.
 */
export function createProvider(
  name: string,
  config: ProviderConfig,
  deps: AuthDependencies = {}
): Provider {
  switch (config.kind) {
    case PROVIDER_KINDS.GITHUB_APP:
      return new GitHubAppProvider(name, config, deps);
    case PROVIDER_KINDS.GITHUB_USER:
      return new GitHubUserProvider(name, config, deps);
    case PROVIDER_KINDS.GITHUB_OIDC:
      return new GitHubOidcProvider(name, config, deps);
    default:
      throw new AuthError(
        AuthErrorKind.InvalidProviderKind,
        `unsupported provider kind "${config.kind}" for provider "${name}"`,
        { context: { provider: name, kind: config.kind } }
      );
  }
}

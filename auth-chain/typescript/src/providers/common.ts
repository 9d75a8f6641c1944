/**
 * Helpers shared by provider implementations.
 * @module providers/common
 */

import { AuthError, AuthErrorKind } from '../errors/index.js';
import type { ProviderConfig } from '../config/index.js';

/**
 * Checks the provider name and kind before any other configuration.
 */
export function assertProviderIdentity(
  name: string,
  config: ProviderConfig,
  expectedKind: string
): void {
  if (name.trim() === '') {
    throw new AuthError(AuthErrorKind.InvalidProviderConfig, 'provider name is required', {
      context: { field: 'name' },
    });
  }
  if (config.kind !== expectedKind) {
    throw new AuthError(
      AuthErrorKind.InvalidProviderKind,
      `provider "${name}" has kind "${config.kind}", expected "${expectedKind}"`,
      { context: { provider: name, kind: config.kind } }
    );
  }
}

/**
 * Strips trailing slashes from a base URL.
 */
export function trimBaseUrl(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Credential store selection from configuration.
 * @module store/factory
 */

import { SpecReader, type KeyringConfig } from '../config/index.js';
import { AuthErrorKind } from '../errors/index.js';
import type { CredentialStore } from '../types/index.js';
import { FileCredentialStore } from './file.js';
import { SystemKeychain, type Keychain } from './keychain.js';
import { DEFAULT_KEYRING_SERVICE, KeyringCredentialStore } from './keyring.js';
import { MemoryCredentialStore } from './memory.js';
import { NoopCredentialStore } from './noop.js';

/**
 * Creates the store named by `keyring.type`; the system keyring is the default.
 */
export function createCredentialStore(
  config: KeyringConfig | undefined,
  keychain: Keychain = new SystemKeychain()
): CredentialStore {
  const type = config?.type ?? 'system-keyring';
  const spec = new SpecReader(config?.spec, 'keyring', AuthErrorKind.InvalidProviderConfig);

  switch (type) {
    case 'system-keyring':
      return new KeyringCredentialStore(keychain, spec.string('service') ?? DEFAULT_KEYRING_SERVICE);
    case 'file':
      return new FileCredentialStore(spec.string('path'));
    case 'memory':
      return new MemoryCredentialStore();
    case 'noop':
      return new NoopCredentialStore();
  }
}

/**
 * Credential store on top of the OS keychain.
 * @module store/keyring
 */

import {
  deserializeCredentials,
  serializeCredentials,
  type Credentials,
} from '../credentials/index.js';
import { AuthError, AuthErrorKind, isAuthError } from '../errors/index.js';
import type { CredentialStore } from '../types/index.js';
import { credentialsNotFound } from './errors.js';
import type { Keychain } from './keychain.js';

/** Default keychain service for stored credentials. */
export const DEFAULT_KEYRING_SERVICE = 'auth-chain';

/** Account holding the JSON list of stored aliases. */
export const KEYRING_INDEX_ACCOUNT = '__index__';

function assertNotIndex(alias: string): void {
  if (alias === KEYRING_INDEX_ACCOUNT) {
    throw new AuthError(
      AuthErrorKind.StorageFailed,
      `alias "${alias}" is reserved for the keyring index`,
      { context: { alias } }
    );
  }
}

/**
 * Stores each alias as a keychain entry, plus an index entry for `list`.
 */
export class KeyringCredentialStore implements CredentialStore {
  readonly type = 'system-keyring';

  constructor(
    private readonly keychain: Keychain,
    private readonly service: string = DEFAULT_KEYRING_SERVICE
  ) {}

  async store(alias: string, credentials: Credentials): Promise<void> {
    assertNotIndex(alias);
    await this.keychain.set(this.service, alias, serializeCredentials(credentials));
    const aliases = await this.list();
    if (!aliases.includes(alias)) {
      await this.writeIndex([...aliases, alias]);
    }
  }

  async retrieve(alias: string): Promise<Credentials> {
    assertNotIndex(alias);
    let secret: string;
    try {
      secret = await this.keychain.get(this.service, alias);
    } catch (error) {
      if (isAuthError(error, AuthErrorKind.KeychainItemNotFound)) {
        throw credentialsNotFound(alias);
      }
      throw error;
    }
    return deserializeCredentials(secret);
  }

  async delete(alias: string): Promise<void> {
    assertNotIndex(alias);
    try {
      await this.keychain.delete(this.service, alias);
    } catch (error) {
      if (!isAuthError(error, AuthErrorKind.KeychainItemNotFound)) {
        throw error;
      }
    }
    const aliases = await this.list();
    if (aliases.includes(alias)) {
      await this.writeIndex(aliases.filter((a) => a !== alias));
    }
  }

  async list(): Promise<string[]> {
    let raw: string;
    try {
      raw = await this.keychain.get(this.service, KEYRING_INDEX_ACCOUNT);
    } catch (error) {
      if (isAuthError(error, AuthErrorKind.KeychainItemNotFound)) {
        return [];
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      // corrupt index reads as empty
      return [];
    }
    if (!Array.isArray(parsed)) {
      return [];
    }
    return parsed.filter((item): item is string => typeof item === 'string').sort();
  }

  async isExpired(alias: string): Promise<boolean> {
    try {
      const credentials = await this.retrieve(alias);
      return credentials.isExpired();
    } catch (error) {
      if (isAuthError(error, AuthErrorKind.CredentialsNotFound)) {
        return true;
      }
      throw error;
    }
  }

  private async writeIndex(aliases: string[]): Promise<void> {
    await this.keychain.set(this.service, KEYRING_INDEX_ACCOUNT, JSON.stringify(aliases));
  }
}

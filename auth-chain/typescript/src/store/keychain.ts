/**
 * OS keychain capability.
 * @module store/keychain
 */

import { Entry } from '@napi-rs/keyring';
import { AuthError, AuthErrorKind, errorMessage } from '../errors/index.js';

/**
 * Secret storage keyed by service and account.
 *
 * `get` and `delete` throw KeychainItemNotFound for missing entries.
 * Writers to the same key are last-writer-wins.
 */
export interface Keychain {
  get(service: string, account: string): Promise<string>;
  set(service: string, account: string, secret: string): Promise<void>;
  delete(service: string, account: string): Promise<void>;
}

/**
 * Builds the not-found error for a keychain entry.
 */
export function keychainItemNotFound(service: string, account: string): AuthError {
  return new AuthError(
    AuthErrorKind.KeychainItemNotFound,
    `keychain item not found: ${service}/${account}`,
    { context: { service, account } }
  );
}

function keychainFailure(operation: string, service: string, error: unknown): AuthError {
  return new AuthError(
    AuthErrorKind.StorageFailed,
    `keychain ${operation} failed for ${service}: ${errorMessage(error)}`,
    { cause: error, context: { service } }
  );
}

const NOT_FOUND_PATTERN = /no matching entry|not found/i;

/**
 * Keychain backed by the platform secret store (macOS Keychain, Windows
 * Credential Manager, Secret Service).
 */
export class SystemKeychain implements Keychain {
  async get(service: string, account: string): Promise<string> {
    let secret: string | null | undefined;
    try {
      secret = new Entry(service, account).getPassword();
    } catch (error) {
      if (NOT_FOUND_PATTERN.test(errorMessage(error))) {
        throw keychainItemNotFound(service, account);
      }
      throw keychainFailure('read', service, error);
    }
    if (secret === null || secret === undefined) {
      throw keychainItemNotFound(service, account);
    }
    return secret;
  }

  async set(service: string, account: string, secret: string): Promise<void> {
    try {
      new Entry(service, account).setPassword(secret);
    } catch (error) {
      throw keychainFailure('write', service, error);
    }
  }

  async delete(service: string, account: string): Promise<void> {
    let deleted: boolean;
    try {
      deleted = new Entry(service, account).deletePassword();
    } catch (error) {
      if (NOT_FOUND_PATTERN.test(errorMessage(error))) {
        throw keychainItemNotFound(service, account);
      }
      throw keychainFailure('delete', service, error);
    }
    if (!deleted) {
      throw keychainItemNotFound(service, account);
    }
  }
}

/**
 * In-process keychain.
 */
export class InMemoryKeychain implements Keychain {
  private readonly items = new Map<string, string>();

  private key(service: string, account: string): string {
    return `${service}\u0000${account}`;
  }

  async get(service: string, account: string): Promise<string> {
    const secret = this.items.get(this.key(service, account));
    if (secret === undefined) {
      throw keychainItemNotFound(service, account);
    }
    return secret;
  }

  async set(service: string, account: string, secret: string): Promise<void> {
    this.items.set(this.key(service, account), secret);
  }

  async delete(service: string, account: string): Promise<void> {
    if (!this.items.delete(this.key(service, account))) {
      throw keychainItemNotFound(service, account);
    }
  }

  /**
   * Number of stored entries.
   */
  get size(): number {
    return this.items.size;
  }
}

/**
 * Credential store that keeps nothing.
 * @module store/noop
 */

import type { Credentials } from '../credentials/index.js';
import type { CredentialStore } from '../types/index.js';
import { credentialsNotFound } from './errors.js';

/**
 * Every chain authenticates from scratch.
 */
export class NoopCredentialStore implements CredentialStore {
  readonly type = 'noop';

  async store(_alias: string, _credentials: Credentials): Promise<void> {}

  async retrieve(alias: string): Promise<Credentials> {
    throw credentialsNotFound(alias);
  }

  async delete(_alias: string): Promise<void> {}

  async list(): Promise<string[]> {
    return [];
  }

  async isExpired(_alias: string): Promise<boolean> {
    return true;
  }
}

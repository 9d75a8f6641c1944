/**
 * In-memory credential store.
 * @module store/memory
 */

import type { Credentials } from '../credentials/index.js';
import type { CredentialStore } from '../types/index.js';
import { credentialsNotFound } from './errors.js';

export class MemoryCredentialStore implements CredentialStore {
  readonly type = 'memory';
  private readonly entries = new Map<string, Credentials>();

  async store(alias: string, credentials: Credentials): Promise<void> {
    this.entries.set(alias, credentials);
  }

  async retrieve(alias: string): Promise<Credentials> {
    const credentials = this.entries.get(alias);
    if (!credentials) {
      throw credentialsNotFound(alias);
    }
    return credentials;
  }

  async delete(alias: string): Promise<void> {
    this.entries.delete(alias);
  }

  async list(): Promise<string[]> {
    return [...this.entries.keys()].sort();
  }

  async isExpired(alias: string): Promise<boolean> {
    const credentials = this.entries.get(alias);
    return credentials === undefined || credentials.isExpired();
  }
}

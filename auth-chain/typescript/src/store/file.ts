/**
 * File-backed credential store.
 * @module store/file
 */

import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  deserializeCredentials,
  serializeCredentials,
  type Credentials,
} from '../credentials/index.js';
import { isAuthError, AuthErrorKind } from '../errors/index.js';
import type { CredentialStore } from '../types/index.js';
import { credentialsNotFound, storageFailed } from './errors.js';

/**
 * Default directory for stored credentials.
 */
export function defaultCredentialDirectory(): string {
  return path.join(os.homedir(), '.config', 'auth-chain', 'credentials');
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/** Names that are not valid percent-encoding belong to no alias. */
function decodeAlias(encoded: string): string | undefined {
  try {
    return decodeURIComponent(encoded);
  } catch (error) {
    if (error instanceof URIError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * One JSON file per alias, readable only by the owner.
 */
export class FileCredentialStore implements CredentialStore {
  readonly type = 'file';
  private readonly directory: string;
  private readonly fileExtension = '.credentials.json';

  constructor(directory: string = defaultCredentialDirectory()) {
    this.directory = directory;
  }

  /**
   * Directory holding the credential files.
   */
  get path(): string {
    return this.directory;
  }

  async store(alias: string, credentials: Credentials): Promise<void> {
    try {
      await fs.mkdir(this.directory, { recursive: true, mode: 0o700 });
      await fs.writeFile(this.getFilePath(alias), serializeCredentials(credentials), {
        mode: 0o600,
      });
    } catch (error) {
      throw storageFailed('write', alias, error);
    }
  }

  async retrieve(alias: string): Promise<Credentials> {
    let content: string;
    try {
      content = await fs.readFile(this.getFilePath(alias), 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw credentialsNotFound(alias);
      }
      throw storageFailed('read', alias, error);
    }
    return deserializeCredentials(content);
  }

  async delete(alias: string): Promise<void> {
    try {
      await fs.unlink(this.getFilePath(alias));
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw storageFailed('delete', alias, error);
      }
    }
  }

  async list(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.directory);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return [];
      }
      throw storageFailed('list', this.directory, error);
    }
    const aliases: string[] = [];
    for (const file of files) {
      if (!file.endsWith(this.fileExtension)) {
        continue;
      }
      const alias = decodeAlias(file.slice(0, -this.fileExtension.length));
      if (alias !== undefined) {
        aliases.push(alias);
      }
    }
    return aliases.sort();
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

  private getFilePath(alias: string): string {
    return path.join(this.directory, encodeURIComponent(alias) + this.fileExtension);
  }
}

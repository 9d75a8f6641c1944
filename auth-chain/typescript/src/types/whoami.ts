/**
 * Whoami projection of an authenticated identity.
 * @module types/whoami
 */

import type { Credentials } from '../credentials/index.js';
import type { CredentialStore } from './interfaces.js';

/**
 * Fields accepted by {@link WhoamiInfo}.
 */
export interface WhoamiInit {
  provider: string;
  identity: string;
  principal?: string;
  account?: string;
  region?: string;
  expiration?: Date;
  environment?: Record<string, string>;
  credentialsRef?: string;
  lastUpdated?: Date;
  credentials?: Credentials;
}

/**
 * Serialized whoami record. Never carries credentials.
 */
export interface WhoamiRecord {
  provider: string;
  identity: string;
  principal?: string;
  account?: string;
  region?: string;
  expiration?: string;
  environment: Record<string, string>;
  credentialsRef?: string;
  lastUpdated: string;
}

/**
 * Display information about an authenticated identity.
 */
export class WhoamiInfo {
  provider: string;
  identity: string;
  principal?: string;
  account?: string;
  region?: string;
  expiration?: Date;
  environment: Record<string, string>;
  /** Store alias the credentials can be reloaded from */
  credentialsRef?: string;
  lastUpdated: Date;
  /** In-process only; omitted from JSON */
  credentials?: Credentials;

  constructor(init: WhoamiInit) {
    this.provider = init.provider;
    this.identity = init.identity;
    this.principal = init.principal;
    this.account = init.account;
    this.region = init.region;
    this.expiration = init.expiration;
    this.environment = { ...init.environment };
    this.credentialsRef = init.credentialsRef;
    this.lastUpdated = init.lastUpdated ?? new Date();
    this.credentials = init.credentials;
  }

  /**
   * Loads credentials from the store when only a reference is held.
   */
  async rehydrate(store: CredentialStore): Promise<Credentials | undefined> {
    if (this.credentials) {
      return this.credentials;
    }
    if (!this.credentialsRef) {
      return undefined;
    }
    this.credentials = await store.retrieve(this.credentialsRef);
    return this.credentials;
  }

  toJSON(): WhoamiRecord {
    return {
      provider: this.provider,
      identity: this.identity,
      principal: this.principal,
      account: this.account,
      region: this.region,
      expiration: this.expiration?.toISOString(),
      environment: { ...this.environment },
      credentialsRef: this.credentialsRef,
      lastUpdated: this.lastUpdated.toISOString(),
    };
  }
}

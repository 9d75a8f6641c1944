/**
 * GCP access token credentials.
 * @module credentials/gcp
 */

import { SecretString } from '../core/secret.js';
import type { ValidationInfo, WhoamiInfo } from '../types/index.js';
import { copyDate, isExpiredAt, validationNotImplemented, type ICredentials } from './common.js';

export interface GcpCredentialsInit {
  accessToken: string;
  projectId?: string;
  serviceAccountEmail?: string;
  expiration?: Date;
}

export class GcpCredentials implements ICredentials {
  readonly type = 'gcp';
  readonly accessToken: SecretString;
  readonly projectId?: string;
  readonly serviceAccountEmail?: string;
  readonly expiration?: Date;

  constructor(init: GcpCredentialsInit) {
    this.accessToken = new SecretString(init.accessToken);
    this.projectId = init.projectId;
    this.serviceAccountEmail = init.serviceAccountEmail;
    this.expiration = copyDate(init.expiration);
    Object.freeze(this);
  }

  isExpired(now?: Date): boolean {
    return isExpiredAt(this.expiration, now);
  }

  getExpiration(): Date | undefined {
    return copyDate(this.expiration);
  }

  buildWhoamiInfo(info: WhoamiInfo | undefined): void {
    if (!info) {
      return;
    }
    if (this.serviceAccountEmail) {
      info.principal = this.serviceAccountEmail;
    }
    if (this.projectId) {
      info.account = this.projectId;
    }
    if (this.expiration) {
      info.expiration = copyDate(this.expiration);
    }
  }

  async validate(): Promise<ValidationInfo> {
    throw validationNotImplemented(this.type);
  }
}

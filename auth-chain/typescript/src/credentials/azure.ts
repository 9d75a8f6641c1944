/**
 * Azure access token credentials.
 * @module credentials/azure
 */

import { SecretString } from '../core/secret.js';
import { readStringClaim } from '../core/jwt.js';
import { createTransport } from '../core/transport.js';
import { AuthError, AuthErrorKind, httpFailure } from '../errors/index.js';
import type {
  CredentialValidationContext,
  ValidationInfo,
  WhoamiInfo,
} from '../types/index.js';
import { copyDate, isExpiredAt, type ICredentials } from './common.js';

/** Azure Resource Manager endpoint. */
export const AZURE_MANAGEMENT_URL = 'https://management.azure.com';

/** API version used for subscription lookups. */
export const AZURE_SUBSCRIPTION_API_VERSION = '2022-12-01';

export interface AzureCredentialsInit {
  accessToken: string;
  tenantId?: string;
  subscriptionId?: string;
  clientId?: string;
  location?: string;
  expiration?: Date;
}

export class AzureCredentials implements ICredentials {
  readonly type = 'azure';
  readonly accessToken: SecretString;
  readonly tenantId?: string;
  readonly subscriptionId?: string;
  readonly clientId?: string;
  readonly location?: string;
  readonly expiration?: Date;

  constructor(init: AzureCredentialsInit) {
    this.accessToken = new SecretString(init.accessToken);
    this.tenantId = init.tenantId;
    this.subscriptionId = init.subscriptionId;
    this.clientId = init.clientId;
    this.location = init.location;
    this.expiration = copyDate(init.expiration);
    Object.freeze(this);
  }

  isExpired(now?: Date): boolean {
    return isExpiredAt(this.expiration, now);
  }

  getExpiration(): Date | undefined {
    return copyDate(this.expiration);
  }

  /**
   * Principal from the token's `upn` or `oid` claim, when decodable.
   */
  private tokenPrincipal(): string | undefined {
    const token = this.accessToken.expose();
    return readStringClaim(token, 'upn') ?? readStringClaim(token, 'oid');
  }

  buildWhoamiInfo(info: WhoamiInfo | undefined): void {
    if (!info) {
      return;
    }
    const principal = this.tokenPrincipal() ?? this.clientId;
    if (principal) {
      info.principal = principal;
    }
    if (this.subscriptionId) {
      info.account = this.subscriptionId;
    }
    if (this.location) {
      info.region = this.location;
    }
    if (this.expiration) {
      info.expiration = copyDate(this.expiration);
    }
  }

  /**
   * Reads the subscription through Azure Resource Manager.
   */
  async validate(ctx: CredentialValidationContext = {}): Promise<ValidationInfo> {
    if (!this.subscriptionId) {
      throw new AuthError(
        AuthErrorKind.InvalidCredentials,
        'subscription ID is required to validate Azure credentials'
      );
    }

    const url =
      `${AZURE_MANAGEMENT_URL}/subscriptions/${encodeURIComponent(this.subscriptionId)}` +
      `?api-version=${AZURE_SUBSCRIPTION_API_VERSION}`;
    const transport = ctx.transport ?? createTransport();
    const response = await transport.send({
      method: 'GET',
      url,
      headers: {
        authorization: `Bearer ${this.accessToken.expose()}`,
        accept: 'application/json',
      },
      signal: ctx.signal,
    });

    if (response.status !== 200) {
      throw httpFailure('Azure credential validation', url, response.status, response.body);
    }

    return {
      principal: this.tokenPrincipal() ?? this.subscriptionId,
      account: this.tenantId,
      expiration: copyDate(this.expiration),
    };
  }
}

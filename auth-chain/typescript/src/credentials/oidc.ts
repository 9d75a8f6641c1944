/**
 * OIDC identity token credentials.
 * @module credentials/oidc
 */

import { SecretString } from '../core/secret.js';
import { decodeJwtExpiration, readStringClaim } from '../core/jwt.js';
import type { ValidationInfo, WhoamiInfo } from '../types/index.js';
import { isExpiredWithSkew, validationNotImplemented, type ICredentials } from './common.js';

export interface OidcCredentialsInit {
  token: string;
  provider: string;
  audience?: string;
}

/**
 * Raw OIDC token. Expiration comes from the token's `exp` claim.
 */
export class OidcCredentials implements ICredentials {
  readonly type = 'oidc';
  readonly token: SecretString;
  readonly provider: string;
  readonly audience?: string;

  constructor(init: OidcCredentialsInit) {
    this.token = new SecretString(init.token);
    this.provider = init.provider;
    this.audience = init.audience;
    Object.freeze(this);
  }

  /**
   * Decodes `exp` without verifying the signature.
   *
   * Returns undefined for tokens with fewer than two segments or no numeric
   * `exp`. Throws TokenDecodeFailed or TokenUnmarshalFailed for a malformed
   * payload.
   */
  getExpiration(): Date | undefined {
    return decodeJwtExpiration(this.token.expose());
  }

  /**
   * Expiration, or undefined when the token cannot be decoded.
   */
  private tryGetExpiration(): Date | undefined {
    try {
      return this.getExpiration();
    } catch {
      return undefined;
    }
  }

  /**
   * Undecodable tokens count as expired.
   */
  isExpired(now?: Date): boolean {
    return isExpiredWithSkew(this.tryGetExpiration(), now);
  }

  buildWhoamiInfo(info: WhoamiInfo | undefined): void {
    if (!info) {
      return;
    }
    const subject = readStringClaim(this.token.expose(), 'sub');
    if (subject) {
      info.principal = subject;
    }
    const expiration = this.tryGetExpiration();
    if (expiration) {
      info.expiration = expiration;
    }
  }

  async validate(): Promise<ValidationInfo> {
    throw validationNotImplemented(this.type);
  }
}

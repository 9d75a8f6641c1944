/**
 * Shared credential contract and expiry rules.
 * @module credentials/common
 */

import { EXPIRY_SKEW_MS } from '../config/index.js';
import { AuthError, AuthErrorKind } from '../errors/index.js';
import type {
  CredentialValidationContext,
  ValidationInfo,
  WhoamiInfo,
} from '../types/index.js';

/**
 * Discriminant of the {@link Credentials} union.
 */
export type CredentialType = 'aws' | 'azure' | 'gcp' | 'github-app' | 'github-user' | 'oidc';

/**
 * Behaviour common to every credential variant.
 */
export interface ICredentials {
  readonly type: CredentialType;

  /**
   * Local expiry check; never touches the network.
   */
  isExpired(now?: Date): boolean;

  getExpiration(): Date | undefined;

  /**
   * Copies display fields onto `info`. Never copies secrets.
   */
  buildWhoamiInfo(info: WhoamiInfo | undefined): void;

  /**
   * Confirms the credentials with their issuer.
   */
  validate(ctx?: CredentialValidationContext): Promise<ValidationInfo>;
}

/**
 * Long-lived cloud credentials: no expiration means they never expire.
 */
export function isExpiredAt(expiration: Date | undefined, now: Date = new Date()): boolean {
  if (expiration === undefined) {
    return false;
  }
  return now.getTime() >= expiration.getTime();
}

/**
 * Short-lived tokens: no expiration counts as expired, and tokens within the
 * skew window are treated as expired.
 */
export function isExpiredWithSkew(expiration: Date | undefined, now: Date = new Date()): boolean {
  if (expiration === undefined) {
    return true;
  }
  return expiration.getTime() - now.getTime() < EXPIRY_SKEW_MS;
}

/**
 * Error for variants without a validation API.
 */
export function validationNotImplemented(type: CredentialType): AuthError {
  return new AuthError(
    AuthErrorKind.NotImplemented,
    `validation is not implemented for ${type} credentials`,
    { context: { type } }
  );
}

/**
 * Returns a copy of a date, or undefined.
 */
export function copyDate(value: Date | undefined): Date | undefined {
  return value === undefined ? undefined : new Date(value.getTime());
}

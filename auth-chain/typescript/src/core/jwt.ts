/**
 * Unverified JWT payload decoding.
 *
 * Only reads claims for display and expiry checks; signatures are checked by
 * whoever consumes the token.
 *
 * @module core/jwt
 */

import { AuthError, AuthErrorKind, errorMessage } from '../errors/index.js';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*={0,2}$/;

/**
 * Decodes a base64url segment strictly.
 */
export function decodeBase64Url(segment: string): string {
  if (!BASE64URL_PATTERN.test(segment) || segment.replace(/=+$/, '').length % 4 === 1) {
    throw new AuthError(
      AuthErrorKind.TokenDecodeFailed,
      'failed to decode token payload: invalid base64url encoding'
    );
  }
  return Buffer.from(segment, 'base64url').toString('utf-8');
}

/**
 * Decodes the payload (second segment) of a dot-separated token.
 *
 * Returns undefined for tokens with fewer than two segments.
 * Throws TokenDecodeFailed for bad base64url and TokenUnmarshalFailed for
 * bad JSON.
 */
export function decodeJwtPayload(token: string): Record<string, unknown> | undefined {
  const segments = token.split('.');
  const payloadSegment = segments[1];
  if (segments.length < 2 || payloadSegment === undefined) {
    return undefined;
  }

  const json = decodeBase64Url(payloadSegment);

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new AuthError(
      AuthErrorKind.TokenUnmarshalFailed,
      `failed to unmarshal token payload: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new AuthError(
      AuthErrorKind.TokenUnmarshalFailed,
      'failed to unmarshal token payload: not a JSON object'
    );
  }

  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Reads the numeric `exp` claim as a Date.
 */
export function decodeJwtExpiration(token: string): Date | undefined {
  const payload = decodeJwtPayload(token);
  const exp = payload?.['exp'];
  if (typeof exp !== 'number' || !Number.isFinite(exp)) {
    return undefined;
  }
  return new Date(exp * 1000);
}

/**
 * Reads a string claim, swallowing decode errors.
 */
export function readStringClaim(token: string, claim: string): string | undefined {
  try {
    const value = decodeJwtPayload(token)?.[claim];
    return typeof value === 'string' ? value : undefined;
  } catch {
    return undefined;
  }
}

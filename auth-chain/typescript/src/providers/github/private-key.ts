/**
 * GitHub App private key loading.
 * @module providers/github/private-key
 */

import { createPrivateKey, type KeyObject } from 'node:crypto';
import { AuthError, AuthErrorKind, errorMessage } from '../../errors/index.js';

const PEM_BLOCK = /-----BEGIN ([A-Z0-9 ]+)-----([\s\S]*?)-----END \1-----/;

/**
 * Decodes a PEM block and imports the DER body as a PKCS#1 or PKCS#8 RSA key.
 */
export function parseRsaPrivateKey(pem: string, owner: string): KeyObject {
  const match = PEM_BLOCK.exec(pem);
  const body = match?.[2]?.replace(/\s+/g, '');
  if (!body) {
    throw new AuthError(
      AuthErrorKind.InvalidProviderConfig,
      `failed to decode PEM private key for ${owner}`,
      { context: { owner, field: 'private_key' } }
    );
  }

  const der = Buffer.from(body, 'base64');
  let lastError: unknown;
  for (const type of ['pkcs1', 'pkcs8'] as const) {
    try {
      const key = createPrivateKey({ key: der, format: 'der', type });
      if (key.asymmetricKeyType !== 'rsa') {
        throw new AuthError(
          AuthErrorKind.InvalidProviderConfig,
          `private key for ${owner} is ${key.asymmetricKeyType ?? 'unknown'}, expected RSA`,
          { context: { owner, field: 'private_key' } }
        );
      }
      return key;
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }
      lastError = error;
    }
  }

  throw new AuthError(
    AuthErrorKind.InvalidProviderConfig,
    `failed to parse private key for ${owner}: ${errorMessage(lastError)}`,
    { cause: lastError, context: { owner, field: 'private_key' } }
  );
}

import { AuthError, AuthErrorKind, errorMessage } from '../errors/index.js';

/**
 * Error for an alias with nothing stored.
 */
export function credentialsNotFound(alias: string): AuthError {
  return new AuthError(AuthErrorKind.CredentialsNotFound, `no credentials stored for ${alias}`, {
    context: { alias },
  });
}

/**
 * Error for a failed store operation.
 */
export function storageFailed(operation: string, alias: string, error: unknown): AuthError {
  return new AuthError(
    AuthErrorKind.StorageFailed,
    `Failed to ${operation} credentials for ${alias}: ${errorMessage(error)}`,
    { cause: error, context: { alias, operation } }
  );
}

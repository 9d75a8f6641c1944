/**
 * Error types for the auth chain.
 * @module errors
 */

/**
 * Error kinds for categorizing authentication errors.
 */
export enum AuthErrorKind {
  // Configuration errors
  /** Provider spec is missing a field or has a malformed one. */
  InvalidProviderConfig = 'invalid_provider_config',
  /** Configuration names a kind this provider does not implement. */
  InvalidProviderKind = 'invalid_provider_kind',
  /** Identity spec is missing a field or has a malformed one. */
  InvalidIdentityConfig = 'invalid_identity_config',
  /** Configuration names a kind this identity does not implement. */
  InvalidIdentityKind = 'invalid_identity_kind',
  /** Chain-level misconfiguration. */
  InvalidAuthConfig = 'invalid_auth_config',
  /** Identity chain loops back on itself. */
  CircularDependency = 'circular_dependency',

  // Lookup errors
  /** Identity not present in configuration. */
  IdentityNotFound = 'identity_not_found',
  /** Provider not present in configuration. */
  ProviderNotFound = 'provider_not_found',

  // Authentication errors
  /** Network or protocol level authentication failure. */
  AuthenticationFailed = 'authentication_failed',
  /** Caller cancelled the flow. */
  Cancelled = 'cancelled',
  /** Credentials are of the wrong type for this step. */
  InvalidCredentials = 'invalid_credentials',

  // Credential errors
  /** Credential variant has no validation API. */
  NotImplemented = 'not_implemented',
  /** Token segment is not valid base64url. */
  TokenDecodeFailed = 'token_decode_failed',
  /** Token segment is not valid JSON. */
  TokenUnmarshalFailed = 'token_unmarshal_failed',
  /** No cached credentials for an alias. */
  CredentialsNotFound = 'credentials_not_found',
  /** Cached credentials exist but have expired. */
  ExpiredCredentials = 'expired_credentials',

  // Storage errors
  /** Keychain has no entry for service/account. */
  KeychainItemNotFound = 'keychain_item_not_found',
  /** Credential store read/write failure. */
  StorageFailed = 'storage_failed',

  // Lifecycle errors
  /** Every logout step failed. */
  LogoutFailed = 'logout_failed',
  /** Some logout steps failed; the rest completed. */
  PartialLogout = 'partial_logout',
}

/**
 * Options accepted by {@link AuthError}.
 */
export interface AuthErrorOptions {
  /** Underlying cause. */
  cause?: unknown;
  /** HTTP status code when the error came from a response. */
  statusCode?: number;
  /** Diagnostic context (endpoint, identity, provider...). */
  context?: Record<string, string | number>;
  /** Aggregated errors for best-effort operations. */
  errors?: Error[];
}

/** Maximum number of response body characters kept in error messages. */
export const MAX_ERROR_BODY_LENGTH = 512;

/**
 * Authentication error with a kind and diagnostic context.
 */
export class AuthError extends Error {
  /** Error kind. */
  public readonly kind: AuthErrorKind;
  /** HTTP status code. */
  public readonly statusCode?: number;
  /** Diagnostic context. */
  public readonly context: Record<string, string | number>;
  /** Aggregated failures. */
  public readonly errors: Error[];
  /** Underlying cause. */
  public readonly cause?: unknown;

  constructor(kind: AuthErrorKind, message: string, options: AuthErrorOptions = {}) {
    super(message);
    this.name = 'AuthError';
    this.kind = kind;
    this.statusCode = options.statusCode;
    this.context = options.context ?? {};
    this.errors = options.errors ?? [];
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AuthError);
    }

    Object.setPrototypeOf(this, AuthError.prototype);
  }

  /**
   * Returns true for errors caused by local configuration.
   */
  isConfigurationError(): boolean {
    return (
      this.kind === AuthErrorKind.InvalidProviderConfig ||
      this.kind === AuthErrorKind.InvalidProviderKind ||
      this.kind === AuthErrorKind.InvalidIdentityConfig ||
      this.kind === AuthErrorKind.InvalidIdentityKind ||
      this.kind === AuthErrorKind.InvalidAuthConfig ||
      this.kind === AuthErrorKind.CircularDependency
    );
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      statusCode: this.statusCode,
      context: this.context,
      errors: this.errors.map((e) => e.message),
    };
  }
}

/**
 * Checks whether a value is an {@link AuthError}, optionally of a given kind.
 */
export function isAuthError(error: unknown, kind?: AuthErrorKind): error is AuthError {
  if (!(error instanceof AuthError)) {
    return false;
  }
  return kind === undefined || error.kind === kind;
}

/**
 * Truncates a response body for inclusion in an error message.
 */
export function truncateBody(body: string, max: number = MAX_ERROR_BODY_LENGTH): string {
  if (body.length <= max) {
    return body;
  }
  return `${body.slice(0, max)}...(truncated)`;
}

/**
 * Builds an AuthenticationFailed error for an unexpected HTTP response.
 */
export function httpFailure(
  operation: string,
  endpoint: string,
  status: number,
  body: string
): AuthError {
  return new AuthError(
    AuthErrorKind.AuthenticationFailed,
    `${operation} failed: ${endpoint} returned status ${status}: ${truncateBody(body)}`,
    { statusCode: status, context: { endpoint, status } }
  );
}

/**
 * Builds an error for a missing required spec field.
 */
export function missingField(
  kind: AuthErrorKind.InvalidProviderConfig | AuthErrorKind.InvalidIdentityConfig,
  owner: string,
  field: string
): AuthError {
  return new AuthError(kind, `${field} is required for ${owner}`, {
    context: { owner, field },
  });
}

/**
 * Returns a message for any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

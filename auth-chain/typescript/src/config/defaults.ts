/**
 * Default values shared across providers, identities and the manager.
 * @module config/defaults
 */

/** Provider kinds implemented by this package. */
export const PROVIDER_KINDS = {
  GITHUB_APP: 'github/app',
  GITHUB_USER: 'github/user',
  GITHUB_OIDC: 'github/oidc',
} as const;

/** Identity kinds implemented by this package. */
export const IDENTITY_KINDS = {
  AWS_ASSUME_ROLE: 'aws/assume-role',
} as const;

/**
 * Default GitHub web base URL (device flow endpoints).
 */
export const DEFAULT_GITHUB_BASE_URL = 'https://github.com';

/**
 * Default GitHub REST API base URL.
 */
export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

/**
 * Default keychain service for cached GitHub user tokens.
 */
export const DEFAULT_KEYCHAIN_SERVICE = 'auth-chain-github-user';

/**
 * Keychain account under which the user token is stored.
 */
export const KEYCHAIN_TOKEN_ACCOUNT = 'oauth-token';

/**
 * Default STS session name for GitHub OIDC exchanges.
 */
export const DEFAULT_OIDC_SESSION_NAME = 'auth-chain-github-oidc';

/** Session duration bounds for web identity exchanges, in seconds. */
export const DEFAULT_SESSION_DURATION_SECONDS = 3600;
export const MIN_SESSION_DURATION_SECONDS = 900;
export const MAX_SESSION_DURATION_SECONDS = 43200;

/** GitHub user token lifetime policy, in milliseconds. */
export const DEFAULT_TOKEN_LIFETIME_MS = 8 * 60 * 60 * 1000;
export const MIN_TOKEN_LIFETIME_MS = 60 * 60 * 1000;
export const MAX_TOKEN_LIFETIME_MS = 24 * 60 * 60 * 1000;

/**
 * Default device flow poll interval in seconds.
 */
export const DEFAULT_POLL_INTERVAL_SECONDS = 5;

/**
 * Minimum interval applied after slow_down, in seconds.
 */
export const SLOW_DOWN_INTERVAL_SECONDS = 10;

/**
 * Default device code lifetime in seconds.
 */
export const DEFAULT_DEVICE_CODE_EXPIRES_IN_SECONDS = 900;

/**
 * Maximum number of device flow poll attempts.
 */
export const MAX_POLL_ATTEMPTS = 120;

/**
 * GitHub App JWT lifetime in seconds.
 */
export const APP_JWT_LIFETIME_SECONDS = 600;

/**
 * Skew applied to short-lived GitHub and OIDC tokens.
 */
export const EXPIRY_SKEW_MS = 5 * 60 * 1000;

/**
 * Remaining validity required to resume a chain from cached credentials.
 */
export const CACHE_VALIDITY_BUFFER_MS = 15 * 60 * 1000;

/**
 * Maximum length of an STS role session name.
 */
export const MAX_ROLE_SESSION_NAME_LENGTH = 64;

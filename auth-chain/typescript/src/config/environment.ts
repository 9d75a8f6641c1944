/**
 * Process environment snapshot.
 *
 * Read once at the process boundary and handed to providers, so protocol
 * code never consults `process.env` directly.
 *
 * @module config/environment
 */

/** Environment variable names consumed by providers. */
export const ENV_GITHUB_ACTIONS = 'GITHUB_ACTIONS';
export const ENV_OIDC_REQUEST_TOKEN = 'ACTIONS_ID_TOKEN_REQUEST_TOKEN';
export const ENV_OIDC_REQUEST_URL = 'ACTIONS_ID_TOKEN_REQUEST_URL';
export const ENV_OIDC_TOKEN = 'GITHUB_OIDC_TOKEN';

/**
 * Resolved environment values.
 */
export interface AuthEnvironment {
  /** CI marker; GitHub Actions sets it to "true" */
  readonly githubActions?: string;
  /** Bearer token for the Actions OIDC endpoint */
  readonly oidcRequestToken?: string;
  /** Actions OIDC endpoint */
  readonly oidcRequestUrl?: string;
  /** Pre-fetched OIDC token */
  readonly oidcToken?: string;
  /** Every variable, for `private_key_env` style lookups */
  readonly variables: Readonly<Record<string, string>>;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Builds an {@link AuthEnvironment} from a variable map.
 */
export function readAuthEnvironment(
  env: Record<string, string | undefined> = process.env
): AuthEnvironment {
  const variables: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      variables[key] = value;
    }
  }

  return Object.freeze({
    githubActions: nonEmpty(env[ENV_GITHUB_ACTIONS]),
    oidcRequestToken: nonEmpty(env[ENV_OIDC_REQUEST_TOKEN]),
    oidcRequestUrl: nonEmpty(env[ENV_OIDC_REQUEST_URL]),
    oidcToken: nonEmpty(env[ENV_OIDC_TOKEN]),
    variables: Object.freeze(variables),
  });
}

/**
 * True when running inside GitHub Actions.
 */
export function isGitHubActions(env: AuthEnvironment): boolean {
  return env.githubActions === 'true';
}

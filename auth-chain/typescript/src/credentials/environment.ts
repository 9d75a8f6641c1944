/**
 * Environment variables exported to subprocesses for each credential type.
 * @module credentials/environment
 */

import type { WhoamiInfo } from '../types/index.js';
import type { Credentials } from './types.js';

/**
 * Maps credentials to the variables a subprocess needs to use them.
 */
export function credentialEnvironment(credentials: Credentials): Record<string, string> {
  const env: Record<string, string> = {};

  switch (credentials.type) {
    case 'aws':
      env['AWS_ACCESS_KEY_ID'] = credentials.accessKeyId;
      env['AWS_SECRET_ACCESS_KEY'] = credentials.secretAccessKey.expose();
      if (credentials.sessionToken) {
        env['AWS_SESSION_TOKEN'] = credentials.sessionToken.expose();
      }
      if (credentials.region) {
        env['AWS_REGION'] = credentials.region;
        env['AWS_DEFAULT_REGION'] = credentials.region;
      }
      break;
    case 'azure':
      env['ARM_ACCESS_TOKEN'] = credentials.accessToken.expose();
      if (credentials.tenantId) {
        env['ARM_TENANT_ID'] = credentials.tenantId;
        env['AZURE_TENANT_ID'] = credentials.tenantId;
      }
      if (credentials.subscriptionId) {
        env['ARM_SUBSCRIPTION_ID'] = credentials.subscriptionId;
        env['AZURE_SUBSCRIPTION_ID'] = credentials.subscriptionId;
      }
      break;
    case 'gcp':
      env['CLOUDSDK_AUTH_ACCESS_TOKEN'] = credentials.accessToken.expose();
      env['GOOGLE_OAUTH_ACCESS_TOKEN'] = credentials.accessToken.expose();
      if (credentials.projectId) {
        env['GOOGLE_CLOUD_PROJECT'] = credentials.projectId;
        env['CLOUDSDK_CORE_PROJECT'] = credentials.projectId;
      }
      break;
    case 'github-app':
    case 'github-user':
      env['GITHUB_TOKEN'] = credentials.token.expose();
      env['GH_TOKEN'] = credentials.token.expose();
      break;
    case 'oidc':
      break;
    default: {
      const unreachable: never = credentials;
      return unreachable;
    }
  }

  return env;
}

/**
 * Copies display fields from credentials onto whoami info. Either side may
 * be undefined.
 */
export function populateWhoamiInfo(
  credentials: Credentials | undefined,
  info: WhoamiInfo | undefined
): void {
  credentials?.buildWhoamiInfo(info);
}

/**
 * The closed set of credential variants.
 * @module credentials/types
 */

import type { AwsCredentials } from './aws.js';
import type { AzureCredentials } from './azure.js';
import type { GcpCredentials } from './gcp.js';
import type { GitHubAppCredentials, GitHubUserCredentials } from './github.js';
import type { OidcCredentials } from './oidc.js';

export type Credentials =
  | AwsCredentials
  | AzureCredentials
  | GcpCredentials
  | GitHubAppCredentials
  | GitHubUserCredentials
  | OidcCredentials;

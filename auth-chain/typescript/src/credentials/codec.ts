/**
 * Plain JSON encoding of credentials, used by stores.
 * @module credentials/codec
 */

import { z } from 'zod';
import { AuthError, AuthErrorKind } from '../errors/index.js';
import { AwsCredentials } from './aws.js';
import { AzureCredentials } from './azure.js';
import { GcpCredentials } from './gcp.js';
import { GitHubAppCredentials, GitHubUserCredentials } from './github.js';
import { OidcCredentials } from './oidc.js';
import type { Credentials } from './types.js';

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const credentialRecordSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('aws'),
    accessKeyId: z.string().min(1),
    secretAccessKey: z.string().min(1),
    sessionToken: z.string().optional(),
    region: z.string().optional(),
    expiration: isoDate.optional(),
    principalArn: z.string().optional(),
  }),
  z.object({
    type: z.literal('azure'),
    accessToken: z.string().min(1),
    tenantId: z.string().optional(),
    subscriptionId: z.string().optional(),
    clientId: z.string().optional(),
    location: z.string().optional(),
    expiration: isoDate.optional(),
  }),
  z.object({
    type: z.literal('gcp'),
    accessToken: z.string().min(1),
    projectId: z.string().optional(),
    serviceAccountEmail: z.string().optional(),
    expiration: isoDate.optional(),
  }),
  z.object({
    type: z.literal('github-app'),
    token: z.string().min(1),
    appId: z.string().min(1),
    installationId: z.string().min(1),
    expiresAt: isoDate.optional(),
    apiUrl: z.string().optional(),
  }),
  z.object({
    type: z.literal('github-user'),
    token: z.string().min(1),
    provider: z.string().min(1),
    expiresAt: isoDate.optional(),
    apiUrl: z.string().optional(),
    login: z.string().optional(),
  }),
  z.object({
    type: z.literal('oidc'),
    token: z.string().min(1),
    provider: z.string().min(1),
    audience: z.string().optional(),
  }),
]);

/**
 * Serialized credentials. Secrets are in the clear; stores must protect them.
 */
export type CredentialRecord = z.input<typeof credentialRecordSchema>;

/**
 * Encodes credentials into a JSON-safe record.
 */
export function encodeCredentials(credentials: Credentials): CredentialRecord {
  switch (credentials.type) {
    case 'aws':
      return {
        type: 'aws',
        accessKeyId: credentials.accessKeyId,
        secretAccessKey: credentials.secretAccessKey.expose(),
        sessionToken: credentials.sessionToken?.expose(),
        region: credentials.region,
        expiration: credentials.expiration?.toISOString(),
        principalArn: credentials.principalArn,
      };
    case 'azure':
      return {
        type: 'azure',
        accessToken: credentials.accessToken.expose(),
        tenantId: credentials.tenantId,
        subscriptionId: credentials.subscriptionId,
        clientId: credentials.clientId,
        location: credentials.location,
        expiration: credentials.expiration?.toISOString(),
      };
    case 'gcp':
      return {
        type: 'gcp',
        accessToken: credentials.accessToken.expose(),
        projectId: credentials.projectId,
        serviceAccountEmail: credentials.serviceAccountEmail,
        expiration: credentials.expiration?.toISOString(),
      };
    case 'github-app':
      return {
        type: 'github-app',
        token: credentials.token.expose(),
        appId: credentials.appId,
        installationId: credentials.installationId,
        expiresAt: credentials.expiresAt?.toISOString(),
        apiUrl: credentials.apiUrl,
      };
    case 'github-user':
      return {
        type: 'github-user',
        token: credentials.token.expose(),
        provider: credentials.provider,
        expiresAt: credentials.expiresAt?.toISOString(),
        apiUrl: credentials.apiUrl,
        login: credentials.login,
      };
    case 'oidc':
      return {
        type: 'oidc',
        token: credentials.token.expose(),
        provider: credentials.provider,
        audience: credentials.audience,
      };
    default: {
      const unreachable: never = credentials;
      throw new AuthError(
        AuthErrorKind.StorageFailed,
        `unsupported credential type: ${JSON.stringify(unreachable)}`
      );
    }
  }
}

/**
 * Decodes a stored record back into credentials.
 */
export function decodeCredentials(record: unknown): Credentials {
  const result = credentialRecordSchema.safeParse(record);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new AuthError(
      AuthErrorKind.StorageFailed,
      `Invalid stored credentials: ${issues.join(', ')}`,
      { cause: result.error }
    );
  }

  const data = result.data;
  switch (data.type) {
    case 'aws':
      return new AwsCredentials(data);
    case 'azure':
      return new AzureCredentials(data);
    case 'gcp':
      return new GcpCredentials(data);
    case 'github-app':
      return new GitHubAppCredentials(data);
    case 'github-user':
      return new GitHubUserCredentials(data);
    case 'oidc':
      return new OidcCredentials(data);
  }
}

/**
 * Serializes credentials to a JSON string.
 */
export function serializeCredentials(credentials: Credentials): string {
  return JSON.stringify(encodeCredentials(credentials));
}

/**
 * Parses credentials from a JSON string.
 */
export function deserializeCredentials(json: string): Credentials {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new AuthError(AuthErrorKind.StorageFailed, 'Stored credentials are not valid JSON', {
      cause: error,
    });
  }
  return decodeCredentials(parsed);
}

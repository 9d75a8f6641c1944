/**
 * STS exchange adapter.
 *
 * Wraps `@aws-sdk/client-sts` behind {@link StsApi} so providers and
 * identities can be exercised against an in-process fake.
 *
 * @module sts/client
 */

import {
  STSClient,
  AssumeRoleCommand,
  AssumeRoleWithWebIdentityCommand,
  GetCallerIdentityCommand,
  type Credentials as STSCredentials,
} from '@aws-sdk/client-sts';
import { AuthError, AuthErrorKind, errorMessage } from '../errors/index.js';
import { cancelledError } from '../core/sleep.js';

/**
 * Temporary credentials returned by STS.
 */
export interface StsTemporaryCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string;
  expiration?: Date;
  /** ARN of the assumed role session, when STS reports one */
  assumedRoleArn?: string;
}

/**
 * AssumeRoleWithWebIdentity input.
 */
export interface WebIdentityRequest {
  roleArn: string;
  webIdentityToken: string;
  roleSessionName: string;
  durationSeconds?: number;
}

/**
 * AssumeRole input.
 */
export interface AssumeRoleRequest {
  roleArn: string;
  roleSessionName: string;
  durationSeconds?: number;
  externalId?: string;
}

/**
 * GetCallerIdentity result.
 */
export interface CallerIdentity {
  arn: string;
  account: string;
  userId?: string;
}

/**
 * STS operations used by the auth chain.
 */
export interface StsApi {
  assumeRoleWithWebIdentity(
    request: WebIdentityRequest,
    signal?: AbortSignal
  ): Promise<StsTemporaryCredentials>;
  assumeRole(request: AssumeRoleRequest, signal?: AbortSignal): Promise<StsTemporaryCredentials>;
  getCallerIdentity(signal?: AbortSignal): Promise<CallerIdentity>;
}

/**
 * Options for building an STS client.
 */
export interface StsClientOptions {
  region: string;
  /** Static credentials; omitted for unsigned web identity calls */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
}

/**
 * Builds an {@link StsApi} for a region and optional credentials.
 */
export type StsClientFactory = (options: StsClientOptions) => StsApi;

/**
 * {@link StsApi} backed by the AWS SDK.
 */
export class AwsSdkStsClient implements StsApi {
  private readonly client: STSClient;

  constructor(options: StsClientOptions) {
    this.client = new STSClient({
      region: options.region,
      credentials: options.credentials,
    });
  }

  async assumeRoleWithWebIdentity(
    request: WebIdentityRequest,
    signal?: AbortSignal
  ): Promise<StsTemporaryCredentials> {
    const command = new AssumeRoleWithWebIdentityCommand({
      RoleArn: request.roleArn,
      WebIdentityToken: request.webIdentityToken,
      RoleSessionName: request.roleSessionName,
      DurationSeconds: request.durationSeconds,
    });

    try {
      const response = await this.client.send(command, { abortSignal: signal });
      return toTemporaryCredentials(
        'AssumeRoleWithWebIdentity',
        response.Credentials,
        response.AssumedRoleUser?.Arn
      );
    } catch (error) {
      throw stsFailure('AssumeRoleWithWebIdentity', error, signal);
    }
  }

  async assumeRole(
    request: AssumeRoleRequest,
    signal?: AbortSignal
  ): Promise<StsTemporaryCredentials> {
    const command = new AssumeRoleCommand({
      RoleArn: request.roleArn,
      RoleSessionName: request.roleSessionName,
      DurationSeconds: request.durationSeconds,
      ExternalId: request.externalId,
    });

    try {
      const response = await this.client.send(command, { abortSignal: signal });
      return toTemporaryCredentials(
        'AssumeRole',
        response.Credentials,
        response.AssumedRoleUser?.Arn
      );
    } catch (error) {
      throw stsFailure('AssumeRole', error, signal);
    }
  }

  async getCallerIdentity(signal?: AbortSignal): Promise<CallerIdentity> {
    try {
      const response = await this.client.send(new GetCallerIdentityCommand({}), {
        abortSignal: signal,
      });
      if (!response.Arn || !response.Account) {
        throw new AuthError(
          AuthErrorKind.AuthenticationFailed,
          'GetCallerIdentity returned no ARN or account'
        );
      }
      return { arn: response.Arn, account: response.Account, userId: response.UserId };
    } catch (error) {
      throw stsFailure('GetCallerIdentity', error, signal);
    }
  }
}

function toTemporaryCredentials(
  operation: string,
  credentials: STSCredentials | undefined,
  assumedRoleArn: string | undefined
): StsTemporaryCredentials {
  if (!credentials?.AccessKeyId || !credentials.SecretAccessKey || !credentials.SessionToken) {
    throw new AuthError(
      AuthErrorKind.AuthenticationFailed,
      `${operation} returned no credentials`
    );
  }

  return {
    accessKeyId: credentials.AccessKeyId,
    secretAccessKey: credentials.SecretAccessKey,
    sessionToken: credentials.SessionToken,
    expiration: credentials.Expiration,
    assumedRoleArn,
  };
}

function stsFailure(operation: string, error: unknown, signal?: AbortSignal): AuthError {
  if (error instanceof AuthError) {
    return error;
  }
  if (signal?.aborted) {
    return cancelledError(operation);
  }
  return new AuthError(
    AuthErrorKind.AuthenticationFailed,
    `${operation} failed: ${errorMessage(error)}`,
    { cause: error, context: { operation } }
  );
}

/**
 * Default factory producing SDK-backed clients.
 */
export const createStsClient: StsClientFactory = (options) => new AwsSdkStsClient(options);

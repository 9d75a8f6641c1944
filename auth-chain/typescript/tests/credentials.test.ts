/**
 * Credential variant tests
 */

import { describe, it, expect } from 'vitest';
import {
  AwsCredentials,
  AzureCredentials,
  GcpCredentials,
  GitHubAppCredentials,
  GitHubUserCredentials,
  OidcCredentials,
  credentialEnvironment,
  decodeCredentials,
  deserializeCredentials,
  encodeCredentials,
  populateWhoamiInfo,
  serializeCredentials,
  accountFromArn,
} from '../src/credentials/index.js';
import { MockHttpTransport } from '../src/core/transport.js';
import { AuthErrorKind } from '../src/errors/index.js';
import { WhoamiInfo } from '../src/types/index.js';
import { FakeSts, makeToken } from './support/fakes.js';

const NOW = new Date('2030-06-01T12:00:00Z');
const minutesFromNow = (minutes: number): Date => new Date(NOW.getTime() + minutes * 60000);

describe('expiration without a timestamp', () => {
  it('should never expire cloud credentials', () => {
    expect(new AwsCredentials({ accessKeyId: 'AKIA', secretAccessKey: 's' }).isExpired(NOW)).toBe(false);
    expect(new AzureCredentials({ accessToken: 't' }).isExpired(NOW)).toBe(false);
    expect(new GcpCredentials({ accessToken: 't' }).isExpired(NOW)).toBe(false);
  });

  it('should always expire short-lived tokens', () => {
    expect(
      new GitHubAppCredentials({ token: 't', appId: '1', installationId: '2' }).isExpired(NOW)
    ).toBe(true);
    expect(new GitHubUserCredentials({ token: 't', provider: 'gh' }).isExpired(NOW)).toBe(true);
    expect(new OidcCredentials({ token: makeToken({}), provider: 'gh' }).isExpired(NOW)).toBe(true);
  });
});

describe('expiration with a timestamp', () => {
  it('should compare cloud credentials exactly', () => {
    const past = new AwsCredentials({
      accessKeyId: 'AKIA',
      secretAccessKey: 's',
      expiration: minutesFromNow(-1),
    });
    const boundary = new GcpCredentials({ accessToken: 't', expiration: NOW });
    const soon = new AzureCredentials({ accessToken: 't', expiration: minutesFromNow(1) });

    expect(past.isExpired(NOW)).toBe(true);
    expect(boundary.isExpired(NOW)).toBe(true);
    expect(soon.isExpired(NOW)).toBe(false);
  });

  it('should apply the five minute skew to GitHub tokens', () => {
    const threeMinutes = new GitHubAppCredentials({
      token: 't',
      appId: '1',
      installationId: '2',
      expiresAt: minutesFromNow(3),
    });
    const tenMinutes = new GitHubUserCredentials({
      token: 't',
      provider: 'gh',
      expiresAt: minutesFromNow(10),
    });

    expect(threeMinutes.isExpired(NOW)).toBe(true);
    expect(tenMinutes.isExpired(NOW)).toBe(false);
  });
});

describe('buildWhoamiInfo', () => {
  const info = (): WhoamiInfo => new WhoamiInfo({ provider: 'p', identity: 'i' });

  it('should tolerate a missing info', () => {
    expect(() => new GcpCredentials({ accessToken: 't' }).buildWhoamiInfo(undefined)).not.toThrow();
    expect(() => populateWhoamiInfo(undefined, info())).not.toThrow();
  });

  it('should fill AWS principal, account and region', () => {
    const target = info();
    new AwsCredentials({
      accessKeyId: 'AKIA',
      secretAccessKey: 's',
      region: 'eu-west-1',
      expiration: minutesFromNow(60),
      principalArn: 'arn:aws:sts::123456789012:assumed-role/deploy/s',
    }).buildWhoamiInfo(target);

    expect(target.principal).toBe('arn:aws:sts::123456789012:assumed-role/deploy/s');
    expect(target.account).toBe('123456789012');
    expect(target.region).toBe('eu-west-1');
    expect(target.expiration?.getTime()).toBe(minutesFromNow(60).getTime());
  });

  it('should prefer the Azure token principal over the client ID', () => {
    const target = info();
    new AzureCredentials({
      accessToken: makeToken({ upn: 'dev@example.test' }),
      clientId: 'client-1',
      subscriptionId: 'sub-1',
      location: 'westeurope',
    }).buildWhoamiInfo(target);

    expect(target.principal).toBe('dev@example.test');
    expect(target.account).toBe('sub-1');
    expect(target.region).toBe('westeurope');

    const fallback = info();
    populateWhoamiInfo(new AzureCredentials({ accessToken: 'opaque', clientId: 'client-1' }), fallback);
    expect(fallback.principal).toBe('client-1');
  });

  it('should fill GitHub App principal and installation', () => {
    const target = info();
    new GitHubAppCredentials({ token: 't', appId: '42', installationId: '7' }).buildWhoamiInfo(target);

    expect(target.principal).toBe('app/42');
    expect(target.account).toBe('7');
  });
});

describe('accountFromArn', () => {
  it('should read the fifth field', () => {
    expect(accountFromArn('arn:aws:iam::123456789012:role/x')).toBe('123456789012');
    expect(accountFromArn('arn:aws:s3:::bucket')).toBeUndefined();
    expect(accountFromArn(undefined)).toBeUndefined();
  });
});

describe('credentialEnvironment', () => {
  it('should export AWS variables', () => {
    const env = credentialEnvironment(
      new AwsCredentials({
        accessKeyId: 'AKIA',
        secretAccessKey: 'test-secret',
        sessionToken: 'test-session',
        region: 'us-west-2',
      })
    );

    expect(env).toEqual({
      AWS_ACCESS_KEY_ID: 'AKIA',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      AWS_SESSION_TOKEN: 'test-session',
      AWS_REGION: 'us-west-2',
      AWS_DEFAULT_REGION: 'us-west-2',
    });
  });

  it('should omit optional AWS variables', () => {
    expect(
      credentialEnvironment(new AwsCredentials({ accessKeyId: 'AKIA', secretAccessKey: 's' }))
    ).toEqual({ AWS_ACCESS_KEY_ID: 'AKIA', AWS_SECRET_ACCESS_KEY: 's' });
  });

  it('should export Azure variables', () => {
    expect(
      credentialEnvironment(
        new AzureCredentials({ accessToken: 'tok', tenantId: 'ten', subscriptionId: 'sub' })
      )
    ).toEqual({
      ARM_ACCESS_TOKEN: 'tok',
      ARM_TENANT_ID: 'ten',
      AZURE_TENANT_ID: 'ten',
      ARM_SUBSCRIPTION_ID: 'sub',
      AZURE_SUBSCRIPTION_ID: 'sub',
    });
  });

  it('should export GCP variables', () => {
    expect(
      credentialEnvironment(new GcpCredentials({ accessToken: 'tok', projectId: 'proj' }))
    ).toEqual({
      CLOUDSDK_AUTH_ACCESS_TOKEN: 'tok',
      GOOGLE_OAUTH_ACCESS_TOKEN: 'tok',
      GOOGLE_CLOUD_PROJECT: 'proj',
      CLOUDSDK_CORE_PROJECT: 'proj',
    });
  });

  it('should export GitHub tokens and nothing for OIDC', () => {
    expect(credentialEnvironment(new GitHubUserCredentials({ token: 'gho', provider: 'gh' }))).toEqual({
      GITHUB_TOKEN: 'gho',
      GH_TOKEN: 'gho',
    });
    expect(credentialEnvironment(new OidcCredentials({ token: 'x.y.z', provider: 'gh' }))).toEqual({});
  });
});

describe('codec', () => {
  it('should restore AWS credentials from JSON', () => {
    const original = new AwsCredentials({
      accessKeyId: 'AKIA',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-session',
      region: 'us-east-2',
      expiration: new Date('2030-01-01T00:00:00.000Z'),
    });

    const restored = deserializeCredentials(serializeCredentials(original));

    expect(restored).toBeInstanceOf(AwsCredentials);
    expect(encodeCredentials(restored)).toEqual(encodeCredentials(original));
  });

  it('should decode a GitHub user record', () => {
    const restored = decodeCredentials({
      type: 'github-user',
      token: 'gho_test',
      provider: 'gh',
      expiresAt: '2030-01-01T00:00:00Z',
      login: 'octo',
    });

    expect(restored).toBeInstanceOf(GitHubUserCredentials);
    expect(restored.getExpiration()?.toISOString()).toBe('2030-01-01T00:00:00.000Z');
  });

  it('should reject unknown or incomplete records', () => {
    expect(() => decodeCredentials({ type: 'kerberos' })).toThrow(/Invalid stored credentials/);
    expect(() => decodeCredentials({ type: 'aws', accessKeyId: 'AKIA' })).toThrow(
      /secretAccessKey/
    );
    expect(() => deserializeCredentials('{nope')).toThrow('Stored credentials are not valid JSON');
  });

  it('should never reveal secrets through toString', () => {
    const credentials = new AwsCredentials({ accessKeyId: 'AKIA', secretAccessKey: 'test-secret' });

    expect(String(credentials.secretAccessKey)).toBe('***');
    expect(JSON.stringify({ secret: credentials.secretAccessKey })).toBe('{"secret":"***"}');
  });
});

describe('validate', () => {
  it('should call GetCallerIdentity for AWS', async () => {
    const sts = new FakeSts();
    const credentials = new AwsCredentials({
      accessKeyId: 'AKIA',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-session',
    });

    const result = await credentials.validate({ stsFactory: sts.factory });

    expect(result).toEqual({
      principal: 'arn:aws:iam::123456789012:user/tester',
      account: '123456789012',
      expiration: undefined,
    });
    expect(sts.clientOptions[0]).toEqual({
      region: 'us-east-1',
      credentials: {
        accessKeyId: 'AKIA',
        secretAccessKey: 'test-secret',
        sessionToken: 'test-session',
      },
    });
  });

  it('should validate a GitHub App token against the installation API', async () => {
    const transport = new MockHttpTransport().queueJsonResponse(200, { total_count: 1 });
    const credentials = new GitHubAppCredentials({ token: 'ghs_test', appId: '42', installationId: '7' });

    const result = await credentials.validate({ transport });

    expect(result.principal).toBe('app/42');
    expect(result.account).toBe('7');
    const request = transport.getLastRequest();
    expect(request?.url).toBe('https://api.github.com/installation/repositories?per_page=1');
    expect(request?.headers?.['authorization']).toBe('Bearer ghs_test');
  });

  it('should validate a GitHub user token', async () => {
    const transport = new MockHttpTransport().queueJsonResponse(200, { login: 'octo' });
    const credentials = new GitHubUserCredentials({
      token: 'gho_test',
      provider: 'gh',
      apiUrl: 'https://ghe.example.test/api/v3',
    });

    const result = await credentials.validate({ transport });

    expect(result.principal).toBe('octo');
    expect(transport.getLastRequest()?.url).toBe('https://ghe.example.test/api/v3/user');
  });

  it('should fail GitHub validation on a bad status', async () => {
    const transport = new MockHttpTransport().queueJsonResponse(401, { message: 'Bad credentials' });
    const credentials = new GitHubUserCredentials({ token: 'gho_test', provider: 'gh' });

    await expect(credentials.validate({ transport })).rejects.toMatchObject({
      kind: AuthErrorKind.AuthenticationFailed,
      statusCode: 401,
    });
  });

  it('should validate Azure credentials against the subscription', async () => {
    const transport = new MockHttpTransport().queueJsonResponse(200, { subscriptionId: 'sub-1' });
    const credentials = new AzureCredentials({
      accessToken: makeToken({ oid: 'object-1' }),
      tenantId: 'tenant-1',
      subscriptionId: 'sub-1',
    });

    const result = await credentials.validate({ transport });

    expect(result.principal).toBe('object-1');
    expect(result.account).toBe('tenant-1');
    expect(transport.getLastRequest()?.url).toBe(
      'https://management.azure.com/subscriptions/sub-1?api-version=2022-12-01'
    );
  });

  it('should require a subscription for Azure validation', async () => {
    await expect(new AzureCredentials({ accessToken: 't' }).validate()).rejects.toMatchObject({
      kind: AuthErrorKind.InvalidCredentials,
    });
  });

  it('should not implement GCP validation', async () => {
    await expect(new GcpCredentials({ accessToken: 't' }).validate()).rejects.toMatchObject({
      kind: AuthErrorKind.NotImplemented,
      message: 'validation is not implemented for gcp credentials',
    });
  });
});

/**
 * AWS assume-role identity tests
 */

import { describe, it, expect } from 'vitest';
import { AwsAssumeRoleIdentity, sanitizeRoleSessionName } from '../src/identities/index.js';
import type { IdentityConfig } from '../src/config/index.js';
import {
  AwsCredentials,
  GitHubUserCredentials,
  OidcCredentials,
} from '../src/credentials/index.js';
import { AuthErrorKind } from '../src/errors/index.js';
import { InMemoryLogger } from '../src/telemetry/index.js';
import { captureError, FakeSts, fixedClock } from './support/fakes.js';

const ROLE_ARN = 'arn:aws:iam::123456789012:role/admin';
const clock = fixedClock('2030-01-01T00:00:00Z');

function identityConfig(principal: Record<string, unknown> = {}): IdentityConfig {
  return {
    kind: 'aws/assume-role',
    via: { provider: 'oidc' },
    principal: { assume_role: ROLE_ARN, ...principal },
  };
}

const baseAws = new AwsCredentials({
  accessKeyId: 'ASIABASE',
  secretAccessKey: 'test-secret',
  sessionToken: 'base-session',
  region: 'eu-west-1',
});

describe('sanitizeRoleSessionName', () => {
  it('should replace rejected characters and trim', () => {
    expect(sanitizeRoleSessionName('auth-chain-my role!')).toBe('auth-chain-my-role');
    expect(sanitizeRoleSessionName('ok+=,.@-name')).toBe('ok+=,.@-name');
  });

  it('should truncate to 64 characters', () => {
    expect(sanitizeRoleSessionName('a'.repeat(80))).toBe('a'.repeat(64));
  });

  it('should fall back when nothing remains', () => {
    expect(sanitizeRoleSessionName('!!!')).toBe('auth-chain-session');
  });
});

describe('AwsAssumeRoleIdentity', () => {
  it('should reject another kind', () => {
    const error = captureError(
      () => new AwsAssumeRoleIdentity('admin', { ...identityConfig(), kind: 'azure/subscription' })
    );

    expect(error).toMatchObject({ kind: AuthErrorKind.InvalidIdentityKind });
  });

  it('should require a role at validation', () => {
    const identity = new AwsAssumeRoleIdentity('admin', { kind: 'aws/assume-role' });

    expect(() => identity.validate()).toThrow('assume_role is required for identity "admin"');
  });

  it('should warn about an invalid duration', () => {
    const logger = new InMemoryLogger();
    const identity = new AwsAssumeRoleIdentity('admin', identityConfig({ duration: 'long' }), {
      logger,
    });

    expect(identity.durationSeconds).toBeUndefined();
    expect(logger.getLogsContaining('Invalid duration for assume role')).toHaveLength(1);
  });

  it('should assume the role with AWS base credentials', async () => {
    const sts = new FakeSts();
    const identity = new AwsAssumeRoleIdentity(
      'admin',
      identityConfig({ external_id: 'ext-1', duration: '30m' }),
      { stsFactory: sts.factory, clock }
    );

    const credentials = await identity.authenticate({}, baseAws);

    expect(sts.clientOptions).toEqual([
      {
        region: 'eu-west-1',
        credentials: {
          accessKeyId: 'ASIABASE',
          secretAccessKey: 'test-secret',
          sessionToken: 'base-session',
        },
      },
    ]);
    expect(sts.assumeRoleCalls).toEqual([
      {
        roleArn: ROLE_ARN,
        roleSessionName: 'auth-chain-admin-1893456000',
        durationSeconds: 1800,
        externalId: 'ext-1',
      },
    ]);
    if (!(credentials instanceof AwsCredentials)) {
      throw new Error('expected AWS credentials');
    }
    expect(credentials.region).toBe('eu-west-1');
    expect(credentials.accessKeyId).toBe('ASIATESTKEY');
  });

  it('should use web identity for OIDC base credentials', async () => {
    const sts = new FakeSts();
    const identity = new AwsAssumeRoleIdentity('admin', identityConfig({ region: 'ap-south-1' }), {
      stsFactory: sts.factory,
      clock,
    });

    const credentials = await identity.authenticate(
      {},
      new OidcCredentials({ token: 'oidc-jwt', provider: 'oidc' })
    );

    expect(sts.clientOptions).toEqual([{ region: 'ap-south-1' }]);
    expect(sts.webIdentityCalls).toEqual([
      {
        roleArn: ROLE_ARN,
        webIdentityToken: 'oidc-jwt',
        roleSessionName: 'auth-chain-admin-1893456000',
        durationSeconds: undefined,
      },
    ]);
    expect(credentials.type).toBe('aws');
  });

  it('should reject other base credentials', async () => {
    const identity = new AwsAssumeRoleIdentity('admin', identityConfig(), {
      stsFactory: new FakeSts().factory,
    });

    await expect(
      identity.authenticate({}, new GitHubUserCredentials({ token: 'gho', provider: 'gh' }))
    ).rejects.toMatchObject({ kind: AuthErrorKind.InvalidCredentials });
  });

  it('should merge region and configured environment', () => {
    const identity = new AwsAssumeRoleIdentity('admin', {
      ...identityConfig({ region: 'us-west-2' }),
      env: { AWS_PROFILE: 'admin', AWS_REGION: 'us-east-2' },
    });

    expect(identity.environment()).toEqual({
      AWS_REGION: 'us-east-2',
      AWS_DEFAULT_REGION: 'us-west-2',
      AWS_PROFILE: 'admin',
    });
  });
});

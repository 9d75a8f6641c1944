/**
 * Auth manager tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AuthManager } from '../src/manager/index.js';
import { readAuthEnvironment, type AuthConfigInput } from '../src/config/index.js';
import { AwsCredentials, type Credentials } from '../src/credentials/index.js';
import { AuthError, AuthErrorKind } from '../src/errors/index.js';
import { InMemoryKeychain, MemoryCredentialStore } from '../src/store/index.js';
import { InMemoryLogger } from '../src/telemetry/index.js';
import { captureError, FakeSts, fixedClock } from './support/fakes.js';

const DEPLOY_ROLE = 'arn:aws:iam::123456789012:role/deploy';
const ADMIN_ROLE = 'arn:aws:iam::123456789012:role/admin';
const NOW = '2029-12-31T00:00:00Z';

const config: AuthConfigInput = {
  providers: {
    oidc: {
      kind: 'github/oidc',
      region: 'us-east-1',
      spec: { audience: 'sts.amazonaws.com' },
    },
    gh: {
      kind: 'github/user',
      spec: { client_id: 'client-1' },
    },
  },
  identities: {
    deploy: {
      kind: 'aws/assume-role',
      default: true,
      via: { provider: 'oidc' },
      principal: { assume_role: DEPLOY_ROLE },
    },
    admin: {
      kind: 'aws/assume-role',
      via: { identity: 'deploy' },
      principal: { assume_role: ADMIN_ROLE },
      env: { STAGE: 'prod' },
    },
  },
  keyring: { type: 'memory' },
};

class FailingDeleteStore extends MemoryCredentialStore {
  override async delete(alias: string): Promise<void> {
    if (alias === 'deploy') {
      throw new Error('disk full');
    }
    await super.delete(alias);
  }
}

class AlwaysFailingDeleteStore extends MemoryCredentialStore {
  override async delete(_alias: string): Promise<void> {
    throw new Error('disk full');
  }
}

class CorruptStore extends MemoryCredentialStore {
  override async retrieve(alias: string): Promise<Credentials> {
    if (alias === 'admin') {
      throw new AuthError(AuthErrorKind.StorageFailed, 'corrupt entry');
    }
    return super.retrieve(alias);
  }
}

class LockedKeychain extends InMemoryKeychain {
  override async delete(_service: string, _account: string): Promise<void> {
    throw new Error('keychain locked');
  }
}

class FailingWriteStore extends MemoryCredentialStore {
  override async store(_alias: string, _credentials: Credentials): Promise<void> {
    throw new Error('read-only');
  }
}

function awsExpiringAt(iso: string): AwsCredentials {
  return new AwsCredentials({
    accessKeyId: 'ASIACACHED',
    secretAccessKey: 'test-secret',
    region: 'us-east-1',
    expiration: new Date(iso),
    principalArn: 'arn:aws:sts::123456789012:assumed-role/cached/session',
  });
}

describe('AuthManager', () => {
  let sts: FakeSts;
  let store: MemoryCredentialStore;
  let logger: InMemoryLogger;
  let keychain: InMemoryKeychain;

  function createManager(
    input: AuthConfigInput = config,
    overrides: { store?: MemoryCredentialStore } = {}
  ): AuthManager {
    return new AuthManager(input, {
      store: overrides.store ?? store,
      stsFactory: sts.factory,
      keychain,
      logger,
      clock: fixedClock(NOW),
      environment: readAuthEnvironment({
        GITHUB_ACTIONS: 'true',
        GITHUB_OIDC_TOKEN: 'supplied-jwt',
      }),
    });
  }

  beforeEach(() => {
    sts = new FakeSts();
    store = new MemoryCredentialStore();
    logger = new InMemoryLogger();
    keychain = new InMemoryKeychain();
  });

  describe('construction', () => {
    it('should reject invalid configuration', () => {
      const error = captureError(() => createManager({ providers: { bad: { kind: '' } } }));

      expect(error).toMatchObject({ kind: AuthErrorKind.InvalidAuthConfig });
    });

    it('should reject unknown provider kinds', () => {
      const error = captureError(() => createManager({ providers: { x: { kind: 'okta/saml' } } }));

      expect(error).toMatchObject({
        kind: AuthErrorKind.InvalidProviderKind,
        message: 'unsupported provider kind "okta/saml" for provider "x"',
      });
    });
  });

  describe('authenticate', () => {
    it('should run the whole chain and cache every step', async () => {
      const manager = createManager();

      const info = await manager.authenticate('admin');

      expect(manager.getChain()).toEqual(['oidc', 'deploy', 'admin']);
      expect(sts.webIdentityCalls.map((call) => call.roleArn)).toEqual([DEPLOY_ROLE]);
      expect(sts.webIdentityCalls[0]?.webIdentityToken).toBe('supplied-jwt');
      expect(sts.assumeRoleCalls.map((call) => call.roleArn)).toEqual([DEPLOY_ROLE, ADMIN_ROLE]);
      expect(await store.list()).toEqual(['admin', 'deploy', 'oidc']);

      expect(info.provider).toBe('oidc');
      expect(info.identity).toBe('admin');
      expect(info.credentialsRef).toBe('admin');
      expect(info.principal).toBe('arn:aws:sts::123456789012:assumed-role/deploy/session');
      expect(info.account).toBe('123456789012');
      expect(info.environment).toEqual({
        AWS_REGION: 'us-east-1',
        AWS_DEFAULT_REGION: 'us-east-1',
        STAGE: 'prod',
      });
      expect(info.lastUpdated.toISOString()).toBe('2029-12-31T00:00:00.000Z');
    });

    it('should resolve identity names case-insensitively', async () => {
      const info = await createManager().authenticate('DEPLOY');

      expect(info.identity).toBe('deploy');
    });

    it('should return cached target credentials without calling STS', async () => {
      const manager = createManager();
      await manager.authenticate('admin');
      const webCalls = sts.webIdentityCalls.length;
      const assumeCalls = sts.assumeRoleCalls.length;

      await manager.authenticate('admin');

      expect(sts.webIdentityCalls).toHaveLength(webCalls);
      expect(sts.assumeRoleCalls).toHaveLength(assumeCalls);
    });

    it('should resume after the last valid cached step', async () => {
      await store.store('deploy', awsExpiringAt('2029-12-31T02:00:00Z'));
      const manager = createManager();

      await manager.authenticate('admin');

      expect(sts.webIdentityCalls).toHaveLength(0);
      expect(sts.assumeRoleCalls.map((call) => call.roleArn)).toEqual([ADMIN_ROLE]);
      expect(sts.clientOptions[0]?.credentials?.accessKeyId).toBe('ASIACACHED');
    });

    it('should skip cached steps expiring within the buffer', async () => {
      await store.store('deploy', awsExpiringAt('2029-12-31T00:10:00Z'));
      const manager = createManager();

      await manager.authenticate('admin');

      expect(sts.webIdentityCalls).toHaveLength(1);
      expect(sts.assumeRoleCalls).toHaveLength(2);
    });

    it('should keep going when caching fails', async () => {
      const manager = createManager(config, { store: new FailingWriteStore() });

      const info = await manager.authenticate('deploy');

      expect(info.identity).toBe('deploy');
      expect(logger.getLogsContaining('Failed to cache credentials')).toHaveLength(2);
    });

    it('should report unknown identities', async () => {
      await expect(createManager().authenticate('ghost')).rejects.toMatchObject({
        kind: AuthErrorKind.IdentityNotFound,
        message: 'identity "ghost" not found',
      });
    });
  });

  describe('authenticateProvider', () => {
    it('should authenticate and cache a provider on its own', async () => {
      await keychain.set(
        'auth-chain-github-user',
        'oauth-token',
        JSON.stringify({ token: 'gho_cached', expires_at: '2029-12-31T06:00:00Z' })
      );
      const manager = createManager();

      const info = await manager.authenticateProvider('gh');

      expect(manager.getChain()).toEqual(['gh']);
      expect(info.provider).toBe('gh');
      expect(info.identity).toBe('gh');
      expect(info.environment).toEqual({});
      expect(await store.list()).toEqual(['gh']);
    });

    it('should fail when the web identity provider has no role to assume', async () => {
      await expect(createManager().authenticateProvider('oidc')).rejects.toThrow(
        /^no role to assume for web identity/
      );
    });

    it('should report unknown providers', async () => {
      await expect(createManager().authenticateProvider('nope')).rejects.toMatchObject({
        kind: AuthErrorKind.ProviderNotFound,
      });
    });
  });

  describe('whoami', () => {
    it('should prefer cached credentials', async () => {
      await store.store('admin', awsExpiringAt('2029-12-31T06:00:00Z'));

      const info = await createManager().whoami('admin');

      expect(info.principal).toBe('arn:aws:sts::123456789012:assumed-role/cached/session');
      expect(sts.assumeRoleCalls).toHaveLength(0);
    });

    it('should authenticate when nothing is cached', async () => {
      const info = await createManager().whoami('admin');

      expect(info.identity).toBe('admin');
      expect(sts.assumeRoleCalls).toHaveLength(2);
    });

    it('should authenticate when the cache has expired', async () => {
      await store.store('admin', awsExpiringAt('2029-12-30T00:00:00Z'));

      const info = await createManager().whoami('admin');

      expect(info.principal).toBe('arn:aws:sts::123456789012:assumed-role/deploy/session');
    });

    it('should authenticate when the cached entry cannot be read', async () => {
      const info = await createManager(config, { store: new CorruptStore() }).whoami('admin');

      expect(info.identity).toBe('admin');
      expect(info.principal).toBe('arn:aws:sts::123456789012:assumed-role/deploy/session');
    });

    it('should throw the cache error when authentication also fails', async () => {
      sts.failure = new Error('sts unavailable');

      await expect(
        createManager(config, { store: new CorruptStore() }).whoami('admin')
      ).rejects.toMatchObject({ kind: AuthErrorKind.StorageFailed, message: 'corrupt entry' });
    });

    it('should not authenticate unknown identities', async () => {
      await expect(createManager().whoami('nobody')).rejects.toMatchObject({
        kind: AuthErrorKind.IdentityNotFound,
      });
      expect(sts.webIdentityCalls).toHaveLength(0);
    });
  });

  describe('getCachedCredentials', () => {
    it('should reject expired credentials', async () => {
      await store.store('admin', awsExpiringAt('2029-12-30T00:00:00Z'));

      await expect(createManager().getCachedCredentials('admin')).rejects.toMatchObject({
        kind: AuthErrorKind.ExpiredCredentials,
        message: 'credentials for identity "admin" have expired',
      });
    });

    it('should report missing credentials', async () => {
      await expect(createManager().getCachedCredentials('admin')).rejects.toMatchObject({
        kind: AuthErrorKind.CredentialsNotFound,
      });
    });
  });

  describe('prepareShellEnvironment', () => {
    it('should layer identity and credential variables over the input', async () => {
      const env = await createManager().prepareShellEnvironment('admin', {
        PATH: '/usr/bin',
        AWS_REGION: 'ap-east-1',
      });

      expect(env).toEqual({
        PATH: '/usr/bin',
        AWS_REGION: 'us-east-1',
        AWS_DEFAULT_REGION: 'us-east-1',
        STAGE: 'prod',
        AWS_ACCESS_KEY_ID: 'ASIATESTKEY',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
        AWS_SESSION_TOKEN: 'test-session-token',
      });
    });
  });

  describe('configuration queries', () => {
    it('should list names in order', () => {
      const manager = createManager();

      expect(manager.listIdentities()).toEqual(['admin', 'deploy']);
      expect(manager.listProviders()).toEqual(['gh', 'oidc']);
    });

    it('should find the provider behind an identity', () => {
      const manager = createManager();

      expect(manager.getProviderForIdentity('admin')).toBe('oidc');
      expect(manager.getProviderKindForIdentity('admin')).toBe('github/oidc');
      expect(manager.getFilesDisplayPath('gh')).toBe('keychain:auth-chain-github-user');
    });

    it('should return the single default identity', () => {
      expect(createManager().getDefaultIdentity()).toBe('deploy');
    });

    it('should reject multiple defaults', () => {
      const manager = createManager({
        ...config,
        identities: {
          a: { kind: 'aws/assume-role', default: true, via: { provider: 'oidc' }, principal: {} },
          b: { kind: 'aws/assume-role', default: true, via: { provider: 'oidc' }, principal: {} },
        },
      });

      expect(() => manager.getDefaultIdentity()).toThrow(
        'multiple default identities configured: a, b'
      );
    });

    it('should validate every chain and component', () => {
      expect(() => createManager().validate()).not.toThrow();

      const broken = createManager({
        ...config,
        identities: { lonely: { kind: 'aws/assume-role', principal: { assume_role: ADMIN_ROLE } } },
      });
      expect(() => broken.validate()).toThrow('identity "lonely" has no via configuration');
    });
  });

  describe('logout', () => {
    it('should remove every cached step of the chain', async () => {
      const manager = createManager();
      await manager.authenticate('admin');

      await manager.logout('admin');

      expect(await store.list()).toEqual([]);
    });

    it('should report a partial logout when some steps succeed', async () => {
      const failing = new FailingDeleteStore();
      const manager = createManager(config, { store: failing });
      await manager.authenticate('admin');

      const error = await manager.logout('admin').then(
        () => undefined,
        (reason: unknown) => reason
      );

      expect(error).toMatchObject({
        kind: AuthErrorKind.PartialLogout,
        message:
          'partial logout for identity "admin" (1 of 6 steps failed): delete credentials for deploy: disk full',
      });
      expect(await failing.list()).toEqual(['deploy']);
    });

    it('should report a failed logout when no step succeeds', async () => {
      keychain = new LockedKeychain();
      const manager = createManager(config, { store: new AlwaysFailingDeleteStore() });

      const error = await manager.logoutProvider('gh').then(
        () => undefined,
        (reason: unknown) => reason
      );

      expect(error).toMatchObject({
        kind: AuthErrorKind.LogoutFailed,
        message:
          'logout failed for provider "gh": delete credentials for gh: disk full; logout provider gh: keychain locked',
      });
    });

    it('should log out identities rooted at a provider', async () => {
      const manager = createManager();
      await manager.authenticate('admin');
      await store.store('gh', awsExpiringAt('2029-12-31T06:00:00Z'));

      await manager.logoutProvider('oidc');

      expect(await store.list()).toEqual(['gh']);
    });

    it('should log out everything', async () => {
      const manager = createManager();
      await manager.authenticate('admin');
      await keychain.set('auth-chain-github-user', 'oauth-token', '{}');

      await manager.logoutAll();

      expect(await store.list()).toEqual([]);
      expect(keychain.size).toBe(0);
    });
  });
});

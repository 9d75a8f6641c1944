/**
 * GitHub App provider.
 *
 * Signs an RS256 JWT as the app and exchanges it for an installation access
 * token.
 *
 * @module providers/github/app
 */

import { readFileSync } from 'node:fs';
import type { KeyObject } from 'node:crypto';
import * as jose from 'jose';
import {
  APP_JWT_LIFETIME_SECONDS,
  DEFAULT_GITHUB_API_URL,
  PROVIDER_KINDS,
  readAuthEnvironment,
  SpecReader,
  type ProviderConfig,
} from '../../config/index.js';
import { createTransport, parseJsonObject, type HttpTransport } from '../../core/transport.js';
import { throwIfAborted } from '../../core/sleep.js';
import {
  GITHUB_ACCEPT,
  GITHUB_API_VERSION,
  GitHubAppCredentials,
  type Credentials,
} from '../../credentials/index.js';
import { AuthError, AuthErrorKind, errorMessage, httpFailure } from '../../errors/index.js';
import { noOpLogger, type Logger } from '../../telemetry/index.js';
import type { AuthenticateContext, Provider, ProviderHints } from '../../types/index.js';
import { assertProviderIdentity, trimBaseUrl } from '../common.js';
import type { AuthDependencies } from '../types.js';
import { parseRsaPrivateKey } from './private-key.js';

export class GitHubAppProvider implements Provider {
  readonly kind = PROVIDER_KINDS.GITHUB_APP;
  readonly name: string;
  readonly appId: string;
  readonly installationId: string;
  readonly baseUrl: string;
  private readonly permissions?: Record<string, string>;
  private readonly repositories: string[];
  private readonly privateKey: KeyObject;
  private readonly keySource: string;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  /**
   * Validates configuration and loads the private key. No network access.
   */
  constructor(name: string, config: ProviderConfig, deps: AuthDependencies = {}) {
    assertProviderIdentity(name, config, PROVIDER_KINDS.GITHUB_APP);
    this.name = name;

    const owner = `provider "${name}"`;
    const spec = new SpecReader(config.spec, owner, AuthErrorKind.InvalidProviderConfig);
    this.appId = spec.requiredString('app_id');
    this.installationId = spec.requiredString('installation_id');
    this.permissions = spec.stringMap('permissions');
    this.repositories = spec.stringList('repositories');
    this.baseUrl = trimBaseUrl(spec.string('base_url') ?? DEFAULT_GITHUB_API_URL);

    const keyPath = spec.string('private_key_path');
    const keyEnv = spec.string('private_key_env');
    let pem: string;
    if (keyPath) {
      this.keySource = keyPath;
      try {
        pem = readFileSync(keyPath, 'utf-8');
      } catch (error) {
        throw new AuthError(
          AuthErrorKind.InvalidProviderConfig,
          `failed to read private_key_path for ${owner}: ${errorMessage(error)}`,
          { cause: error, context: { provider: name, field: 'private_key_path' } }
        );
      }
    } else if (keyEnv) {
      this.keySource = `$${keyEnv}`;
      const environment = deps.environment ?? readAuthEnvironment();
      const value = environment.variables[keyEnv];
      if (!value) {
        throw new AuthError(
          AuthErrorKind.InvalidProviderConfig,
          `environment variable ${keyEnv} named by private_key_env is not set for ${owner}`,
          { context: { provider: name, field: 'private_key_env' } }
        );
      }
      pem = value;
    } else {
      throw new AuthError(
        AuthErrorKind.InvalidProviderConfig,
        `private_key_path or private_key_env is required for ${owner}`,
        { context: { provider: name, field: 'private_key_path' } }
      );
    }

    this.privateKey = parseRsaPrivateKey(pem, owner);
    this.transport = deps.transport ?? createTransport();
    this.logger = (deps.logger ?? noOpLogger).child({ provider: name, kind: this.kind });
    this.clock = deps.clock ?? (() => new Date());
  }

  preAuthenticate(): ProviderHints {
    return {};
  }

  async authenticate(ctx: AuthenticateContext = {}): Promise<Credentials> {
    throwIfAborted(ctx.signal, 'GitHub App authentication');

    const jwt = await this.signJwt();
    const url = `${this.baseUrl}/app/installations/${encodeURIComponent(this.installationId)}/access_tokens`;

    const headers: Record<string, string> = {
      authorization: `Bearer ${jwt}`,
      accept: GITHUB_ACCEPT,
      'x-github-api-version': GITHUB_API_VERSION,
    };
    const payload: { permissions?: Record<string, string>; repositories?: string[] } = {};
    if (this.permissions && Object.keys(this.permissions).length > 0) {
      payload.permissions = this.permissions;
    }
    if (this.repositories.length > 0) {
      payload.repositories = this.repositories;
    }
    const hasBody = payload.permissions !== undefined || payload.repositories !== undefined;
    if (hasBody) {
      headers['content-type'] = 'application/json';
    }

    this.logger.debug('Requesting installation token', { endpoint: url });
    const response = await this.transport.send({
      method: 'POST',
      url,
      headers,
      body: hasBody ? JSON.stringify(payload) : undefined,
      signal: ctx.signal,
    });

    if (response.status !== 201) {
      throw httpFailure('GitHub App installation token request', url, response.status, response.body);
    }

    const json = parseJsonObject(response.body);
    const token = json?.['token'];
    if (typeof token !== 'string' || token === '') {
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        'GitHub App installation token response has no token',
        { context: { endpoint: url } }
      );
    }

    const expiresAtRaw = json?.['expires_at'];
    const expiresAt = typeof expiresAtRaw === 'string' ? new Date(expiresAtRaw) : undefined;

    this.logger.info('Obtained installation token', { installationId: this.installationId });
    return new GitHubAppCredentials({
      token,
      appId: this.appId,
      installationId: this.installationId,
      expiresAt: expiresAt && !Number.isNaN(expiresAt.getTime()) ? expiresAt : undefined,
      apiUrl: this.baseUrl,
    });
  }

  /**
   * Signs the app JWT: `iss` = app ID, valid for ten minutes from now.
   */
  private async signJwt(): Promise<string> {
    const iat = Math.floor(this.clock().getTime() / 1000);
    try {
      return await new jose.SignJWT({})
        .setProtectedHeader({ alg: 'RS256', typ: 'JWT' })
        .setIssuer(this.appId)
        .setIssuedAt(iat)
        .setExpirationTime(iat + APP_JWT_LIFETIME_SECONDS)
        .sign(this.privateKey);
    } catch (error) {
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        `failed to sign GitHub App JWT: ${errorMessage(error)}`,
        { cause: error, context: { provider: this.name } }
      );
    }
  }

  validate(): void {
    // Construction already checked every field.
  }

  environment(): Record<string, string> {
    return {};
  }

  async logout(): Promise<void> {
    // Installation tokens are not cached by the provider.
  }

  getFilesDisplayPath(): string {
    return this.keySource;
  }
}

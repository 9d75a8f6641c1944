/**
 * GitHub User provider.
 *
 * Obtains a user token through the OAuth device flow and caches it in the
 * OS keychain so later runs skip the interactive flow.
 *
 * @module providers/github/user
 */

import {
  DEFAULT_GITHUB_API_URL,
  DEFAULT_GITHUB_BASE_URL,
  DEFAULT_KEYCHAIN_SERVICE,
  KEYCHAIN_TOKEN_ACCOUNT,
  PROVIDER_KINDS,
  resolveTokenLifetime,
  SpecReader,
  type ProviderConfig,
} from '../../config/index.js';
import type { Sleeper } from '../../core/sleep.js';
import { createTransport, parseJsonObject } from '../../core/transport.js';
import { GitHubUserCredentials, type Credentials } from '../../credentials/index.js';
import { AuthError, AuthErrorKind, errorMessage, isAuthError } from '../../errors/index.js';
import { consoleDevicePrompt, DeviceFlowClient, type DevicePrompt } from '../../flows/index.js';
import { SystemKeychain, type Keychain } from '../../store/index.js';
import { noOpLogger, type Logger } from '../../telemetry/index.js';
import type { AuthenticateContext, Provider, ProviderHints } from '../../types/index.js';
import { assertProviderIdentity, trimBaseUrl } from '../common.js';
import type { AuthDependencies } from '../types.js';

/**
 * Keychain entry layout.
 */
interface CachedUserToken {
  token: string;
  expires_at: string;
}

export class GitHubUserProvider implements Provider {
  readonly kind = PROVIDER_KINDS.GITHUB_USER;
  readonly name: string;
  readonly clientId: string;
  readonly scopes: string[];
  /** Token lifetime in milliseconds */
  readonly tokenLifetime: number;
  readonly keychainService: string;
  readonly apiUrl: string;
  private readonly deviceFlow: DeviceFlowClient;
  private readonly keychain: Keychain;
  private readonly prompt: DevicePrompt;
  private readonly sleep?: Sleeper;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(name: string, config: ProviderConfig, deps: AuthDependencies = {}) {
    assertProviderIdentity(name, config, PROVIDER_KINDS.GITHUB_USER);
    this.name = name;
    this.logger = (deps.logger ?? noOpLogger).child({ provider: name, kind: this.kind });

    const spec = new SpecReader(
      config.spec,
      `provider "${name}"`,
      AuthErrorKind.InvalidProviderConfig
    );
    this.clientId = spec.requiredString('client_id');
    this.scopes = spec.stringList('scopes');
    this.tokenLifetime = resolveTokenLifetime(spec.string('token_lifetime'), this.logger);
    this.keychainService = spec.string('keychain_service') ?? DEFAULT_KEYCHAIN_SERVICE;
    this.apiUrl = trimBaseUrl(spec.string('api_url') ?? DEFAULT_GITHUB_API_URL);

    this.deviceFlow = new DeviceFlowClient({
      clientId: this.clientId,
      baseUrl: spec.string('base_url') ?? DEFAULT_GITHUB_BASE_URL,
      transport: deps.transport ?? createTransport(),
      logger: this.logger,
    });
    this.keychain = deps.keychain ?? new SystemKeychain();
    this.prompt = deps.prompt ?? consoleDevicePrompt;
    this.sleep = deps.sleep;
    this.clock = deps.clock ?? (() => new Date());
  }

  preAuthenticate(): ProviderHints {
    return {};
  }

  async authenticate(ctx: AuthenticateContext = {}): Promise<Credentials> {
    const cached = await this.readCachedToken();
    if (cached) {
      this.logger.debug('Using cached GitHub user token');
      return cached;
    }

    if (ctx.allowPrompts === false) {
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        `no cached GitHub user token for provider "${this.name}" and interactive login is disabled`,
        { context: { provider: this.name } }
      );
    }

    const session = await this.deviceFlow.requestDeviceCode(this.scopes, ctx.signal);
    await this.prompt.display(session);
    const response = await this.deviceFlow.awaitAuthorization(session, {
      signal: ctx.signal,
      sleep: this.sleep,
    });

    const credentials = new GitHubUserCredentials({
      token: response.accessToken,
      provider: this.name,
      expiresAt: new Date(this.clock().getTime() + this.tokenLifetime),
      apiUrl: this.apiUrl,
    });
    await this.writeCachedToken(credentials);
    this.logger.info('GitHub user authentication succeeded');
    return credentials;
  }

  /**
   * Returns the keychain token when present and unexpired. Any keychain
   * problem is a cache miss.
   */
  private async readCachedToken(): Promise<GitHubUserCredentials | undefined> {
    let raw: string;
    try {
      raw = await this.keychain.get(this.keychainService, KEYCHAIN_TOKEN_ACCOUNT);
    } catch (error) {
      this.logger.debug('No cached GitHub user token', { reason: errorMessage(error) });
      return undefined;
    }

    const entry = parseJsonObject(raw);
    const token = entry?.['token'];
    const expiresAtRaw = entry?.['expires_at'];
    if (typeof token !== 'string' || token === '' || typeof expiresAtRaw !== 'string') {
      this.logger.debug('Ignoring malformed cached GitHub user token');
      return undefined;
    }

    const expiresAt = new Date(expiresAtRaw);
    const credentials = new GitHubUserCredentials({
      token,
      provider: this.name,
      expiresAt: Number.isNaN(expiresAt.getTime()) ? undefined : expiresAt,
      apiUrl: this.apiUrl,
    });
    if (credentials.isExpired(this.clock())) {
      this.logger.debug('Cached GitHub user token has expired');
      return undefined;
    }
    return credentials;
  }

  private async writeCachedToken(credentials: GitHubUserCredentials): Promise<void> {
    const entry: CachedUserToken = {
      token: credentials.token.expose(),
      expires_at: (credentials.expiresAt ?? this.clock()).toISOString(),
    };
    try {
      await this.keychain.set(this.keychainService, KEYCHAIN_TOKEN_ACCOUNT, JSON.stringify(entry));
    } catch (error) {
      this.logger.warn('Failed to cache GitHub user token', { reason: errorMessage(error) });
    }
  }

  validate(): void {
    // client_id is checked at construction.
  }

  environment(): Record<string, string> {
    return {};
  }

  /**
   * Removes the cached token. A missing entry is not an error.
   */
  async logout(): Promise<void> {
    try {
      await this.keychain.delete(this.keychainService, KEYCHAIN_TOKEN_ACCOUNT);
    } catch (error) {
      if (isAuthError(error, AuthErrorKind.KeychainItemNotFound)) {
        return;
      }
      throw error;
    }
    this.logger.info('Removed cached GitHub user token');
  }

  getFilesDisplayPath(): string {
    return `keychain:${this.keychainService}`;
  }
}

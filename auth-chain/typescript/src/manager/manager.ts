/**
 * Auth manager: resolves chains, authenticates them and caches every step.
 * @module manager/manager
 */

import {
  CACHE_VALIDITY_BUFFER_MS,
  parseAuthConfig,
  readAuthEnvironment,
  type AuthConfig,
  type AuthConfigInput,
  type IdentityConfig,
  type ProviderConfig,
} from '../config/index.js';
import { createTransport } from '../core/transport.js';
import { credentialEnvironment, type Credentials } from '../credentials/index.js';
import { AuthError, AuthErrorKind, errorMessage, isAuthError } from '../errors/index.js';
import { createIdentity } from '../identities/index.js';
import { createProvider, type AuthDependencies } from '../providers/index.js';
import { createCredentialStore } from '../store/index.js';
import { ConsoleLogger, parseLogLevel, type Logger } from '../telemetry/index.js';
import {
  WhoamiInfo,
  type AuthenticateContext,
  type AuthManagerApi,
  type ChainView,
  type CredentialStore,
  type Identity,
  type Provider,
} from '../types/index.js';
import { buildAuthenticationChain, resolveIdentityName, validateChains } from './chain.js';

/**
 * Manager collaborators. Everything defaults to the production binding.
 */
export interface AuthManagerOptions extends AuthDependencies {
  store?: CredentialStore;
}

interface CachedStep {
  index: number;
  credentials: Credentials;
}

/** Logout steps run so far and the ones that failed. */
interface LogoutTally {
  attempted: number;
  failures: Error[];
}

function newTally(): LogoutTally {
  return { attempted: 0, failures: [] };
}

export class AuthManager implements AuthManagerApi {
  private readonly config: AuthConfig;
  private readonly providers = new Map<string, Provider>();
  private readonly identities = new Map<string, Identity>();
  private readonly store: CredentialStore;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  /** Chain of the most recent request */
  private chain: string[] = [];

  /**
   * Validates configuration and constructs every provider and identity.
   */
  constructor(config: AuthConfigInput, options: AuthManagerOptions = {}) {
    this.config = parseAuthConfig(config);
    this.logger =
      options.logger ??
      new ConsoleLogger({ minLevel: parseLogLevel(this.config.logs?.level) ?? 'warn' });
    this.clock = options.clock ?? (() => new Date());

    const deps: AuthDependencies = {
      ...options,
      logger: this.logger,
      environment: options.environment ?? readAuthEnvironment(),
      transport: options.transport ?? createTransport(),
    };
    this.store = options.store ?? createCredentialStore(this.config.keyring, options.keychain);

    for (const [name, providerConfig] of Object.entries(this.config.providers)) {
      this.providers.set(name, createProvider(name, providerConfig, deps));
    }
    for (const [name, identityConfig] of Object.entries(this.config.identities)) {
      this.identities.set(name, createIdentity(name, identityConfig, deps));
    }
  }

  // ChainView

  getChain(): readonly string[] {
    return [...this.chain];
  }

  getIdentities(): Readonly<Record<string, IdentityConfig>> {
    return this.config.identities;
  }

  getProviders(): Readonly<Record<string, ProviderConfig>> {
    return this.config.providers;
  }

  // Authentication

  /**
   * Authenticates the identity's chain, resuming from cached credentials
   * where possible.
   */
  async authenticate(identityName: string, ctx: AuthenticateContext = {}): Promise<WhoamiInfo> {
    const name = this.requireIdentityName(identityName);
    const chain = buildAuthenticationChain(name, this.config.identities);
    this.chain = chain;

    const logger = this.logger.child({ identity: name });
    logger.debug('Authenticating chain', { chain: chain.join(' -> ') });
    const credentials = await this.authenticateChain(chain, ctx, logger);
    return this.buildWhoami(chain[0] ?? '', name, credentials);
  }

  /**
   * Authenticates a provider on its own.
   */
  async authenticateProvider(
    providerName: string,
    ctx: AuthenticateContext = {}
  ): Promise<WhoamiInfo> {
    const provider = this.requireProvider(providerName);
    const chain = [providerName];
    this.chain = chain;

    const hints = provider.preAuthenticate(this.chainView(chain));
    const credentials = await provider.authenticate({ ...ctx, hints });
    await this.cacheStep(providerName, credentials);
    return this.buildWhoami(providerName, providerName, credentials);
  }

  /**
   * Returns cached credentials without starting any flow.
   */
  async getCachedCredentials(identityName: string): Promise<WhoamiInfo> {
    const name = this.requireIdentityName(identityName);
    const credentials = await this.store.retrieve(name);
    if (credentials.isExpired(this.clock())) {
      throw new AuthError(
        AuthErrorKind.ExpiredCredentials,
        `credentials for identity "${name}" have expired`,
        { context: { identity: name } }
      );
    }
    return this.buildWhoami(this.getProviderForIdentity(name), name, credentials);
  }

  /**
   * Cached credentials first, then a non-interactive chain authentication.
   * When both fail the cache error is thrown.
   */
  async whoami(identityName: string, ctx: AuthenticateContext = {}): Promise<WhoamiInfo> {
    let cacheError: unknown;
    try {
      return await this.getCachedCredentials(identityName);
    } catch (error) {
      if (isAuthError(error, AuthErrorKind.IdentityNotFound)) {
        throw error;
      }
      cacheError = error;
      this.logger.debug('No usable cached credentials, authenticating', {
        identity: identityName,
        reason: errorMessage(error),
      });
    }

    try {
      return await this.authenticate(identityName, { ...ctx, allowPrompts: false });
    } catch (error) {
      this.logger.debug('Non-interactive authentication failed', {
        identity: identityName,
        reason: errorMessage(error),
      });
      throw cacheError;
    }
  }

  private async authenticateChain(
    chain: string[],
    ctx: AuthenticateContext,
    logger: Logger
  ): Promise<Credentials> {
    const cached = await this.findLastValidCachedStep(chain, logger);

    let current: Credentials | undefined;
    let start = 0;
    if (cached) {
      logger.debug('Resuming from cached credentials', {
        chainIndex: cached.index,
        step: chain[cached.index],
      });
      current = cached.credentials;
      start = cached.index + 1;
    }

    if (start === 0) {
      const providerName = chain[0] ?? '';
      const provider = this.requireProvider(providerName);
      const hints = provider.preAuthenticate(this.chainView(chain));
      current = await provider.authenticate({ ...ctx, hints });
      await this.cacheStep(providerName, current);
      start = 1;
    }

    for (let i = start; i < chain.length; i++) {
      const step = chain[i] ?? '';
      const identity = this.identities.get(step);
      if (!identity) {
        throw new AuthError(
          AuthErrorKind.InvalidAuthConfig,
          `identity "${step}" not found in chain step ${i}`,
          { context: { identity: step, chainIndex: i } }
        );
      }
      if (!current) {
        throw new AuthError(
          AuthErrorKind.AuthenticationFailed,
          `no credentials available for chain step ${i}`,
          { context: { identity: step, chainIndex: i } }
        );
      }

      logger.debug('Authenticating identity step', { chainIndex: i, step, kind: identity.kind });
      current = await identity.authenticate(ctx, current);
      await this.cacheStep(step, current);
    }

    if (!current) {
      throw new AuthError(AuthErrorKind.InvalidAuthConfig, 'empty authentication chain');
    }
    return current;
  }

  /**
   * Scans from the target back to the provider for credentials that remain
   * valid for at least the cache buffer.
   */
  private async findLastValidCachedStep(
    chain: string[],
    logger: Logger
  ): Promise<CachedStep | undefined> {
    for (let index = chain.length - 1; index >= 0; index--) {
      const step = chain[index] ?? '';
      let credentials: Credentials;
      try {
        credentials = await this.store.retrieve(step);
      } catch (error) {
        logger.trace('No cached credentials for step', { chainIndex: index, step, reason: errorMessage(error) });
        continue;
      }

      if (this.isUsable(credentials)) {
        return { index, credentials };
      }
      logger.debug('Skipping cached credentials expiring within buffer', { chainIndex: index, step });
    }
    return undefined;
  }

  private isUsable(credentials: Credentials): boolean {
    const now = this.clock();
    if (credentials.isExpired(now)) {
      return false;
    }
    let expiration: Date | undefined;
    try {
      expiration = credentials.getExpiration();
    } catch {
      return false;
    }
    return expiration === undefined || expiration.getTime() - now.getTime() > CACHE_VALIDITY_BUFFER_MS;
  }

  private async cacheStep(step: string, credentials: Credentials): Promise<void> {
    try {
      await this.store.store(step, credentials);
    } catch (error) {
      this.logger.warn('Failed to cache credentials', { step, reason: errorMessage(error) });
    }
  }

  private chainView(chain: readonly string[]): ChainView {
    return {
      getChain: () => chain,
      getIdentities: () => this.config.identities,
    };
  }

  private buildWhoami(providerName: string, identityName: string, credentials: Credentials): WhoamiInfo {
    const info = new WhoamiInfo({
      provider: providerName,
      identity: identityName,
      environment: this.environmentFor(identityName),
      credentialsRef: identityName,
      lastUpdated: this.clock(),
      credentials,
    });
    credentials.buildWhoamiInfo(info);
    return info;
  }

  private environmentFor(name: string): Record<string, string> {
    if (this.providers.has(name) && !this.identities.has(name)) {
      return this.requireProvider(name).environment();
    }
    return this.getEnvironmentVariables(name);
  }

  // Configuration queries

  /**
   * Checks `via` references, cycles and each provider and identity.
   */
  validate(): void {
    validateChains(this.config);
    for (const provider of this.providers.values()) {
      provider.validate();
    }
    for (const identity of this.identities.values()) {
      identity.validate();
    }
  }

  listIdentities(): string[] {
    return Object.keys(this.config.identities).sort();
  }

  listProviders(): string[] {
    return Object.keys(this.config.providers).sort();
  }

  /**
   * The identity marked `default`, if exactly one is.
   */
  getDefaultIdentity(): string | undefined {
    const defaults = Object.entries(this.config.identities)
      .filter(([, identity]) => identity.default === true)
      .map(([name]) => name)
      .sort();
    if (defaults.length > 1) {
      throw new AuthError(
        AuthErrorKind.InvalidAuthConfig,
        `multiple default identities configured: ${defaults.join(', ')}`
      );
    }
    return defaults[0];
  }

  getProviderForIdentity(identityName: string): string {
    const name = this.requireIdentityName(identityName);
    return buildAuthenticationChain(name, this.config.identities)[0] ?? '';
  }

  getProviderKindForIdentity(identityName: string): string {
    const providerName = this.getProviderForIdentity(identityName);
    const config = this.config.providers[providerName];
    if (!config) {
      throw new AuthError(AuthErrorKind.ProviderNotFound, `provider "${providerName}" not found`, {
        context: { provider: providerName },
      });
    }
    return config.kind;
  }

  getFilesDisplayPath(providerName: string): string {
    return this.requireProvider(providerName).getFilesDisplayPath();
  }

  /**
   * Non-secret variables for an identity: provider first, then each identity
   * in chain order. Does not authenticate.
   */
  getEnvironmentVariables(identityName: string): Record<string, string> {
    const name = this.requireIdentityName(identityName);
    const chain = buildAuthenticationChain(name, this.config.identities);

    let env: Record<string, string> = {};
    const provider = this.providers.get(chain[0] ?? '');
    if (provider) {
      env = { ...env, ...provider.environment() };
    }
    for (const step of chain.slice(1)) {
      const identity = this.identities.get(step);
      if (identity) {
        env = { ...env, ...identity.environment() };
      }
    }
    return env;
  }

  /**
   * Returns a copy of `env` with identity and credential variables applied.
   */
  async prepareShellEnvironment(
    identityName: string,
    env: Readonly<Record<string, string>>,
    ctx: AuthenticateContext = {}
  ): Promise<Record<string, string>> {
    const info = await this.whoami(identityName, ctx);
    const credentials = info.credentials ?? (await info.rehydrate(this.store));
    return {
      ...env,
      ...this.getEnvironmentVariables(identityName),
      ...(credentials ? credentialEnvironment(credentials) : {}),
    };
  }

  // Logout

  /**
   * Removes cached credentials for every step of the identity's chain and
   * runs provider and identity cleanup. All steps run; failures are
   * reported together.
   */
  async logout(identityName: string): Promise<void> {
    const name = this.requireIdentityName(identityName);
    const chain = buildAuthenticationChain(name, this.config.identities);
    const tally = newTally();

    for (const step of chain) {
      await this.attempt(tally, `delete credentials for ${step}`, () => this.store.delete(step));
    }
    const provider = this.providers.get(chain[0] ?? '');
    if (provider) {
      await this.attempt(tally, `logout provider ${provider.name}`, () => provider.logout({}));
    }
    for (const step of chain.slice(1)) {
      const identity = this.identities.get(step);
      if (identity) {
        await this.attempt(tally, `logout identity ${step}`, () => identity.logout({}));
      }
    }

    this.throwIfFailed(tally, `identity "${name}"`);
  }

  /**
   * Logs out every identity rooted at the provider, then the provider.
   */
  async logoutProvider(providerName: string): Promise<void> {
    const provider = this.requireProvider(providerName);
    const tally = newTally();
    await this.logoutProviderSteps(provider, tally);
    this.throwIfFailed(tally, `provider "${providerName}"`);
  }

  /**
   * Logs out every provider and identity.
   */
  async logoutAll(): Promise<void> {
    const tally = newTally();
    for (const provider of this.providers.values()) {
      await this.logoutProviderSteps(provider, tally);
    }
    this.throwIfFailed(tally, 'all providers');
  }

  private async logoutProviderSteps(provider: Provider, tally: LogoutTally): Promise<void> {
    for (const identityName of this.listIdentities()) {
      let root: string;
      try {
        root = this.getProviderForIdentity(identityName);
      } catch (error) {
        tally.attempted++;
        tally.failures.push(error instanceof Error ? error : new Error(String(error)));
        continue;
      }
      if (root !== provider.name) {
        continue;
      }
      await this.attempt(tally, `delete credentials for ${identityName}`, () =>
        this.store.delete(identityName)
      );
      const identity = this.identities.get(identityName);
      if (identity) {
        await this.attempt(tally, `logout identity ${identityName}`, () => identity.logout({}));
      }
    }

    await this.attempt(tally, `delete credentials for ${provider.name}`, () =>
      this.store.delete(provider.name)
    );
    await this.attempt(tally, `logout provider ${provider.name}`, () => provider.logout({}));
  }

  private async attempt(tally: LogoutTally, step: string, action: () => Promise<void>): Promise<void> {
    tally.attempted++;
    try {
      await action();
    } catch (error) {
      this.logger.warn('Logout step failed', { step, reason: errorMessage(error) });
      tally.failures.push(new Error(`${step}: ${errorMessage(error)}`, { cause: error }));
    }
  }

  /**
   * PartialLogout when some steps succeeded, LogoutFailed when none did.
   */
  private throwIfFailed(tally: LogoutTally, target: string): void {
    const { attempted, failures } = tally;
    if (failures.length === 0) {
      return;
    }
    const partial = failures.length < attempted;
    const summary = failures.map((f) => f.message).join('; ');
    throw new AuthError(
      partial ? AuthErrorKind.PartialLogout : AuthErrorKind.LogoutFailed,
      partial
        ? `partial logout for ${target} (${failures.length} of ${attempted} steps failed): ${summary}`
        : `logout failed for ${target}: ${summary}`,
      { errors: failures, context: { attempted, failed: failures.length } }
    );
  }

  // Lookups

  private requireIdentityName(identityName: string): string {
    const name = resolveIdentityName(identityName, this.config.identities);
    if (!name) {
      throw new AuthError(AuthErrorKind.IdentityNotFound, `identity "${identityName}" not found`, {
        context: { identity: identityName },
      });
    }
    return name;
  }

  private requireProvider(providerName: string): Provider {
    const provider = this.providers.get(providerName);
    if (!provider) {
      throw new AuthError(AuthErrorKind.ProviderNotFound, `provider "${providerName}" not found`, {
        context: { provider: providerName },
      });
    }
    return provider;
  }
}

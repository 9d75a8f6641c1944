/**
 * Contracts between the auth manager, providers, identities and stores.
 * @module types/interfaces
 */

import type { HttpTransport } from '../core/transport.js';
import type { IdentityConfig, KeyringType, ProviderConfig } from '../config/index.js';
import type { Credentials } from '../credentials/index.js';
import type { StsClientFactory } from '../sts/index.js';
import type { WhoamiInfo } from './whoami.js';

/**
 * Result of validating credentials against their issuer.
 */
export interface ValidationInfo {
  principal: string;
  account?: string;
  expiration?: Date;
}

/**
 * Collaborators used when validating credentials remotely.
 */
export interface CredentialValidationContext {
  signal?: AbortSignal;
  transport?: HttpTransport;
  stsFactory?: StsClientFactory;
}

/**
 * Values a provider derives from the chain before authenticating.
 */
export interface ProviderHints {
  /** Role to assume with the provider's web identity token */
  roleArn?: string;
}

/**
 * Per-request authentication context.
 */
export interface AuthenticateContext {
  signal?: AbortSignal;
  /** When false, interactive flows must not start */
  allowPrompts?: boolean;
  hints?: ProviderHints;
}

/**
 * Read-only view of the chain being authenticated.
 */
export interface ChainView {
  /** `[provider, identity1, ..., identityN]` */
  getChain(): readonly string[];
  getIdentities(): Readonly<Record<string, IdentityConfig>>;
}

/**
 * An authentication protocol that yields base credentials.
 */
export interface Provider {
  readonly kind: string;
  readonly name: string;

  /**
   * Derives hints from the chain. Must not mutate the provider.
   */
  preAuthenticate(chain: ChainView): ProviderHints;

  authenticate(ctx: AuthenticateContext): Promise<Credentials>;

  /**
   * Checks configuration locally.
   */
  validate(): void;

  /**
   * Non-secret environment variables contributed by this provider.
   */
  environment(): Record<string, string>;

  /**
   * Removes provider-held state such as cached tokens.
   */
  logout(ctx: AuthenticateContext): Promise<void>;

  /**
   * Location of provider-managed files, for display.
   */
  getFilesDisplayPath(): string;
}

/**
 * A principal derived from prior credentials in the chain.
 */
export interface Identity {
  readonly kind: string;
  readonly name: string;

  authenticate(ctx: AuthenticateContext, baseCredentials: Credentials): Promise<Credentials>;
  validate(): void;
  environment(): Record<string, string>;
  logout(ctx: AuthenticateContext): Promise<void>;
}

/**
 * Persistence for credentials produced by chain steps.
 */
export interface CredentialStore {
  readonly type: KeyringType;

  store(alias: string, credentials: Credentials): Promise<void>;

  /**
   * Throws CredentialsNotFound when nothing is stored under the alias.
   */
  retrieve(alias: string): Promise<Credentials>;

  /**
   * Deleting a missing alias succeeds.
   */
  delete(alias: string): Promise<void>;

  list(): Promise<string[]>;

  /**
   * True when the alias is missing or its credentials have expired.
   */
  isExpired(alias: string): Promise<boolean>;
}

/**
 * Public surface of the auth manager.
 */
export interface AuthManagerApi extends ChainView {
  authenticate(identity: string, ctx?: AuthenticateContext): Promise<WhoamiInfo>;
  authenticateProvider(provider: string, ctx?: AuthenticateContext): Promise<WhoamiInfo>;
  getCachedCredentials(identity: string): Promise<WhoamiInfo>;
  whoami(identity: string, ctx?: AuthenticateContext): Promise<WhoamiInfo>;
  validate(): void;
  getProviders(): Readonly<Record<string, ProviderConfig>>;
  listIdentities(): string[];
  listProviders(): string[];
  getDefaultIdentity(): string | undefined;
  getProviderForIdentity(identity: string): string;
  getProviderKindForIdentity(identity: string): string;
  getFilesDisplayPath(provider: string): string;
  getEnvironmentVariables(identity: string): Record<string, string>;
  prepareShellEnvironment(
    identity: string,
    env: Readonly<Record<string, string>>,
    ctx?: AuthenticateContext
  ): Promise<Record<string, string>>;
  logout(identity: string): Promise<void>;
  logoutProvider(provider: string): Promise<void>;
  logoutAll(): Promise<void>;
}

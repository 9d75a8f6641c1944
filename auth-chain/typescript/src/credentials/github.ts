/**
 * GitHub App installation and user token credentials.
 * @module credentials/github
 */

import { SecretString } from '../core/secret.js';
import { createTransport, parseJsonObject } from '../core/transport.js';
import { DEFAULT_GITHUB_API_URL } from '../config/index.js';
import { AuthError, AuthErrorKind, httpFailure } from '../errors/index.js';
import type {
  CredentialValidationContext,
  ValidationInfo,
  WhoamiInfo,
} from '../types/index.js';
import { copyDate, isExpiredWithSkew, type ICredentials } from './common.js';

/** Media type for GitHub REST calls. */
export const GITHUB_ACCEPT = 'application/vnd.github+json';

/** GitHub REST API version header value. */
export const GITHUB_API_VERSION = '2022-11-28';

async function githubGet(
  ctx: CredentialValidationContext,
  url: string,
  token: SecretString,
  operation: string
): Promise<Record<string, unknown>> {
  const transport = ctx.transport ?? createTransport();
  const response = await transport.send({
    method: 'GET',
    url,
    headers: {
      authorization: `Bearer ${token.expose()}`,
      accept: GITHUB_ACCEPT,
      'x-github-api-version': GITHUB_API_VERSION,
    },
    signal: ctx.signal,
  });

  if (response.status !== 200) {
    throw httpFailure(operation, url, response.status, response.body);
  }

  const body = parseJsonObject(response.body);
  if (!body) {
    throw new AuthError(
      AuthErrorKind.AuthenticationFailed,
      `${operation} failed: ${url} returned a non-JSON body`
    );
  }
  return body;
}

export interface GitHubAppCredentialsInit {
  token: string;
  appId: string;
  installationId: string;
  expiresAt?: Date;
  apiUrl?: string;
}

/**
 * Installation access token minted for a GitHub App.
 */
export class GitHubAppCredentials implements ICredentials {
  readonly type = 'github-app';
  readonly token: SecretString;
  readonly appId: string;
  readonly installationId: string;
  readonly expiresAt?: Date;
  readonly apiUrl: string;

  constructor(init: GitHubAppCredentialsInit) {
    this.token = new SecretString(init.token);
    this.appId = init.appId;
    this.installationId = init.installationId;
    this.expiresAt = copyDate(init.expiresAt);
    this.apiUrl = init.apiUrl ?? DEFAULT_GITHUB_API_URL;
    Object.freeze(this);
  }

  get principal(): string {
    return `app/${this.appId}`;
  }

  isExpired(now?: Date): boolean {
    return isExpiredWithSkew(this.expiresAt, now);
  }

  getExpiration(): Date | undefined {
    return copyDate(this.expiresAt);
  }

  buildWhoamiInfo(info: WhoamiInfo | undefined): void {
    if (!info) {
      return;
    }
    info.principal = this.principal;
    info.account = this.installationId;
    if (this.expiresAt) {
      info.expiration = copyDate(this.expiresAt);
    }
  }

  /**
   * Lists one installation repository, which only succeeds with a live token.
   */
  async validate(ctx: CredentialValidationContext = {}): Promise<ValidationInfo> {
    await githubGet(
      ctx,
      `${this.apiUrl}/installation/repositories?per_page=1`,
      this.token,
      'GitHub App token validation'
    );
    return {
      principal: this.principal,
      account: this.installationId,
      expiration: copyDate(this.expiresAt),
    };
  }
}

export interface GitHubUserCredentialsInit {
  token: string;
  /** Name of the provider that produced the token */
  provider: string;
  expiresAt?: Date;
  apiUrl?: string;
  login?: string;
}

/**
 * OAuth user token obtained through the device flow.
 */
export class GitHubUserCredentials implements ICredentials {
  readonly type = 'github-user';
  readonly token: SecretString;
  readonly provider: string;
  readonly expiresAt?: Date;
  readonly apiUrl: string;
  readonly login?: string;

  constructor(init: GitHubUserCredentialsInit) {
    this.token = new SecretString(init.token);
    this.provider = init.provider;
    this.expiresAt = copyDate(init.expiresAt);
    this.apiUrl = init.apiUrl ?? DEFAULT_GITHUB_API_URL;
    this.login = init.login;
    Object.freeze(this);
  }

  isExpired(now?: Date): boolean {
    return isExpiredWithSkew(this.expiresAt, now);
  }

  getExpiration(): Date | undefined {
    return copyDate(this.expiresAt);
  }

  buildWhoamiInfo(info: WhoamiInfo | undefined): void {
    if (!info) {
      return;
    }
    if (this.login) {
      info.principal = this.login;
    }
    if (this.expiresAt) {
      info.expiration = copyDate(this.expiresAt);
    }
  }

  /**
   * Fetches the authenticated user.
   */
  async validate(ctx: CredentialValidationContext = {}): Promise<ValidationInfo> {
    const user = await githubGet(
      ctx,
      `${this.apiUrl}/user`,
      this.token,
      'GitHub user token validation'
    );
    const login = user['login'];
    if (typeof login !== 'string' || login === '') {
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        'GitHub user token validation failed: response has no login'
      );
    }
    return { principal: login, expiration: copyDate(this.expiresAt) };
  }
}

/**
 * GitHub Actions OIDC provider.
 *
 * Exchanges the workflow's OIDC token for AWS credentials with
 * AssumeRoleWithWebIdentity. The role comes from the next identity in the
 * chain and reaches `authenticate` through `ctx.hints`.
 *
 * @module providers/github/oidc
 */

import {
  DEFAULT_OIDC_SESSION_NAME,
  ENV_OIDC_REQUEST_TOKEN,
  ENV_OIDC_REQUEST_URL,
  isGitHubActions,
  PROVIDER_KINDS,
  readAuthEnvironment,
  resolveSessionDuration,
  SpecReader,
  type AuthEnvironment,
  type ProviderConfig,
} from '../../config/index.js';
import { createTransport, parseJsonObject, type HttpTransport } from '../../core/transport.js';
import { throwIfAborted } from '../../core/sleep.js';
import { AwsCredentials, type Credentials } from '../../credentials/index.js';
import { AuthError, AuthErrorKind, httpFailure, missingField } from '../../errors/index.js';
import { createStsClient, type StsClientFactory } from '../../sts/index.js';
import { noOpLogger, type Logger } from '../../telemetry/index.js';
import type {
  AuthenticateContext,
  ChainView,
  Provider,
  ProviderHints,
} from '../../types/index.js';
import { assertProviderIdentity } from '../common.js';
import type { AuthDependencies } from '../types.js';

export class GitHubOidcProvider implements Provider {
  readonly kind = PROVIDER_KINDS.GITHUB_OIDC;
  readonly name: string;
  readonly region: string;
  readonly audience?: string;
  readonly roleSessionName: string;
  /** Requested STS session length in seconds */
  readonly sessionDuration: number;
  private readonly environmentSnapshot: AuthEnvironment;
  private readonly transport: HttpTransport;
  private readonly stsFactory: StsClientFactory;
  private readonly logger: Logger;

  constructor(name: string, config: ProviderConfig, deps: AuthDependencies = {}) {
    assertProviderIdentity(name, config, PROVIDER_KINDS.GITHUB_OIDC);
    if (!config.region) {
      throw missingField(AuthErrorKind.InvalidProviderConfig, `provider "${name}"`, 'region');
    }

    this.name = name;
    this.region = config.region;
    this.logger = (deps.logger ?? noOpLogger).child({ provider: name, kind: this.kind });

    const spec = new SpecReader(
      config.spec,
      `provider "${name}"`,
      AuthErrorKind.InvalidProviderConfig
    );
    this.audience = spec.string('audience');
    this.roleSessionName = spec.string('role_session_name') ?? DEFAULT_OIDC_SESSION_NAME;
    this.sessionDuration = resolveSessionDuration(config.session?.duration, this.logger);

    this.environmentSnapshot = deps.environment ?? readAuthEnvironment();
    this.transport = deps.transport ?? createTransport();
    this.stsFactory = deps.stsFactory ?? createStsClient;
  }

  /**
   * Reads the role to assume from the identity right after the provider.
   */
  preAuthenticate(chain: ChainView): ProviderHints {
    const steps = chain.getChain();
    const next = steps[1];
    if (next === undefined) {
      return {};
    }

    const identity = chain.getIdentities()[next];
    if (!identity) {
      throw new AuthError(AuthErrorKind.InvalidAuthConfig, `identity "${next}" not found`, {
        context: { provider: this.name, identity: next },
      });
    }

    const principal = new SpecReader(
      identity.principal,
      `identity "${next}"`,
      AuthErrorKind.InvalidIdentityConfig
    );
    const roleArn = principal.string('assume_role');
    if (!roleArn) {
      throw new AuthError(
        AuthErrorKind.InvalidAuthConfig,
        `assume_role is required for identity "${next}"`,
        { context: { provider: this.name, identity: next, field: 'assume_role' } }
      );
    }
    return { roleArn };
  }

  async authenticate(ctx: AuthenticateContext = {}): Promise<Credentials> {
    if (!isGitHubActions(this.environmentSnapshot)) {
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        'GitHub OIDC authentication is only available in GitHub Actions environment',
        { context: { provider: this.name } }
      );
    }

    const roleArn = ctx.hints?.roleArn;
    if (!roleArn) {
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        `no role to assume for web identity; provider "${this.name}" must be followed by an identity with assume_role`,
        { context: { provider: this.name } }
      );
    }

    if (!this.audience) {
      throw missingField(AuthErrorKind.InvalidProviderConfig, `provider "${this.name}"`, 'audience');
    }

    throwIfAborted(ctx.signal, 'GitHub OIDC authentication');
    const token = await this.resolveOidcToken(this.audience, ctx.signal);

    this.logger.debug('Exchanging OIDC token for AWS credentials', {
      roleArn,
      durationSeconds: this.sessionDuration,
    });
    const sts = this.stsFactory({ region: this.region });
    const result = await sts.assumeRoleWithWebIdentity(
      {
        roleArn,
        webIdentityToken: token,
        roleSessionName: this.roleSessionName,
        durationSeconds: this.sessionDuration,
      },
      ctx.signal
    );

    this.logger.info('Assumed role with web identity', { roleArn });
    return new AwsCredentials({
      accessKeyId: result.accessKeyId,
      secretAccessKey: result.secretAccessKey,
      sessionToken: result.sessionToken,
      region: this.region,
      expiration: result.expiration,
      principalArn: result.assumedRoleArn,
    });
  }

  /**
   * Uses the pre-supplied token when present, otherwise asks the Actions
   * OIDC endpoint for one.
   */
  private async resolveOidcToken(audience: string, signal?: AbortSignal): Promise<string> {
    const env = this.environmentSnapshot;
    if (env.oidcToken) {
      return env.oidcToken;
    }
    if (!env.oidcRequestToken) {
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        `${ENV_OIDC_REQUEST_TOKEN} is not set; grant the workflow "id-token: write" permission`,
        { context: { provider: this.name } }
      );
    }
    if (!env.oidcRequestUrl) {
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        `${ENV_OIDC_REQUEST_URL} is not set; grant the workflow "id-token: write" permission`,
        { context: { provider: this.name } }
      );
    }

    let url: URL;
    try {
      url = new URL(env.oidcRequestUrl);
    } catch (error) {
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        `${ENV_OIDC_REQUEST_URL} is not a valid URL`,
        { cause: error, context: { provider: this.name } }
      );
    }
    url.searchParams.set('audience', audience);
    const endpoint = url.toString();

    const response = await this.transport.send({
      method: 'GET',
      url: endpoint,
      headers: {
        authorization: `bearer ${env.oidcRequestToken}`,
        accept: 'application/json',
      },
      signal,
    });

    if (response.status !== 200) {
      throw httpFailure('GitHub OIDC token request', env.oidcRequestUrl, response.status, response.body);
    }

    const value = parseJsonObject(response.body)?.['value'];
    if (typeof value !== 'string' || value === '') {
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        'GitHub OIDC token response has no value',
        { context: { provider: this.name, endpoint: env.oidcRequestUrl } }
      );
    }
    return value;
  }

  /**
   * Requires `audience` and `region`.
   */
  validate(): void {
    if (!this.audience) {
      throw missingField(AuthErrorKind.InvalidProviderConfig, `provider "${this.name}"`, 'audience');
    }
    if (!this.region) {
      throw missingField(AuthErrorKind.InvalidProviderConfig, `provider "${this.name}"`, 'region');
    }
  }

  environment(): Record<string, string> {
    return {
      AWS_REGION: this.region,
      AWS_DEFAULT_REGION: this.region,
    };
  }

  async logout(): Promise<void> {
    // Nothing is cached outside the credential store.
  }

  getFilesDisplayPath(): string {
    return '';
  }
}

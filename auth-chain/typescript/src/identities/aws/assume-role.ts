/**
 * AWS assume-role identity.
 *
 * Assumes `principal.assume_role` from the previous chain step: AssumeRole
 * for AWS base credentials, AssumeRoleWithWebIdentity for OIDC ones.
 *
 * @module identities/aws/assume-role
 */

import {
  IDENTITY_KINDS,
  MAX_ROLE_SESSION_NAME_LENGTH,
  parseDuration,
  SpecReader,
  type IdentityConfig,
} from '../../config/index.js';
import { throwIfAborted } from '../../core/sleep.js';
import {
  AwsCredentials,
  DEFAULT_AWS_REGION,
  type Credentials,
} from '../../credentials/index.js';
import { AuthError, AuthErrorKind, missingField } from '../../errors/index.js';
import type { AuthDependencies } from '../../providers/types.js';
import { createStsClient, type StsClientFactory, type StsTemporaryCredentials } from '../../sts/index.js';
import { noOpLogger, type Logger } from '../../telemetry/index.js';
import type { AuthenticateContext, Identity } from '../../types/index.js';

const FALLBACK_SESSION_NAME = 'auth-chain-session';

/**
 * Replaces characters STS rejects with `-`, truncates to 64 characters and
 * trims trailing dashes.
 */
export function sanitizeRoleSessionName(raw: string): string {
  const name = raw
    .replace(/[^A-Za-z0-9+=,.@-]/g, '-')
    .slice(0, MAX_ROLE_SESSION_NAME_LENGTH)
    .replace(/-+$/, '');
  return name === '' ? FALLBACK_SESSION_NAME : name;
}

export class AwsAssumeRoleIdentity implements Identity {
  readonly kind = IDENTITY_KINDS.AWS_ASSUME_ROLE;
  readonly name: string;
  readonly roleArn?: string;
  readonly region?: string;
  readonly externalId?: string;
  /** Requested session length in seconds, when configured */
  readonly durationSeconds?: number;
  private readonly env: Record<string, string>;
  private readonly stsFactory: StsClientFactory;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(name: string, config: IdentityConfig, deps: AuthDependencies = {}) {
    if (name.trim() === '') {
      throw new AuthError(AuthErrorKind.InvalidIdentityConfig, 'identity name is required', {
        context: { field: 'name' },
      });
    }
    if (config.kind !== IDENTITY_KINDS.AWS_ASSUME_ROLE) {
      throw new AuthError(
        AuthErrorKind.InvalidIdentityKind,
        `identity "${name}" has kind "${config.kind}", expected "${IDENTITY_KINDS.AWS_ASSUME_ROLE}"`,
        { context: { identity: name, kind: config.kind } }
      );
    }

    this.name = name;
    this.logger = (deps.logger ?? noOpLogger).child({ identity: name, kind: this.kind });

    const principal = new SpecReader(
      config.principal,
      `identity "${name}"`,
      AuthErrorKind.InvalidIdentityConfig
    );
    this.roleArn = principal.string('assume_role');
    this.region = principal.string('region');
    this.externalId = principal.string('external_id');

    const duration = principal.string('duration');
    if (duration !== undefined) {
      const ms = parseDuration(duration);
      if (ms === undefined || ms <= 0) {
        this.logger.warn('Invalid duration for assume role, using the role default', { duration });
      } else {
        this.durationSeconds = Math.floor(ms / 1000);
      }
    }

    this.env = { ...config.env };
    this.stsFactory = deps.stsFactory ?? createStsClient;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Requires `principal.assume_role`.
   */
  validate(): void {
    this.requireRoleArn();
  }

  private requireRoleArn(): string {
    if (!this.roleArn) {
      throw missingField(AuthErrorKind.InvalidIdentityConfig, `identity "${this.name}"`, 'assume_role');
    }
    return this.roleArn;
  }

  async authenticate(ctx: AuthenticateContext, baseCredentials: Credentials): Promise<Credentials> {
    const roleArn = this.requireRoleArn();
    throwIfAborted(ctx.signal, `assume role for identity "${this.name}"`);

    const roleSessionName = sanitizeRoleSessionName(
      `auth-chain-${this.name}-${Math.floor(this.clock().getTime() / 1000)}`
    );

    let result: StsTemporaryCredentials;
    let region: string | undefined;
    switch (baseCredentials.type) {
      case 'oidc': {
        region = this.region;
        const sts = this.stsFactory({ region: region ?? DEFAULT_AWS_REGION });
        result = await sts.assumeRoleWithWebIdentity(
          {
            roleArn,
            webIdentityToken: baseCredentials.token.expose(),
            roleSessionName,
            durationSeconds: this.durationSeconds,
          },
          ctx.signal
        );
        break;
      }
      case 'aws': {
        region = this.region ?? baseCredentials.region;
        const sts = this.stsFactory({
          region: region ?? DEFAULT_AWS_REGION,
          credentials: {
            accessKeyId: baseCredentials.accessKeyId,
            secretAccessKey: baseCredentials.secretAccessKey.expose(),
            sessionToken: baseCredentials.sessionToken?.expose(),
          },
        });
        result = await sts.assumeRole(
          {
            roleArn,
            roleSessionName,
            durationSeconds: this.durationSeconds,
            externalId: this.externalId,
          },
          ctx.signal
        );
        break;
      }
      default:
        throw new AuthError(
          AuthErrorKind.InvalidCredentials,
          `identity "${this.name}" needs aws or oidc base credentials, got ${baseCredentials.type}`,
          { context: { identity: this.name, type: baseCredentials.type } }
        );
    }

    this.logger.info('Assumed role', { roleArn });
    return new AwsCredentials({
      accessKeyId: result.accessKeyId,
      secretAccessKey: result.secretAccessKey,
      sessionToken: result.sessionToken,
      region,
      expiration: result.expiration,
      principalArn: result.assumedRoleArn,
    });
  }

  environment(): Record<string, string> {
    const env: Record<string, string> = {};
    if (this.region) {
      env['AWS_REGION'] = this.region;
      env['AWS_DEFAULT_REGION'] = this.region;
    }
    return { ...env, ...this.env };
  }

  async logout(): Promise<void> {
    // Session credentials live only in the credential store.
  }
}

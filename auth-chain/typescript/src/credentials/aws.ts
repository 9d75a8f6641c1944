/**
 * AWS temporary credentials.
 * @module credentials/aws
 */

import { SecretString } from '../core/secret.js';
import { createStsClient } from '../sts/index.js';
import type {
  CredentialValidationContext,
  ValidationInfo,
  WhoamiInfo,
} from '../types/index.js';
import { copyDate, isExpiredAt, type ICredentials } from './common.js';

/** Region used for STS calls when the credentials carry none. */
export const DEFAULT_AWS_REGION = 'us-east-1';

/**
 * Fields accepted by {@link AwsCredentials}.
 */
export interface AwsCredentialsInit {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  region?: string;
  expiration?: Date;
  /** ARN of the principal, e.g. an assumed-role session */
  principalArn?: string;
}

/**
 * Extracts the account ID from an ARN.
 */
export function accountFromArn(arn: string | undefined): string | undefined {
  const account = arn?.split(':')[4];
  return account ? account : undefined;
}

export class AwsCredentials implements ICredentials {
  readonly type = 'aws';
  readonly accessKeyId: string;
  readonly secretAccessKey: SecretString;
  readonly sessionToken?: SecretString;
  readonly region?: string;
  readonly expiration?: Date;
  readonly principalArn?: string;

  constructor(init: AwsCredentialsInit) {
    this.accessKeyId = init.accessKeyId;
    this.secretAccessKey = new SecretString(init.secretAccessKey);
    this.sessionToken = init.sessionToken ? new SecretString(init.sessionToken) : undefined;
    this.region = init.region;
    this.expiration = copyDate(init.expiration);
    this.principalArn = init.principalArn;
    Object.freeze(this);
  }

  isExpired(now?: Date): boolean {
    return isExpiredAt(this.expiration, now);
  }

  getExpiration(): Date | undefined {
    return copyDate(this.expiration);
  }

  buildWhoamiInfo(info: WhoamiInfo | undefined): void {
    if (!info) {
      return;
    }
    if (this.principalArn) {
      info.principal = this.principalArn;
      info.account = accountFromArn(this.principalArn);
    }
    if (this.region) {
      info.region = this.region;
    }
    if (this.expiration) {
      info.expiration = copyDate(this.expiration);
    }
  }

  /**
   * Calls STS GetCallerIdentity with these credentials.
   */
  async validate(ctx: CredentialValidationContext = {}): Promise<ValidationInfo> {
    const factory = ctx.stsFactory ?? createStsClient;
    const sts = factory({
      region: this.region ?? DEFAULT_AWS_REGION,
      credentials: {
        accessKeyId: this.accessKeyId,
        secretAccessKey: this.secretAccessKey.expose(),
        sessionToken: this.sessionToken?.expose(),
      },
    });

    const identity = await sts.getCallerIdentity(ctx.signal);
    return {
      principal: identity.arn,
      account: identity.account,
      expiration: copyDate(this.expiration),
    };
  }
}

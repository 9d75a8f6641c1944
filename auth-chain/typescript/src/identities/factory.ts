/**
 * Identity construction by kind.
 * @module identities/factory
 */

import { IDENTITY_KINDS, type IdentityConfig } from '../config/index.js';
import { AuthError, AuthErrorKind } from '../errors/index.js';
import type { AuthDependencies } from '../providers/types.js';
import type { Identity } from '../types/index.js';
import { AwsAssumeRoleIdentity } from './aws/assume-role.js';

/**
 * Creates the identity implementation for `config.kind`.
 */
export function createIdentity(
  name: string,
  config: IdentityConfig,
  deps: AuthDependencies = {}
): Identity {
  switch (config.kind) {
    case IDENTITY_KINDS.AWS_ASSUME_ROLE:
      return new AwsAssumeRoleIdentity(name, config, deps);
    default:
      throw new AuthError(
        AuthErrorKind.InvalidIdentityKind,
        `unsupported identity kind "${config.kind}" for identity "${name}"`,
        { context: { identity: name, kind: config.kind } }
      );
  }
}

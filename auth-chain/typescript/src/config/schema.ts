/**
 * Configuration schemas.
 * @module config/schema
 */

import { z } from 'zod';
import { AuthError, AuthErrorKind } from '../errors/index.js';

/**
 * Provider session settings.
 */
const sessionSchema = z.object({
  duration: z.string().optional(),
});

/**
 * Provider configuration.
 */
export const providerConfigSchema = z.object({
  kind: z.string().min(1),
  region: z.string().optional(),
  spec: z.record(z.unknown()).optional(),
  session: sessionSchema.optional(),
  default: z.boolean().optional(),
});

/**
 * Link from an identity to whatever it is derived from.
 */
const viaSchema = z
  .object({
    provider: z.string().min(1).optional(),
    identity: z.string().min(1).optional(),
  })
  .refine((via) => !(via.provider && via.identity), {
    message: 'via must name either a provider or an identity, not both',
  });

/**
 * Identity configuration.
 */
export const identityConfigSchema = z.object({
  kind: z.string().min(1),
  default: z.boolean().optional(),
  via: viaSchema.optional(),
  principal: z.record(z.unknown()).optional(),
  env: z.record(z.string()).optional(),
});

/** Supported credential store types. */
export const KEYRING_TYPES = ['system-keyring', 'file', 'memory', 'noop'] as const;

/**
 * Credential store selection.
 */
export const keyringConfigSchema = z.object({
  type: z.enum(KEYRING_TYPES),
  spec: z.record(z.unknown()).optional(),
});

/**
 * Top-level auth configuration.
 */
export const authConfigSchema = z.object({
  providers: z.record(providerConfigSchema).default({}),
  identities: z.record(identityConfigSchema).default({}),
  keyring: keyringConfigSchema.optional(),
  logs: z
    .object({
      level: z.string().optional(),
    })
    .optional(),
});

export type ProviderConfig = z.infer<typeof providerConfigSchema>;
export type IdentityConfig = z.infer<typeof identityConfigSchema>;
export type KeyringType = (typeof KEYRING_TYPES)[number];
export type KeyringConfig = z.infer<typeof keyringConfigSchema>;
export type AuthConfig = z.infer<typeof authConfigSchema>;
/** Input accepted by {@link parseAuthConfig} before defaults are applied. */
export type AuthConfigInput = z.input<typeof authConfigSchema>;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join(', ');
}

/**
 * Validates and freezes an auth configuration.
 */
export function parseAuthConfig(input: unknown): AuthConfig {
  const result = authConfigSchema.safeParse(input);
  if (!result.success) {
    throw new AuthError(
      AuthErrorKind.InvalidAuthConfig,
      `Invalid auth configuration: ${formatIssues(result.error)}`,
      { cause: result.error }
    );
  }
  return deepFreeze(result.data);
}


/**
 * Typed access to free-form `spec` and `principal` maps.
 * @module config/spec-reader
 */

import { AuthError, AuthErrorKind, missingField } from '../errors/index.js';

type FieldErrorKind = AuthErrorKind.InvalidProviderConfig | AuthErrorKind.InvalidIdentityConfig;

/**
 * Reads typed fields out of a configuration map, raising configuration
 * errors that name the offending field.
 */
export class SpecReader {
  private readonly fields: Readonly<Record<string, unknown>>;

  constructor(
    fields: Readonly<Record<string, unknown>> | undefined,
    private readonly owner: string,
    private readonly errorKind: FieldErrorKind
  ) {
    this.fields = fields ?? {};
  }

  /**
   * Reads a string field. Numbers are accepted and stringified, since IDs
   * are often written unquoted.
   */
  string(key: string): string | undefined {
    const value = this.fields[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value === 'string') {
      return value === '' ? undefined : value;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
    throw this.invalid(key, 'must be a string');
  }

  /**
   * Reads a required string field.
   */
  requiredString(key: string): string {
    const value = this.string(key);
    if (value === undefined) {
      throw missingField(this.errorKind, this.owner, key);
    }
    return value;
  }

  /**
   * Reads a list of strings. A single string is split on whitespace and commas.
   */
  stringList(key: string): string[] {
    const value = this.fields[key];
    if (value === undefined || value === null) {
      return [];
    }
    if (typeof value === 'string') {
      return value.split(/[\s,]+/).filter((item) => item !== '');
    }
    if (Array.isArray(value)) {
      return value.map((item, index) => {
        if (typeof item !== 'string') {
          throw this.invalid(`${key}[${index}]`, 'must be a string');
        }
        return item;
      });
    }
    throw this.invalid(key, 'must be a list of strings');
  }

  /**
   * Reads a map of string values.
   */
  stringMap(key: string): Record<string, string> | undefined {
    const value = this.fields[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'object' || Array.isArray(value)) {
      throw this.invalid(key, 'must be a map');
    }

    const result: Record<string, string> = {};
    for (const [entryKey, entryValue] of Object.entries(value)) {
      if (typeof entryValue !== 'string') {
        throw this.invalid(`${key}.${entryKey}`, 'must be a string');
      }
      result[entryKey] = entryValue;
    }
    return result;
  }

  private invalid(key: string, problem: string): AuthError {
    return new AuthError(this.errorKind, `${key} ${problem} for ${this.owner}`, {
      context: { owner: this.owner, field: key },
    });
  }
}

/**
 * Duration strings such as `90s`, `15m` or `1h30m`.
 * @module config/duration
 */

import type { Logger } from '../telemetry/index.js';
import {
  DEFAULT_SESSION_DURATION_SECONDS,
  DEFAULT_TOKEN_LIFETIME_MS,
  MAX_SESSION_DURATION_SECONDS,
  MAX_TOKEN_LIFETIME_MS,
  MIN_SESSION_DURATION_SECONDS,
  MIN_TOKEN_LIFETIME_MS,
} from './defaults.js';

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  'μs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const DURATION_PATTERN = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:ns|us|µs|μs|ms|s|m|h))+$/;
const COMPONENT_PATTERN = /(\d+\.?\d*|\.\d+)(ns|us|µs|μs|ms|s|m|h)/g;

/**
 * Parses a duration string into milliseconds.
 *
 * Returns undefined when the string is not a valid duration.
 */
export function parseDuration(value: string): number | undefined {
  const trimmed = value.trim();
  if (trimmed === '0' || trimmed === '+0' || trimmed === '-0') {
    return 0;
  }
  if (!DURATION_PATTERN.test(trimmed)) {
    return undefined;
  }

  const sign = trimmed.startsWith('-') ? -1 : 1;
  let total = 0;
  for (const match of trimmed.matchAll(COMPONENT_PATTERN)) {
    const amount = Number(match[1]);
    const unit = UNIT_MS[match[2] ?? ''];
    if (!Number.isFinite(amount) || unit === undefined) {
      return undefined;
    }
    total += amount * unit;
  }
  return sign * total;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Resolves the web identity session duration in whole seconds.
 *
 * Absent or invalid values fall back to one hour; the result is clamped to
 * [15m, 12h].
 */
export function resolveSessionDuration(value: string | undefined, logger?: Logger): number {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_SESSION_DURATION_SECONDS;
  }

  const ms = parseDuration(value);
  if (ms === undefined) {
    logger?.warn('Invalid session duration, using default', {
      duration: value,
      defaultSeconds: DEFAULT_SESSION_DURATION_SECONDS,
    });
    return DEFAULT_SESSION_DURATION_SECONDS;
  }

  return clamp(
    Math.floor(ms / 1000),
    MIN_SESSION_DURATION_SECONDS,
    MAX_SESSION_DURATION_SECONDS
  );
}

/**
 * Resolves the GitHub user token lifetime in milliseconds, clamped to [1h, 24h].
 */
export function resolveTokenLifetime(value: string | undefined, logger?: Logger): number {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_TOKEN_LIFETIME_MS;
  }

  const ms = parseDuration(value);
  if (ms === undefined) {
    logger?.warn('Invalid token lifetime, using default', { tokenLifetime: value });
    return DEFAULT_TOKEN_LIFETIME_MS;
  }

  return clamp(ms, MIN_TOKEN_LIFETIME_MS, MAX_TOKEN_LIFETIME_MS);
}

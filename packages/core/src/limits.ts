/**
 * Process-wide admission limits.
 */

import { ConfigError } from './errors.js';
import type { Limits } from './types.js';

export const DEFAULT_LIMITS: Limits = Object.freeze({
  rpmLimit: 60,
  tpmLimit: 10_000,
  windowSeconds: 60,
});

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Validate and freeze a set of limits. Missing fields fall back to
 * DEFAULT_LIMITS.
 */
export function createLimits(overrides: Partial<Limits> = {}): Limits {
  const limits = { ...DEFAULT_LIMITS, ...overrides };
  assertPositiveInteger('rpmLimit', limits.rpmLimit);
  assertPositiveInteger('tpmLimit', limits.tpmLimit);
  assertPositiveInteger('windowSeconds', limits.windowSeconds);
  return Object.freeze(limits);
}

/** Parse a decimal integer env value; undefined or blank yields the fallback */
export function parseIntegerEnv(
  env: Record<string, string | undefined>,
  name: string,
  fallback: number
): number {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

/**
 * Read RPM_LIMIT, TPM_LIMIT and WINDOW_SECONDS.
 */
export function loadLimitsFromEnv(env: Record<string, string | undefined> = process.env): Limits {
  return createLimits({
    rpmLimit: parseIntegerEnv(env, 'RPM_LIMIT', DEFAULT_LIMITS.rpmLimit),
    tpmLimit: parseIntegerEnv(env, 'TPM_LIMIT', DEFAULT_LIMITS.tpmLimit),
    windowSeconds: parseIntegerEnv(env, 'WINDOW_SECONDS', DEFAULT_LIMITS.windowSeconds),
  });
}

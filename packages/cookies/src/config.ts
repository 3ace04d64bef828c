/**
 * Environment-driven configuration
 *
 * - COOKIE_SECRET (required): master secret for key derivation
 * - COOKIE_KDF_ITERATIONS: PBKDF2 work factor (default 65536)
 * - SESSION_COOKIE_NAME: default "_session"
 * - SESSION_COOKIE_DOMAIN: Domain for non-loopback hosts (default host-only)
 * - SESSION_MAX_AGE: seconds (default 7 days)
 * - SESSION_SAME_SITE: strict | lax | none (default lax)
 */

import { ConfigError, createLogger, DEFAULT_KDF_ITERATIONS } from '@cookie-vault/crypto';
import type { SameSite } from './http.js';

const log = createLogger('config');

const WEEK_IN_SECONDS = 7 * 24 * 60 * 60;
const RECOMMENDED_SECRET_LENGTH = 32;
const SAME_SITE_VALUES: readonly SameSite[] = ['strict', 'lax', 'none'];

export interface CookieVaultConfig {
  secret: string;
  iterations: number;
  cookieName: string;
  cookieDomain?: string;
  maxAge: number;
  sameSite: SameSite;
}

export type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function isSameSite(value: string): value is SameSite {
  return SAME_SITE_VALUES.some((candidate) => candidate === value);
}

function readSameSite(env: Env): SameSite {
  const raw = (env.SESSION_SAME_SITE || 'lax').toLowerCase();
  if (!isSameSite(raw)) {
    throw new ConfigError(`SESSION_SAME_SITE must be one of ${SAME_SITE_VALUES.join(', ')}, got "${raw}"`);
  }
  return raw;
}

export function loadConfig(env: Env = process.env): CookieVaultConfig {
  const secret = env.COOKIE_SECRET;
  if (!secret) {
    throw new ConfigError('Missing required environment variable: COOKIE_SECRET');
  }
  if (secret.length < RECOMMENDED_SECRET_LENGTH) {
    log.warn(
      { length: secret.length, recommended: RECOMMENDED_SECRET_LENGTH },
      'COOKIE_SECRET is shorter than recommended'
    );
  }

  const cookieName = env.SESSION_COOKIE_NAME || '_session';
  if (!/^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/.test(cookieName)) {
    throw new ConfigError(`SESSION_COOKIE_NAME is not a valid cookie name: "${cookieName}"`);
  }

  return {
    secret,
    iterations: readInteger(env, 'COOKIE_KDF_ITERATIONS', DEFAULT_KDF_ITERATIONS),
    cookieName,
    cookieDomain: env.SESSION_COOKIE_DOMAIN || undefined,
    maxAge: readInteger(env, 'SESSION_MAX_AGE', WEEK_IN_SECONDS),
    sameSite: readSameSite(env),
  };
}

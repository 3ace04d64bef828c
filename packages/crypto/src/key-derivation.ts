/**
 * Purpose-separated key derivation from one master secret
 *
 * PBKDF2-HMAC-SHA256(password = secret, salt = purpose label, c = iterations).
 * A production iteration count makes each derivation take tens of
 * milliseconds, so keys are derived once per process and cached.
 */

import { ConfigError } from './errors.js';
import { createLogger, redactSecret } from './logger.js';
import { pbkdf2SHA256, sha256Hex } from './primitives.js';

const log = createLogger('kdf');

export type MasterSecret = string | Uint8Array;

export type DeriveFn = (
  secret: Uint8Array,
  label: string,
  iterations: number,
  length: number
) => Promise<Uint8Array>;

export interface KeyGeneratorOptions {
  secret: MasterSecret;
  iterations: number;
  /** Shared cache; defaults to the process-wide {@link defaultKeyCache}. */
  cache?: KeyCache;
  /** Derivation function; tests swap this to count calls. */
  derive?: DeriveFn;
}

/**
 * Single-flight cache of derived keys.
 *
 * Entries hold the derivation promise, so callers that arrive while the
 * first derivation is running wait on it instead of starting their own.
 */
export class KeyCache {
  private entries = new Map<string, Promise<Uint8Array>>();

  getOrDerive(cacheKey: string, derive: () => Promise<Uint8Array>): Promise<Uint8Array> {
    const existing = this.entries.get(cacheKey);
    if (existing) return existing;

    const pending = derive().catch((error: unknown) => {
      // Let the next caller retry
      this.entries.delete(cacheKey);
      throw error;
    });
    this.entries.set(cacheKey, pending);
    return pending;
  }

  get size(): number {
    return this.entries.size;
  }
}

export const defaultKeyCache = new KeyCache();

function toBytes(secret: MasterSecret): Uint8Array {
  return typeof secret === 'string' ? new TextEncoder().encode(secret) : new Uint8Array(secret);
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
}

export class KeyGenerator {
  private readonly secret: Uint8Array;
  private readonly secretId: string;
  readonly iterations: number;
  private readonly cache: KeyCache;
  private readonly derive: DeriveFn;

  constructor(options: KeyGeneratorOptions) {
    const secret = toBytes(options.secret);
    if (secret.length === 0) {
      throw new ConfigError('Master secret must not be empty');
    }
    assertPositiveInteger('KDF iterations', options.iterations);

    this.secret = secret;
    // Cache keys carry a digest, never the secret itself
    this.secretId = sha256Hex(secret);
    this.iterations = options.iterations;
    this.cache = options.cache ?? defaultKeyCache;
    this.derive = options.derive ?? pbkdf2SHA256;

    log.debug(
      { secret: redactSecret(secret), iterations: this.iterations },
      'Key generator configured'
    );
  }

  /**
   * Derive a key for one purpose. Deterministic; not cached.
   */
  generate(label: string, length: number): Promise<Uint8Array> {
    if (label.length === 0) {
      throw new ConfigError('Key purpose label must not be empty');
    }
    assertPositiveInteger('Derived key length', length);

    const started = performance.now();
    return this.derive(this.secret, label, this.iterations, length).then((key) => {
      log.debug(
        { label, length, iterations: this.iterations, ms: Math.round(performance.now() - started) },
        'Derived key'
      );
      return key;
    });
  }

  /**
   * Same result as {@link generate}, computed at most once per
   * (secret, iterations, label, length) for the lifetime of the cache.
   */
  cacheGenerate(label: string, length: number): Promise<Uint8Array> {
    if (label.length === 0) {
      throw new ConfigError('Key purpose label must not be empty');
    }
    assertPositiveInteger('Derived key length', length);

    return this.cache.getOrDerive(this.cacheKey(label, length), () => this.generate(label, length));
  }

  private cacheKey(label: string, length: number): string {
    return `${this.secretId}:${this.iterations}:${length}:${label}`;
  }
}

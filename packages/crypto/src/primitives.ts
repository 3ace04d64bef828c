/**
 * Cryptographic Primitives Layer
 * XChaCha20-Poly1305, constant-time compare, CSPRNG via libsodium
 * PBKDF2 and HMAC via @noble/hashes
 */

import sodium from 'libsodium-wrappers';
import { pbkdf2Async } from '@noble/hashes/pbkdf2';
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha2';
import * as constants from './constants.js';
import { createLogger } from './logger.js';

const log = createLogger('crypto');

let sodiumReady = false;
let initPromise: Promise<void> | null = null;

/**
 * Wait for libsodium's WASM module. Safe to call repeatedly and concurrently.
 */
export function initCrypto(): Promise<void> {
  if (!initPromise) {
    initPromise = sodium.ready.then(() => {
      sodiumReady = true;
      log.debug('libsodium initialized');
    });
  }
  return initPromise;
}

function assertReady(): void {
  if (!sodiumReady) {
    throw new Error('libsodium not initialized. Call initCrypto() first.');
  }
}

// Constant-time compare
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  assertReady();
  if (a.length !== b.length) return false;
  return sodium.compare(a, b) === 0;
}

// ==================== Random Bytes ====================

export function randomBytes(length: number): Uint8Array {
  assertReady();
  return sodium.randombytes_buf(length);
}

// ==================== PBKDF2-HMAC-SHA256 (key stretching) ====================

export function pbkdf2SHA256(
  password: Uint8Array,
  salt: string,
  iterations: number,
  length: number
): Promise<Uint8Array> {
  return pbkdf2Async(sha256, password, salt, { c: iterations, dkLen: length });
}

// ==================== HMAC-SHA256 (integrity tag) ====================

export function hmacSHA256(key: Uint8Array, message: Uint8Array): Uint8Array {
  return hmac(sha256, key, message);
}

// ==================== XChaCha20-Poly1305-IETF (AEAD) ====================
// 24-byte nonces are safe to draw at random for every cookie write

export function aeadEncrypt(
  key: Uint8Array,
  nonce: Uint8Array,
  plaintext: Uint8Array,
  aad: Uint8Array
): Uint8Array {
  assertReady();
  if (key.length !== constants.ENCRYPTION_KEY_LENGTH) {
    throw new Error('Invalid AEAD key length');
  }
  if (nonce.length !== constants.AEAD_NONCE_LENGTH) {
    throw new Error('Invalid AEAD nonce length');
  }

  return sodium.crypto_aead_xchacha20poly1305_ietf_encrypt(plaintext, aad, null, nonce, key);
}

/**
 * Throws when the Poly1305 tag does not authenticate the ciphertext.
 */
export function aeadDecrypt(
  key: Uint8Array,
  nonce: Uint8Array,
  ciphertext: Uint8Array,
  aad: Uint8Array
): Uint8Array {
  assertReady();
  if (key.length !== constants.ENCRYPTION_KEY_LENGTH) {
    throw new Error('Invalid AEAD key length');
  }
  if (nonce.length !== constants.AEAD_NONCE_LENGTH) {
    throw new Error('Invalid AEAD nonce length');
  }

  return sodium.crypto_aead_xchacha20poly1305_ietf_decrypt(null, ciphertext, aad, nonce, key);
}

// ==================== Hashing ====================

export function sha256Hex(data: Uint8Array | string): string {
  const bytes = typeof data === 'string' ? new TextEncoder().encode(data) : data;
  return Buffer.from(sha256(bytes)).toString('hex');
}

/**
 * Cookie envelope constants
 * Changing any value here invalidates every cookie already issued
 */

export const ENVELOPE_VERSION = 'v1';
export const ENVELOPE_SEPARATOR = '.';
export const ENVELOPE_SEGMENT_COUNT = 4; // version, nonce, ciphertext, tag

// KDF purpose labels (MUST use verbatim)
export const LABEL_ENCRYPTION_KEY = 'encrypted cookie';
export const LABEL_SIGNING_KEY = 'signed encrypted cookie';

// Derived key sizes (bytes)
export const ENCRYPTION_KEY_LENGTH = 32; // XChaCha20-Poly1305
export const SIGNING_KEY_LENGTH = 64; // HMAC-SHA256 block size

// XChaCha20-Poly1305-IETF
export const AEAD_NONCE_LENGTH = 24;
export const AEAD_TAG_LENGTH = 16;

// HMAC-SHA256 over version || nonce || ciphertext
export const MAC_TAG_LENGTH = 32;

// PBKDF2-HMAC-SHA256 work factor used when none is configured
export const DEFAULT_KDF_ITERATIONS = 65536;

// Browsers drop Set-Cookie headers whose name + value exceed this
export const MAX_COOKIE_BYTES = 4096;

/**
 * Authenticated encryption of opaque payloads
 *
 * Encrypt: XChaCha20-Poly1305 under the encryption key, then
 * HMAC-SHA256 over (version, nonce, ciphertext) under the signing key.
 * Decrypt: the HMAC is checked in constant time before the cipher ever
 * sees the ciphertext.
 */

import * as constants from './constants.js';
import { ConfigError, IntegrityError } from './errors.js';
import { KeyGenerator, type KeyCache, type MasterSecret } from './key-derivation.js';
import {
  aeadDecrypt,
  aeadEncrypt,
  constantTimeEqual,
  hmacSHA256,
  initCrypto,
  randomBytes,
} from './primitives.js';
import { aeadAssociatedData, decodeEnvelope, encodeEnvelope, macInput } from './wire.js';

export interface MessageEncryptorKeys {
  key: Uint8Array;
  signKey: Uint8Array;
}

export class MessageEncryptor {
  private readonly key: Uint8Array;
  private readonly signKey: Uint8Array;

  constructor(keys: MessageEncryptorKeys) {
    if (keys.key.length !== constants.ENCRYPTION_KEY_LENGTH) {
      throw new ConfigError(
        `Encryption key must be ${constants.ENCRYPTION_KEY_LENGTH} bytes, got ${keys.key.length}`
      );
    }
    if (keys.signKey.length !== constants.SIGNING_KEY_LENGTH) {
      throw new ConfigError(
        `Signing key must be ${constants.SIGNING_KEY_LENGTH} bytes, got ${keys.signKey.length}`
      );
    }
    this.key = keys.key;
    this.signKey = keys.signKey;
  }

  /**
   * Encrypt and sign a payload into a single envelope string.
   * Every call draws a fresh nonce.
   */
  encryptAndSign(plaintext: Uint8Array): string {
    const nonce = randomBytes(constants.AEAD_NONCE_LENGTH);
    const ciphertext = aeadEncrypt(this.key, nonce, plaintext, aeadAssociatedData());
    const tag = hmacSHA256(this.signKey, macInput(nonce, ciphertext));
    return encodeEnvelope({ nonce, ciphertext, tag });
  }

  /**
   * Verify and decrypt an envelope.
   *
   * @throws EnvelopeParseError when the envelope is malformed
   * @throws IntegrityError when the tag does not match
   */
  decryptAndVerify(envelope: string): Uint8Array {
    const { nonce, ciphertext, tag } = decodeEnvelope(envelope);

    const expected = hmacSHA256(this.signKey, macInput(nonce, ciphertext));
    if (!constantTimeEqual(expected, tag)) {
      throw new IntegrityError();
    }

    try {
      return aeadDecrypt(this.key, nonce, ciphertext, aeadAssociatedData());
    } catch (error) {
      // Reachable only with a valid HMAC, i.e. a signing key leak or a bug
      throw new IntegrityError('Envelope failed authenticated decryption', { cause: error });
    }
  }
}

export interface CreateMessageEncryptorOptions {
  cache?: KeyCache;
}

/**
 * Derive both keys from the master secret and build an encryptor.
 * Expensive on first use per secret; later calls hit the key cache.
 */
export async function createMessageEncryptor(
  secret: MasterSecret,
  iterations: number = constants.DEFAULT_KDF_ITERATIONS,
  options: CreateMessageEncryptorOptions = {}
): Promise<MessageEncryptor> {
  const generator = new KeyGenerator({ secret, iterations, cache: options.cache });
  await initCrypto();

  const [key, signKey] = await Promise.all([
    generator.cacheGenerate(constants.LABEL_ENCRYPTION_KEY, constants.ENCRYPTION_KEY_LENGTH),
    generator.cacheGenerate(constants.LABEL_SIGNING_KEY, constants.SIGNING_KEY_LENGTH),
  ]);

  return new MessageEncryptor({ key, signKey });
}

/**
 * Cookie-level wrapper around MessageEncryptor: swaps a cookie's value for
 * its envelope on the way out and back on the way in.
 */

import {
  CookieNotFoundError,
  createMessageEncryptor,
  type CreateMessageEncryptorOptions,
  type MasterSecret,
  MessageEncryptor,
} from '@cookie-vault/crypto';
import type { Cookie } from './http.js';

export class CookieEncryptor {
  constructor(private readonly messageEncryptor: MessageEncryptor) {}

  /**
   * Copy of the cookie with its value replaced by the envelope of `payload`.
   */
  protect(cookie: Cookie, payload: Uint8Array): Cookie {
    return { ...cookie, value: this.messageEncryptor.encryptAndSign(payload) };
  }

  /**
   * Verified payload of a cookie. An empty value counts as no cookie at all.
   *
   * @throws CookieNotFoundError when the value is empty
   * @throws EnvelopeParseError | IntegrityError when the value is not ours
   */
  reveal(cookie: Pick<Cookie, 'name' | 'value'>): Uint8Array {
    if (cookie.value === '') {
      throw new CookieNotFoundError(cookie.name, 'empty');
    }
    return this.messageEncryptor.decryptAndVerify(cookie.value);
  }
}

/**
 * Expensive: derives both keys on first use for a given secret.
 */
export async function createCookieEncryptor(
  secret: MasterSecret,
  iterations?: number,
  options?: CreateMessageEncryptorOptions
): Promise<CookieEncryptor> {
  return new CookieEncryptor(await createMessageEncryptor(secret, iterations, options));
}

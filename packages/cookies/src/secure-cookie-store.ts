/**
 * Named, encrypted cookies carrying encoded application values
 */

import {
  CookieNotFoundError,
  createLogger,
  DecodeError,
  EnvelopeParseError,
  IntegrityError,
  logSecurityEvent,
  MAX_COOKIE_BYTES,
  redactEnvelope,
} from '@cookie-vault/crypto';
import type { CookieEncryptor } from './cookie-encryptor.js';
import type { ValueEncoder } from './encoders.js';
import type { Cookie, CookieAttributes, CookieRequest, CookieResponse } from './http.js';

const log = createLogger('cookie-store');

export class SecureCookieStore<T> {
  constructor(
    private readonly encryptor: CookieEncryptor,
    private readonly encoder: ValueEncoder<T>
  ) {}

  /**
   * Encode, encrypt and emit `value` as cookie `name`.
   * Nothing is written to the response unless every step succeeds.
   *
   * @returns the cookie handed to the response
   */
  set(response: CookieResponse, name: string, attributes: CookieAttributes | undefined, value: T): Cookie {
    const payload = this.encoder.encode(value);
    const cookie = this.encryptor.protect({ ...attributes, name, value: '' }, payload);

    const size = name.length + cookie.value.length;
    if (size > MAX_COOKIE_BYTES) {
      log.warn({ cookie: name, size, limit: MAX_COOKIE_BYTES }, 'Cookie exceeds browser size limit');
    }

    response.setCookie(cookie);
    log.debug({ cookie: name, value: redactEnvelope(cookie.value) }, 'Cookie set');
    return cookie;
  }

  /**
   * Read cookie `name`, verify it and decode its value.
   *
   * @throws CookieNotFoundError when the cookie is absent or empty
   * @throws EnvelopeParseError | IntegrityError | DecodeError otherwise
   */
  get(request: CookieRequest, name: string): T {
    const value = request.cookie(name);
    if (value === undefined) {
      throw new CookieNotFoundError(name, 'missing');
    }

    let payload: Uint8Array;
    try {
      payload = this.encryptor.reveal({ name, value });
    } catch (error) {
      if (error instanceof IntegrityError) {
        logSecurityEvent(log, 'INTEGRITY_FAILED', { cookie: name, ip: request.ip, value: redactEnvelope(value) });
      } else if (error instanceof EnvelopeParseError) {
        logSecurityEvent(log, 'PARSE_FAILED', { cookie: name, ip: request.ip, value: redactEnvelope(value) });
      }
      throw error;
    }

    try {
      return this.encoder.decode(payload);
    } catch (error) {
      if (error instanceof DecodeError) {
        logSecurityEvent(log, 'DECODE_FAILED', { cookie: name, ip: request.ip, reason: error.message });
      }
      throw error;
    }
  }

  /**
   * Ask the client to drop cookie `name`. Domain and path must match the
   * ones it was set with for the browser to honour this.
   */
  delete(response: CookieResponse, name: string, attributes?: CookieAttributes): Cookie {
    const cookie: Cookie = {
      name,
      value: '',
      domain: attributes?.domain,
      path: attributes?.path,
      httpOnly: attributes?.httpOnly,
      secure: attributes?.secure,
      sameSite: attributes?.sameSite,
      partitioned: attributes?.partitioned,
      maxAge: -1,
    };
    response.setCookie(cookie);
    log.debug({ cookie: name }, 'Cookie deleted');
    return cookie;
  }
}

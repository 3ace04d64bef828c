/**
 * Cookie-backed sessions
 *
 * Absent ──update──▶ Present
 * Present ──current──▶ valid session | SessionValidationError
 * Present ──clear──▶ Absent
 */

import {
  ConfigError,
  CookieNotFoundError,
  createLogger,
  errorMessage,
  isRejectedCookie,
  logSecurityEvent,
  SessionValidationError,
} from '@cookie-vault/crypto';
import type { CookieVaultConfig } from './config.js';
import { createCookieEncryptor } from './cookie-encryptor.js';
import { createHostCookiePolicy, type CookieAttributePolicy } from './cookie-policy.js';
import type { ValueEncoder } from './encoders.js';
import type { Cookie, CookieRequest, CookieResponse } from './http.js';
import { SecureCookieStore } from './secure-cookie-store.js';
import type { Session, SessionLookup } from './session.js';

const log = createLogger('session');

/**
 * Session backends. The cookie backend below is the only one shipped.
 */
export interface SessionManager<S extends Session> {
  current(request: CookieRequest): S;
  lookup(request: CookieRequest): SessionLookup<S>;
  update(response: CookieResponse, request: CookieRequest, session: S): Cookie;
  clear(response: CookieResponse, request: CookieRequest): Cookie;
}

export interface CookieSessionManagerOptions {
  /** Cookie name. Keep it free of hints about the stack behind it. */
  cookieName: string;
  /** Defaults to {@link createHostCookiePolicy} with no domain. */
  policy?: CookieAttributePolicy;
}

export class CookieSessionManager<S extends Session> implements SessionManager<S> {
  readonly cookieName: string;
  private readonly policy: CookieAttributePolicy;

  constructor(
    private readonly store: SecureCookieStore<S>,
    options: CookieSessionManagerOptions
  ) {
    if (options.cookieName.length === 0) {
      throw new ConfigError('Session cookie name must not be empty');
    }
    this.cookieName = options.cookieName;
    this.policy = options.policy ?? createHostCookiePolicy();
  }

  /**
   * Session presented with this request, validated against it.
   *
   * @throws CookieNotFoundError when there is no session cookie
   * @throws RejectedCookieError when the cookie or the session is not acceptable
   */
  current(request: CookieRequest): S {
    const session = this.store.get(request, this.cookieName);

    try {
      session.validate(request);
    } catch (error) {
      logSecurityEvent(log, 'SESSION_REJECTED', {
        cookie: this.cookieName,
        ip: request.ip,
        reason: errorMessage(error),
      });
      if (error instanceof SessionValidationError) throw error;
      throw new SessionValidationError(`Session rejected: ${errorMessage(error)}`, { cause: error });
    }

    return session;
  }

  /**
   * Non-throwing form of {@link current} for the three session states.
   * Anything other than a missing or rejected cookie is rethrown.
   */
  lookup(request: CookieRequest): SessionLookup<S> {
    try {
      return { state: 'valid', session: this.current(request) };
    } catch (error) {
      if (error instanceof CookieNotFoundError) return { state: 'absent' };
      if (isRejectedCookie(error)) return { state: 'invalid', error };
      throw error;
    }
  }

  /**
   * Replace the session cookie with `session`.
   */
  update(response: CookieResponse, request: CookieRequest, session: S): Cookie {
    return this.store.set(response, this.cookieName, this.policy(request), session);
  }

  clear(response: CookieResponse, request: CookieRequest): Cookie {
    return this.store.delete(response, this.cookieName, this.policy(request));
  }
}

/**
 * Wire encryptor, store and host policy from configuration.
 * Derives keys, so call it once at startup.
 */
export async function createCookieSessionManager<S extends Session>(
  config: CookieVaultConfig,
  encoder: ValueEncoder<S>
): Promise<CookieSessionManager<S>> {
  const encryptor = await createCookieEncryptor(config.secret, config.iterations);
  const store = new SecureCookieStore(encryptor, encoder);
  const policy = createHostCookiePolicy({
    domain: config.cookieDomain,
    maxAge: config.maxAge,
    sameSite: config.sameSite,
  });
  return new CookieSessionManager(store, { cookieName: config.cookieName, policy });
}

import type { RejectedCookieError } from '@cookie-vault/crypto';
import type { CookieRequest } from './http.js';

/**
 * Application session carried in a cookie.
 *
 * `validate` runs on every read against the request that presented the
 * cookie; throwing rejects the session (e.g. fingerprint mismatch).
 */
export interface Session {
  validate(request: CookieRequest): void;
}

export type SessionLookup<S> =
  | { state: 'absent' }
  | { state: 'valid'; session: S }
  | { state: 'invalid'; error: RejectedCookieError };

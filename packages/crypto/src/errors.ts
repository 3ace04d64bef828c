/**
 * Error taxonomy shared by every cookie-vault package.
 *
 * Everything a client can provoke with a bad cookie extends
 * {@link RejectedCookieError}; HTTP layers map all of those to the same
 * "no valid session" response.
 */

export type CookieVaultErrorCode =
  | 'CONFIG_ERROR'
  | 'NOT_FOUND'
  | 'PARSE_ERROR'
  | 'INTEGRITY_ERROR'
  | 'DECODE_ERROR'
  | 'VALIDATION_ERROR';

export class CookieVaultError extends Error {
  readonly code: CookieVaultErrorCode;

  constructor(code: CookieVaultErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CookieVaultError';
    this.code = code;
  }
}

/** Degenerate key material or configuration. Fatal at startup. */
export class ConfigError extends CookieVaultError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_ERROR', message, options);
    this.name = 'ConfigError';
  }
}

export type NotFoundReason = 'missing' | 'empty';

/** No cookie, or a cookie with an empty value. */
export class CookieNotFoundError extends CookieVaultError {
  readonly cookieName: string;
  readonly reason: NotFoundReason;

  constructor(cookieName: string, reason: NotFoundReason) {
    super('NOT_FOUND', `Cookie "${cookieName}" is ${reason === 'missing' ? 'not present' : 'empty'}`);
    this.name = 'CookieNotFoundError';
    this.cookieName = cookieName;
    this.reason = reason;
  }
}

export class RejectedCookieError extends CookieVaultError {
  constructor(code: CookieVaultErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.name = 'RejectedCookieError';
  }
}

/** Envelope has the wrong shape: segment count, alphabet, lengths. */
export class EnvelopeParseError extends RejectedCookieError {
  constructor(message: string) {
    super('PARSE_ERROR', message);
    this.name = 'EnvelopeParseError';
  }
}

/** Tag mismatch. Treat as a forgery attempt. */
export class IntegrityError extends RejectedCookieError {
  constructor(message = 'Envelope failed integrity verification', options?: ErrorOptions) {
    super('INTEGRITY_ERROR', message, options);
    this.name = 'IntegrityError';
  }
}

/** Verified payload does not decode to the expected shape. */
export class DecodeError extends RejectedCookieError {
  constructor(message: string, options?: ErrorOptions) {
    super('DECODE_ERROR', message, options);
    this.name = 'DecodeError';
  }
}

/** Session decoded fine but rejected itself against the current request. */
export class SessionValidationError extends RejectedCookieError {
  constructor(message: string, options?: ErrorOptions) {
    super('VALIDATION_ERROR', message, options);
    this.name = 'SessionValidationError';
  }
}

export function isRejectedCookie(error: unknown): error is RejectedCookieError {
  return error instanceof RejectedCookieError;
}

/**
 * True for every error that must look like "no valid session" from the outside.
 */
export function isInvalidSession(error: unknown): error is CookieNotFoundError | RejectedCookieError {
  return error instanceof CookieNotFoundError || error instanceof RejectedCookieError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

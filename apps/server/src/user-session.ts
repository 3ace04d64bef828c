/**
 * Signed-in user session, bound to the browser that created it
 */

import { sha256Hex } from '@cookie-vault/crypto';
import type { CookieRequest, Schema, Session } from '@cookie-vault/cookies';

const USER_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export interface UserSessionData {
  userId: string;
  issuedAt: number;
  fingerprint: string;
}

/**
 * SHA-256 of the User-Agent. Deliberately excludes the IP: mobile clients
 * change addresses mid-session.
 */
export function fingerprintRequest(request: CookieRequest): string {
  return sha256Hex(request.header('user-agent') ?? '');
}

export function isValidUserId(value: unknown): value is string {
  return typeof value === 'string' && USER_ID_PATTERN.test(value);
}

export class UserSession implements Session {
  readonly userId: string;
  readonly issuedAt: number;
  readonly fingerprint: string;

  constructor(data: UserSessionData) {
    this.userId = data.userId;
    this.issuedAt = data.issuedAt;
    this.fingerprint = data.fingerprint;
  }

  static issue(userId: string, request: CookieRequest, now = Date.now()): UserSession {
    return new UserSession({ userId, issuedAt: now, fingerprint: fingerprintRequest(request) });
  }

  validate(request: CookieRequest): void {
    if (fingerprintRequest(request) !== this.fingerprint) {
      throw new Error('Fingerprint mismatch');
    }
  }

  toJSON(): UserSessionData {
    return { userId: this.userId, issuedAt: this.issuedAt, fingerprint: this.fingerprint };
  }
}

function readField(input: object, name: string): unknown {
  return name in input ? Reflect.get(input, name) : undefined;
}

export const userSessionSchema: Schema<UserSession> = {
  parse(input) {
    if (typeof input !== 'object' || input === null) {
      throw new Error('Session is not an object');
    }
    const userId = readField(input, 'userId');
    if (!isValidUserId(userId)) {
      throw new Error('Invalid userId');
    }
    const issuedAt = readField(input, 'issuedAt');
    if (typeof issuedAt !== 'number' || !Number.isFinite(issuedAt)) {
      throw new Error('Invalid issuedAt');
    }
    const fingerprint = readField(input, 'fingerprint');
    if (typeof fingerprint !== 'string' || !/^[0-9a-f]{64}$/.test(fingerprint)) {
      throw new Error('Invalid fingerprint');
    }
    return new UserSession({ userId, issuedAt, fingerprint });
  },
};

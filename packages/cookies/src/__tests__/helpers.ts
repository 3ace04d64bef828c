import { KeyCache } from '@cookie-vault/crypto';
import { createCookieEncryptor, type CookieEncryptor } from '../cookie-encryptor.js';
import type { Cookie, CookieRequest, CookieResponse } from '../http.js';

export const TEST_SECRET = 'test-secret';
export const TEST_ITERATIONS = 1000;

export function testEncryptor(secret = TEST_SECRET): Promise<CookieEncryptor> {
  return createCookieEncryptor(secret, TEST_ITERATIONS, { cache: new KeyCache() });
}

export interface FakeRequestInit {
  host?: string;
  ip?: string;
  headers?: Record<string, string>;
  cookies?: Record<string, string>;
}

export class FakeRequest implements CookieRequest {
  readonly host: string;
  readonly ip: string;
  private readonly headers: Record<string, string>;
  private readonly cookies: Record<string, string>;

  constructor(init: FakeRequestInit = {}) {
    this.host = init.host ?? 'localhost:8080';
    this.ip = init.ip ?? '127.0.0.1';
    this.headers = Object.fromEntries(
      Object.entries(init.headers ?? {}).map(([name, value]) => [name.toLowerCase(), value])
    );
    this.cookies = init.cookies ?? {};
  }

  header(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  cookie(name: string): string | undefined {
    return this.cookies[name];
  }
}

export class RecordingResponse implements CookieResponse {
  readonly cookies: Cookie[] = [];

  setCookie(cookie: Cookie): void {
    this.cookies.push(cookie);
  }

  last(): Cookie {
    const cookie = this.cookies[this.cookies.length - 1];
    if (!cookie) throw new Error('No cookie was set');
    return cookie;
  }
}

/**
 * Next request from the same client: carries every cookie the response set.
 */
export function followUp(response: RecordingResponse, init: FakeRequestInit = {}): FakeRequest {
  const cookies = { ...init.cookies };
  for (const cookie of response.cookies) {
    cookies[cookie.name] = cookie.value;
  }
  return new FakeRequest({ ...init, cookies });
}

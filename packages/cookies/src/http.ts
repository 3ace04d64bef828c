/**
 * HTTP collaborator interfaces
 *
 * The transport (header parsing, Set-Cookie formatting) lives outside this
 * package; adapters such as ./fastify.ts implement these two interfaces.
 */

export type SameSite = 'strict' | 'lax' | 'none';

export interface CookieAttributes {
  /** Absent means host-only (the empty Domain). */
  domain?: string;
  path?: string;
  httpOnly?: boolean;
  secure?: boolean;
  /** Seconds. Negative asks the client to drop the cookie now. */
  maxAge?: number;
  expires?: Date;
  sameSite?: SameSite;
  partitioned?: boolean;
}

export interface Cookie extends CookieAttributes {
  name: string;
  value: string;
}

export interface CookieRequest {
  /** Host header as sent, port included (e.g. "localhost:8080"). */
  readonly host: string;
  readonly ip: string;
  header(name: string): string | undefined;
  cookie(name: string): string | undefined;
}

export interface CookieResponse {
  setCookie(cookie: Cookie): void;
}

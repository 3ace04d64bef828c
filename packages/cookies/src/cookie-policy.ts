/**
 * Request-derived cookie attributes
 *
 * Loopback hosts get a relaxed cookie (no Secure, no Domain) so local HTTP
 * development works; every other host gets Secure and the trusted domain.
 */

import type { CookieAttributes, CookieRequest, SameSite } from './http.js';

export type CookieAttributePolicy = (request: CookieRequest) => CookieAttributes;

export interface HostCookiePolicyOptions {
  /** Domain attribute for non-loopback hosts. Omit for host-only cookies. */
  domain?: string;
  /** Seconds */
  maxAge?: number;
  sameSite?: SameSite;
  httpOnly?: boolean;
  partitioned?: boolean;
}

/**
 * Host part of a Host header: port and IPv6 brackets removed, lower-cased.
 */
export function hostname(host: string): string {
  const trimmed = host.trim().toLowerCase();
  if (trimmed.startsWith('[')) {
    const end = trimmed.indexOf(']');
    return end === -1 ? trimmed.slice(1) : trimmed.slice(1, end);
  }
  const colon = trimmed.indexOf(':');
  // More than one colon: bare IPv6 literal without brackets
  if (colon !== -1 && trimmed.indexOf(':', colon + 1) === -1) {
    return trimmed.slice(0, colon);
  }
  return trimmed;
}

export function isLoopbackHost(host: string): boolean {
  const name = hostname(host);
  if (name === 'localhost' || name.endsWith('.localhost')) return true;
  if (name === '::1') return true;
  return /^127(?:\.\d{1,3}){3}$/.test(name);
}

export function createHostCookiePolicy(options: HostCookiePolicyOptions = {}): CookieAttributePolicy {
  const shared: CookieAttributes = {
    path: '/',
    httpOnly: options.httpOnly ?? true,
    sameSite: options.sameSite ?? 'lax',
    maxAge: options.maxAge,
  };

  return (request) => {
    if (isLoopbackHost(request.host)) {
      // SameSite=None is refused by browsers without Secure
      const sameSite = shared.sameSite === 'none' ? 'lax' : shared.sameSite;
      return { ...shared, sameSite, secure: false };
    }
    return {
      ...shared,
      secure: true,
      domain: options.domain,
      partitioned: options.partitioned,
    };
  };
}

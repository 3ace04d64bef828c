/**
 * Fastify binding for the HTTP collaborator interfaces.
 * Requires @fastify/cookie to be registered on the instance.
 */

import type { CookieSerializeOptions } from '@fastify/cookie';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Cookie, CookieRequest, CookieResponse } from './http.js';

const EPOCH = new Date(0);

export function fastifyCookieRequest(request: FastifyRequest): CookieRequest {
  return {
    host: request.headers.host ?? request.hostname,
    ip: request.ip,
    header(name) {
      const value = request.headers[name.toLowerCase()];
      return Array.isArray(value) ? value.join(', ') : value;
    },
    cookie(name) {
      return request.cookies[name];
    },
  };
}

/**
 * Cookie model -> @fastify/cookie options. A negative maxAge becomes
 * Max-Age=0 plus an epoch Expires.
 */
export function toSerializeOptions(cookie: Cookie): CookieSerializeOptions {
  const expired = cookie.maxAge !== undefined && cookie.maxAge < 0;
  return {
    domain: cookie.domain,
    path: cookie.path,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: cookie.sameSite,
    partitioned: cookie.partitioned,
    maxAge: expired ? 0 : cookie.maxAge,
    expires: expired ? EPOCH : cookie.expires,
  };
}

export function fastifyCookieResponse(reply: FastifyReply): CookieResponse {
  return {
    setCookie(cookie) {
      reply.setCookie(cookie.name, cookie.value, toSerializeOptions(cookie));
    },
  };
}

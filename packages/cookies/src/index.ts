/**
 * @cookie-vault/cookies
 *
 * ```ts
 * import Fastify from 'fastify';
 * import cookie from '@fastify/cookie';
 * import {
 *   createCookieSessionManager,
 *   createJsonEncoder,
 *   fastifyCookieRequest,
 *   fastifyCookieResponse,
 *   loadConfig,
 * } from '@cookie-vault/cookies';
 *
 * const sessions = await createCookieSessionManager(loadConfig(), createJsonEncoder(CartSession));
 * const app = Fastify();
 * await app.register(cookie);
 * app.get('/cart', async (request, reply) => {
 *   const lookup = sessions.lookup(fastifyCookieRequest(request));
 *   if (lookup.state !== 'valid') return reply.code(401).send({ error: 'No valid session' });
 *   return lookup.session.items;
 * });
 * ```
 *
 * @module
 */

export * from './http.js';
export * from './cookie-encryptor.js';
export * from './encoders.js';
export * from './secure-cookie-store.js';
export * from './session.js';
export * from './cookie-policy.js';
export * from './session-manager.js';
export * from './config.js';
export * from './fastify.js';

export {
  ConfigError,
  CookieNotFoundError,
  CookieVaultError,
  DecodeError,
  EnvelopeParseError,
  IntegrityError,
  RejectedCookieError,
  SessionValidationError,
  isInvalidSession,
  isRejectedCookie,
} from '@cookie-vault/crypto';

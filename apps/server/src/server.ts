/**
 * Example server: sessions live entirely in an encrypted cookie
 */

import cookie from '@fastify/cookie';
import Fastify, { type FastifyInstance } from 'fastify';
import {
  createCookieSessionManager,
  createJsonEncoder,
  fastifyCookieRequest,
  fastifyCookieResponse,
  type SessionManager,
} from '@cookie-vault/cookies';
import type { ServerConfig } from './config.js';
import { isValidUserId, UserSession, userSessionSchema } from './user-session.js';

interface SignInBody {
  userId?: unknown;
}

// One body for every rejected or missing cookie, so clients cannot tell which check failed
const NO_SESSION = { error: 'No valid session' } as const;

export interface BuildServerOptions {
  /** Pre-built manager; skips key derivation (tests). */
  sessions?: SessionManager<UserSession>;
}

export async function buildServer(
  config: ServerConfig,
  options: BuildServerOptions = {}
): Promise<FastifyInstance> {
  const sessions =
    options.sessions ?? (await createCookieSessionManager(config, createJsonEncoder(userSessionSchema)));

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      serializers: {
        req: (req) => ({
          method: req.method,
          url: req.url,
          remoteAddress: req.ip,
        }),
        res: (res) => ({
          statusCode: res.statusCode,
        }),
      },
    },
    bodyLimit: 16 * 1024,
  });

  await fastify.register(cookie);

  // ==================== Observability Endpoints ====================

  fastify.get('/healthz', async () => {
    return { status: 'ok' };
  });

  // ==================== Session Endpoints ====================

  fastify.post<{ Body: SignInBody }>('/session', async (request, reply) => {
    const userId = request.body?.userId;
    if (!isValidUserId(userId)) {
      return reply.code(400).send({ error: 'userId must be 1-64 characters of [A-Za-z0-9_-]' });
    }

    const view = fastifyCookieRequest(request);
    const session = UserSession.issue(userId, view);
    sessions.update(fastifyCookieResponse(reply), view, session);

    request.log.info({ userId }, 'Session issued');
    return reply.code(201).send({ userId: session.userId, issuedAt: session.issuedAt });
  });

  fastify.get('/session', async (request, reply) => {
    const lookup = sessions.lookup(fastifyCookieRequest(request));

    if (lookup.state !== 'valid') {
      if (lookup.state === 'invalid') {
        request.log.warn({ code: lookup.error.name }, 'Rejected session cookie');
      }
      return reply.code(401).send(NO_SESSION);
    }

    return { userId: lookup.session.userId, issuedAt: lookup.session.issuedAt };
  });

  fastify.delete('/session', async (request, reply) => {
    sessions.clear(fastifyCookieResponse(reply), fastifyCookieRequest(request));
    return reply.code(204).send();
  });

  return fastify;
}

import type { FastifyReply, FastifyRequest } from 'fastify';
import { SESSION_COOKIE } from '../services/AuthService.js';
import type { AuthService } from '../services/AuthService.js';

export const AUTH_HEADER = 'x-qbee-authorization';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function createAuthMiddleware(authService: AuthService) {
  return async function authMiddleware(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
    if (!authService.isEnabled()) {
      return undefined;
    }

    const session = request.cookies[SESSION_COOKIE];
    if (session && authService.verifySession(session)) {
      return undefined;
    }

    const presented = headerValue(request.headers[AUTH_HEADER]);
    if (presented !== undefined && authService.validateToken(presented)) {
      reply.setCookie(SESSION_COOKIE, authService.createSession(), {
        httpOnly: true,
        sameSite: 'strict',
        path: '/',
      });
      return undefined;
    }

    return reply.status(401).send({ error: 'Unauthorized' });
  };
}

import type { FastifyInstance } from 'fastify';
import type { AuthMeResponse } from '@promptdeck/shared';
import * as userService from '../services/userService.js';
import * as sessionService from '../services/sessionService.js';
import { sessionCookieOptions } from '../plugins/auth.js';
import { COOKIE_NAME } from '../constants.js';

export default async function authRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/auth/me
   *
   * Public. The signed-in user (null without an active session) and whether
   * the login button should be offered.
   */
  fastify.get('/me', async (request, reply) => {
    const response: AuthMeResponse = {
      user: request.user ? userService.toUserResponse(request.user) : null,
      oidcEnabled: fastify.config.oidcEnabled,
    };
    return reply.status(200).send(response);
  });

  /**
   * POST /api/auth/logout
   *
   * Public. Ends the session named by the cookie, if any, and always clears
   * the cookie.
   */
  fastify.post('/logout', async (request, reply) => {
    const sessionId = request.cookies[COOKIE_NAME];
    if (sessionId) {
      sessionService.destroySession(fastify.db, sessionId);
      if (request.user) {
        request.log.info({ userId: request.user.id }, 'User logged out');
      }
    }

    reply.setCookie(COOKIE_NAME, '', sessionCookieOptions(fastify.config, 0));
    return reply.status(204).send();
  });
}

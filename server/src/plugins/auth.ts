import fp from 'fastify-plugin';
import type { FastifyRequest, preHandlerHookHandler } from 'fastify';
import type { UserRole } from '@promptdeck/shared';
import type { users } from '../db/schema.js';
import type { AppConfig } from './config.js';
import * as sessionService from '../services/sessionService.js';
import { UnauthorizedError, ForbiddenError } from '../errors/AppError.js';
import { COOKIE_NAME } from '../constants.js';

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

// "METHOD /route/pattern" pairs reachable without a session
const PUBLIC_ROUTES = new Set([
  'GET /api/auth/me',
  'POST /api/auth/logout',
  'GET /api/auth/oidc/login',
  'GET /api/auth/oidc/callback',
  'GET /api/health',
  'GET /api/health/ready',
]);

declare module 'fastify' {
  interface FastifyRequest {
    user: typeof users.$inferSelect | null;
  }
}

/**
 * Cookie attributes for the session cookie. Pass `maxAge: 0` to clear it.
 */
export function sessionCookieOptions(config: AppConfig, maxAge: number) {
  return {
    httpOnly: true,
    secure: config.secureCookies,
    sameSite: 'strict' as const,
    path: '/',
    maxAge,
  };
}

function isPublicRoute(request: FastifyRequest, routeUrl: string): boolean {
  const method = request.method === 'HEAD' ? 'GET' : request.method;
  return PUBLIC_ROUTES.has(`${method} ${routeUrl}`);
}

/**
 * preHandler that admits only users holding one of `roles`.
 *
 * @example
 * fastify.post('/users/:id/approve', { preHandler: requireRole('admin') }, handler);
 */
export function requireRole(...roles: UserRole[]): preHandlerHookHandler {
  return async function roleCheck(request) {
    if (!request.user) {
      throw new UnauthorizedError('Authentication required');
    }
    if (!roles.includes(request.user.role)) {
      throw new ForbiddenError('Insufficient permissions');
    }
  };
}

export default fp(
  async function authPlugin(fastify) {
    fastify.decorateRequest('user', null);

    const cleanupTimer = setInterval(() => {
      try {
        const deletedCount = sessionService.cleanupExpiredSessions(fastify.db);
        if (deletedCount > 0) {
          fastify.log.info({ deletedCount }, 'Cleaned up expired sessions');
        }
      } catch (err) {
        fastify.log.error({ err }, 'Failed to clean up expired sessions');
      }
    }, CLEANUP_INTERVAL_MS);
    cleanupTimer.unref();

    fastify.addHook('onClose', async () => {
      clearInterval(cleanupTimer);
    });

    // Runs before schema validation, so unauthenticated requests get 401 rather than 400
    fastify.addHook('preValidation', async (request) => {
      if (!request.url.startsWith('/api/')) {
        return;
      }

      // Unmatched URLs fall through to the not-found handler
      const routeUrl = request.routeOptions.url;
      if (!routeUrl) {
        return;
      }

      const sessionId = request.cookies[COOKIE_NAME];
      if (sessionId) {
        request.user = sessionService.validateSession(fastify.db, sessionId);
      }

      if (!request.user && !isPublicRoute(request, routeUrl)) {
        throw new UnauthorizedError('Authentication required');
      }
    });
  },
  {
    name: 'auth',
    dependencies: ['config', 'db'],
  },
);

import type { FastifyInstance } from 'fastify';
import {
  AccountDisabledError,
  AccountPendingError,
  ForbiddenError,
  OidcNotConfiguredError,
} from '../errors/AppError.js';
import type { AppConfig } from '../plugins/config.js';
import { sessionCookieOptions } from '../plugins/auth.js';
import * as oidcService from '../services/oidcService.js';
import * as userService from '../services/userService.js';
import * as sessionService from '../services/sessionService.js';
import { COOKIE_NAME } from '../constants.js';

interface OidcSettings {
  issuer: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

/**
 * Only relative, same-host paths are accepted as post-login redirects.
 */
function isSafeRedirect(redirect: string): boolean {
  return redirect.startsWith('/') && !redirect.startsWith('//') && !redirect.includes('://');
}

function getOidcSettings(config: AppConfig): OidcSettings | null {
  const { oidcIssuer, oidcClientId, oidcClientSecret, oidcRedirectUri } = config;
  if (!config.oidcEnabled || !oidcIssuer || !oidcClientId || !oidcClientSecret || !oidcRedirectUri) {
    return null;
  }
  return {
    issuer: oidcIssuer,
    clientId: oidcClientId,
    clientSecret: oidcClientSecret,
    redirectUri: oidcRedirectUri,
  };
}

export default async function oidcRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/auth/oidc/login?redirect=/path
   *
   * Starts the login flow by redirecting to the identity provider.
   */
  fastify.get<{ Querystring: { redirect?: string } }>('/login', async (request, reply) => {
    const settings = getOidcSettings(fastify.config);
    if (!settings) {
      throw new OidcNotConfiguredError();
    }

    const { redirect = '/' } = request.query;
    const safeRedirect = isSafeRedirect(redirect) ? redirect : '/';

    const config = await oidcService.discoverOidcConfig(
      settings.issuer,
      settings.clientId,
      settings.clientSecret,
    );

    const { authorizationUrl } = oidcService.buildAuthorizationUrl(
      config,
      settings.redirectUri,
      safeRedirect,
    );

    return reply.redirect(authorizationUrl);
  });

  /**
   * GET /api/auth/oidc/callback
   *
   * Exchanges the authorization code, applies the access policy and, for
   * active accounts only, creates a session (createSession refuses the rest). Every failure redirects to
   * /login with an error code instead of returning JSON.
   */
  fastify.get<{ Querystring: { code?: string; state?: string; error?: string } }>(
    '/callback',
    async (request, reply) => {
      const settings = getOidcSettings(fastify.config);
      if (!settings) {
        return reply.redirect('/login?error=oidc_not_configured');
      }

      const query = request.query;

      if (query.error) {
        request.log.warn({ error: query.error }, 'OIDC provider returned an error');
        return reply.redirect('/login?error=oidc_error');
      }

      const state = query.state;
      if (!state) {
        request.log.warn('Missing state parameter in OIDC callback');
        return reply.redirect('/login?error=invalid_state');
      }

      const appRedirect = oidcService.consumeState(state);
      if (!appRedirect) {
        request.log.warn({ state }, 'Invalid or expired state parameter');
        return reply.redirect('/login?error=invalid_state');
      }

      try {
        const config = await oidcService.discoverOidcConfig(
          settings.issuer,
          settings.clientId,
          settings.clientSecret,
        );

        // request.protocol honours trustProxy and x-forwarded-proto
        const callbackUrl = new URL(request.url, `${request.protocol}://${request.host}`);
        const profile = await oidcService.handleCallback(config, callbackUrl, state);

        if (!profile.email) {
          request.log.warn({ sub: profile.sub }, 'OIDC user missing email claim');
          return reply.redirect('/login?error=missing_email');
        }

        const user = userService.findOrCreateOidcUser(fastify.db, profile, {
          accessPolicy: fastify.config.accessPolicy,
          adminEmails: fastify.config.adminEmails,
          allowedDomain: fastify.config.oidcAllowedDomain,
        });

        // Throws for pending and disabled accounts
        const sessionId = sessionService.createSession(
          fastify.db,
          user.id,
          fastify.config.sessionDuration,
        );

        reply.setCookie(
          COOKIE_NAME,
          sessionId,
          sessionCookieOptions(fastify.config, fastify.config.sessionDuration),
        );

        request.log.info({ userId: user.id }, 'User logged in');
        return reply.redirect(appRedirect);
      } catch (error) {
        if (error instanceof AccountPendingError) {
          request.log.info('Login of account awaiting approval');
          return reply.redirect('/login?error=account_pending');
        }
        if (error instanceof AccountDisabledError) {
          request.log.warn('Disabled account attempted OIDC login');
          return reply.redirect('/login?error=account_disabled');
        }
        if (error instanceof ForbiddenError) {
          request.log.warn({ err: error }, 'OIDC login from a domain that is not allowed');
          return reply.redirect('/login?error=domain_not_allowed');
        }
        request.log.error({ err: error }, 'OIDC callback error');
        return reply.redirect('/login?error=oidc_error');
      }
    },
  );
}

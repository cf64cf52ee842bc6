import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fastifyCompress from '@fastify/compress';
import fastifyCookie from '@fastify/cookie';
import { sql } from 'drizzle-orm';
import type { ApiErrorResponse } from '@promptdeck/shared';
import configPlugin, { loadConfig } from './plugins/config.js';
import dbPlugin from './plugins/db.js';
import errorHandlerPlugin from './plugins/errorHandler.js';
import authPlugin from './plugins/auth.js';
import mergeHistoryPlugin from './plugins/mergeHistory.js';
import authRoutes from './routes/auth.js';
import oidcRoutes from './routes/oidc.js';
import userRoutes from './routes/users.js';
import adminRoutes from './routes/admin.js';
import promptRoutes from './routes/prompts.js';
import mergeRoutes from './routes/merge.js';
import attachmentRoutes from './routes/attachments.js';
import tagRoutes from './routes/tags.js';
import favoriteSetRoutes from './routes/favoriteSets.js';

export async function buildApp(): Promise<FastifyInstance> {
  // Logger and proxy settings are needed before the config plugin runs
  const bootConfig = loadConfig(process.env);

  const app = Fastify({
    logger: {
      level: bootConfig.logLevel,
    },
    trustProxy: bootConfig.trustProxy,
  });

  // Configuration (must be first)
  await app.register(configPlugin);

  // Error handler (after config, before routes)
  await app.register(errorHandlerPlugin);

  // Compression (gzip/deflate/brotli)
  await app.register(fastifyCompress);

  // Cookie parsing (required for session management)
  await app.register(fastifyCookie);

  // Database connection & migrations
  await app.register(dbPlugin);

  // Authentication & session management (after db, before routes)
  await app.register(authPlugin);

  // In-process merge history
  await app.register(mergeHistoryPlugin);

  // Auth routes
  await app.register(authRoutes, { prefix: '/api/auth' });

  // OIDC routes
  await app.register(oidcRoutes, { prefix: '/api/auth/oidc' });

  // User profile routes
  await app.register(userRoutes, { prefix: '/api/users' });

  // Account approval and allowlist management
  await app.register(adminRoutes, { prefix: '/api/admin' });

  // Prompt routes
  await app.register(promptRoutes, { prefix: '/api/prompts' });

  // Merge routes
  await app.register(mergeRoutes, { prefix: '/api/prompts/merge' });

  // Attachment routes (nested under prompts)
  await app.register(attachmentRoutes, { prefix: '/api/prompts' });

  // Tag routes
  await app.register(tagRoutes, { prefix: '/api/tags' });

  // Favorite set routes
  await app.register(favoriteSetRoutes, { prefix: '/api/favorite-sets' });

  // Health check endpoint (liveness)
  app.get('/api/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Readiness probe: the database must answer
  app.get('/api/health/ready', async () => {
    app.db.run(sql`SELECT 1`);
    return { status: 'ready', timestamp: new Date().toISOString() };
  });

  app.setNotFoundHandler((request, reply) => {
    if (request.url.startsWith('/api/')) {
      const response: ApiErrorResponse = {
        error: {
          code: 'ROUTE_NOT_FOUND',
          message: `Route ${request.method} ${request.url} not found`,
        },
      };
      return reply.status(404).send(response);
    }
    const response: ApiErrorResponse = {
      error: {
        code: 'NOT_FOUND',
        message: 'Not found',
      },
    };
    return reply.status(404).send(response);
  });

  return app;
}

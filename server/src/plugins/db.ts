import fp from 'fastify-plugin';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { runMigrations } from '../db/migrate.js';
import * as schema from '../db/schema.js';

type DbType = BetterSQLite3Database<typeof schema>;

// Type augmentation: makes fastify.db available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    db: DbType;
  }
}

export default fp(
  async function dbPlugin(fastify) {
    const dbPath = fastify.config.databaseUrl;

    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    fastify.log.info({ dbPath }, 'Opening SQLite database');

    const sqlite = new Database(dbPath);

    // WAL for concurrent readers; foreign keys drive the cascades on prompt deletion
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('foreign_keys = ON');

    // Run pending migrations (throws on failure, preventing startup)
    const applied = runMigrations(sqlite);
    for (const name of applied) {
      fastify.log.info({ migration: name }, 'Applied migration');
    }
    fastify.log.info('Database migrations completed');

    fastify.decorate('db', drizzle(sqlite, { schema }));

    fastify.addHook('onClose', () => {
      fastify.log.info('Closing SQLite database connection');
      sqlite.close();
    });
  },
  {
    name: 'db',
    dependencies: ['config'],
  },
);

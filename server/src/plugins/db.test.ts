import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { sql } from 'drizzle-orm';
import { buildApp } from '../app.js';
import type { FastifyInstance } from 'fastify';

describe('Database Plugin', () => {
  let app: FastifyInstance | undefined;
  let tempDir: string;
  let dbPath: string;
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    tempDir = mkdtempSync(join(tmpdir(), 'promptdeck-db-test-'));
    dbPath = join(tempDir, 'test.db');
    process.env.DATABASE_URL = dbPath;
  });

  afterEach(async () => {
    if (app) {
      await app.close();
      app = undefined;
    }
    process.env = originalEnv;
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('opens the database and applies migrations on startup', async () => {
    app = await buildApp();

    const result = app.db.get<{ value: number }>(sql`SELECT 1 AS value`);
    expect(result).toEqual({ value: 1 });
    expect(existsSync(dbPath)).toBe(true);

    const migrations = app.db.all<{ name: string }>(sql`SELECT name FROM _migrations`);
    expect(migrations.map((m) => m.name)).toEqual(['0001_initial.sql']);
  });

  it('enables foreign key enforcement', async () => {
    app = await buildApp();

    const row = app.db.get<{ foreign_keys: number }>(sql`PRAGMA foreign_keys`);
    expect(row.foreign_keys).toBe(1);
  });

  it('keeps data across restarts without re-running migrations', async () => {
    app = await buildApp();
    app.db.run(
      sql`INSERT INTO tags (name, color, created_at) VALUES ('kept', '#000000', '2026-01-01T00:00:00.000Z')`,
    );
    await app.close();

    app = await buildApp();
    const tags = app.db.all<{ name: string }>(sql`SELECT name FROM tags`);
    expect(tags).toEqual([{ name: 'kept' }]);
  });
});

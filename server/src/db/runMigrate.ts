import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { runMigrations } from './migrate.js';

// Run migrations standalone (without starting the server)
function main() {
  const dbPath = process.env.DATABASE_URL || './data/promptdeck.db';

  mkdirSync(dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);
  db.pragma('foreign_keys = ON');

  try {
    const applied = runMigrations(db);
    for (const name of applied) {
      console.warn(`Applied migration: ${name}`);
    }
    console.warn(`Migrations completed successfully (${applied.length} applied)`);
  } catch (err) {
    console.error('Migration failed:', err);
    process.exitCode = 1;
  } finally {
    db.close();
  }
}

main();

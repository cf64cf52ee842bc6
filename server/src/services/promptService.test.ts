import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { eq } from 'drizzle-orm';
import { runMigrations } from '../db/migrate.js';
import * as schema from '../db/schema.js';
import * as promptService from './promptService.js';
import { NotFoundError, ValidationError } from '../errors/AppError.js';

describe('Prompt Service', () => {
  let sqlite: Database.Database;
  let db: BetterSQLite3Database<typeof schema>;

  function createTestDb() {
    const sqliteDb = new Database(':memory:');
    sqliteDb.pragma('journal_mode = WAL');
    sqliteDb.pragma('foreign_keys = ON');
    runMigrations(sqliteDb);
    return { sqlite: sqliteDb, db: drizzle(sqliteDb, { schema }) };
  }

  function create(title: string, extra: { tags?: string[]; description?: string } = {}) {
    return promptService.createPrompt(db, null, { title, content: `${title} body`, ...extra });
  }

  function setCreatedAt(id: number, createdAt: string) {
    db.update(schema.prompts).set({ createdAt }).where(eq(schema.prompts.id, id)).run();
  }

  beforeEach(() => {
    const testDb = createTestDb();
    sqlite = testDb.sqlite;
    db = testDb.db;
  });

  afterEach(() => {
    sqlite.close();
  });

  describe('createPrompt()', () => {
    it('trims fields, appends to the ordering and starts active', () => {
      const first = promptService.createPrompt(db, null, {
        title: '  Greeting  ',
        content: '  Say hello.  ',
        description: '   ',
      });
      const second = create('Second');

      expect(first.title).toBe('Greeting');
      expect(first.content).toBe('Say hello.');
      expect(first.description).toBeNull();
      expect(first.isActive).toBe(true);
      expect(first.sortOrder).toBe(0);
      expect(first.attachedCount).toBe(0);
      expect(second.sortOrder).toBe(1);
    });

    it('creates and normalizes tags', () => {
      const prompt = create('Tagged', { tags: ['Code Review', 'writing', 'code review'] });
      expect(prompt.tags.map((t) => t.name)).toEqual(['code-review', 'writing']);
    });

    it('rejects a blank title or content', () => {
      expect(() => promptService.createPrompt(db, null, { title: '  ', content: 'x' })).toThrow(
        'Title is required',
      );
      expect(() => promptService.createPrompt(db, null, { title: 'x', content: '\n' })).toThrow(
        'Content is required',
      );
    });

    it('rejects a title over 255 characters', () => {
      expect(() =>
        promptService.createPrompt(db, null, { title: 't'.repeat(256), content: 'x' }),
      ).toThrow(ValidationError);
    });
  });

  describe('getPromptById() / getPromptsByIds()', () => {
    it('returns undefined for a missing id', () => {
      expect(promptService.getPromptById(db, 404)).toBeUndefined();
    });

    it('skips missing ids', () => {
      const a = create('A');
      const b = create('B');
      const rows = promptService.getPromptsByIds(db, [b.id, 999, a.id]);
      expect(rows.map((r) => r.id).sort((x, y) => x - y)).toEqual([a.id, b.id]);
    });

    it('returns an empty list for no ids', () => {
      expect(promptService.getPromptsByIds(db, [])).toEqual([]);
    });
  });

  describe('updatePrompt()', () => {
    it('applies partial updates and replaces tags', () => {
      const prompt = create('Old', { tags: ['one', 'two'] });

      const updated = promptService.updatePrompt(db, prompt.id, {
        title: 'New',
        tags: ['three'],
      });

      expect(updated.title).toBe('New');
      expect(updated.content).toBe('Old body');
      expect(updated.tags.map((t) => t.name)).toEqual(['three']);
    });

    it('clears tags with an empty list', () => {
      const prompt = create('Tagged', { tags: ['one'] });
      expect(promptService.updatePrompt(db, prompt.id, { tags: [] }).tags).toEqual([]);
    });

    it('rejects an empty update', () => {
      const prompt = create('A');
      expect(() => promptService.updatePrompt(db, prompt.id, {})).toThrow(
        'At least one field must be provided',
      );
    });

    it('throws NotFoundError for a missing prompt', () => {
      expect(() => promptService.updatePrompt(db, 404, { title: 'x' })).toThrow(NotFoundError);
    });
  });

  describe('deletePrompt() / restorePrompt()', () => {
    it('soft deletes by default and restore reactivates', () => {
      const prompt = create('A');

      promptService.deletePrompt(db, prompt.id);
      expect(promptService.getPromptById(db, prompt.id)?.isActive).toBe(false);

      expect(promptService.restorePrompt(db, prompt.id).isActive).toBe(true);
    });

    it('hard delete removes the row', () => {
      const prompt = create('A');
      promptService.deletePrompt(db, prompt.id, { hard: true });
      expect(promptService.getPromptById(db, prompt.id)).toBeUndefined();
    });

    it('markInactive and removePrompt report whether anything changed', () => {
      expect(promptService.markInactive(db, 404)).toBe(false);
      expect(promptService.removePrompt(db, 404)).toBe(false);
    });

    it('throws NotFoundError for a missing prompt', () => {
      expect(() => promptService.deletePrompt(db, 404)).toThrow(NotFoundError);
      expect(() => promptService.restorePrompt(db, 404)).toThrow(NotFoundError);
    });
  });

  describe('duplicatePrompt()', () => {
    it('copies content and tags under a "Copy of" title', () => {
      const source = create('Greeting', { tags: ['hello'], description: 'desc' });

      const copy = promptService.duplicatePrompt(db, null, source.id);

      expect(copy.id).not.toBe(source.id);
      expect(copy.title).toBe('Copy of Greeting');
      expect(copy.content).toBe('Greeting body');
      expect(copy.description).toBe('desc');
      expect(copy.tags.map((t) => t.name)).toEqual(['hello']);
      expect(copy.sortOrder).toBe(1);
    });

    it('uses an explicit title', () => {
      const source = create('Greeting');
      expect(promptService.duplicatePrompt(db, null, source.id, 'Hi').title).toBe('Hi');
    });
  });

  describe('resolvePage()', () => {
    it('defaults to the first page of the default size', () => {
      expect(promptService.resolvePage({})).toEqual({ page: 1, pageSize: 20 });
      expect(promptService.resolvePage({}, 5)).toEqual({ page: 1, pageSize: 5 });
    });

    it('clamps out-of-range values', () => {
      expect(promptService.resolvePage({ page: 0, pageSize: 500 })).toEqual({
        page: 1,
        pageSize: 100,
      });
      expect(promptService.resolvePage({ page: 3, pageSize: 0 })).toEqual({ page: 3, pageSize: 1 });
    });
  });

  describe('listPrompts()', () => {
    it('returns only active prompts in manual order by default', () => {
      const a = create('A');
      const b = create('B');
      const c = create('C');
      promptService.markInactive(db, b.id);

      const result = promptService.listPrompts(db, {});

      expect(result.items.map((p) => p.id)).toEqual([a.id, c.id]);
      expect(result.pagination).toEqual({ page: 1, pageSize: 20, totalItems: 2, totalPages: 1 });
    });

    it('filters by isActive=false and isActive=all', () => {
      create('A');
      const b = create('B');
      promptService.markInactive(db, b.id);

      expect(promptService.listPrompts(db, { isActive: 'false' }).items.map((p) => p.id)).toEqual([
        b.id,
      ]);
      expect(promptService.listPrompts(db, { isActive: 'all' }).pagination.totalItems).toBe(2);
    });

    it('searches title, content and description case-insensitively', () => {
      create('Email Writer');
      create('Other', { description: 'drafts an EMAIL' });
      create('Unrelated');

      const result = promptService.listPrompts(db, { q: 'email' });

      expect(result.items.map((p) => p.title)).toEqual(['Email Writer', 'Other']);
    });

    it('treats LIKE wildcards in the search text literally', () => {
      create('100% done');
      create('1000 done');
      expect(promptService.listPrompts(db, { q: '0%' }).items.map((p) => p.title)).toEqual([
        '100% done',
      ]);
    });

    it('filters by tags with any/all matching', () => {
      create('Both', { tags: ['x', 'y'] });
      create('OnlyX', { tags: ['x'] });
      create('None');

      expect(promptService.listPrompts(db, { tag: 'X,y' }).items.map((p) => p.title)).toEqual([
        'Both',
        'OnlyX',
      ]);
      expect(
        promptService.listPrompts(db, { tag: 'x,y', tagMatch: 'all' }).items.map((p) => p.title),
      ).toEqual(['Both']);
    });

    it('filters by creation date range', () => {
      const old = create('Old');
      const mid = create('Mid');
      const recent = create('Recent');
      setCreatedAt(old.id, '2024-01-01T00:00:00.000Z');
      setCreatedAt(mid.id, '2024-06-01T00:00:00.000Z');
      setCreatedAt(recent.id, '2025-01-01T00:00:00.000Z');

      const result = promptService.listPrompts(db, {
        createdAfter: '2024-03-01',
        createdBefore: '2024-12-31',
      });

      expect(result.items.map((p) => p.title)).toEqual(['Mid']);
    });

    it('sorts by title and by creation date', () => {
      const b = create('banana');
      const a = create('Apple');
      setCreatedAt(b.id, '2024-01-01T00:00:00.000Z');
      setCreatedAt(a.id, '2024-02-01T00:00:00.000Z');

      expect(promptService.listPrompts(db, { sortBy: 'title' }).items.map((p) => p.title)).toEqual(
        ['Apple', 'banana'],
      );
      expect(
        promptService.listPrompts(db, { sortBy: 'created' }).items.map((p) => p.title),
      ).toEqual(['Apple', 'banana']);
      expect(
        promptService.listPrompts(db, { sortBy: 'created', sortOrder: 'asc' }).items.map(
          (p) => p.title,
        ),
      ).toEqual(['banana', 'Apple']);
    });

    it('paginates and clamps the page size', () => {
      for (let i = 1; i <= 5; i++) create(`P${i}`);

      const page2 = promptService.listPrompts(db, { page: 2, pageSize: 2 });
      expect(page2.items.map((p) => p.title)).toEqual(['P3', 'P4']);
      expect(page2.pagination).toEqual({ page: 2, pageSize: 2, totalItems: 5, totalPages: 3 });

      expect(promptService.listPrompts(db, { pageSize: 500 }).pagination.pageSize).toBe(100);
      expect(promptService.listPrompts(db, {}, 3).pagination.pageSize).toBe(3);
    });
  });

  describe('bulkReorder()', () => {
    it('assigns positions by index and skips unknown ids', () => {
      const a = create('A');
      const b = create('B');
      const c = create('C');

      const updated = promptService.bulkReorder(db, [c.id, 999, a.id, b.id]);

      expect(updated).toBe(3);
      expect(promptService.getPromptById(db, c.id)?.sortOrder).toBe(0);
      expect(promptService.getPromptById(db, a.id)?.sortOrder).toBe(2);
      expect(promptService.getPromptById(db, b.id)?.sortOrder).toBe(3);
      expect(promptService.listPrompts(db, {}).items.map((p) => p.title)).toEqual(['C', 'A', 'B']);
    });

    it('leaves every position unchanged when a write fails midway', () => {
      const a = create('A');
      const b = create('B');
      const c = create('C');
      sqlite.exec(
        `CREATE TRIGGER fail_reorder BEFORE UPDATE ON prompts WHEN NEW.id = ${c.id}
         BEGIN SELECT RAISE(ABORT, 'disk full'); END`,
      );

      expect(() => promptService.bulkReorder(db, [b.id, a.id, c.id])).toThrow('disk full');

      expect([a, b, c].map((p) => promptService.getPromptById(db, p.id)?.sortOrder)).toEqual([
        0, 1, 2,
      ]);
    });

    it('is idempotent', () => {
      const a = create('A');
      const b = create('B');

      promptService.bulkReorder(db, [b.id, a.id]);
      const first = promptService.listPrompts(db, {}).items.map((p) => [p.id, p.sortOrder]);
      promptService.bulkReorder(db, [b.id, a.id]);
      const second = promptService.listPrompts(db, {}).items.map((p) => [p.id, p.sortOrder]);

      expect(second).toEqual(first);
      expect(first).toEqual([
        [b.id, 0],
        [a.id, 1],
      ]);
    });
  });

  describe('getPromptStatistics()', () => {
    it('returns zeros for an empty library', () => {
      expect(promptService.getPromptStatistics(db)).toEqual({
        total: 0,
        active: 0,
        inactive: 0,
        activePercentage: 0,
      });
    });

    it('counts active and inactive prompts', () => {
      create('A');
      create('B');
      const c = create('C');
      promptService.markInactive(db, c.id);

      expect(promptService.getPromptStatistics(db)).toEqual({
        total: 3,
        active: 2,
        inactive: 1,
        activePercentage: 66.7,
      });
    });
  });
});

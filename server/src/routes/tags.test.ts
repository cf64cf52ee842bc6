import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { buildApp } from '../app.js';
import * as userService from '../services/userService.js';
import * as sessionService from '../services/sessionService.js';
import * as promptService from '../services/promptService.js';
import type { FastifyInstance } from 'fastify';
import type {
  ApiErrorResponse,
  TagListResponse,
  TagResponse,
  TagWithCountResponse,
} from '@promptdeck/shared';

describe('Tag Routes', () => {
  let app: FastifyInstance;
  let tempDir: string;
  let originalEnv: NodeJS.ProcessEnv;
  let cookie: string;

  beforeEach(async () => {
    originalEnv = { ...process.env };
    tempDir = mkdtempSync(join(tmpdir(), 'promptdeck-tags-test-'));
    process.env.DATABASE_URL = join(tempDir, 'test.db');
    process.env.SECURE_COOKIES = 'false';
    process.env.LOG_LEVEL = 'error';

    app = await buildApp();

    const user = userService.findOrCreateOidcUser(
      app.db,
      { sub: 'sub-1', email: 'user@example.com', name: 'User', picture: null, hostedDomain: null },
      { accessPolicy: 'open', adminEmails: [] },
    );
    cookie = `promptdeck_session=${sessionService.createSession(app.db, user.id, 3600)}`;
  });

  afterEach(async () => {
    if (app) {
      await app.close();
    }
    process.env = originalEnv;
    rmSync(tempDir, { recursive: true, force: true });
  });

  function createTag(name: string, color?: string) {
    return app.inject({
      method: 'POST',
      url: '/api/tags',
      headers: { cookie },
      payload: color ? { name, color } : { name },
    });
  }

  describe('authentication', () => {
    it('returns 401 without a session', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/tags' });

      expect(response.statusCode).toBe(401);
      expect(response.json<ApiErrorResponse>().error.code).toBe('UNAUTHORIZED');
    });
  });

  describe('POST /api/tags', () => {
    it('stores the normalized name with the default color', async () => {
      const response = await createTag('  Code Review!! ');

      expect(response.statusCode).toBe(201);
      const tag = response.json<TagResponse>();
      expect(tag.name).toBe('code-review');
      expect(tag.color).toBe('#3B82F6');
      expect(typeof tag.id).toBe('number');
    });

    it('returns 409 for a name that normalizes to an existing tag', async () => {
      await createTag('Writing');
      const response = await createTag('  WRITING ');

      expect(response.statusCode).toBe(409);
      expect(response.json<ApiErrorResponse>().error.code).toBe('CONFLICT');
    });

    it('rejects a malformed color in the schema', async () => {
      const response = await createTag('style', 'blue');

      expect(response.statusCode).toBe(400);
      expect(response.json<ApiErrorResponse>().error.code).toBe('VALIDATION_ERROR');
    });

    it('rejects a name with no letters or digits', async () => {
      const response = await createTag('!!!');

      expect(response.statusCode).toBe(400);
      expect(response.json<ApiErrorResponse>().error.message).toBe(
        'Tag name must contain at least one letter or digit',
      );
    });
  });

  describe('GET /api/tags', () => {
    it('lists tags by name with usage counts', async () => {
      promptService.createPrompt(app.db, null, { title: 'P', content: 'c', tags: ['beta'] });
      await createTag('alpha');

      const response = await app.inject({ method: 'GET', url: '/api/tags', headers: { cookie } });

      expect(response.statusCode).toBe(200);
      const body = response.json<TagListResponse>();
      expect(body.tags.map((t) => [t.name, t.promptCount])).toEqual([
        ['alpha', 0],
        ['beta', 1],
      ]);
    });
  });

  describe('GET /api/tags/:id', () => {
    it('returns 404 for an unknown tag', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/tags/999', headers: { cookie } });

      expect(response.statusCode).toBe(404);
      expect(response.json<ApiErrorResponse>().error.message).toBe('Tag not found');
    });

    it('rejects a non-numeric id', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/tags/abc', headers: { cookie } });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('PATCH /api/tags/:id', () => {
    it('renames and recolors a tag', async () => {
      const tag = (await createTag('draft')).json<TagResponse>();

      const response = await app.inject({
        method: 'PATCH',
        url: `/api/tags/${tag.id}`,
        headers: { cookie },
        payload: { name: 'Final Draft', color: '#10B981' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json<TagResponse>()).toMatchObject({
        id: tag.id,
        name: 'final-draft',
        color: '#10B981',
      });
    });

    it('rejects an empty body', async () => {
      const tag = (await createTag('draft')).json<TagResponse>();

      const response = await app.inject({
        method: 'PATCH',
        url: `/api/tags/${tag.id}`,
        headers: { cookie },
        payload: {},
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('DELETE /api/tags/:id', () => {
    it('moves prompts to the reassignment target', async () => {
      const prompt = promptService.createPrompt(app.db, null, {
        title: 'P',
        content: 'c',
        tags: ['old'],
      });
      const target = (await createTag('new')).json<TagResponse>();
      const old = prompt.tags[0];

      const response = await app.inject({
        method: 'DELETE',
        url: `/api/tags/${old.id}?reassignTo=${target.id}`,
        headers: { cookie },
      });

      expect(response.statusCode).toBe(204);
      expect(promptService.getPromptDetail(app.db, prompt.id).tags.map((t) => t.name)).toEqual([
        'new',
      ]);
    });

    it('returns 404 for an unknown tag', async () => {
      const response = await app.inject({
        method: 'DELETE',
        url: '/api/tags/42',
        headers: { cookie },
      });

      expect(response.statusCode).toBe(404);
    });
  });

  describe('POST /api/tags/merge', () => {
    it('merges the source into the target and returns the target', async () => {
      promptService.createPrompt(app.db, null, { title: 'A', content: 'a', tags: ['ml'] });
      promptService.createPrompt(app.db, null, { title: 'B', content: 'b', tags: ['ai', 'ml'] });
      const tags = (
        await app.inject({ method: 'GET', url: '/api/tags', headers: { cookie } })
      ).json<TagListResponse>().tags;
      const ai = tags.find((t) => t.name === 'ai');
      const ml = tags.find((t) => t.name === 'ml');
      if (!ai || !ml) throw new Error('tags missing');

      const response = await app.inject({
        method: 'POST',
        url: '/api/tags/merge',
        headers: { cookie },
        payload: { sourceTagId: ml.id, targetTagId: ai.id },
      });

      expect(response.statusCode).toBe(200);
      const merged = response.json<TagWithCountResponse>();
      expect(merged.name).toBe('ai');
      expect(merged.promptCount).toBe(2);
    });

    it('refuses to merge a tag into itself', async () => {
      const tag = (await createTag('solo')).json<TagResponse>();

      const response = await app.inject({
        method: 'POST',
        url: '/api/tags/merge',
        headers: { cookie },
        payload: { sourceTagId: tag.id, targetTagId: tag.id },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<ApiErrorResponse>().error.message).toBe('Cannot merge a tag into itself');
    });
  });

  describe('GET /api/tags/popular and POST /api/tags/cleanup', () => {
    it('ranks used tags and removes unused ones', async () => {
      promptService.createPrompt(app.db, null, { title: 'A', content: 'a', tags: ['x', 'y'] });
      promptService.createPrompt(app.db, null, { title: 'B', content: 'b', tags: ['y'] });
      await createTag('unused');

      const popular = await app.inject({
        method: 'GET',
        url: '/api/tags/popular?limit=5',
        headers: { cookie },
      });
      expect(popular.json<TagListResponse>().tags.map((t) => [t.name, t.promptCount])).toEqual([
        ['y', 2],
        ['x', 1],
      ]);

      const cleanup = await app.inject({
        method: 'POST',
        url: '/api/tags/cleanup',
        headers: { cookie },
      });
      expect(cleanup.statusCode).toBe(200);
      expect(cleanup.json()).toEqual({ deleted: 1 });
    });
  });
});

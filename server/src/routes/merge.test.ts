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
  MergeHistoryResponse,
  MergeResponse,
  MergeValidationResponse,
} from '@promptdeck/shared';

describe('Merge Routes', () => {
  let app: FastifyInstance;
  let tempDir: string;
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(async () => {
    originalEnv = { ...process.env };
    tempDir = mkdtempSync(join(tmpdir(), 'promptdeck-merge-test-'));
    process.env.DATABASE_URL = join(tempDir, 'test.db');
    process.env.SECURE_COOKIES = 'false';
    process.env.LOG_LEVEL = 'error';

    app = await buildApp();
  });

  afterEach(async () => {
    if (app) {
      await app.close();
    }
    process.env = originalEnv;
    rmSync(tempDir, { recursive: true, force: true });
  });

  function createUserWithSession(email: string): string {
    const user = userService.findOrCreateOidcUser(
      app.db,
      { sub: `sub-${email}`, email, name: email, picture: null, hostedDomain: null },
      { accessPolicy: 'open', adminEmails: [] },
    );
    return `promptdeck_session=${sessionService.createSession(app.db, user.id, 3600)}`;
  }

  function seedPrompts(): number[] {
    return [
      promptService.createPrompt(app.db, null, { title: 'A', content: 'Alpha' }).id,
      promptService.createPrompt(app.db, null, { title: 'B', content: 'Beta' }).id,
    ];
  }

  describe('POST /api/prompts/merge', () => {
    it('merges in the order the ids are given', async () => {
      const cookie = createUserWithSession('user@example.com');
      const [a, b] = seedPrompts();

      const response = await app.inject({
        method: 'POST',
        url: '/api/prompts/merge',
        headers: { cookie },
        payload: { promptIds: [b, a], strategy: 'separator', options: { separator: ' | ' } },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<MergeResponse>();
      expect(body.mergedContent).toBe('## B\n\nBeta | ## A\n\nAlpha');
      expect(body.metadata.strategy).toBe('separator');
      expect(body.metadata.promptIds).toEqual([b, a]);
      expect(body.metadata.promptTitles).toEqual(['B', 'A']);
      expect(body.warnings).toEqual([]);
    });

    it('defaults to the simple strategy', async () => {
      const cookie = createUserWithSession('user@example.com');
      const [a, b] = seedPrompts();

      const response = await app.inject({
        method: 'POST',
        url: '/api/prompts/merge',
        headers: { cookie },
        payload: { promptIds: [a, b], options: { includeTitle: false } },
      });

      expect(response.json<MergeResponse>().mergedContent).toBe('Alpha\n\nBeta');
    });

    it('returns 400 MERGE_VALIDATION_FAILED for a single id', async () => {
      const cookie = createUserWithSession('user@example.com');
      const [a] = seedPrompts();

      const response = await app.inject({
        method: 'POST',
        url: '/api/prompts/merge',
        headers: { cookie },
        payload: { promptIds: [a] },
      });

      expect(response.statusCode).toBe(400);
      const error = response.json<ApiErrorResponse>().error;
      expect(error.code).toBe('MERGE_VALIDATION_FAILED');
      expect(error.message).toBe('At least 2 prompts required for merging');
    });

    it('returns 400 UNSUPPORTED_STRATEGY for an unknown strategy', async () => {
      const cookie = createUserWithSession('user@example.com');
      const [a, b] = seedPrompts();

      const response = await app.inject({
        method: 'POST',
        url: '/api/prompts/merge',
        headers: { cookie },
        payload: { promptIds: [a, b], strategy: 'shuffle' },
      });

      expect(response.statusCode).toBe(400);
      const error = response.json<ApiErrorResponse>().error;
      expect(error.code).toBe('UNSUPPORTED_STRATEGY');
      expect(error.message).toBe('Unknown merge strategy: shuffle');
    });

    it('returns 404 naming missing ids', async () => {
      const cookie = createUserWithSession('user@example.com');
      const [a] = seedPrompts();

      const response = await app.inject({
        method: 'POST',
        url: '/api/prompts/merge',
        headers: { cookie },
        payload: { promptIds: [a, 404] },
      });

      expect(response.statusCode).toBe(404);
      const error = response.json<ApiErrorResponse>().error;
      expect(error.message).toBe('Prompts not found: 404');
      expect(error.details).toEqual({ missingIds: [404] });
    });

    it('returns 400 for an empty template', async () => {
      const cookie = createUserWithSession('user@example.com');
      const [a, b] = seedPrompts();

      const response = await app.inject({
        method: 'POST',
        url: '/api/prompts/merge',
        headers: { cookie },
        payload: { promptIds: [a, b], strategy: 'template', options: { template: '' } },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<ApiErrorResponse>().error.message).toBe('Template cannot be empty');
    });
  });

  describe('POST /api/prompts/merge/validate', () => {
    it('reports errors without merging', async () => {
      const cookie = createUserWithSession('user@example.com');
      const [a] = seedPrompts();

      const response = await app.inject({
        method: 'POST',
        url: '/api/prompts/merge/validate',
        headers: { cookie },
        payload: { promptIds: [a, a, 99] },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json<MergeValidationResponse>()).toEqual({
        valid: false,
        errors: ['Duplicate prompt IDs found', 'Prompts not found: 99'],
        warnings: [],
      });
      expect(app.mergeHistory.size).toBe(0);
    });

    it('warns about inactive prompts', async () => {
      const cookie = createUserWithSession('user@example.com');
      const [a, b] = seedPrompts();
      promptService.deletePrompt(app.db, b);

      const response = await app.inject({
        method: 'POST',
        url: '/api/prompts/merge/validate',
        headers: { cookie },
        payload: { promptIds: [a, b] },
      });

      expect(response.json<MergeValidationResponse>()).toEqual({
        valid: true,
        errors: [],
        warnings: ['1 inactive prompt(s) included'],
      });
    });
  });

  describe('GET /api/prompts/merge/history', () => {
    it("returns only the caller's merges, newest first", async () => {
      const ada = createUserWithSession('ada@example.com');
      const bob = createUserWithSession('bob@example.com');
      const [a, b] = seedPrompts();

      for (const [cookie, strategy] of [
        [ada, 'simple'],
        [bob, 'numbered'],
        [ada, 'bulleted'],
      ]) {
        await app.inject({
          method: 'POST',
          url: '/api/prompts/merge',
          headers: { cookie },
          payload: { promptIds: [a, b], strategy },
        });
      }

      const response = await app.inject({
        method: 'GET',
        url: '/api/prompts/merge/history?limit=5',
        headers: { cookie: ada },
      });

      expect(response.statusCode).toBe(200);
      const { history } = response.json<MergeHistoryResponse>();
      expect(history.map((entry) => entry.strategy)).toEqual(['bulleted', 'simple']);
      expect(history[0].contentLength).toBeGreaterThan(0);
    });
  });
});

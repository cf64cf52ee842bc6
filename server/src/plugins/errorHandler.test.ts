import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FastifyInstance } from 'fastify';
import type { ApiErrorResponse } from '@promptdeck/shared';
import { buildApp } from '../app.js';
import {
  CircularAttachmentError,
  NotFoundError,
  UnsupportedStrategyError,
  ValidationError,
} from '../errors/AppError.js';

describe('Error Handler Plugin', () => {
  let app: FastifyInstance | undefined;
  let tempDir: string;
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    tempDir = mkdtempSync(join(tmpdir(), 'promptdeck-error-test-'));
    process.env.DATABASE_URL = join(tempDir, 'test.db');
  });

  afterEach(async () => {
    if (app) {
      await app.close();
      app = undefined;
    }
    process.env = originalEnv;
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('AppError handling', () => {
    it('maps NotFoundError to 404 with details', async () => {
      app = await buildApp();
      app.get('/test/not-found', async () => {
        throw new NotFoundError('Prompt not found', { missingIds: [7] });
      });

      const response = await app.inject({ method: 'GET', url: '/test/not-found' });

      expect(response.statusCode).toBe(404);
      expect(response.json<ApiErrorResponse>()).toEqual({
        error: {
          code: 'NOT_FOUND',
          message: 'Prompt not found',
          details: { missingIds: [7] },
        },
      });
    });

    it('omits details when not provided', async () => {
      app = await buildApp();
      app.get('/test/validation', async () => {
        throw new ValidationError('Title is required');
      });

      const response = await app.inject({ method: 'GET', url: '/test/validation' });

      expect(response.statusCode).toBe(400);
      expect(response.json<ApiErrorResponse>()).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Title is required' },
      });
    });

    it('maps business-rule errors to their own codes', async () => {
      app = await buildApp();
      app.get('/test/cycle', async () => {
        throw new CircularAttachmentError(undefined, { path: [2, 1] });
      });
      app.get('/test/strategy', async () => {
        throw new UnsupportedStrategyError('shuffle');
      });

      const cycle = await app.inject({ method: 'GET', url: '/test/cycle' });
      expect(cycle.statusCode).toBe(409);
      expect(cycle.json<ApiErrorResponse>().error).toEqual({
        code: 'CIRCULAR_ATTACHMENT',
        message: 'Attaching this prompt would create a circular reference',
        details: { path: [2, 1] },
      });

      const strategy = await app.inject({ method: 'GET', url: '/test/strategy' });
      expect(strategy.statusCode).toBe(400);
      expect(strategy.json<ApiErrorResponse>().error).toEqual({
        code: 'UNSUPPORTED_STRATEGY',
        message: 'Unknown merge strategy: shuffle',
        details: { strategy: 'shuffle' },
      });
    });
  });

  describe('Fastify validation error handling', () => {
    it('returns 400 with field-level details for schema validation errors', async () => {
      app = await buildApp();
      app.post(
        '/test/validated',
        {
          schema: {
            body: {
              type: 'object',
              required: ['title'],
              properties: { title: { type: 'string' } },
            },
          },
        },
        async () => ({ ok: true }),
      );

      const response = await app.inject({
        method: 'POST',
        url: '/test/validated',
        payload: { content: 'no title' },
      });

      expect(response.statusCode).toBe(400);
      const body = response.json<ApiErrorResponse>();
      expect(body.error.code).toBe('VALIDATION_ERROR');
      expect(body.error.message).toBe('Validation failed');
      expect(body.error.details).toEqual({
        fields: [
          {
            path: '/',
            message: "must have required property 'title'",
            params: { missingProperty: 'title' },
          },
        ],
      });
    });

    it('returns 400 for a malformed JSON body', async () => {
      app = await buildApp();
      app.post('/test/json', async () => ({ ok: true }));

      const response = await app.inject({
        method: 'POST',
        url: '/test/json',
        headers: { 'content-type': 'application/json' },
        payload: '{"broken":',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<ApiErrorResponse>().error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('Unknown error handling', () => {
    it('returns 500 with original message in development mode', async () => {
      process.env.NODE_ENV = 'development';
      app = await buildApp();
      app.get('/test/crash', async () => {
        throw new Error('disk I/O error');
      });

      const response = await app.inject({ method: 'GET', url: '/test/crash' });

      expect(response.statusCode).toBe(500);
      expect(response.json<ApiErrorResponse>().error).toEqual({
        code: 'INTERNAL_ERROR',
        message: 'disk I/O error',
      });
    });

    it('returns 500 with sanitized message in production mode', async () => {
      process.env.NODE_ENV = 'production';
      app = await buildApp();
      app.get('/test/crash', async () => {
        throw new Error('database path /secret/location.db is locked');
      });

      const response = await app.inject({ method: 'GET', url: '/test/crash' });

      expect(response.statusCode).toBe(500);
      expect(response.json<ApiErrorResponse>().error).toEqual({
        code: 'INTERNAL_ERROR',
        message: 'An internal error occurred',
      });
    });
  });

  describe('Not-found handler', () => {
    it('returns 404 ROUTE_NOT_FOUND for unknown API routes', async () => {
      app = await buildApp();

      const response = await app.inject({ method: 'POST', url: '/api/nonexistent' });

      expect(response.statusCode).toBe(404);
      expect(response.json<ApiErrorResponse>()).toEqual({
        error: {
          code: 'ROUTE_NOT_FOUND',
          message: 'Route POST /api/nonexistent not found',
        },
      });
    });
  });
});

import type { FastifyInstance } from 'fastify';
import { UnauthorizedError } from '../errors/AppError.js';
import * as promptService from '../services/promptService.js';
import type {
  BulkReorderRequest,
  BulkReorderResponse,
  CreatePromptRequest,
  DuplicatePromptRequest,
  PromptListQuery,
  PromptSortBy,
  SortDirection,
  UpdatePromptRequest,
} from '@promptdeck/shared';

const PROMPT_SORT_FIELDS: PromptSortBy[] = ['order', 'created', 'updated', 'title'];
const SORT_DIRECTIONS: SortDirection[] = ['asc', 'desc'];

const promptIdParams = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'integer', minimum: 1 },
  },
};

const tagsProperty = {
  type: 'array',
  items: { type: 'string', minLength: 1, maxLength: 200 },
  maxItems: 50,
};

// JSON schema for POST /api/prompts (create prompt)
const createPromptSchema = {
  body: {
    type: 'object',
    required: ['title', 'content'],
    properties: {
      title: { type: 'string', minLength: 1, maxLength: 500 },
      content: { type: 'string', minLength: 1 },
      description: { type: ['string', 'null'], maxLength: 2000 },
      tags: tagsProperty,
    },
    additionalProperties: false,
  },
};

// JSON schema for GET /api/prompts (list prompts)
const listPromptsSchema = {
  querystring: {
    type: 'object',
    properties: {
      page: { type: 'integer', minimum: 1 },
      pageSize: { type: 'integer', minimum: 1, maximum: 100 },
      q: { type: 'string' },
      tag: { type: 'string' },
      tagMatch: { type: 'string', enum: ['any', 'all'] },
      isActive: { type: 'string', enum: ['true', 'false', 'all'] },
      createdAfter: { type: 'string' },
      createdBefore: { type: 'string' },
      sortBy: { type: 'string', enum: PROMPT_SORT_FIELDS },
      sortOrder: { type: 'string', enum: SORT_DIRECTIONS },
    },
    additionalProperties: false,
  },
};

// JSON schema for PATCH /api/prompts/:id (update prompt)
const updatePromptSchema = {
  body: {
    type: 'object',
    properties: {
      title: { type: 'string', minLength: 1, maxLength: 500 },
      content: { type: 'string', minLength: 1 },
      description: { type: ['string', 'null'], maxLength: 2000 },
      isActive: { type: 'boolean' },
      tags: tagsProperty,
    },
    additionalProperties: false,
  },
  params: promptIdParams,
};

// JSON schema for DELETE /api/prompts/:id
const deletePromptSchema = {
  params: promptIdParams,
  querystring: {
    type: 'object',
    properties: {
      hard: { type: 'boolean' },
    },
    additionalProperties: false,
  },
};

// JSON schema for POST /api/prompts/:id/duplicate
const duplicatePromptSchema = {
  body: {
    type: 'object',
    properties: {
      title: { type: 'string', minLength: 1, maxLength: 500 },
    },
    additionalProperties: false,
  },
  params: promptIdParams,
};

// JSON schema for PUT /api/prompts/reorder
const reorderSchema = {
  body: {
    type: 'object',
    required: ['promptIds'],
    properties: {
      promptIds: {
        type: 'array',
        items: { type: 'integer', minimum: 1 },
        maxItems: 1000,
      },
    },
    additionalProperties: false,
  },
};

export default async function promptRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/prompts
   * List prompts with filtering, sorting and pagination.
   * Auth required: Yes
   */
  fastify.get<{ Querystring: PromptListQuery }>(
    '/',
    { schema: listPromptsSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const result = promptService.listPrompts(
        fastify.db,
        request.query,
        fastify.config.defaultPageSize,
      );
      return reply.status(200).send(result);
    },
  );

  /**
   * GET /api/prompts/statistics
   * Auth required: Yes
   */
  fastify.get('/statistics', async (request, reply) => {
    if (!request.user) {
      throw new UnauthorizedError();
    }

    return reply.status(200).send(promptService.getPromptStatistics(fastify.db));
  });

  /**
   * PUT /api/prompts/reorder
   * Set the manual order to the given id sequence. Unknown ids are skipped.
   * Auth required: Yes
   */
  fastify.put<{ Body: BulkReorderRequest }>(
    '/reorder',
    { schema: reorderSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const response: BulkReorderResponse = {
        updated: promptService.bulkReorder(fastify.db, request.body.promptIds),
      };
      return reply.status(200).send(response);
    },
  );

  /**
   * POST /api/prompts
   * Auth required: Yes
   */
  fastify.post<{ Body: CreatePromptRequest }>(
    '/',
    { schema: createPromptSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const prompt = promptService.createPrompt(fastify.db, request.user.id, request.body);
      return reply.status(201).send(prompt);
    },
  );

  /**
   * GET /api/prompts/:id
   * Auth required: Yes
   */
  fastify.get<{ Params: { id: number } }>(
    '/:id',
    { schema: { params: promptIdParams } },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      return reply.status(200).send(promptService.getPromptDetail(fastify.db, request.params.id));
    },
  );

  /**
   * PATCH /api/prompts/:id
   * Partial update; `tags` replaces the tag set.
   * Auth required: Yes
   */
  fastify.patch<{ Params: { id: number }; Body: UpdatePromptRequest }>(
    '/:id',
    { schema: updatePromptSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const prompt = promptService.updatePrompt(fastify.db, request.params.id, request.body);
      return reply.status(200).send(prompt);
    },
  );

  /**
   * DELETE /api/prompts/:id?hard=true
   * Soft delete by default; `hard=true` removes the prompt and its edges.
   * Auth required: Yes
   */
  fastify.delete<{ Params: { id: number }; Querystring: { hard?: boolean } }>(
    '/:id',
    { schema: deletePromptSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const hard = request.query.hard === true;
      promptService.deletePrompt(fastify.db, request.params.id, { hard });
      request.log.info({ promptId: request.params.id, hard }, 'Prompt deleted');
      return reply.status(204).send();
    },
  );

  /**
   * POST /api/prompts/:id/restore
   * Auth required: Yes
   */
  fastify.post<{ Params: { id: number } }>(
    '/:id/restore',
    { schema: { params: promptIdParams } },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      return reply.status(200).send(promptService.restorePrompt(fastify.db, request.params.id));
    },
  );

  /**
   * POST /api/prompts/:id/duplicate
   * Copy a prompt with its tags. Title defaults to "Copy of <title>".
   * Auth required: Yes
   */
  fastify.post<{ Params: { id: number }; Body: DuplicatePromptRequest }>(
    '/:id/duplicate',
    { schema: duplicatePromptSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const prompt = promptService.duplicatePrompt(
        fastify.db,
        request.user.id,
        request.params.id,
        request.body.title,
      );
      return reply.status(201).send(prompt);
    },
  );
}

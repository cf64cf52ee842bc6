import type { FastifyInstance } from 'fastify';
import { UnauthorizedError } from '../errors/AppError.js';
import * as tagService from '../services/tagService.js';
import type {
  CreateTagRequest,
  MergeTagsRequest,
  TagListResponse,
  UpdateTagRequest,
} from '@promptdeck/shared';

const colorProperty = { type: 'string', pattern: '^#[0-9A-Fa-f]{6}$' };

const tagIdParams = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'integer', minimum: 1 },
  },
};

// JSON schema for POST /api/tags (create tag)
const createTagSchema = {
  body: {
    type: 'object',
    required: ['name'],
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 200 },
      color: colorProperty,
    },
    additionalProperties: false,
  },
};

// JSON schema for PATCH /api/tags/:id (update tag)
const updateTagSchema = {
  body: {
    type: 'object',
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 200 },
      color: colorProperty,
    },
    additionalProperties: false,
    minProperties: 1,
  },
  params: tagIdParams,
};

// JSON schema for DELETE /api/tags/:id (optional reassignment target)
const deleteTagSchema = {
  params: tagIdParams,
  querystring: {
    type: 'object',
    properties: {
      reassignTo: { type: 'integer', minimum: 1 },
    },
    additionalProperties: false,
  },
};

// JSON schema for POST /api/tags/merge
const mergeTagsSchema = {
  body: {
    type: 'object',
    required: ['sourceTagId', 'targetTagId'],
    properties: {
      sourceTagId: { type: 'integer', minimum: 1 },
      targetTagId: { type: 'integer', minimum: 1 },
    },
    additionalProperties: false,
  },
};

// JSON schema for GET /api/tags/popular
const popularTagsSchema = {
  querystring: {
    type: 'object',
    properties: {
      limit: { type: 'integer', minimum: 1, maximum: 100 },
    },
    additionalProperties: false,
  },
};

export default async function tagRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/tags
   * List all tags with usage counts, sorted by name.
   * Auth required: Yes
   */
  fastify.get('/', async (request, reply) => {
    if (!request.user) {
      throw new UnauthorizedError();
    }

    const response: TagListResponse = { tags: tagService.listTags(fastify.db) };
    return reply.status(200).send(response);
  });

  /**
   * GET /api/tags/popular
   * Most used tags first.
   * Auth required: Yes
   */
  fastify.get<{ Querystring: { limit?: number } }>(
    '/popular',
    { schema: popularTagsSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const response: TagListResponse = {
        tags: tagService.getPopularTags(fastify.db, request.query.limit),
      };
      return reply.status(200).send(response);
    },
  );

  /**
   * GET /api/tags/:id
   * Auth required: Yes
   */
  fastify.get<{ Params: { id: number } }>(
    '/:id',
    { schema: { params: tagIdParams } },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      return reply.status(200).send(tagService.getTagById(fastify.db, request.params.id));
    },
  );

  /**
   * POST /api/tags
   * Create a new tag. The name is stored normalized.
   * Auth required: Yes
   */
  fastify.post<{ Body: CreateTagRequest }>(
    '/',
    { schema: createTagSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const tag = tagService.createTag(fastify.db, request.body);
      return reply.status(201).send(tag);
    },
  );

  /**
   * POST /api/tags/merge
   * Move every prompt of the source tag to the target tag and delete the source.
   * Auth required: Yes
   */
  fastify.post<{ Body: MergeTagsRequest }>(
    '/merge',
    { schema: mergeTagsSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const tag = tagService.mergeTags(
        fastify.db,
        request.body.sourceTagId,
        request.body.targetTagId,
      );
      return reply.status(200).send(tag);
    },
  );

  /**
   * POST /api/tags/cleanup
   * Delete all tags that no prompt uses.
   * Auth required: Yes
   */
  fastify.post('/cleanup', async (request, reply) => {
    if (!request.user) {
      throw new UnauthorizedError();
    }

    const deleted = tagService.cleanupUnusedTags(fastify.db);
    request.log.info({ deleted }, 'Removed unused tags');
    return reply.status(200).send({ deleted });
  });

  /**
   * PATCH /api/tags/:id
   * Update a tag's name and/or color.
   * Auth required: Yes
   */
  fastify.patch<{ Params: { id: number }; Body: UpdateTagRequest }>(
    '/:id',
    { schema: updateTagSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const tag = tagService.updateTag(fastify.db, request.params.id, request.body);
      return reply.status(200).send(tag);
    },
  );

  /**
   * DELETE /api/tags/:id?reassignTo=<tagId>
   * Delete a tag, optionally moving its prompts to another tag first.
   * Auth required: Yes
   */
  fastify.delete<{ Params: { id: number }; Querystring: { reassignTo?: number } }>(
    '/:id',
    { schema: deleteTagSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      tagService.deleteTag(fastify.db, request.params.id, request.query.reassignTo);
      return reply.status(204).send();
    },
  );
}

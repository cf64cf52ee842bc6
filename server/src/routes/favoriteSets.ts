import type { FastifyInstance } from 'fastify';
import { UnauthorizedError } from '../errors/AppError.js';
import * as favoriteSetService from '../services/favoriteSetService.js';
import { mergePrompts } from '../services/mergeService.js';
import type {
  CreateFavoriteSetRequest,
  FavoriteSetListResponse,
  MergeOptions,
  UpdateFavoriteSetRequest,
} from '@promptdeck/shared';

const setIdParams = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'integer', minimum: 1 },
  },
};

const promptIdsProperty = {
  type: 'array',
  items: { type: 'integer', minimum: 1 },
  maxItems: 200,
};

const createSetSchema = {
  body: {
    type: 'object',
    required: ['name'],
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 200 },
      description: { type: ['string', 'null'], maxLength: 2000 },
      promptIds: promptIdsProperty,
    },
    additionalProperties: false,
  },
};

const updateSetSchema = {
  body: {
    type: 'object',
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 200 },
      description: { type: ['string', 'null'], maxLength: 2000 },
      isActive: { type: 'boolean' },
      promptIds: promptIdsProperty,
    },
    additionalProperties: false,
  },
  params: setIdParams,
};

const mergeSetSchema = {
  body: {
    type: 'object',
    properties: {
      strategy: { type: 'string', minLength: 1 },
      options: {
        type: 'object',
        properties: {
          includeTitle: { type: 'boolean' },
          includeDescription: { type: 'boolean' },
          separator: { type: 'string', maxLength: 200 },
          numberFormat: { type: 'string', maxLength: 50 },
          bullet: { type: 'string', maxLength: 20 },
          template: { type: 'string' },
        },
        additionalProperties: false,
      },
    },
    additionalProperties: false,
  },
  params: setIdParams,
};

export default async function favoriteSetRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/favorite-sets
   * The current user's sets, sorted by name.
   * Auth required: Yes
   */
  fastify.get('/', async (request, reply) => {
    if (!request.user) {
      throw new UnauthorizedError();
    }

    const response: FavoriteSetListResponse = {
      favoriteSets: favoriteSetService.listFavoriteSets(fastify.db, request.user.id),
    };
    return reply.status(200).send(response);
  });

  /**
   * POST /api/favorite-sets
   * Auth required: Yes
   */
  fastify.post<{ Body: CreateFavoriteSetRequest }>(
    '/',
    { schema: createSetSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const set = favoriteSetService.createFavoriteSet(fastify.db, request.user.id, request.body);
      return reply.status(201).send(set);
    },
  );

  /**
   * GET /api/favorite-sets/:id
   * Auth required: Yes
   */
  fastify.get<{ Params: { id: number } }>(
    '/:id',
    { schema: { params: setIdParams } },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const set = favoriteSetService.getFavoriteSet(fastify.db, request.user.id, request.params.id);
      return reply.status(200).send(set);
    },
  );

  /**
   * PATCH /api/favorite-sets/:id
   * `promptIds`, when given, replaces the items.
   * Auth required: Yes
   */
  fastify.patch<{ Params: { id: number }; Body: UpdateFavoriteSetRequest }>(
    '/:id',
    { schema: updateSetSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const set = favoriteSetService.updateFavoriteSet(
        fastify.db,
        request.user.id,
        request.params.id,
        request.body,
      );
      return reply.status(200).send(set);
    },
  );

  /**
   * DELETE /api/favorite-sets/:id
   * Auth required: Yes
   */
  fastify.delete<{ Params: { id: number } }>(
    '/:id',
    { schema: { params: setIdParams } },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      favoriteSetService.deleteFavoriteSet(fastify.db, request.user.id, request.params.id);
      return reply.status(204).send();
    },
  );

  /**
   * POST /api/favorite-sets/:id/merge
   * Merge the set's prompts in position order.
   * Auth required: Yes
   */
  fastify.post<{ Params: { id: number }; Body: { strategy?: string; options?: MergeOptions } }>(
    '/:id/merge',
    { schema: mergeSetSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const promptIds = favoriteSetService.getFavoriteSetPromptIds(
        fastify.db,
        request.user.id,
        request.params.id,
      );
      const result = mergePrompts(fastify.db, promptIds, request.body.strategy, request.body.options, {
        history: fastify.mergeHistory,
        userId: request.user.id,
      });
      return reply.status(200).send(result);
    },
  );
}

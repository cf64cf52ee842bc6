import type { FastifyInstance } from 'fastify';
import { UnauthorizedError } from '../errors/AppError.js';
import * as mergeService from '../services/mergeService.js';
import type {
  MergeHistoryResponse,
  MergeRequest,
  MergeValidationRequest,
} from '@promptdeck/shared';

const promptIdsProperty = {
  type: 'array',
  items: { type: 'integer', minimum: 1 },
  maxItems: 200,
};

const mergeOptionsProperty = {
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
};

// Strategy names are checked by the merge service so unknown ones get UNSUPPORTED_STRATEGY
const mergeSchema = {
  body: {
    type: 'object',
    required: ['promptIds'],
    properties: {
      promptIds: promptIdsProperty,
      strategy: { type: 'string', minLength: 1 },
      options: mergeOptionsProperty,
    },
    additionalProperties: false,
  },
};

const validateMergeSchema = {
  body: {
    type: 'object',
    required: ['promptIds'],
    properties: {
      promptIds: promptIdsProperty,
    },
    additionalProperties: false,
  },
};

const historySchema = {
  querystring: {
    type: 'object',
    properties: {
      limit: { type: 'integer', minimum: 1, maximum: 100 },
    },
    additionalProperties: false,
  },
};

export default async function mergeRoutes(fastify: FastifyInstance) {
  /**
   * POST /api/prompts/merge
   * Merge prompts, in the order given, with the selected strategy.
   * Auth required: Yes
   */
  fastify.post<{ Body: MergeRequest }>('/', { schema: mergeSchema }, async (request, reply) => {
    if (!request.user) {
      throw new UnauthorizedError();
    }

    const { promptIds, strategy, options } = request.body;
    const result = mergeService.mergePrompts(fastify.db, promptIds, strategy, options, {
      history: fastify.mergeHistory,
      userId: request.user.id,
    });

    request.log.info(
      { strategy: result.metadata.strategy, promptCount: result.metadata.promptCount },
      'Prompts merged',
    );
    return reply.status(200).send(result);
  });

  /**
   * POST /api/prompts/merge/validate
   * Dry-run check: reports errors and warnings without merging.
   * Auth required: Yes
   */
  fastify.post<{ Body: MergeValidationRequest }>(
    '/validate',
    { schema: validateMergeSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      return reply.status(200).send(mergeService.validateMerge(fastify.db, request.body.promptIds));
    },
  );

  /**
   * GET /api/prompts/merge/history?limit=10
   * The current user's most recent merges, newest first. Not persisted across restarts.
   * Auth required: Yes
   */
  fastify.get<{ Querystring: { limit?: number } }>(
    '/history',
    { schema: historySchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const response: MergeHistoryResponse = {
        history: fastify.mergeHistory.recent(request.query.limit ?? 10, request.user.id),
      };
      return reply.status(200).send(response);
    },
  );
}

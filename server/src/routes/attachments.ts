import type { FastifyInstance } from 'fastify';
import { NotFoundError, UnauthorizedError } from '../errors/AppError.js';
import * as attachmentService from '../services/attachmentService.js';
import type {
  AttachmentListResponse,
  AttachmentValidationResponse,
  AttachPromptRequest,
  AvailablePromptsResponse,
  PopularCombinationsResponse,
  ReorderAttachmentsRequest,
} from '@promptdeck/shared';

const promptIdParams = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'integer', minimum: 1 },
  },
};

const edgeParams = {
  type: 'object',
  required: ['id', 'attachedId'],
  properties: {
    id: { type: 'integer', minimum: 1 },
    attachedId: { type: 'integer', minimum: 1 },
  },
};

// JSON schema for POST /api/prompts/:id/attach and /attach/validate
const attachSchema = {
  body: {
    type: 'object',
    required: ['attachedPromptId'],
    properties: {
      attachedPromptId: { type: 'integer', minimum: 1 },
    },
    additionalProperties: false,
  },
  params: promptIdParams,
};

// Entries are checked field by field in the service
const reorderSchema = {
  body: {
    type: 'object',
    required: ['orderData'],
    properties: {
      orderData: {
        type: 'array',
        items: {
          type: 'object',
          required: ['attachedPromptId', 'order'],
          properties: {
            attachedPromptId: { type: 'integer', minimum: 1 },
            order: { type: 'integer', minimum: 0 },
          },
        },
        maxItems: 500,
      },
    },
    additionalProperties: false,
  },
  params: promptIdParams,
};

const availableSchema = {
  params: promptIdParams,
  querystring: {
    type: 'object',
    properties: {
      exclude: { type: 'string', pattern: '^[0-9,\\s]*$' },
    },
    additionalProperties: false,
  },
};

const popularSchema = {
  querystring: {
    type: 'object',
    properties: {
      limit: { type: 'integer', minimum: 1, maximum: 100 },
    },
    additionalProperties: false,
  },
};

function parseIdList(value: string | undefined): number[] {
  if (!value) return [];
  return value
    .split(',')
    .map((part) => Number.parseInt(part.trim(), 10))
    .filter((id) => Number.isInteger(id) && id > 0);
}

export default async function attachmentRoutes(fastify: FastifyInstance) {
  const limits = () => ({ maxAttachments: fastify.config.maxAttachments });

  /**
   * GET /api/prompts/combinations/popular
   * Most used main/attached pairs.
   * Auth required: Yes
   */
  fastify.get<{ Querystring: { limit?: number } }>(
    '/combinations/popular',
    { schema: popularSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const response: PopularCombinationsResponse = {
        combinations: attachmentService.getPopularCombinations(fastify.db, request.query.limit),
      };
      return reply.status(200).send(response);
    },
  );

  /**
   * GET /api/prompts/:id/attached
   * Attached prompts in display order.
   * Auth required: Yes
   */
  fastify.get<{ Params: { id: number } }>(
    '/:id/attached',
    { schema: { params: promptIdParams } },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const response: AttachmentListResponse = {
        attachments: attachmentService.getAttachedPrompts(fastify.db, request.params.id),
      };
      return reply.status(200).send(response);
    },
  );

  /**
   * GET /api/prompts/:id/attached/available?exclude=1,2
   * Active prompts that are not yet attached.
   * Auth required: Yes
   */
  fastify.get<{ Params: { id: number }; Querystring: { exclude?: string } }>(
    '/:id/attached/available',
    { schema: availableSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const response: AvailablePromptsResponse = {
        prompts: attachmentService.getAvailableForAttachment(
          fastify.db,
          request.params.id,
          parseIdList(request.query.exclude),
        ),
      };
      return reply.status(200).send(response);
    },
  );

  /**
   * PUT /api/prompts/:id/attached/reorder
   * Auth required: Yes
   */
  fastify.put<{ Params: { id: number }; Body: ReorderAttachmentsRequest }>(
    '/:id/attached/reorder',
    { schema: reorderSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const response: AttachmentListResponse = {
        attachments: attachmentService.reorderAttachments(
          fastify.db,
          request.params.id,
          request.body.orderData,
        ),
      };
      return reply.status(200).send(response);
    },
  );

  /**
   * POST /api/prompts/:id/attach
   * Attach another prompt under this one.
   * Auth required: Yes
   */
  fastify.post<{ Params: { id: number }; Body: AttachPromptRequest }>(
    '/:id/attach',
    { schema: attachSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const attachment = attachmentService.attachPrompt(
        fastify.db,
        request.params.id,
        request.body.attachedPromptId,
        limits(),
      );
      return reply.status(201).send(attachment);
    },
  );

  /**
   * POST /api/prompts/:id/attach/validate
   * Report every rule an attach would break, without attaching.
   * Auth required: Yes
   */
  fastify.post<{ Params: { id: number }; Body: AttachPromptRequest }>(
    '/:id/attach/validate',
    { schema: attachSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const errors = attachmentService.validateAttachment(
        fastify.db,
        request.params.id,
        request.body.attachedPromptId,
        limits(),
      );
      const response: AttachmentValidationResponse = { valid: errors.length === 0, errors };
      return reply.status(200).send(response);
    },
  );

  /**
   * DELETE /api/prompts/:id/attach/:attachedId
   * Idempotent; reports whether an edge was removed.
   * Auth required: Yes
   */
  fastify.delete<{ Params: { id: number; attachedId: number } }>(
    '/:id/attach/:attachedId',
    { schema: { params: edgeParams } },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const detached = attachmentService.detachPrompt(
        fastify.db,
        request.params.id,
        request.params.attachedId,
      );
      return reply.status(200).send({ detached });
    },
  );

  /**
   * POST /api/prompts/:id/attach/:attachedId/use
   * Count one use of the attachment.
   * Auth required: Yes
   */
  fastify.post<{ Params: { id: number; attachedId: number } }>(
    '/:id/attach/:attachedId/use',
    { schema: { params: edgeParams } },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const { id, attachedId } = request.params;
      if (!attachmentService.incrementUsage(fastify.db, id, attachedId)) {
        throw new NotFoundError('Attachment not found', {
          mainPromptId: id,
          attachedPromptId: attachedId,
        });
      }
      return reply.status(204).send();
    },
  );
}

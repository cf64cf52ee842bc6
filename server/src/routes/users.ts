import type { FastifyInstance } from 'fastify';
import type { UpdateProfileRequest } from '@promptdeck/shared';
import { UnauthorizedError } from '../errors/AppError.js';
import * as userService from '../services/userService.js';

// Blank and over-long names are rejected by the service after trimming
const updateProfileSchema = {
  body: {
    type: 'object',
    required: ['displayName'],
    properties: {
      displayName: { type: 'string', minLength: 1 },
    },
    additionalProperties: false,
  },
};

export default async function userRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/users/me
   * Auth required: Yes
   */
  fastify.get('/me', async (request, reply) => {
    if (!request.user) {
      throw new UnauthorizedError();
    }
    return reply.status(200).send(userService.toUserResponse(request.user));
  });

  /**
   * PATCH /api/users/me
   * Rename the current user. Email, role and status come from the identity
   * provider and the admins, not from here.
   * Auth required: Yes
   */
  fastify.patch<{ Body: UpdateProfileRequest }>(
    '/me',
    { schema: updateProfileSchema },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const user = userService.updateDisplayName(
        fastify.db,
        request.user.id,
        request.body.displayName,
      );
      request.log.info({ userId: user.id }, 'Display name updated');

      return reply.status(200).send(userService.toUserResponse(user));
    },
  );
}

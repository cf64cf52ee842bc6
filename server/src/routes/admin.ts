import type { FastifyInstance } from 'fastify';
import type {
  AdminUserListQuery,
  ApproveUserRequest,
  CreateAllowlistEntryRequest,
  UserStatus,
} from '@promptdeck/shared';
import { UnauthorizedError } from '../errors/AppError.js';
import * as userService from '../services/userService.js';
import * as allowlistService from '../services/allowlistService.js';
import { requireRole } from '../plugins/auth.js';

const USER_STATUSES: UserStatus[] = ['pending', 'active', 'disabled'];

const userIdParams = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'string', minLength: 1 },
  },
};

// JSON schema for GET /api/admin/users
const listUsersSchema = {
  querystring: {
    type: 'object',
    properties: {
      status: { type: 'string', enum: USER_STATUSES },
      q: { type: 'string' },
    },
    additionalProperties: false,
  },
};

// JSON schema for POST /api/admin/users/:id/approve
const approveUserSchema = {
  body: {
    type: 'object',
    properties: {
      role: { type: 'string', enum: ['user', 'admin'] },
    },
    additionalProperties: false,
  },
  params: userIdParams,
};

// JSON schema for POST /api/admin/allowlist
const createAllowlistEntrySchema = {
  body: {
    type: 'object',
    required: ['email'],
    properties: {
      email: { type: 'string', minLength: 3, maxLength: 320 },
      defaultRole: { type: 'string', enum: ['user', 'admin'] },
      note: { type: ['string', 'null'], maxLength: 500 },
    },
    additionalProperties: false,
  },
};

export default async function adminRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/admin/users?status=pending&q=ada
   *
   * Lists accounts, optionally filtered by status and a search term.
   * Auth required: Yes (Admin only)
   */
  fastify.get<{ Querystring: AdminUserListQuery }>(
    '/users',
    { schema: listUsersSchema, preHandler: requireRole('admin') },
    async (request, reply) => {
      const users = userService.listUsers(fastify.db, request.query);
      return reply.status(200).send({ users: users.map(userService.toUserResponse) });
    },
  );

  /**
   * POST /api/admin/users/:id/approve
   *
   * Activates an account, optionally setting its role.
   * Auth required: Yes (Admin only)
   */
  fastify.post<{ Params: { id: string }; Body: ApproveUserRequest }>(
    '/users/:id/approve',
    { schema: approveUserSchema, preHandler: requireRole('admin') },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const user = userService.approveUser(
        fastify.db,
        request.user.id,
        request.params.id,
        request.body.role,
      );
      request.log.info({ userId: user.id, approvedBy: request.user.id }, 'User approved');
      return reply.status(200).send(userService.toUserResponse(user));
    },
  );

  /**
   * POST /api/admin/users/:id/disable
   *
   * Disables an account and ends its sessions. Admins cannot disable themselves.
   * Auth required: Yes (Admin only)
   */
  fastify.post<{ Params: { id: string } }>(
    '/users/:id/disable',
    { schema: { params: userIdParams }, preHandler: requireRole('admin') },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const user = userService.disableUser(fastify.db, request.user.id, request.params.id);
      request.log.info({ userId: user.id, disabledBy: request.user.id }, 'User disabled');
      return reply.status(200).send(userService.toUserResponse(user));
    },
  );

  /**
   * GET /api/admin/allowlist
   * Auth required: Yes (Admin only)
   */
  fastify.get('/allowlist', { preHandler: requireRole('admin') }, async (_request, reply) => {
    return reply.status(200).send({ entries: allowlistService.listAllowlist(fastify.db) });
  });

  /**
   * POST /api/admin/allowlist
   * Auth required: Yes (Admin only)
   */
  fastify.post<{ Body: CreateAllowlistEntryRequest }>(
    '/allowlist',
    { schema: createAllowlistEntrySchema, preHandler: requireRole('admin') },
    async (request, reply) => {
      if (!request.user) {
        throw new UnauthorizedError();
      }

      const entry = allowlistService.addAllowlistEntry(fastify.db, request.user.id, request.body);
      return reply.status(201).send(entry);
    },
  );

  /**
   * DELETE /api/admin/allowlist/:id
   * Auth required: Yes (Admin only)
   */
  fastify.delete<{ Params: { id: number } }>(
    '/allowlist/:id',
    {
      schema: {
        params: {
          type: 'object',
          required: ['id'],
          properties: { id: { type: 'integer', minimum: 1 } },
        },
      },
      preHandler: requireRole('admin'),
    },
    async (request, reply) => {
      allowlistService.removeAllowlistEntry(fastify.db, request.params.id);
      return reply.status(204).send();
    },
  );
}

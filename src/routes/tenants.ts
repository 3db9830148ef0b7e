import { FastifyInstance } from 'fastify';
import type { TenantService } from '../services/tenant.service.js';
import type { UserService } from '../services/user.service.js';
import { tenantBodySchema, type TenantBody } from './schemas.js';

interface InvitationBody {
  email: string;
  first_name: string;
  last_name: string;
}

interface TenantParams {
  tenantId: string;
}

interface TenantUserParams {
  tenantId: string;
  userId: string;
}

interface ActorHeaders {
  'x-actor-id': string;
}

export interface TenantRoutesOptions {
  tenantService: TenantService;
  userService: UserService;
}

export async function tenantRoutes(fastify: FastifyInstance, options: TenantRoutesOptions): Promise<void> {
  const { tenantService, userService } = options;

  fastify.post<{ Body: TenantBody }>(
    '/',
    { schema: { body: tenantBodySchema } },
    async (request, reply) => {
      const tenantId = await tenantService.createTenant({
        name: request.body.name,
        domain: request.body.domain,
      });
      return reply.code(201).send({ tenant_id: tenantId });
    }
  );

  // tenantId is the internal tenant id
  fastify.post<{ Params: TenantParams; Body: InvitationBody }>(
    '/:tenantId/invitations',
    {
      schema: {
        params: {
          type: 'object',
          required: ['tenantId'],
          properties: { tenantId: { type: 'string', format: 'uuid' } },
        },
        body: {
          type: 'object',
          required: ['email', 'first_name', 'last_name'],
          properties: {
            email: { type: 'string', format: 'email', maxLength: 320 },
            first_name: { type: 'string', minLength: 1, maxLength: 255 },
            last_name: { type: 'string', minLength: 1, maxLength: 255 },
          },
        },
      },
    },
    async (request, reply) => {
      const userId = await tenantService.inviteUser({
        tenantId: request.params.tenantId,
        email: request.body.email,
        firstName: request.body.first_name,
        lastName: request.body.last_name,
      });
      return reply.code(201).send({ user_id: userId });
    }
  );

  // Identity provider ids throughout; the gateway sets x-actor-id
  fastify.delete<{ Params: TenantUserParams; Headers: ActorHeaders }>(
    '/:tenantId/users/:userId',
    {
      schema: {
        headers: {
          type: 'object',
          required: ['x-actor-id'],
          properties: { 'x-actor-id': { type: 'string', minLength: 1 } },
        },
      },
    },
    async (request, reply) => {
      const { tenantId, userId } = request.params;
      await userService.deleteUser(userId, request.headers['x-actor-id'], tenantId);
      return reply.code(204).send();
    }
  );
}

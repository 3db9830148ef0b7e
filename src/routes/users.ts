import { FastifyInstance } from 'fastify';
import type { UserService } from '../services/user.service.js';
import { userBodySchema, type UserBody } from './schemas.js';

interface CreateUserBody extends UserBody {
  /** Identity provider id of the organization to join */
  organization_id?: string;
}

export interface UserRoutesOptions {
  userService: UserService;
}

export async function userRoutes(fastify: FastifyInstance, options: UserRoutesOptions): Promise<void> {
  const { userService } = options;

  fastify.post<{ Body: CreateUserBody }>(
    '/',
    {
      schema: {
        body: {
          ...userBodySchema,
          properties: {
            ...userBodySchema.properties,
            organization_id: { type: 'string', minLength: 1, maxLength: 255 },
          },
        },
      },
    },
    async (request, reply) => {
      const { body } = request;
      const userId = await userService.createUser(
        {
          username: body.username,
          email: body.email,
          firstName: body.first_name,
          lastName: body.last_name,
          password: body.password,
        },
        body.organization_id
      );
      return reply.code(201).send({ user_id: userId });
    }
  );
}

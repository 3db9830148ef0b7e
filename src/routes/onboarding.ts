import { FastifyInstance } from 'fastify';
import type { OnboardingService } from '../services/onboarding.service.js';
import { userBodySchema, tenantBodySchema, type UserBody, type TenantBody } from './schemas.js';

interface OnboardingBody {
  user: UserBody;
  tenant: TenantBody;
}

export interface OnboardingRoutesOptions {
  onboardingService: OnboardingService;
}

export async function onboardingRoutes(
  fastify: FastifyInstance,
  options: OnboardingRoutesOptions
): Promise<void> {
  const { onboardingService } = options;

  fastify.post<{ Body: OnboardingBody }>(
    '/',
    {
      schema: {
        body: {
          type: 'object',
          required: ['user', 'tenant'],
          properties: {
            user: userBodySchema,
            tenant: tenantBodySchema,
          },
        },
      },
    },
    async (request, reply) => {
      const { user, tenant } = request.body;

      const result = await onboardingService.onboardOrganization(
        {
          username: user.username,
          email: user.email,
          firstName: user.first_name,
          lastName: user.last_name,
          password: user.password,
        },
        { name: tenant.name, domain: tenant.domain }
      );

      return reply.code(201).send({
        user_id: result.userId,
        tenant_id: result.tenantId,
      });
    }
  );
}

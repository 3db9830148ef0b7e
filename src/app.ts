import Fastify, { FastifyInstance } from 'fastify';
import { config } from './config/index.js';
import { setupMetrics } from './config/metrics.js';
import { onboardingRoutes } from './routes/onboarding.js';
import { tenantRoutes } from './routes/tenants.js';
import { userRoutes } from './routes/users.js';
import { errorHandler } from './middleware/error-handler.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { getAllCircuitBreakerStats } from './utils/circuit-breaker.js';
import type { OnboardingService } from './services/onboarding.service.js';
import type { TenantService } from './services/tenant.service.js';
import type { UserService } from './services/user.service.js';

export interface AppDependencies {
  onboardingService: OnboardingService;
  tenantService: TenantService;
  userService: UserService;
  checkDatabase: () => Promise<boolean>;
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: config.logging.level,
      transport: config.server.nodeEnv === 'development' ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      } : undefined,
    },
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
  });

  requestIdMiddleware(fastify);

  await setupMetrics(fastify);

  fastify.setErrorHandler(errorHandler);

  fastify.get('/health', async (_request, reply) => {
    const dbOk = await deps.checkDatabase();

    return reply.code(dbOk ? 200 : 503).send({
      status: dbOk ? 'healthy' : 'unhealthy',
      checks: {
        database: dbOk ? 'ok' : 'error',
      },
      timestamp: new Date().toISOString(),
    });
  });

  // Readiness also requires the identity provider circuit to be closed
  fastify.get('/ready', async (_request, reply) => {
    const dbOk = await deps.checkDatabase();
    const circuitBreakers = getAllCircuitBreakerStats();
    const openCircuits = circuitBreakers.filter(cb => cb.state === 'open');

    const ready = dbOk && openCircuits.length === 0;

    return reply.code(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks: {
        database: dbOk ? 'ok' : 'error',
        circuitBreakers: {
          total: circuitBreakers.length,
          open: openCircuits.map(cb => cb.name),
        },
      },
      timestamp: new Date().toISOString(),
    });
  });

  await fastify.register(onboardingRoutes, {
    prefix: '/api/v1/onboarding',
    onboardingService: deps.onboardingService,
  });
  await fastify.register(tenantRoutes, {
    prefix: '/api/v1/tenants',
    tenantService: deps.tenantService,
    userService: deps.userService,
  });
  await fastify.register(userRoutes, {
    prefix: '/api/v1/users',
    userService: deps.userService,
  });

  return fastify;
}

import { config } from './config/index.js';
import { pool, checkDatabaseConnection, closeDatabase } from './config/database.js';
import { PgTransactionalStore } from './db/pg-store.js';
import { KeycloakProvider } from './providers/keycloak.provider.js';
import { FailureLogService } from './services/failure-log.service.js';
import { OnboardingService } from './services/onboarding.service.js';
import { TenantService } from './services/tenant.service.js';
import { UserService } from './services/user.service.js';
import type { WorkflowDependencies } from './services/saga-steps.js';
import { RegistrationWorker } from './workers/registration.worker.js';
import { buildApp } from './app.js';
import { logger } from './utils/logger.js';

const store = new PgTransactionalStore(pool);

const deps: WorkflowDependencies = {
  provider: new KeycloakProvider({
    baseUrl: config.identityProvider.baseUrl,
    realm: config.identityProvider.realm,
    clientId: config.identityProvider.clientId,
    clientSecret: config.identityProvider.clientSecret,
    requestTimeoutMs: config.identityProvider.requestTimeoutMs,
  }),
  store,
  failureLog: new FailureLogService(store.failureLogs),
  providerId: config.identityProvider.providerId,
  roles: config.roles,
  compensationTimeoutMs: config.saga.compensationTimeoutMs,
};

const worker = new RegistrationWorker({
  ...deps,
  intervalMs: config.reconciliation.intervalMs,
  windowMs: config.reconciliation.windowMs,
  initialDelayMs: config.reconciliation.initialDelayMs,
});

const fastify = await buildApp({
  onboardingService: new OnboardingService(deps),
  tenantService: new TenantService(deps),
  userService: new UserService(deps),
  checkDatabase: checkDatabaseConnection,
});

// Graceful shutdown
const shutdown = async (signal: string): Promise<void> => {
  logger.info({ signal }, 'Received shutdown signal');

  try {
    await worker.stop();
    await fastify.close();
    await closeDatabase();

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Error during shutdown');
    process.exit(1);
  }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

async function start(): Promise<void> {
  try {
    const dbOk = await checkDatabaseConnection();
    if (!dbOk) {
      throw new Error('Database connection failed');
    }
    logger.info('Database connected');

    await fastify.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info(
      { port: config.server.port, host: config.server.host },
      'Tenant onboarding service started'
    );

    if (config.reconciliation.enabled) {
      worker.start();
    } else {
      logger.info('Registration reconciliation disabled');
    }
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
}

await start();

import dotenv from 'dotenv';

dotenv.config();

// SECURITY: Validate that required secrets are set in production
const nodeEnv = process.env['NODE_ENV'] || 'development';
const isProduction = nodeEnv === 'production';

function requireEnvInProduction(key: string, defaultValue: string): string {
  const value = process.env[key];
  if (isProduction && !value) {
    throw new Error(`SECURITY: Required environment variable ${key} is not set in production`);
  }
  return value || defaultValue;
}

function intFromEnv(key: string, defaultValue: number): number {
  return parseInt(process.env[key] || String(defaultValue), 10);
}

const reconciliationIntervalMs = intFromEnv('RECONCILIATION_INTERVAL_MS', 60000);
// 1 hour + 10 minutes: overlapping windows absorb missed ticks
const reconciliationWindowMs = intFromEnv('RECONCILIATION_WINDOW_MS', 4200000);

if (reconciliationWindowMs <= reconciliationIntervalMs) {
  throw new Error(
    `RECONCILIATION_WINDOW_MS (${reconciliationWindowMs}) must be greater than RECONCILIATION_INTERVAL_MS (${reconciliationIntervalMs})`
  );
}

export const config = {
  server: {
    port: intFromEnv('PORT', 3000),
    host: process.env['HOST'] || '0.0.0.0',
    nodeEnv,
    isProduction,
  },
  database: {
    host: process.env['DB_HOST'] || 'localhost',
    port: intFromEnv('DB_PORT', 5432),
    name: process.env['DB_NAME'] || 'tenant_onboarding',
    user: process.env['DB_USER'] || 'postgres',
    password: requireEnvInProduction('DB_PASSWORD', 'postgres'),
    poolSize: intFromEnv('DB_POOL_SIZE', 10),
    ssl: process.env['DB_SSL'] === 'true',
  },
  identityProvider: {
    baseUrl: process.env['IDP_BASE_URL'] || 'http://localhost:8080',
    realm: process.env['IDP_REALM'] || 'tenants',
    clientId: process.env['IDP_CLIENT_ID'] || 'tenant-onboarding',
    clientSecret: requireEnvInProduction('IDP_CLIENT_SECRET', 'dev-client-secret'),
    // Row id of the seeded identity_providers entry every mapping points at
    providerId: process.env['IDENTITY_PROVIDER_ID'] || '049284c1-ff29-4f28-869f-f64300b69719',
    requestTimeoutMs: intFromEnv('IDP_REQUEST_TIMEOUT_MS', 10000),
  },
  roles: {
    administrator: process.env['ADMIN_ROLE_NAME'] || 'org-admin',
    member: process.env['MEMBER_ROLE_NAME'] || 'org-user',
  },
  saga: {
    compensationTimeoutMs: intFromEnv('SAGA_COMPENSATION_TIMEOUT_MS', 30000),
  },
  reconciliation: {
    enabled: process.env['RECONCILIATION_ENABLED'] !== 'false',
    intervalMs: reconciliationIntervalMs,
    windowMs: reconciliationWindowMs,
    initialDelayMs: intFromEnv('RECONCILIATION_INITIAL_DELAY_MS', 60000),
  },
  logging: {
    level: process.env['LOG_LEVEL'] || 'info',
  },
  circuitBreaker: {
    timeout: intFromEnv('CIRCUIT_BREAKER_TIMEOUT', 10000),
    errorThresholdPercentage: intFromEnv('CIRCUIT_BREAKER_ERROR_THRESHOLD', 50),
    resetTimeout: intFromEnv('CIRCUIT_BREAKER_RESET_TIMEOUT', 30000),
  },
} as const;

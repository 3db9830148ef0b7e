import { Pool, PoolConfig } from 'pg';
import { config } from './index.js';
import { logger } from '../utils/logger.js';

const poolConfig: PoolConfig = {
  host: config.database.host,
  port: config.database.port,
  database: config.database.name,
  user: config.database.user,
  password: config.database.password,
  max: config.database.poolSize,
  ssl: config.database.ssl ? { rejectUnauthorized: true } : undefined,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
};

export const pool = new Pool(poolConfig);

// Track consecutive errors so a single transient failure does not kill the process
let consecutiveErrors = 0;
const MAX_CONSECUTIVE_ERRORS = 5;

pool.on('error', (err) => {
  consecutiveErrors++;
  logger.error(
    { error: err.message, consecutiveErrors },
    'Unexpected error on idle database client'
  );

  if (consecutiveErrors >= MAX_CONSECUTIVE_ERRORS) {
    logger.fatal(
      { consecutiveErrors },
      'Too many consecutive database errors, initiating shutdown'
    );
    process.kill(process.pid, 'SIGTERM');
  }
});

pool.on('connect', () => {
  consecutiveErrors = 0;
});

export async function checkDatabaseConnection(): Promise<boolean> {
  try {
    const client = await pool.connect();
    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
    return true;
  } catch (error) {
    logger.error({ error }, 'Database connection check failed');
    return false;
  }
}

export async function closeDatabase(): Promise<void> {
  await pool.end();
}

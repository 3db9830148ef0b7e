import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { v4 as uuidv4 } from 'uuid';
import { pool } from '../../config/database.js';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const SEED_ROLES = [
  { name: config.roles.administrator, displayName: 'Organization administrator' },
  { name: config.roles.member, displayName: 'Organization member' },
];

async function runMigrations(): Promise<void> {
  logger.info('Starting database migrations');

  const client = await pool.connect();
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS migrations (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) NOT NULL UNIQUE,
        executed_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
      )
    `);

    const { rows } = await client.query(
      "SELECT name FROM migrations WHERE name = 'initial_schema'"
    );

    if (rows.length === 0) {
      logger.info('Applying initial schema');

      const schemaPath = join(__dirname, '..', 'schema.sql');
      const schema = readFileSync(schemaPath, 'utf-8');

      await client.query('BEGIN');
      await client.query(schema);
      await client.query("INSERT INTO migrations (name) VALUES ('initial_schema')");
      await client.query('COMMIT');

      logger.info('Initial schema applied');
    } else {
      logger.info('Initial schema already applied, skipping');
    }

    // Every external identity row points at this provider
    await client.query(
      `INSERT INTO identity_providers (id, name, provider_type, base_url)
       VALUES ($1, 'Keycloak', 'keycloak', $2)
       ON CONFLICT (id) DO NOTHING`,
      [config.identityProvider.providerId, config.identityProvider.baseUrl]
    );

    for (const role of SEED_ROLES) {
      await client.query(
        `INSERT INTO roles (id, name, display_name) VALUES ($1, $2, $3)
         ON CONFLICT (name) DO NOTHING`,
        [uuidv4(), role.name, role.displayName]
      );
    }

    logger.info('Migrations completed');
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      logger.error({ error: rollbackError }, 'Rollback of failed migration failed');
    });
    throw error;
  } finally {
    client.release();
  }
}

try {
  await runMigrations();
} catch (error) {
  logger.error({ error }, 'Migration failed');
  process.exitCode = 1;
} finally {
  await pool.end();
}

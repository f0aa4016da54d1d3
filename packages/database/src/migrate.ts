/**
 * Database schema migration.
 *
 * Applies `SCHEMA_SQL` over a single dedicated connection. Run once per deploy
 * (`npm run migrate`); the schema is idempotent.
 */
import { Client } from 'pg';

import { createLogger } from '@rights-parser/shared';

import type { DatabaseClientConfig } from './index';
import { SCHEMA_SQL } from './schema';

const log = createLogger('migrate');

export async function runMigrations(config: DatabaseClientConfig): Promise<void> {
  const client = new Client({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl ? { rejectUnauthorized: false } : false
  });

  await client.connect();
  log.info('Connected to database, applying schema', { database: config.database ?? null });
  try {
    await client.query(SCHEMA_SQL);
    log.info('Schema migration completed');
  } finally {
    // Ensure database connection is always closed
    await client.end();
  }
}

/**
 * Process-wide database client.
 *
 * The API server and the worker pool run in one process and share one pool.
 * The cached client is replaced only when the connection settings change.
 */

import { createLogger, errorMessage } from '@rights-parser/shared';

import { DatabaseClient, type DatabaseClientConfig } from './index';

const log = createLogger('database');

let cachedClient: DatabaseClient | null = null;

/**
 * Stable key of the cached client's configuration for change detection
 */
let cachedConfig: string | null = null;

/**
 * Get or create the shared DatabaseClient.
 *
 * IMPORTANT: Do not call db.end() on the returned client outside the shutdown path;
 * use `clearCachedClient()` there instead.
 *
 * @example
 * ```typescript
 * const db = getSharedDatabaseClient({ connectionString: process.env['DATABASE_URL'], maxRetries: 3 });
 * const job = await db.getJobById(jobId);
 * ```
 */
export function getSharedDatabaseClient(config: DatabaseClientConfig): DatabaseClient {
  // The password is left out; it only travels inside connectionString
  const configHash = JSON.stringify({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    maxRetries: config.maxRetries
  });

  if (cachedClient && cachedConfig === configHash) {
    return cachedClient;
  }

  if (cachedClient) {
    // Don't await - let it close in background
    cachedClient.end().catch(err => {
      log.error('Error closing old database client during config change', { error: errorMessage(err) });
    });
  }

  cachedClient = new DatabaseClient(config);
  cachedConfig = configHash;

  return cachedClient;
}

/**
 * Close and forget the shared client. Resolves once its pool has drained.
 */
export async function clearCachedClient(): Promise<void> {
  const client = cachedClient;
  cachedClient = null;
  cachedConfig = null;
  if (client) {
    await client.end();
  }
}

import 'dotenv/config';

import { errorMessage, createLogger, getConfig } from '@rights-parser/shared';
import { resolveDatabaseConfig, runMigrations } from '@rights-parser/database';

const log = createLogger('migrate');

async function main() {
  const config = getConfig();
  const dbConfig = await resolveDatabaseConfig(config.database, config.jobs.maxRetries);
  await runMigrations(dbConfig);
}

main().catch(err => {
  log.error('Migration failed', { error: errorMessage(err) });
  process.exit(1);
});

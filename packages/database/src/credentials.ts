/**
 * Database connection settings resolution.
 *
 * Credentials come from, in order:
 * 1. `DATABASE_URL` (connection string, used as-is)
 * 2. Explicit `DB_USER` / `DB_PASSWORD` for local development
 * 3. AWS Secrets Manager (`DATABASE_SECRET_ARN`, a JSON secret `{ username, password }`)
 */
import { z } from 'zod';

import { errorMessage, type AppConfig } from '@rights-parser/shared';

import type { DatabaseClientConfig } from './index';

const DbSecretSchema = z.object({
  username: z.string().optional(),
  password: z.string().optional()
});

export type SecretFetcher = (secretArn: string) => Promise<string>;

/**
 * Read a secret's string value from AWS Secrets Manager.
 */
export const fetchSecretString: SecretFetcher = async secretArn => {
  // Lazy import AWS SDK v3 to avoid loading it when no secret is configured
  const { SecretsManagerClient, GetSecretValueCommand } = await import('@aws-sdk/client-secrets-manager');
  const client = new SecretsManagerClient({});
  const res = await client.send(new GetSecretValueCommand({ SecretId: secretArn }));
  return res.SecretString ?? Buffer.from(res.SecretBinary ?? new Uint8Array()).toString('utf8');
};

export async function getDbCredentials(
  config: AppConfig['database'],
  fetchSecret: SecretFetcher = fetchSecretString
): Promise<{ user?: string; password?: string }> {
  if (config.user || config.password) {
    return { user: config.user, password: config.password };
  }
  if (!config.secretArn) return {};

  const secretString = await fetchSecret(config.secretArn);
  let raw: unknown;
  try {
    raw = JSON.parse(secretString || '{}');
  } catch (err) {
    throw new Error(`Database secret ${config.secretArn} is not JSON: ${errorMessage(err)}`);
  }
  const parsed = DbSecretSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Database secret ${config.secretArn} has an unexpected shape`);
  }
  return { user: parsed.data.username, password: parsed.data.password };
}

/**
 * Turn the `database` section of the app config into pg client settings.
 */
export async function resolveDatabaseConfig(
  config: AppConfig['database'],
  maxRetries: number,
  fetchSecret: SecretFetcher = fetchSecretString
): Promise<DatabaseClientConfig> {
  if (config.connectionString) {
    return { connectionString: config.connectionString, ssl: config.ssl, maxRetries };
  }
  const creds = await getDbCredentials(config, fetchSecret);
  return {
    host: config.host,
    port: config.port,
    database: config.database,
    user: creds.user,
    password: creds.password,
    ssl: config.ssl,
    maxRetries
  };
}

import { describe, it, expect, vi, beforeEach } from 'vitest';

const pg = vi.hoisted(() => {
  const options: unknown[] = [];
  const client = {
    connect: vi.fn(async () => {}),
    query: vi.fn(async (_sql: string) => ({ rows: [] })),
    end: vi.fn(async () => {})
  };
  return { client, options };
});

vi.mock('pg', () => ({
  Pool: vi.fn(),
  Client: vi.fn(function MockClient(options: unknown) {
    pg.options.push(options);
    return pg.client;
  })
}));

import { runMigrations } from './migrate';
import { SCHEMA_SQL } from './schema';

describe('runMigrations', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    pg.options.length = 0;
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('applies the schema over one connection and closes it', async () => {
    await runMigrations({ host: 'localhost', port: 5432, database: 'rights', user: 'app', password: 'test-secret', ssl: false });

    expect(pg.options).toEqual([
      {
        connectionString: undefined,
        host: 'localhost',
        port: 5432,
        database: 'rights',
        user: 'app',
        password: 'test-secret',
        ssl: false
      }
    ]);
    expect(pg.client.connect).toHaveBeenCalledTimes(1);
    expect(pg.client.query).toHaveBeenCalledWith(SCHEMA_SQL);
    expect(pg.client.end).toHaveBeenCalledTimes(1);
  });

  it('closes the connection when the schema fails to apply', async () => {
    pg.client.query.mockRejectedValueOnce(new Error('permission denied for schema public'));

    await expect(runMigrations({ connectionString: 'postgres://localhost/rights', ssl: true })).rejects.toThrow(
      'permission denied for schema public'
    );
    expect(pg.options[0]).toMatchObject({ connectionString: 'postgres://localhost/rights', ssl: { rejectUnauthorized: false } });
    expect(pg.client.end).toHaveBeenCalledTimes(1);
  });
});

import { describe, it, expect, vi, afterEach } from 'vitest';

const pg = vi.hoisted(() => {
  const pools: Array<{ end: ReturnType<typeof vi.fn> }> = [];
  return { pools };
});

vi.mock('pg', () => ({
  Pool: vi.fn(function MockPool() {
    const pool = { query: vi.fn(), connect: vi.fn(), end: vi.fn(async () => {}) };
    pg.pools.push(pool);
    return pool;
  }),
  Client: vi.fn()
}));

import { clearCachedClient, getSharedDatabaseClient } from './shared-client';

describe('getSharedDatabaseClient', () => {
  afterEach(async () => {
    await clearCachedClient();
    pg.pools.length = 0;
  });

  it('returns the same client for the same settings', () => {
    const config = { host: 'localhost', database: 'rights', user: 'app', password: 'test-secret', ssl: false };
    const first = getSharedDatabaseClient(config);
    expect(getSharedDatabaseClient({ ...config })).toBe(first);
    expect(pg.pools).toHaveLength(1);
  });

  it('replaces and closes the client when the settings change', async () => {
    const first = getSharedDatabaseClient({ host: 'db-a', ssl: false });
    const second = getSharedDatabaseClient({ host: 'db-b', ssl: false });

    expect(second).not.toBe(first);
    expect(pg.pools).toHaveLength(2);
    await vi.waitFor(() => expect(pg.pools[0]?.end).toHaveBeenCalledTimes(1));
  });

  it('closes the cached pool on clear', async () => {
    getSharedDatabaseClient({ host: 'localhost', ssl: false });
    await clearCachedClient();
    expect(pg.pools[0]?.end).toHaveBeenCalledTimes(1);
  });
});

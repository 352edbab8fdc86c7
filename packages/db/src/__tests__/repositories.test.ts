import { describe, it, expect, vi } from 'vitest';
import { PgUserRepository } from '../repositories/user-repository';
import { PgRunRepository } from '../repositories/run-repository';

interface FakeResult {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

/** Stands in for a PoolClient; answers queries in order. */
function fakeClient(...results: FakeResult[]) {
  const queue = [...results];
  return {
    query: vi.fn(async (_sql: string, _params?: unknown[]): Promise<FakeResult> => {
      return queue.shift() ?? { rows: [], rowCount: 0 };
    }),
  };
}

const normalize = (sql: string) => sql.replace(/\s+/g, ' ').trim();

describe('PgUserRepository', () => {
  const repo = new PgUserRepository();

  it('locks the user row and maps it', async () => {
    const expiry = new Date('2026-10-01T01:00:00Z');
    const client = fakeClient({
      rows: [
        {
          spotify_id: 'u1',
          active: true,
          refresh_token: 'test-refresh',
          access_token: 'test-access',
          expiry_timestamp: expiry,
        },
      ],
      rowCount: 1,
    });

    const user = await repo.findByIdForUpdate(client, 'u1');

    expect(user).toEqual({
      spotifyId: 'u1',
      active: true,
      refreshToken: 'test-refresh',
      accessToken: 'test-access',
      expiresAt: expiry,
    });
    const [sql, params] = client.query.mock.calls[0];
    expect(normalize(sql)).toMatch(/FOR UPDATE$/);
    expect(params).toEqual(['u1']);
  });

  it('treats an infinite expiry as long expired', async () => {
    const client = fakeClient({
      rows: [
        { spotify_id: 'u1', active: true, refresh_token: 'r', access_token: '', expiry_timestamp: -Infinity },
      ],
      rowCount: 1,
    });

    const user = await repo.findByIdForUpdate(client, 'u1');

    expect(user?.expiresAt.getTime()).toBe(0);
  });

  it('returns null for an unknown user', async () => {
    await expect(repo.findByIdForUpdate(fakeClient(), 'missing')).resolves.toBeNull();
  });

  it('lists active ids', async () => {
    const client = fakeClient({ rows: [{ spotify_id: 'a' }, { spotify_id: 'b' }], rowCount: 2 });

    await expect(repo.listActiveIds(client)).resolves.toEqual(['a', 'b']);
  });
});

describe('PgRunRepository', () => {
  const repo = new PgRunRepository();

  it('returns the inserted run', async () => {
    const client = fakeClient({ rows: [{ id: 3, date: '2026-09-01' }], rowCount: 1 });

    await expect(repo.findOrCreateByDate(client, '2026-09-01')).resolves.toEqual({ id: 3, date: '2026-09-01' });
    expect(client.query).toHaveBeenCalledTimes(1);
  });

  it('falls back to the existing run on a date conflict', async () => {
    const client = fakeClient({ rows: [], rowCount: 0 }, { rows: [{ id: 2, date: '2026-09-01' }], rowCount: 1 });

    await expect(repo.findOrCreateByDate(client, '2026-09-01')).resolves.toEqual({ id: 2, date: '2026-09-01' });
    expect(normalize(client.query.mock.calls[1][0])).toBe(
      "SELECT id, to_char(date, 'YYYY-MM-DD') AS date FROM botm_runs WHERE date = $1",
    );
  });

  it('reports whether a commit row was inserted', async () => {
    await expect(repo.insertUserRun(fakeClient({ rows: [], rowCount: 1 }), 1, 'u1')).resolves.toBe(true);
    await expect(repo.insertUserRun(fakeClient({ rows: [], rowCount: 0 }), 1, 'u1')).resolves.toBe(false);
  });

  it('maps history rows', async () => {
    const client = fakeClient({
      rows: [
        { id: 2, date: '2026-09-01', committed_count: 4 },
        { id: 1, date: '2026-08-01', committed_count: 0 },
      ],
      rowCount: 2,
    });

    await expect(repo.listHistory(client, 12)).resolves.toEqual([
      { id: 2, date: '2026-09-01', committedCount: 4 },
      { id: 1, date: '2026-08-01', committedCount: 0 },
    ]);
    expect(client.query.mock.calls[0][1]).toEqual([12]);
  });

  it('reads the remembered playlist id', async () => {
    const client = fakeClient({ rows: [{ playlist_id: 'pl-9' }], rowCount: 1 });

    await expect(repo.findPlaylistId(client, 1, 'u1')).resolves.toBe('pl-9');
    await expect(repo.findPlaylistId(fakeClient(), 1, 'u1')).resolves.toBeNull();
  });
});

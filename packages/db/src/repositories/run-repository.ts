import { type PoolClient } from 'pg';
import { type Run, type RunHistoryEntry, type RunRepository } from '@botm/domain';

const RUN_COLUMNS = `id, to_char(date, 'YYYY-MM-DD') AS date`;

export class PgRunRepository implements RunRepository {
  async findOrCreateByDate(tx: unknown, date: string): Promise<Run> {
    const client = tx as PoolClient;
    const inserted = await client.query(
      `INSERT INTO botm_runs (date)
       VALUES ($1)
       ON CONFLICT (date) DO NOTHING
       RETURNING ${RUN_COLUMNS}`,
      [date],
    );
    if (inserted.rows[0]) {
      return mapRunRow(inserted.rows[0]);
    }

    const existing = await client.query(`SELECT ${RUN_COLUMNS} FROM botm_runs WHERE date = $1`, [date]);
    if (!existing.rows[0]) {
      throw new Error(`Run for ${date} vanished after insert conflict`);
    }
    return mapRunRow(existing.rows[0]);
  }

  async listCommittedUserIds(tx: unknown, runId: number): Promise<string[]> {
    const client = tx as PoolClient;
    const result = await client.query('SELECT spotify_id FROM user_botm_runs WHERE botm_run_id = $1', [runId]);
    return result.rows.map((row: Record<string, unknown>) => String(row.spotify_id));
  }

  async isCommitted(tx: unknown, runId: number, spotifyId: string): Promise<boolean> {
    const client = tx as PoolClient;
    const result = await client.query(
      'SELECT 1 FROM user_botm_runs WHERE botm_run_id = $1 AND spotify_id = $2',
      [runId, spotifyId],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async insertUserRun(tx: unknown, runId: number, spotifyId: string): Promise<boolean> {
    const client = tx as PoolClient;
    const result = await client.query(
      `INSERT INTO user_botm_runs (botm_run_id, spotify_id)
       VALUES ($1, $2)
       ON CONFLICT (botm_run_id, spotify_id) DO NOTHING`,
      [runId, spotifyId],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async findPlaylistId(tx: unknown, runId: number, spotifyId: string): Promise<string | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      'SELECT playlist_id FROM botm_run_playlists WHERE botm_run_id = $1 AND spotify_id = $2',
      [runId, spotifyId],
    );
    return result.rows[0] ? String(result.rows[0].playlist_id) : null;
  }

  async savePlaylistId(tx: unknown, runId: number, spotifyId: string, playlistId: string): Promise<void> {
    const client = tx as PoolClient;
    await client.query(
      `INSERT INTO botm_run_playlists (botm_run_id, spotify_id, playlist_id)
       VALUES ($1, $2, $3)
       ON CONFLICT (botm_run_id, spotify_id) DO NOTHING`,
      [runId, spotifyId, playlistId],
    );
  }

  async listHistory(tx: unknown, limit: number): Promise<RunHistoryEntry[]> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT r.id, to_char(r.date, 'YYYY-MM-DD') AS date, COUNT(u.spotify_id)::int AS committed_count
       FROM botm_runs r
       LEFT JOIN user_botm_runs u ON u.botm_run_id = r.id
       GROUP BY r.id, r.date
       ORDER BY r.date DESC
       LIMIT $1`,
      [limit],
    );
    return result.rows.map((row: Record<string, unknown>) => ({
      ...mapRunRow(row),
      committedCount: Number(row.committed_count),
    }));
  }
}

function mapRunRow(row: Record<string, unknown>): Run {
  return {
    id: Number(row.id),
    date: String(row.date),
  };
}

import { type PoolClient } from 'pg';
import { type User, type UserRepository } from '@botm/domain';

export class PgUserRepository implements UserRepository {
  async listActiveIds(tx: unknown): Promise<string[]> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT spotify_id
       FROM users
       WHERE active
       ORDER BY spotify_id`,
    );
    return result.rows.map((row: Record<string, unknown>) => String(row.spotify_id));
  }

  async findByIdForUpdate(tx: unknown, spotifyId: string): Promise<User | null> {
    const client = tx as PoolClient;
    const result = await client.query(
      `SELECT spotify_id, active, refresh_token, access_token, expiry_timestamp
       FROM users
       WHERE spotify_id = $1
       FOR UPDATE`,
      [spotifyId],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async updateAccessToken(tx: unknown, spotifyId: string, accessToken: string, expiresAt: Date): Promise<void> {
    const client = tx as PoolClient;
    await client.query(
      `UPDATE users
       SET access_token = $2,
           expiry_timestamp = $3
       WHERE spotify_id = $1`,
      [spotifyId, accessToken, expiresAt],
    );
  }

  async updateRefreshToken(tx: unknown, spotifyId: string, refreshToken: string): Promise<void> {
    const client = tx as PoolClient;
    await client.query('UPDATE users SET refresh_token = $2 WHERE spotify_id = $1', [spotifyId, refreshToken]);
  }

  async deactivate(tx: unknown, spotifyId: string): Promise<void> {
    const client = tx as PoolClient;
    await client.query('UPDATE users SET active = FALSE WHERE spotify_id = $1', [spotifyId]);
  }
}

function mapUserRow(row: Record<string, unknown>): User {
  return {
    spotifyId: String(row.spotify_id),
    active: row.active === true,
    refreshToken: String(row.refresh_token ?? ''),
    accessToken: String(row.access_token ?? ''),
    // pg yields a number (-Infinity) rather than a Date for '-infinity'
    expiresAt: row.expiry_timestamp instanceof Date ? row.expiry_timestamp : new Date(0),
  };
}

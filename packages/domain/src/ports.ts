import { type User, type TokenGrant } from './user';
import { type Run, type RunHistoryEntry, type TopTrack, type TopTracksPeriod } from './run';

export interface UserRepository {
  listActiveIds(tx: unknown): Promise<string[]>;
  /** Locks the row until the surrounding transaction ends. */
  findByIdForUpdate(tx: unknown, spotifyId: string): Promise<User | null>;
  updateAccessToken(tx: unknown, spotifyId: string, accessToken: string, expiresAt: Date): Promise<void>;
  updateRefreshToken(tx: unknown, spotifyId: string, refreshToken: string): Promise<void>;
  deactivate(tx: unknown, spotifyId: string): Promise<void>;
}

export interface RunRepository {
  /** Inserts the run for `date` unless one exists; returns the stored run either way. */
  findOrCreateByDate(tx: unknown, date: string): Promise<Run>;
  listCommittedUserIds(tx: unknown, runId: number): Promise<string[]>;
  isCommitted(tx: unknown, runId: number, spotifyId: string): Promise<boolean>;
  /** Returns false when the (run, user) pair was already present. */
  insertUserRun(tx: unknown, runId: number, spotifyId: string): Promise<boolean>;
  findPlaylistId(tx: unknown, runId: number, spotifyId: string): Promise<string | null>;
  savePlaylistId(tx: unknown, runId: number, spotifyId: string, playlistId: string): Promise<void>;
  listHistory(tx: unknown, limit: number): Promise<RunHistoryEntry[]>;
}

export interface SpotifyAuthPort {
  refreshAccessToken(refreshToken: string): Promise<TokenGrant>;
}

export interface MusicApiPort {
  fetchTopTracks(accessToken: string, period: TopTracksPeriod, limit: number): Promise<TopTrack[]>;
  createPlaylist(
    accessToken: string,
    spotifyId: string,
    details: { name: string; description: string },
  ): Promise<string>;
  replaceTracks(accessToken: string, playlistId: string, uris: string[]): Promise<void>;
}

export interface AccessTokenProvider {
  getValidAccessToken(spotifyId: string, opts?: { staleToken?: string }): Promise<string>;
}

export interface JobScheduler {
  schedule<T>(job: () => Promise<T>): Promise<T>;
}

export interface LoggerPort {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
}

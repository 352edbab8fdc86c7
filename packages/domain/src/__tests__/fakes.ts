import { vi } from 'vitest';
import { type User } from '../user';
import { type Run, type RunHistoryEntry, type TopTrack } from '../run';
import { type JobScheduler, type LoggerPort, type RunRepository, type UserRepository } from '../ports';

export const NOW = new Date('2026-10-01T00:05:00Z');

export function makeUser(overrides: Partial<User> & { spotifyId: string }): User {
  return {
    active: true,
    refreshToken: `refresh-${overrides.spotifyId}`,
    accessToken: 'stored-token',
    expiresAt: new Date(NOW.getTime() + 3_600_000),
    ...overrides,
  };
}

export function makeTrack(n: number): TopTrack {
  return { id: `t${n}`, uri: `spotify:track:t${n}`, name: `Track ${n}` };
}

export class InMemoryUserRepository implements UserRepository {
  readonly users = new Map<string, User>();

  add(user: User): void {
    this.users.set(user.spotifyId, { ...user });
  }

  async listActiveIds(_tx: unknown): Promise<string[]> {
    return [...this.users.values()].filter((u) => u.active).map((u) => u.spotifyId);
  }

  async findByIdForUpdate(_tx: unknown, spotifyId: string): Promise<User | null> {
    const user = this.users.get(spotifyId);
    return user ? { ...user } : null;
  }

  async updateAccessToken(_tx: unknown, spotifyId: string, accessToken: string, expiresAt: Date): Promise<void> {
    const user = this.users.get(spotifyId);
    if (user) {
      user.accessToken = accessToken;
      user.expiresAt = expiresAt;
    }
  }

  async updateRefreshToken(_tx: unknown, spotifyId: string, refreshToken: string): Promise<void> {
    const user = this.users.get(spotifyId);
    if (user) user.refreshToken = refreshToken;
  }

  async deactivate(_tx: unknown, spotifyId: string): Promise<void> {
    const user = this.users.get(spotifyId);
    if (user) user.active = false;
  }
}

export class InMemoryRunRepository implements RunRepository {
  readonly runs: Run[] = [];
  readonly userRuns: Array<{ runId: number; spotifyId: string }> = [];
  readonly playlists = new Map<string, string>();
  private nextId = 1;

  async findOrCreateByDate(_tx: unknown, date: string): Promise<Run> {
    const existing = this.runs.find((r) => r.date === date);
    if (existing) return { ...existing };
    const run = { id: this.nextId++, date };
    this.runs.push(run);
    return { ...run };
  }

  async listCommittedUserIds(_tx: unknown, runId: number): Promise<string[]> {
    return this.userRuns.filter((r) => r.runId === runId).map((r) => r.spotifyId);
  }

  async isCommitted(_tx: unknown, runId: number, spotifyId: string): Promise<boolean> {
    return this.userRuns.some((r) => r.runId === runId && r.spotifyId === spotifyId);
  }

  async insertUserRun(_tx: unknown, runId: number, spotifyId: string): Promise<boolean> {
    if (this.userRuns.some((r) => r.runId === runId && r.spotifyId === spotifyId)) return false;
    this.userRuns.push({ runId, spotifyId });
    return true;
  }

  async findPlaylistId(_tx: unknown, runId: number, spotifyId: string): Promise<string | null> {
    return this.playlists.get(`${runId}:${spotifyId}`) ?? null;
  }

  async savePlaylistId(_tx: unknown, runId: number, spotifyId: string, playlistId: string): Promise<void> {
    const key = `${runId}:${spotifyId}`;
    if (!this.playlists.has(key)) this.playlists.set(key, playlistId);
  }

  async listHistory(_tx: unknown, limit: number): Promise<RunHistoryEntry[]> {
    return [...this.runs]
      .sort((a, b) => b.date.localeCompare(a.date))
      .slice(0, limit)
      .map((run) => ({
        ...run,
        committedCount: this.userRuns.filter((r) => r.runId === run.id).length,
      }));
  }
}

export async function withTransaction<T>(fn: (tx: unknown) => Promise<T>): Promise<T> {
  return fn({});
}

export function createTestLogger(): LoggerPort {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export const passThroughScheduler: JobScheduler = {
  schedule: (job) => job(),
};

/** Runs one job at a time, in submission order. */
export function createSerialScheduler(): JobScheduler {
  let tail: Promise<unknown> = Promise.resolve();
  return {
    schedule<T>(job: () => Promise<T>): Promise<T> {
      const next = tail.then(job, job);
      tail = next.catch(() => undefined);
      return next;
    },
  };
}

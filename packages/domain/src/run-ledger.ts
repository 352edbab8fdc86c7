import { type Run, type RunHistoryEntry } from './run';
import { type RunRepository } from './ports';

export type CommitResult = 'COMMITTED' | 'ALREADY_COMMITTED';

export interface RunLedgerDeps {
  runRepo: RunRepository;
  withTransaction: <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;
}

/**
 * Durable record of runs and of the users that completed them. A commit is
 * written only after the playlist is published; remembered playlist ids are
 * progress and never count as a commit.
 */
export class RunLedger {
  constructor(private readonly deps: RunLedgerDeps) {}

  async startRun(date: string): Promise<Run> {
    return this.guard('start run', (tx) => this.deps.runRepo.findOrCreateByDate(tx, date));
  }

  async listCommitted(runId: number): Promise<Set<string>> {
    const ids = await this.guard('list committed users', (tx) =>
      this.deps.runRepo.listCommittedUserIds(tx, runId),
    );
    return new Set(ids);
  }

  async isCommitted(runId: number, spotifyId: string): Promise<boolean> {
    return this.guard('check commit', (tx) => this.deps.runRepo.isCommitted(tx, runId, spotifyId));
  }

  async commit(runId: number, spotifyId: string): Promise<CommitResult> {
    const inserted = await this.guard('commit', (tx) =>
      this.deps.runRepo.insertUserRun(tx, runId, spotifyId),
    );
    return inserted ? 'COMMITTED' : 'ALREADY_COMMITTED';
  }

  async findPlaylist(runId: number, spotifyId: string): Promise<string | null> {
    return this.guard('find playlist', (tx) => this.deps.runRepo.findPlaylistId(tx, runId, spotifyId));
  }

  async rememberPlaylist(runId: number, spotifyId: string, playlistId: string): Promise<void> {
    await this.guard('remember playlist', (tx) =>
      this.deps.runRepo.savePlaylistId(tx, runId, spotifyId, playlistId),
    );
  }

  async history(limit: number): Promise<RunHistoryEntry[]> {
    return this.guard('list history', (tx) => this.deps.runRepo.listHistory(tx, limit));
  }

  private async guard<T>(operation: string, fn: (tx: unknown) => Promise<T>): Promise<T> {
    try {
      return await this.deps.withTransaction(fn);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RunLedgerError('UNAVAILABLE', `Run ledger failed to ${operation}: ${reason}`, {
        cause: err,
      });
    }
  }
}

export class RunLedgerError extends Error {
  constructor(
    public readonly kind: 'UNAVAILABLE',
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RunLedgerError';
  }
}

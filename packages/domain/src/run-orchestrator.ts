import { backoffDelay, sleep as defaultSleep, type BackoffPolicy } from './backoff';
import { MusicApiError, TokenRefreshError } from './errors';
import { buildPlaylist, MAX_PLAYLIST_TRACKS, PlaylistError } from './playlist-builder';
import { playlistDetailsFor, runDateFor, type PlaylistDetails, type Run, type TopTracksPeriod } from './run';
import { RunLedgerError, type CommitResult, type RunLedger } from './run-ledger';
import { TokenError } from './token-manager';
import {
  type AccessTokenProvider,
  type JobScheduler,
  type LoggerPort,
  type MusicApiPort,
  type UserRepository,
} from './ports';

/** Spotify caps a single top-tracks page at 50 items. */
export const TOP_TRACKS_FETCH_LIMIT = 50;

export type RunPhase = 'CREATED' | 'SELECTING' | 'DISPATCHING' | 'FINALIZED';
export type UserJobState = 'PENDING' | 'IN_PROGRESS' | 'COMMITTED' | 'FAILED' | 'ABORTED';
export type FailureClass = 'transient' | 'permanent' | 'ledger';

export interface UserOutcome {
  spotifyId: string;
  status: Extract<UserJobState, 'COMMITTED' | 'FAILED' | 'ABORTED'>;
  attempts: number;
  reason: string | null;
}

export interface RunSummary {
  runId: number;
  date: string;
  selected: number;
  alreadyCommitted: number;
  committed: number;
  failed: number;
  aborted: number;
  outcomes: UserOutcome[];
}

export interface RunOrchestratorDeps {
  userRepo: UserRepository;
  ledger: RunLedger;
  tokens: AccessTokenProvider;
  musicApi: MusicApiPort;
  scheduler: JobScheduler;
  withTransaction: <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;
  logger: LoggerPort;
  maxAttempts?: number;
  retryBackoff?: BackoffPolicy;
  playlistLimit?: number;
  topTracksPeriod?: TopTracksPeriod;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

interface DispatchContext {
  run: Run;
  details: PlaylistDetails;
  halt: AbortController;
  ledgerFailure: RunLedgerError | null;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_BACKOFF: BackoffPolicy = { baseMs: 2_000, maxMs: 60_000 };

export class RunOrchestrator {
  private running = false;
  private readonly maxAttempts: number;
  private readonly retryBackoff: BackoffPolicy;
  private readonly playlistLimit: number;
  private readonly topTracksPeriod: TopTracksPeriod;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly deps: RunOrchestratorDeps) {
    this.maxAttempts = Math.max(1, deps.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.retryBackoff = deps.retryBackoff ?? DEFAULT_RETRY_BACKOFF;
    this.playlistLimit = deps.playlistLimit ?? MAX_PLAYLIST_TRACKS;
    this.topTracksPeriod = deps.topTracksPeriod ?? 'short_term';
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Runs the playlist month containing `now`. Re-invoking for the same month
   * reuses the run and only processes users without a commit. Aborting
   * `signal` stops new jobs and retries; in-flight attempts finish.
   */
  async run(input: { now: Date; signal?: AbortSignal }): Promise<RunSummary> {
    if (this.running) {
      throw new RunError('ALREADY_RUNNING', 'A run is already in progress');
    }
    this.running = true;
    try {
      return await this.execute(input.now, input.signal);
    } finally {
      this.running = false;
    }
  }

  private async execute(now: Date, signal: AbortSignal | undefined): Promise<RunSummary> {
    const { ledger, userRepo, scheduler, logger } = this.deps;
    const date = runDateFor(now);

    let run: Run;
    try {
      run = await ledger.startRun(date);
    } catch (err) {
      throw new RunError('LEDGER_UNAVAILABLE', `Run for ${date} could not be started`, { cause: err });
    }
    this.transition(run, 'CREATED');

    this.transition(run, 'SELECTING');
    let activeIds: string[];
    let committed: Set<string>;
    try {
      activeIds = await this.deps.withTransaction((tx) => userRepo.listActiveIds(tx));
      committed = await ledger.listCommitted(run.id);
    } catch (err) {
      throw new RunError('LEDGER_UNAVAILABLE', `Users for run ${run.id} could not be selected`, {
        cause: err,
      });
    }
    const selected = activeIds.filter((id) => !committed.has(id));
    logger.info(
      { runId: run.id, active: activeIds.length, selected: selected.length },
      'Selected users for run',
    );

    this.transition(run, 'DISPATCHING');
    const ctx: DispatchContext = {
      run,
      details: playlistDetailsFor(now),
      halt: new AbortController(),
      ledgerFailure: null,
    };
    const forwardAbort = () => ctx.halt.abort();
    if (signal?.aborted) forwardAbort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    let outcomes: UserOutcome[];
    try {
      outcomes = await Promise.all(
        selected.map((spotifyId) => scheduler.schedule(() => this.processUser(ctx, spotifyId))),
      );
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }

    const summary: RunSummary = {
      runId: run.id,
      date: run.date,
      selected: selected.length,
      alreadyCommitted: activeIds.length - selected.length,
      committed: outcomes.filter((o) => o.status === 'COMMITTED').length,
      failed: outcomes.filter((o) => o.status === 'FAILED').length,
      aborted: outcomes.filter((o) => o.status === 'ABORTED').length,
      outcomes,
    };
    this.transition(run, 'FINALIZED');
    logger.info(
      {
        runId: summary.runId,
        date: summary.date,
        selected: summary.selected,
        alreadyCommitted: summary.alreadyCommitted,
        committed: summary.committed,
        failed: summary.failed,
        aborted: summary.aborted,
      },
      'Run finalized',
    );

    if (ctx.ledgerFailure) {
      throw new RunError('LEDGER_UNAVAILABLE', ctx.ledgerFailure.message, {
        cause: ctx.ledgerFailure,
        summary,
      });
    }
    return summary;
  }

  private async processUser(ctx: DispatchContext, spotifyId: string): Promise<UserOutcome> {
    const { logger } = this.deps;
    const log = { runId: ctx.run.id, spotifyId };

    if (ctx.halt.signal.aborted) {
      return { spotifyId, status: 'ABORTED', attempts: 0, reason: 'Run halted before the job started' };
    }
    logger.debug({ ...log, state: 'IN_PROGRESS' }, 'User job started');

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.publish(ctx, spotifyId);
        logger.info({ ...log, attempt, result, state: 'COMMITTED' }, 'User job committed');
        return {
          spotifyId,
          status: 'COMMITTED',
          attempts: attempt,
          reason: result === 'ALREADY_COMMITTED' ? 'Already committed' : null,
        };
      } catch (err) {
        const failure = classifyFailure(err);
        const reason = err instanceof Error ? err.message : String(err);
        const meta = { ...log, attempt, failure, errorKind: errorKindOf(err), err: reason };

        if (failure === 'ledger') {
          if (err instanceof RunLedgerError && !ctx.ledgerFailure) ctx.ledgerFailure = err;
          ctx.halt.abort();
          logger.error({ ...meta, state: 'FAILED' }, 'Run ledger unavailable, halting dispatch');
          return { spotifyId, status: 'FAILED', attempts: attempt, reason };
        }
        if (failure === 'permanent') {
          logger.warn({ ...meta, state: 'FAILED' }, 'User job failed permanently');
          return { spotifyId, status: 'FAILED', attempts: attempt, reason };
        }
        if (attempt >= this.maxAttempts) {
          logger.warn({ ...meta, state: 'FAILED' }, 'User job exhausted its retry budget');
          return { spotifyId, status: 'FAILED', attempts: attempt, reason };
        }
        if (ctx.halt.signal.aborted) {
          return { spotifyId, status: 'ABORTED', attempts: attempt, reason };
        }

        const delayMs = this.retryDelay(err, attempt);
        logger.info({ ...meta, delayMs }, 'User job failed, retrying');
        await this.sleep(delayMs, ctx.halt.signal);
        if (ctx.halt.signal.aborted) {
          return { spotifyId, status: 'ABORTED', attempts: attempt, reason };
        }
      }
    }
  }

  private async publish(ctx: DispatchContext, spotifyId: string): Promise<CommitResult> {
    const { tokens, musicApi, ledger, logger } = this.deps;
    const { run } = ctx;

    let token = await tokens.getValidAccessToken(spotifyId);

    // A rejected token is refreshed once and the call repeated; a second
    // rejection surfaces and is retried with the whole pipeline.
    const call = async <T>(fn: (accessToken: string) => Promise<T>): Promise<T> => {
      try {
        return await fn(token);
      } catch (err) {
        if (!(err instanceof MusicApiError) || err.kind !== 'UNAUTHORIZED') throw err;
        logger.info({ runId: run.id, spotifyId }, 'Access token rejected, forcing refresh');
        token = await tokens.getValidAccessToken(spotifyId, { staleToken: token });
        return fn(token);
      }
    };

    const topTracks = await call((t) => musicApi.fetchTopTracks(t, this.topTracksPeriod, TOP_TRACKS_FETCH_LIMIT));
    const tracks = buildPlaylist(topTracks, this.playlistLimit);
    if (tracks.length === 0) {
      throw new PlaylistError('EMPTY_HISTORY', 'No top tracks to publish');
    }

    let playlistId = await ledger.findPlaylist(run.id, spotifyId);
    if (playlistId) {
      logger.debug({ runId: run.id, spotifyId, playlistId }, 'Reusing playlist created earlier in this run');
    } else {
      const created = await call((t) => musicApi.createPlaylist(t, spotifyId, ctx.details));
      await ledger.rememberPlaylist(run.id, spotifyId, created);
      logger.debug({ runId: run.id, spotifyId, playlistId: created }, 'Created playlist');
      playlistId = created;
    }

    const target = playlistId;
    await call((t) => musicApi.replaceTracks(t, target, tracks.map((track) => track.uri)));

    return ledger.commit(run.id, spotifyId);
  }

  private retryDelay(err: unknown, attempt: number): number {
    const backoff = backoffDelay(attempt - 1, this.retryBackoff, this.random);
    if (err instanceof MusicApiError && err.retryAfterMs !== null) {
      return Math.max(backoff, err.retryAfterMs);
    }
    return backoff;
  }

  private transition(run: Run, phase: RunPhase): void {
    this.deps.logger.info({ runId: run.id, date: run.date, phase }, 'Run phase');
  }
}

export function classifyFailure(err: unknown): FailureClass {
  if (err instanceof RunLedgerError) return 'ledger';
  if (err instanceof MusicApiError) {
    switch (err.kind) {
      case 'UNAUTHORIZED':
      case 'RATE_LIMITED':
      case 'TRANSIENT':
        return 'transient';
      case 'PERMANENT':
        return 'permanent';
    }
  }
  if (err instanceof TokenRefreshError) {
    switch (err.kind) {
      case 'TRANSIENT':
        return 'transient';
      case 'INVALID_GRANT':
      case 'PERMANENT':
        return 'permanent';
    }
  }
  if (err instanceof TokenError || err instanceof PlaylistError) return 'permanent';
  return 'transient';
}

function errorKindOf(err: unknown): string | null {
  if (
    err instanceof MusicApiError ||
    err instanceof TokenRefreshError ||
    err instanceof TokenError ||
    err instanceof PlaylistError ||
    err instanceof RunLedgerError
  ) {
    return err.kind;
  }
  return null;
}

export class RunError extends Error {
  public readonly summary: RunSummary | null;

  constructor(
    public readonly kind: 'LEDGER_UNAVAILABLE' | 'ALREADY_RUNNING',
    message: string,
    options: { cause?: unknown; summary?: RunSummary } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'RunError';
    this.summary = options.summary ?? null;
  }
}

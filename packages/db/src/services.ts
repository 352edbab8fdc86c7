import { RunLedger, RunOrchestrator, TokenManager } from '@botm/domain';
import {
  BottleneckJobScheduler,
  createSpotifyClients,
  type FetchFn,
  type RunConfig,
  type SafeLogger,
  type SpotifyConfig,
} from '@botm/shared';
import { withTransaction } from './client';
import { PgRunRepository } from './repositories/run-repository';
import { PgUserRepository } from './repositories/user-repository';

export interface RunServices {
  orchestrator: RunOrchestrator;
  ledger: RunLedger;
  tokens: TokenManager;
  scheduler: BottleneckJobScheduler;
}

/**
 * Wires the run orchestrator against Postgres and the Spotify clients.
 * The pool must already be initialized.
 */
export function createRunServices(
  config: SpotifyConfig & RunConfig,
  logger: SafeLogger,
  fetchFn?: FetchFn,
): RunServices {
  const userRepo = new PgUserRepository();
  const spotify = createSpotifyClients(config, logger.child({ component: 'spotify' }), fetchFn);

  const ledger = new RunLedger({ runRepo: new PgRunRepository(), withTransaction });

  const tokens = new TokenManager({
    userRepo,
    authClient: spotify.auth,
    withTransaction,
    logger: logger.child({ component: 'tokens' }),
    safetyMarginMs: config.TOKEN_SAFETY_MARGIN_SECONDS * 1000,
  });

  const scheduler = new BottleneckJobScheduler({
    maxConcurrent: config.RUN_CONCURRENCY,
    minTime: config.RUN_MIN_TIME_MS,
  });

  const orchestrator = new RunOrchestrator({
    userRepo,
    ledger,
    tokens,
    musicApi: spotify.api,
    scheduler,
    withTransaction,
    logger: logger.child({ component: 'orchestrator' }),
    maxAttempts: config.RUN_MAX_ATTEMPTS,
    retryBackoff: { baseMs: config.RUN_RETRY_BASE_MS, maxMs: config.RUN_RETRY_MAX_MS },
    playlistLimit: config.PLAYLIST_TRACK_LIMIT,
    topTracksPeriod: config.TOP_TRACKS_PERIOD,
  });

  return { orchestrator, ledger, tokens, scheduler };
}

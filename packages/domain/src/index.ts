export type { User, TokenGrant } from './user';
export { DEFAULT_TOKEN_SAFETY_MARGIN_MS, isAccessTokenFresh, accessTokenExpiry } from './auth';
export {
  playlistMonthFor,
  runDateFor,
  playlistDetailsFor,
  type Run,
  type RunHistoryEntry,
  type TopTrack,
  type TopTracksPeriod,
  type PlaylistMonth,
  type PlaylistDetails,
} from './run';
export {
  MusicApiError,
  TokenRefreshError,
  type MusicApiErrorKind,
  type TokenRefreshErrorKind,
} from './errors';
export type {
  UserRepository,
  RunRepository,
  SpotifyAuthPort,
  MusicApiPort,
  AccessTokenProvider,
  JobScheduler,
  LoggerPort,
} from './ports';
export { backoffDelay, sleep, type BackoffPolicy } from './backoff';
export { SingleFlight } from './single-flight';
export { buildPlaylist, MAX_PLAYLIST_TRACKS, PlaylistError } from './playlist-builder';
export { TokenManager, TokenError, type TokenManagerDeps } from './token-manager';
export { RunLedger, RunLedgerError, type RunLedgerDeps, type CommitResult } from './run-ledger';
export {
  RunOrchestrator,
  RunError,
  classifyFailure,
  TOP_TRACKS_FETCH_LIMIT,
  type RunOrchestratorDeps,
  type RunSummary,
  type UserOutcome,
  type RunPhase,
  type UserJobState,
  type FailureClass,
} from './run-orchestrator';

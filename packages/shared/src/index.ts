export { createLogger, redact, type SafeLogger } from './logger';
export { AppError, ErrorCode } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type SpotifyConfig,
  type RunConfig,
  type ApiConfig,
  type WorkerConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  SpotifyConfigSchema,
  RunConfigSchema,
  ApiConfigSchema,
  WorkerConfigSchema,
} from './config';
export { touchHealthFile, startHealthBeat } from './healthcheck';
export { BottleneckJobScheduler, type JobSchedulerOptions } from './job-scheduler';
export {
  SpotifyHttpClient,
  parseRetryAfter,
  type SpotifyHttpClientOptions,
  type SpotifyRequest,
  type FetchFn,
} from './spotify/http';
export { SpotifyApiClient } from './spotify/api-client';
export { SpotifyAuthClient, type SpotifyAuthClientOptions } from './spotify/auth-client';
export { createSpotifyClients, type SpotifyClients } from './spotify/factory';

import { type LoggerPort } from '@botm/domain';
import { type SpotifyConfig } from '../config';
import { SpotifyHttpClient, type FetchFn } from './http';
import { SpotifyApiClient } from './api-client';
import { SpotifyAuthClient } from './auth-client';

export interface SpotifyClients {
  api: SpotifyApiClient;
  auth: SpotifyAuthClient;
}

export function createSpotifyClients(config: SpotifyConfig, logger: LoggerPort, fetchFn?: FetchFn): SpotifyClients {
  const http = new SpotifyHttpClient({
    baseUrl: config.SPOTIFY_API_BASE_URL,
    timeoutMs: config.SPOTIFY_TIMEOUT_MS,
    maxRetries: config.SPOTIFY_MAX_RETRIES,
    backoff: { baseMs: config.SPOTIFY_BACKOFF_BASE_MS, maxMs: config.SPOTIFY_BACKOFF_MAX_MS },
    maxRetryAfterMs: config.SPOTIFY_MAX_RETRY_AFTER_MS,
    logger,
    fetch: fetchFn,
  });

  return {
    api: new SpotifyApiClient(http),
    auth: new SpotifyAuthClient({
      tokenUrl: config.SPOTIFY_TOKEN_URL,
      clientId: config.SPOTIFY_CLIENT_ID,
      clientSecret: config.SPOTIFY_CLIENT_SECRET,
      timeoutMs: config.SPOTIFY_TIMEOUT_MS,
      logger,
      fetch: fetchFn,
    }),
  };
}

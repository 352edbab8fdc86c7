import { z } from 'zod';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).default(10),
});

export const SpotifyConfigSchema = z.object({
  SPOTIFY_CLIENT_ID: z.string().min(1),
  SPOTIFY_CLIENT_SECRET: z.string().min(1),
  SPOTIFY_API_BASE_URL: z.string().url().default('https://api.spotify.com/v1/'),
  SPOTIFY_TOKEN_URL: z.string().url().default('https://accounts.spotify.com/api/token'),
  SPOTIFY_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),
  SPOTIFY_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(4),
  SPOTIFY_BACKOFF_BASE_MS: z.coerce.number().int().min(1).default(500),
  SPOTIFY_BACKOFF_MAX_MS: z.coerce.number().int().min(1).default(30_000),
  SPOTIFY_MAX_RETRY_AFTER_MS: z.coerce.number().int().min(0).default(60_000),
});

export const RunConfigSchema = z.object({
  RUN_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(5),
  RUN_MIN_TIME_MS: z.coerce.number().int().min(0).default(0),
  RUN_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RUN_RETRY_BASE_MS: z.coerce.number().int().min(0).default(2_000),
  RUN_RETRY_MAX_MS: z.coerce.number().int().min(0).default(60_000),
  PLAYLIST_TRACK_LIMIT: z.coerce.number().int().min(1).max(50).default(50),
  TOP_TRACKS_PERIOD: z.enum(['short_term', 'medium_term', 'long_term']).default('short_term'),
  TOKEN_SAFETY_MARGIN_SECONDS: z.coerce.number().int().min(0).default(60),
});

export type SpotifyConfig = z.infer<typeof SpotifyConfigSchema>;
export type RunConfig = z.infer<typeof RunConfigSchema>;

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(SpotifyConfigSchema)
  .merge(RunConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().default(3000),
    GENERATE_USERNAME: z.string().min(1),
    GENERATE_PASSWORD: z.string().min(1),
  });

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const WorkerConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(SpotifyConfigSchema)
  .merge(RunConfigSchema)
  .extend({
    RUN_DAY_OF_MONTH: z.coerce.number().int().min(1).max(28).default(1),
    RUN_CHECK_INTERVAL_MS: z.coerce.number().int().min(1_000).default(3_600_000),
    WORKER_HEALTHCHECK_PATH: z.string().default('/tmp/.worker-healthy'),
  });

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}

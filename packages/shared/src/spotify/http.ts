import { type z } from 'zod';
import { MusicApiError, backoffDelay, sleep, type BackoffPolicy, type LoggerPort } from '@botm/domain';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface SpotifyHttpClientOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Retries after the first attempt for 429, 5xx and network failures. */
  maxRetries: number;
  backoff: BackoffPolicy;
  /** A Retry-After hint above this fails the call as RATE_LIMITED instead of waiting. */
  maxRetryAfterMs: number;
  logger: LoggerPort;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

export interface SpotifyRequest<T> {
  method: 'GET' | 'POST' | 'PUT';
  /** Relative to the base URL, without a leading slash. */
  path: string;
  accessToken: string;
  query?: Record<string, string | number>;
  body?: unknown;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

type AttemptResult<T> =
  | { outcome: 'ok'; value: T }
  | { outcome: 'retry'; error: MusicApiError; delayMs: number };

/**
 * Parses a Retry-After header given as delta-seconds or an HTTP date.
 * Returns null when the header is absent or unreadable.
 */
export function parseRetryAfter(header: string | null, nowMs: number): number | null {
  if (header === null) return null;
  const trimmed = header.trim();
  if (trimmed === '') return null;
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - nowMs);
}

export class SpotifyHttpClient {
  private readonly fetchFn: FetchFn;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(private readonly opts: SpotifyHttpClientOptions) {
    this.fetchFn = opts.fetch ?? ((url, init) => fetch(url, init));
    this.sleepFn = opts.sleep ?? ((ms) => sleep(ms));
    this.random = opts.random ?? Math.random;
    this.now = opts.now ?? Date.now;
  }

  async request<T>(req: SpotifyRequest<T>): Promise<T> {
    const url = this.buildUrl(req.path, req.query);

    for (let attempt = 0; ; attempt++) {
      const result = await this.attempt(req, url, attempt);
      if (result.outcome === 'ok') {
        return result.value;
      }

      if (attempt >= this.opts.maxRetries) {
        this.opts.logger.warn(
          { method: req.method, path: req.path, attempts: attempt + 1, kind: result.error.kind },
          'Spotify request gave up after retries',
        );
        throw result.error;
      }

      this.opts.logger.debug(
        { method: req.method, path: req.path, attempt, delayMs: result.delayMs, status: result.error.status },
        'Retrying Spotify request',
      );
      await this.sleepFn(result.delayMs);
    }
  }

  private async attempt<T>(req: SpotifyRequest<T>, url: string, attempt: number): Promise<AttemptResult<T>> {
    const headers: Record<string, string> = { Authorization: `Bearer ${req.accessToken}` };
    if (req.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: req.method,
        headers,
        body: req.body === undefined ? undefined : JSON.stringify(req.body),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
      return {
        outcome: 'retry',
        error: new MusicApiError('TRANSIENT', `${req.method} ${req.path} failed: ${reason}`),
        delayMs: backoffDelay(attempt, this.opts.backoff, this.random),
      };
    }

    const { status } = response;

    if (status === 401) {
      await this.discardBody(req, response);
      throw new MusicApiError('UNAUTHORIZED', `${req.method} ${req.path} rejected the access token`, { status });
    }

    if (status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get('Retry-After'), this.now());
      const error = new MusicApiError('RATE_LIMITED', `${req.method} ${req.path} was rate limited`, {
        status,
        retryAfterMs: retryAfterMs ?? undefined,
      });
      await this.discardBody(req, response);
      if (retryAfterMs !== null && retryAfterMs > this.opts.maxRetryAfterMs) {
        throw error;
      }
      return {
        outcome: 'retry',
        error,
        delayMs: retryAfterMs ?? backoffDelay(attempt, this.opts.backoff, this.random),
      };
    }

    if (status >= 500) {
      await this.discardBody(req, response);
      return {
        outcome: 'retry',
        error: new MusicApiError('TRANSIENT', `${req.method} ${req.path} returned ${status}`, { status }),
        delayMs: backoffDelay(attempt, this.opts.backoff, this.random),
      };
    }

    if (status >= 400) {
      await this.discardBody(req, response);
      throw new MusicApiError('PERMANENT', `${req.method} ${req.path} returned ${status}`, { status });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      const reason = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
      return {
        outcome: 'retry',
        error: new MusicApiError('TRANSIENT', `${req.method} ${req.path} body read failed: ${reason}`, { status }),
        delayMs: backoffDelay(attempt, this.opts.backoff, this.random),
      };
    }

    return { outcome: 'ok', value: this.parseBody(req, status, text) };
  }

  private parseBody<T>(req: SpotifyRequest<T>, status: number, text: string): T {
    let json: unknown = undefined;
    if (text.length > 0) {
      try {
        json = JSON.parse(text);
      } catch {
        throw new MusicApiError('PERMANENT', `${req.method} ${req.path} returned malformed JSON`, {
          status,
        });
      }
    }

    const parsed = req.schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid body';
      throw new MusicApiError('PERMANENT', `${req.method} ${req.path} returned an unexpected body (${where})`, {
        status,
      });
    }
    return parsed.data;
  }

  /** Releases the connection of a response whose body is not needed. */
  private async discardBody<T>(req: SpotifyRequest<T>, response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (err) {
      this.opts.logger.debug({ err, method: req.method, path: req.path }, 'Could not discard response body');
    }
  }

  private buildUrl(path: string, query?: Record<string, string | number>): string {
    const url = new URL(path, this.opts.baseUrl);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }
}

import { TokenRefreshError, type LoggerPort, type SpotifyAuthPort, type TokenGrant } from '@botm/domain';
import { type FetchFn } from './http';
import { TokenErrorResponseSchema, TokenResponseSchema } from './schemas';

export interface SpotifyAuthClientOptions {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  timeoutMs: number;
  logger: LoggerPort;
  fetch?: FetchFn;
}

/**
 * Exchanges refresh tokens at the accounts service. Makes exactly one request per
 * call; retrying is up to the caller.
 */
export class SpotifyAuthClient implements SpotifyAuthPort {
  private readonly fetchFn: FetchFn;
  private readonly basicAuth: string;

  constructor(private readonly opts: SpotifyAuthClientOptions) {
    this.fetchFn = opts.fetch ?? ((url, init) => fetch(url, init));
    this.basicAuth = Buffer.from(`${opts.clientId}:${opts.clientSecret}`).toString('base64');
  }

  async refreshAccessToken(refreshToken: string): Promise<TokenGrant> {
    const form = new URLSearchParams({ grant_type: 'refresh_token', refresh_token: refreshToken });

    let response: Response;
    try {
      response = await this.fetchFn(this.opts.tokenUrl, {
        method: 'POST',
        headers: {
          Authorization: `Basic ${this.basicAuth}`,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: form.toString(),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
      throw new TokenRefreshError('TRANSIENT', `Token refresh request failed: ${reason}`);
    }

    const { status } = response;
    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      const reason = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
      throw new TokenRefreshError('TRANSIENT', `Token response could not be read: ${reason}`, status);
    }
    const payload = parseJson(text);

    if (status >= 500 || status === 429) {
      throw new TokenRefreshError('TRANSIENT', `Token endpoint returned ${status}`, status);
    }

    if (status >= 400) {
      const error = TokenErrorResponseSchema.safeParse(payload);
      if (error.success && error.data.error === 'invalid_grant') {
        this.opts.logger.warn({ status }, 'Refresh grant rejected by token endpoint');
        throw new TokenRefreshError('INVALID_GRANT', error.data.error_description ?? 'invalid_grant', status);
      }
      const code = error.success ? error.data.error : 'unknown';
      throw new TokenRefreshError('PERMANENT', `Token endpoint returned ${status} (${code})`, status);
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TokenRefreshError('PERMANENT', 'Token endpoint returned an unexpected body', status);
    }

    return {
      accessToken: parsed.data.access_token,
      expiresInSeconds: parsed.data.expires_in,
      refreshToken: parsed.data.refresh_token ?? null,
    };
  }
}

function parseJson(text: string): unknown {
  if (text.length === 0) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

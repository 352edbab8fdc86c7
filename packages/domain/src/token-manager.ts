import { accessTokenExpiry, isAccessTokenFresh, DEFAULT_TOKEN_SAFETY_MARGIN_MS } from './auth';
import { TokenRefreshError } from './errors';
import { SingleFlight } from './single-flight';
import { type TokenGrant } from './user';
import {
  type AccessTokenProvider,
  type LoggerPort,
  type SpotifyAuthPort,
  type UserRepository,
} from './ports';

export interface TokenManagerDeps {
  userRepo: UserRepository;
  authClient: SpotifyAuthPort;
  withTransaction: <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;
  logger: LoggerPort;
  safetyMarginMs?: number;
  now?: () => Date;
}

type LoadResult =
  | { kind: 'token'; accessToken: string }
  | { kind: 'revoked' }
  | { kind: 'inactive' }
  | { kind: 'malformed' };

export class TokenManager implements AccessTokenProvider {
  private readonly flights = new SingleFlight<string>();
  private readonly safetyMarginMs: number;
  private readonly now: () => Date;

  constructor(private readonly deps: TokenManagerDeps) {
    this.safetyMarginMs = deps.safetyMarginMs ?? DEFAULT_TOKEN_SAFETY_MARGIN_MS;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Returns an access token with more than the safety margin left.
   * Pass `staleToken` after the API rejected it to force a refresh, unless
   * another caller has already replaced it.
   */
  async getValidAccessToken(spotifyId: string, opts: { staleToken?: string } = {}): Promise<string> {
    const { staleToken } = opts;
    const token = await this.flights.run(spotifyId, () => this.loadOrRefresh(spotifyId, staleToken));

    // Joined a flight that started before the token went stale.
    if (staleToken !== undefined && token === staleToken) {
      return this.flights.run(spotifyId, () => this.loadOrRefresh(spotifyId, staleToken));
    }
    return token;
  }

  private async loadOrRefresh(spotifyId: string, staleToken: string | undefined): Promise<string> {
    const { userRepo, authClient, logger } = this.deps;

    const result = await this.deps.withTransaction(async (tx): Promise<LoadResult> => {
      const user = await userRepo.findByIdForUpdate(tx, spotifyId);
      if (!user || !user.active) {
        return { kind: 'inactive' };
      }
      if (user.refreshToken.trim().length === 0) {
        return { kind: 'malformed' };
      }

      const now = this.now();
      const forced = staleToken !== undefined && user.accessToken === staleToken;
      if (!forced && isAccessTokenFresh(user, now, this.safetyMarginMs)) {
        logger.debug({ spotifyId }, 'Stored access token still valid');
        return { kind: 'token', accessToken: user.accessToken };
      }

      logger.debug({ spotifyId, forced }, 'Refreshing access token');
      let grant: TokenGrant;
      try {
        grant = await authClient.refreshAccessToken(user.refreshToken);
      } catch (err) {
        if (err instanceof TokenRefreshError && err.kind === 'INVALID_GRANT') {
          await userRepo.deactivate(tx, spotifyId);
          logger.warn({ spotifyId }, 'Refresh grant revoked, user deactivated');
          return { kind: 'revoked' };
        }
        throw err;
      }

      const expiresAt = accessTokenExpiry(this.now(), grant.expiresInSeconds);
      await userRepo.updateAccessToken(tx, spotifyId, grant.accessToken, expiresAt);
      if (grant.refreshToken) {
        await userRepo.updateRefreshToken(tx, spotifyId, grant.refreshToken);
        logger.debug({ spotifyId }, 'Stored rotated refresh token');
      }

      logger.info({ spotifyId, expiresAt: expiresAt.toISOString() }, 'Access token refreshed');
      return { kind: 'token', accessToken: grant.accessToken };
    });

    switch (result.kind) {
      case 'token':
        return result.accessToken;
      case 'revoked':
        throw new TokenError('REVOKED', 'Refresh grant was revoked');
      case 'inactive':
        throw new TokenError('INACTIVE', 'User is unknown or inactive');
      case 'malformed':
        throw new TokenError('MALFORMED', 'User has no refresh token');
    }
  }
}

export class TokenError extends Error {
  constructor(
    public readonly kind: 'REVOKED' | 'INACTIVE' | 'MALFORMED',
    message: string,
  ) {
    super(message);
    this.name = 'TokenError';
  }
}

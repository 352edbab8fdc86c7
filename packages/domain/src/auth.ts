import { type User } from './user';

export const DEFAULT_TOKEN_SAFETY_MARGIN_MS = 60_000;

/**
 * A stored access token is usable only while more than `marginMs` remains
 * before its expiry; inside the margin it must be refreshed first.
 */
export function isAccessTokenFresh(
  user: Pick<User, 'accessToken' | 'expiresAt'>,
  now: Date,
  marginMs: number = DEFAULT_TOKEN_SAFETY_MARGIN_MS,
): boolean {
  if (user.accessToken.length === 0) return false;
  const expiresAt = user.expiresAt.getTime();
  if (Number.isNaN(expiresAt)) return false;
  return expiresAt - now.getTime() > marginMs;
}

export function accessTokenExpiry(now: Date, expiresInSeconds: number): Date {
  return new Date(now.getTime() + expiresInSeconds * 1000);
}

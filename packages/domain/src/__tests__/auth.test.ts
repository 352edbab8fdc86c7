import { describe, it, expect } from 'vitest';
import { isAccessTokenFresh, accessTokenExpiry, DEFAULT_TOKEN_SAFETY_MARGIN_MS } from '../auth';

const now = new Date('2026-10-01T00:00:00Z');

function inMs(ms: number): Date {
  return new Date(now.getTime() + ms);
}

describe('isAccessTokenFresh', () => {
  it('accepts a token with more than the margin left', () => {
    expect(isAccessTokenFresh({ accessToken: 'a', expiresAt: inMs(61_000) }, now)).toBe(true);
  });

  it('rejects a token inside the safety margin', () => {
    expect(isAccessTokenFresh({ accessToken: 'a', expiresAt: inMs(60_000) }, now)).toBe(false);
    expect(isAccessTokenFresh({ accessToken: 'a', expiresAt: inMs(30_000) }, now)).toBe(false);
  });

  it('rejects an expired token', () => {
    expect(isAccessTokenFresh({ accessToken: 'a', expiresAt: inMs(-1) }, now)).toBe(false);
  });

  it('rejects an empty token regardless of expiry', () => {
    expect(isAccessTokenFresh({ accessToken: '', expiresAt: inMs(3_600_000) }, now)).toBe(false);
  });

  it('rejects an invalid expiry date', () => {
    expect(isAccessTokenFresh({ accessToken: 'a', expiresAt: new Date(Number.NaN) }, now)).toBe(false);
  });

  it('honours a custom margin', () => {
    expect(isAccessTokenFresh({ accessToken: 'a', expiresAt: inMs(10_000) }, now, 5_000)).toBe(true);
  });

  it('defaults the margin to one minute', () => {
    expect(DEFAULT_TOKEN_SAFETY_MARGIN_MS).toBe(60_000);
  });
});

describe('accessTokenExpiry', () => {
  it('adds expires_in seconds to now', () => {
    expect(accessTokenExpiry(now, 3600).toISOString()).toBe('2026-10-01T01:00:00.000Z');
  });
});

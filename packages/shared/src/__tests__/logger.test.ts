import { describe, it, expect } from 'vitest';
import { redact } from '../logger';

describe('redact', () => {
  it('hides secret-bearing keys regardless of case', () => {
    expect(
      redact({ spotifyId: 'u1', accessToken: 'test-access', RefreshToken: 'test-refresh', authorization: 'Basic x' }),
    ).toEqual({
      spotifyId: 'u1',
      accessToken: '[REDACTED]',
      RefreshToken: '[REDACTED]',
      authorization: '[REDACTED]',
    });
  });

  it('recurses into nested objects and arrays of objects', () => {
    expect(
      redact({
        grant: { token: 'test-token', expiresIn: 3600 },
        users: [{ spotifyId: 'u1', clientSecret: 'test-secret' }, 'plain'],
      }),
    ).toEqual({
      grant: { token: '[REDACTED]', expiresIn: 3600 },
      users: [{ spotifyId: 'u1', clientSecret: '[REDACTED]' }, 'plain'],
    });
  });

  it('flattens errors and dates', () => {
    const err = new TypeError('fetch failed');

    expect(redact({ err, at: new Date('2026-10-01T00:00:00Z') })).toEqual({
      err: { name: 'TypeError', message: 'fetch failed' },
      at: '2026-10-01T00:00:00.000Z',
    });
  });

  it('leaves primitive values untouched', () => {
    expect(redact({ attempt: 2, forced: false, reason: null })).toEqual({
      attempt: 2,
      forced: false,
      reason: null,
    });
  });
});

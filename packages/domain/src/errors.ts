export type MusicApiErrorKind = 'UNAUTHORIZED' | 'RATE_LIMITED' | 'TRANSIENT' | 'PERMANENT';

export class MusicApiError extends Error {
  public readonly status: number | null;
  public readonly retryAfterMs: number | null;

  constructor(
    public readonly kind: MusicApiErrorKind,
    message: string,
    details: { status?: number; retryAfterMs?: number } = {},
  ) {
    super(message);
    this.name = 'MusicApiError';
    this.status = details.status ?? null;
    this.retryAfterMs = details.retryAfterMs ?? null;
  }
}

export type TokenRefreshErrorKind = 'INVALID_GRANT' | 'TRANSIENT' | 'PERMANENT';

export class TokenRefreshError extends Error {
  constructor(
    public readonly kind: TokenRefreshErrorKind,
    message: string,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'TokenRefreshError';
  }
}

export interface User {
  spotifyId: string;
  active: boolean;
  refreshToken: string;
  accessToken: string;
  expiresAt: Date;
}

export interface TokenGrant {
  accessToken: string;
  expiresInSeconds: number;
  /** Present only when the provider rotated the refresh token. */
  refreshToken: string | null;
}

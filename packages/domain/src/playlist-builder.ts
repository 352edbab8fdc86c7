import { type TopTrack } from './run';

export const MAX_PLAYLIST_TRACKS = 50;

/**
 * Keeps the service's ranking order, drops repeated track ids (first
 * occurrence wins) and truncates to `limit`. Never pads.
 */
export function buildPlaylist(tracks: readonly TopTrack[], limit: number = MAX_PLAYLIST_TRACKS): TopTrack[] {
  if (limit <= 0) return [];

  const seen = new Set<string>();
  const result: TopTrack[] = [];
  for (const track of tracks) {
    if (seen.has(track.id)) continue;
    seen.add(track.id);
    result.push(track);
    if (result.length >= limit) break;
  }
  return result;
}

export class PlaylistError extends Error {
  constructor(
    public readonly kind: 'EMPTY_HISTORY',
    message: string,
  ) {
    super(message);
    this.name = 'PlaylistError';
  }
}

import { describe, it, expect } from 'vitest';
import { buildPlaylist, MAX_PLAYLIST_TRACKS } from '../playlist-builder';
import { makeTrack } from './fakes';

describe('buildPlaylist', () => {
  it('keeps ranking order and drops later duplicates', () => {
    const input = [makeTrack(3), makeTrack(1), makeTrack(3), makeTrack(2), makeTrack(1)];

    expect(buildPlaylist(input, 10).map((t) => t.id)).toEqual(['t3', 't1', 't2']);
  });

  it('truncates to the limit', () => {
    const input = Array.from({ length: 8 }, (_, i) => makeTrack(i + 1));

    expect(buildPlaylist(input, 5).map((t) => t.id)).toEqual(['t1', 't2', 't3', 't4', 't5']);
  });

  it('counts unique tracks against the limit', () => {
    const input = [makeTrack(1), makeTrack(1), makeTrack(2), makeTrack(3)];

    expect(buildPlaylist(input, 2).map((t) => t.id)).toEqual(['t1', 't2']);
  });

  it('returns a shorter list as-is instead of padding', () => {
    const input = [makeTrack(1), makeTrack(2)];

    expect(buildPlaylist(input, 50)).toEqual(input);
  });

  it('is idempotent on its own output', () => {
    const input = [makeTrack(5), makeTrack(4), makeTrack(5), makeTrack(6), makeTrack(7)];
    const once = buildPlaylist(input, 3);

    expect(buildPlaylist(once, 3)).toEqual(once);
  });

  it('returns an empty list for a non-positive limit', () => {
    expect(buildPlaylist([makeTrack(1)], 0)).toEqual([]);
  });

  it('defaults to the maximum playlist size', () => {
    const input = Array.from({ length: 60 }, (_, i) => makeTrack(i));

    expect(buildPlaylist(input)).toHaveLength(MAX_PLAYLIST_TRACKS);
  });

  it('does not mutate its input', () => {
    const input = [makeTrack(1), makeTrack(1)];
    buildPlaylist(input, 5);

    expect(input).toHaveLength(2);
  });
});

import { describe, it, expect } from 'vitest';
import { playlistMonthFor, runDateFor, playlistDetailsFor } from '../run';

describe('playlistMonthFor', () => {
  it('uses the previous month before the 15th', () => {
    expect(playlistMonthFor(new Date('2026-10-01T00:05:00Z'))).toEqual({ year: 2026, month: 9 });
    expect(playlistMonthFor(new Date('2026-10-14T23:59:59Z'))).toEqual({ year: 2026, month: 9 });
  });

  it('uses the current month from the 15th on', () => {
    expect(playlistMonthFor(new Date('2026-10-15T00:00:00Z'))).toEqual({ year: 2026, month: 10 });
    expect(playlistMonthFor(new Date('2026-10-31T12:00:00Z'))).toEqual({ year: 2026, month: 10 });
  });

  it('wraps January back to December of the previous year', () => {
    expect(playlistMonthFor(new Date('2027-01-01T08:00:00Z'))).toEqual({ year: 2026, month: 12 });
  });
});

describe('runDateFor', () => {
  it('returns the first day of the playlist month', () => {
    expect(runDateFor(new Date('2026-10-01T00:05:00Z'))).toBe('2026-09-01');
    expect(runDateFor(new Date('2026-03-20T00:00:00Z'))).toBe('2026-03-01');
    expect(runDateFor(new Date('2027-01-02T00:00:00Z'))).toBe('2026-12-01');
  });
});

describe('playlistDetailsFor', () => {
  it('names the playlist after the playlist month', () => {
    expect(playlistDetailsFor(new Date('2026-10-01T00:05:00Z'))).toEqual({
      name: '2026-09 (Sep) BOTM',
      description: 'Bangers of the month for September 2026, (generated on 2026-10-01)',
    });
  });

  it('handles the year boundary', () => {
    expect(playlistDetailsFor(new Date('2027-01-03T10:00:00Z'))).toEqual({
      name: '2026-12 (Dec) BOTM',
      description: 'Bangers of the month for December 2026, (generated on 2027-01-03)',
    });
  });
});

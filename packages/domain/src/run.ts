export type TopTracksPeriod = 'short_term' | 'medium_term' | 'long_term';

export interface TopTrack {
  id: string;
  uri: string;
  name: string;
}

export interface Run {
  id: number;
  /** First day of the playlist month, `YYYY-MM-DD`. */
  date: string;
}

export interface RunHistoryEntry extends Run {
  committedCount: number;
}

export interface PlaylistMonth {
  year: number;
  /** 1-12 */
  month: number;
}

export interface PlaylistDetails {
  name: string;
  description: string;
}

const MID_MONTH_DAY = 15;

/**
 * Before the 15th a run still belongs to the month that just ended, so a
 * trigger firing a little early or late around midnight on the 1st names
 * the playlist for the right month.
 */
export function playlistMonthFor(now: Date): PlaylistMonth {
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth() + 1;
  if (now.getUTCDate() >= MID_MONTH_DAY) {
    return { year, month };
  }
  return month === 1 ? { year: year - 1, month: 12 } : { year, month: month - 1 };
}

export function runDateFor(now: Date): string {
  const { year, month } = playlistMonthFor(now);
  return `${year}-${pad2(month)}-01`;
}

export function playlistDetailsFor(now: Date): PlaylistDetails {
  const { year, month } = playlistMonthFor(now);
  const firstDay = new Date(Date.UTC(year, month - 1, 1));
  const shortMonth = firstDay.toLocaleString('en-US', { month: 'short', timeZone: 'UTC' });
  const longMonth = firstDay.toLocaleString('en-US', { month: 'long', timeZone: 'UTC' });
  const generatedOn = now.toISOString().slice(0, 10);

  return {
    name: `${year}-${pad2(month)} (${shortMonth}) BOTM`,
    description: `Bangers of the month for ${longMonth} ${year}, (generated on ${generatedOn})`,
  };
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

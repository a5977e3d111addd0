/**
 * Posted-date normalization to `YYYY-MM-DD`.
 *
 * Accepts ISO timestamps, `Month D, YYYY`, `D Month YYYY` and relative phrases
 * ("today", "yesterday", "3 days ago", "30+ days ago"). Relative phrases are
 * resolved against the discovery time, in UTC.
 */

const MONTHS: Record<string, number> = {
  jan: 0,
  feb: 1,
  mar: 2,
  apr: 3,
  may: 4,
  jun: 5,
  jul: 6,
  aug: 7,
  sep: 8,
  sept: 8,
  oct: 9,
  nov: 10,
  dec: 11,
};

const UNIT_DAYS: Record<string, number> = {
  hour: 0,
  minute: 0,
  day: 1,
  week: 7,
  month: 30,
};

function formatUtcDate(year: number, month: number, day: number): string | null {
  const d = new Date(Date.UTC(year, month, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month || d.getUTCDate() !== day) {
    return null;
  }
  return d.toISOString().slice(0, 10);
}

function daysBefore(reference: Date, days: number): string {
  const d = new Date(
    Date.UTC(reference.getUTCFullYear(), reference.getUTCMonth(), reference.getUTCDate() - days),
  );
  return d.toISOString().slice(0, 10);
}

function monthIndex(name: string): number | undefined {
  return MONTHS[name.toLowerCase().slice(0, name.toLowerCase().startsWith('sept') ? 4 : 3)];
}

export function parsePostedDate(raw: string | null | undefined, scrapedAt: Date): string | null {
  if (!raw) return null;
  const text = raw.trim().toLowerCase().replace(/^posted\s+(?:on\s+)?/, '');
  if (!text) return null;

  const iso = text.match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (iso) return formatUtcDate(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]));

  if (/^(?:today|just now|just posted)\b/.test(text)) return daysBefore(scrapedAt, 0);
  if (/^yesterday\b/.test(text)) return daysBefore(scrapedAt, 1);

  const relative = text.match(/^(\d+|an?)\+?\s+(minute|hour|day|week|month)s?\s+ago\b/);
  if (relative) {
    const count = relative[1] === 'a' || relative[1] === 'an' ? 1 : Number(relative[1]);
    return daysBefore(scrapedAt, count * UNIT_DAYS[relative[2]]);
  }

  // March 5, 2024 / Mar 5 2024
  const monthFirst = text.match(/^([a-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})\b/);
  if (monthFirst) {
    const month = monthIndex(monthFirst[1]);
    if (month !== undefined) {
      return formatUtcDate(Number(monthFirst[3]), month, Number(monthFirst[2]));
    }
  }

  // 5 March 2024
  const dayFirst = text.match(/^(\d{1,2})\s+([a-z]{3,9})\.?,?\s+(\d{4})\b/);
  if (dayFirst) {
    const month = monthIndex(dayFirst[2]);
    if (month !== undefined) {
      return formatUtcDate(Number(dayFirst[3]), month, Number(dayFirst[1]));
    }
  }

  // 03/05/2024 (US order)
  const slashed = text.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})\b/);
  if (slashed) return formatUtcDate(Number(slashed[3]), Number(slashed[1]) - 1, Number(slashed[2]));

  return null;
}

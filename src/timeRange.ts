import type { Granularity, TimeRange } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const RELATIVE_PERIODS = ['last_7_days', 'last_30_days', 'last_90_days'] as const;
export type RelativePeriod = (typeof RELATIVE_PERIODS)[number];

const PERIOD_DAYS: Record<RelativePeriod, number> = {
  last_7_days: 7,
  last_30_days: 30,
  last_90_days: 90,
};

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const ms = Date.parse(`${value}T00:00:00Z`);
  return !Number.isNaN(ms) && toIsoDate(ms) === value;
}

/** Midnight UTC of an ISO date, in epoch milliseconds. */
export function parseIsoDate(value: string): number {
  return Date.parse(`${value}T00:00:00Z`);
}

export function toIsoDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function addDays(isoDate: string, days: number): string {
  return toIsoDate(parseIsoDate(isoDate) + days * DAY_MS);
}

/** Zero-based month for a full or three-letter month name, -1 otherwise. */
export function monthIndex(month: string): number {
  const lower = month.toLowerCase();
  if (lower.length === 3) return MONTHS.findIndex((name) => name.startsWith(lower));
  return MONTHS.indexOf(lower);
}

function utcDate(year: number, month: number, day: number): string {
  return toIsoDate(Date.UTC(year, month, day));
}

/**
 * Relative periods end at the dataset's last day, not at the wall clock,
 * so the same question always resolves to the same rows.
 */
export function resolveRelativePeriod(period: RelativePeriod, domain: TimeRange): TimeRange {
  return { start: addDays(domain.end, -PERIOD_DAYS[period]), end: domain.end };
}

/**
 * Converts a natural-language date phrase into a half-open range.
 * Returns null when no phrase is recognised.
 */
export function parseTimePhrase(text: string, domain: TimeRange | null): TimeRange | null {
  if (!text) return null;
  const lowerText = text.toLowerCase();

  const firstWeekMatch = lowerText.match(/first week of (\w+),? (\d{4})/);
  if (firstWeekMatch) {
    const month = monthIndex(firstWeekMatch[1]);
    if (month !== -1) {
      const start = utcDate(Number(firstWeekMatch[2]), month, 1);
      return { start, end: addDays(start, 7) };
    }
  }

  const betweenMatch = lowerText.match(
    /between\s+(\w+)\s+(\d{1,2})\s+and\s+(?:(\w+)\s+)?(\d{1,2}),?\s*(\d{4})/
  );
  if (betweenMatch) {
    const year = Number(betweenMatch[5]);
    const startMonth = monthIndex(betweenMatch[1]);
    const endMonth = betweenMatch[3] ? monthIndex(betweenMatch[3]) : startMonth;
    if (startMonth !== -1 && endMonth !== -1) {
      return {
        start: utcDate(year, startMonth, Number(betweenMatch[2])),
        end: utcDate(year, endMonth, Number(betweenMatch[4]) + 1),
      };
    }
  }

  for (const monthYearMatch of lowerText.matchAll(/\b([a-z]+),? (\d{4})\b/g)) {
    const month = monthIndex(monthYearMatch[1]);
    if (month !== -1) {
      const year = Number(monthYearMatch[2]);
      return { start: utcDate(year, month, 1), end: utcDate(year, month + 1, 1) };
    }
  }

  if (!domain) return null;

  const lastDaysMatch = lowerText.match(/(?:last|past) (\d{1,3}) days?/);
  if (lastDaysMatch) {
    const days = Number(lastDaysMatch[1]);
    if (days > 0) return { start: addDays(domain.end, -days), end: domain.end };
  }

  const lastWeeksMatch = lowerText.match(/(?:last|past) (\d{1,2}) weeks?/);
  if (lastWeeksMatch) {
    const weeks = Number(lastWeeksMatch[1]);
    if (weeks > 0) return { start: addDays(domain.end, -7 * weeks), end: domain.end };
  }

  if (/(?:last|past) week\b/.test(lowerText)) return resolveRelativePeriod('last_7_days', domain);
  if (/(?:last|past) month\b/.test(lowerText)) return resolveRelativePeriod('last_30_days', domain);
  if (/(?:last|past) (?:quarter|3 months|three months)\b/.test(lowerText)) {
    return resolveRelativePeriod('last_90_days', domain);
  }

  return null;
}

/**
 * Clamps a range to the dataset's timestamp domain. Returns null when the
 * two do not overlap.
 */
export function normalizeTimeRange(range: TimeRange, domain: TimeRange | null): TimeRange | null {
  if (!isIsoDate(range.start) || !isIsoDate(range.end)) return null;
  if (range.start >= range.end) return null;
  if (!domain) return range;
  const start = range.start > domain.start ? range.start : domain.start;
  const end = range.end < domain.end ? range.end : domain.end;
  return start < end ? { start, end } : null;
}

export function spanInDays(range: TimeRange): number {
  return Math.round((parseIsoDate(range.end) - parseIsoDate(range.start)) / DAY_MS);
}

export function inferGranularity(range: TimeRange): Granularity {
  const days = spanInDays(range);
  if (days <= 31) return 'day';
  if (days <= 180) return 'week';
  return 'month';
}

/** Start of the bucket containing `ms`; weeks start on Monday. */
export function bucketStart(ms: number, granularity: Granularity): number {
  const date = new Date(ms);
  const dayStart = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  switch (granularity) {
    case 'day':
      return dayStart;
    case 'week': {
      const offset = (date.getUTCDay() + 6) % 7;
      return dayStart - offset * DAY_MS;
    }
    case 'month':
      return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1);
  }
}

export function bucketLabel(ms: number, granularity: Granularity): string {
  const start = toIsoDate(bucketStart(ms, granularity));
  return granularity === 'month' ? start.slice(0, 7) : start;
}

function nextBucket(ms: number, granularity: Granularity): number {
  switch (granularity) {
    case 'day':
      return ms + DAY_MS;
    case 'week':
      return ms + 7 * DAY_MS;
    case 'month': {
      const date = new Date(ms);
      return Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 1);
    }
  }
}

/** Every bucket label overlapping the range, oldest first. */
export function enumerateBuckets(range: TimeRange, granularity: Granularity): string[] {
  const labels: string[] = [];
  const end = parseIsoDate(range.end);
  for (let ms = bucketStart(parseIsoDate(range.start), granularity); ms < end; ms = nextBucket(ms, granularity)) {
    labels.push(bucketLabel(ms, granularity));
  }
  return labels;
}

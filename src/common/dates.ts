/**
 * UTC calendar-day helpers. A day key is `YYYY-MM-DD`; a bucket covers
 * `[day 00:00Z, next day 00:00Z)`.
 */

export type DayKey = string;

/**
 * Inclusive range of day keys
 */
export interface DateRange {
  from: DayKey;
  to: DayKey;
}

export const DAY_MS = 24 * 60 * 60 * 1000;

const DAY_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isDayKey(value: string): boolean {
  if (!DAY_KEY_PATTERN.test(value)) return false;
  const parsed = Date.parse(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed) && toDayKey(parsed) === value;
}

export function toDayKey(timestamp: number | Date): DayKey {
  const ms = typeof timestamp === 'number' ? timestamp : timestamp.getTime();
  return new Date(ms).toISOString().slice(0, 10);
}

/**
 * Start of the day in epoch milliseconds
 */
export function dayStart(day: DayKey): number {
  if (!isDayKey(day)) {
    throw new RangeError(`Invalid day key: ${day}`);
  }
  return Date.parse(`${day}T00:00:00.000Z`);
}

export function addDays(day: DayKey, days: number): DayKey {
  return toDayKey(dayStart(day) + days * DAY_MS);
}

/**
 * Every day key in the range, in order
 */
export function eachDay(range: DateRange): DayKey[] {
  const days: DayKey[] = [];
  const end = dayStart(range.to);
  for (let ms = dayStart(range.from); ms <= end; ms += DAY_MS) {
    days.push(toDayKey(ms));
  }
  return days;
}

/**
 * Half-open epoch-millisecond window covered by the range
 */
export function rangeWindow(range: DateRange): { startMs: number; endMs: number } {
  return { startMs: dayStart(range.from), endMs: dayStart(range.to) + DAY_MS };
}

export function daysBetween(from: DayKey, to: DayKey): number {
  return Math.round((dayStart(to) - dayStart(from)) / DAY_MS);
}

/**
 * Parse an ISO string or epoch milliseconds; undefined when unparseable
 * or outside the range a Date can hold
 */
export function parseTimestamp(value: string | number): number | undefined {
  const ms = typeof value === 'number' ? value : Date.parse(value);
  return Number.isNaN(new Date(ms).getTime()) ? undefined : ms;
}

/**
 * Throw unless both ends are valid day keys in order
 */
export function assertRange(range: DateRange): void {
  if (!isDayKey(range.from) || !isDayKey(range.to)) {
    throw new RangeError(`Invalid date range ${range.from}..${range.to}`);
  }
  if (range.from > range.to) {
    throw new RangeError(`Date range starts after it ends: ${range.from}..${range.to}`);
  }
}

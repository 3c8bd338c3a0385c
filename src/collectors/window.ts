import { DayWindow } from '../types';

const DAY_MS = 86_400_000;
const DATE_KEY = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isDateKey(value: string): boolean {
  const m = DATE_KEY.exec(value);
  if (!m) return false;
  const [, y, mo, d] = m;
  const date = new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d)));
  return date.toISOString().slice(0, 10) === value;
}

/** Calendar date (YYYY-MM-DD) of `now` in the fixed reference offset. */
export function runDateKey(now: number, utcOffsetMinutes: number): string {
  return new Date(now + utcOffsetMinutes * 60_000).toISOString().slice(0, 10);
}

/**
 * The calendar day before `runDate` in the reference offset, as inclusive
 * epoch-millisecond bounds.
 */
export function windowForRunDate(runDate: string, utcOffsetMinutes: number): DayWindow {
  if (!isDateKey(runDate)) {
    throw new RangeError(`Invalid date key "${runDate}", expected YYYY-MM-DD`);
  }
  const midnight = Date.parse(`${runDate}T00:00:00Z`) - utcOffsetMinutes * 60_000;
  const start = midnight - DAY_MS;
  return {
    dateKey: runDateKey(start, utcOffsetMinutes),
    start,
    end: midnight - 1,
  };
}

import { DayWindow, RawNewsItem } from '../types';

/** One paged news provider queried for a single prior-day window. */
export interface NewsSource {
  readonly name: string;
  readonly maxPages: number;
  fetchPage(keyword: string, page: number, window: DayWindow): Promise<RawNewsItem[]>;
}

/** Unparseable timestamps count as "now", which places them after any prior-day window. */
export function parsePublishedAt(value: string | undefined, now: () => number = Date.now): Date {
  const parsed = value ? Date.parse(value) : NaN;
  return new Date(Number.isNaN(parsed) ? now() : parsed);
}

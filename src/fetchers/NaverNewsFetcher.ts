import { z } from 'zod';
import { AppConfig } from '../config';
import { cleanHtml } from '../common/text';
import { DayWindow, RawNewsItem } from '../types';
import { HttpClient } from './http';
import { NewsSource, parsePublishedAt } from './NewsSource';

const naverResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().default(''),
        link: z.string().default(''),
        originallink: z.string().optional(),
        description: z.string().default(''),
        pubDate: z.string().optional(),
      })
    )
    .default([]),
});

// The search endpoint refuses start > 1000, so at most ten 100-item pages per keyword.
const MAX_START = 1000;

export class NaverNewsFetcher implements NewsSource {
  public readonly name = 'naver';
  public readonly maxPages: number;
  private readonly baseUrl = 'https://openapi.naver.com/v1/search/news.json';
  private readonly display: number;

  constructor(
    private readonly clientId: string,
    private readonly clientSecret: string,
    config: Pick<AppConfig, 'naverMaxPages' | 'pageSize'>,
    private readonly http: HttpClient = new HttpClient({ label: 'Naver' })
  ) {
    if (!clientId || !clientSecret) {
      throw new Error('NaverNewsFetcher requires a client id and secret');
    }
    this.display = Math.min(100, config.pageSize);
    this.maxPages = Math.min(config.naverMaxPages, Math.floor((MAX_START - 1) / this.display) + 1);
  }

  public async fetchPage(keyword: string, page: number, _window: DayWindow): Promise<RawNewsItem[]> {
    const start = (page - 1) * this.display + 1;
    if (start > MAX_START) return [];

    const params = new URLSearchParams({
      query: keyword,
      display: String(this.display),
      start: String(start),
      sort: 'date',
    });
    const json = await this.http.getJson(`${this.baseUrl}?${params.toString()}`, {
      'X-Naver-Client-Id': this.clientId,
      'X-Naver-Client-Secret': this.clientSecret,
    });
    const { items } = naverResponseSchema.parse(json);
    return items
      .filter((item) => item.link)
      .map((item) => ({
        title: cleanHtml(item.title),
        url: item.link,
        publishedAt: parsePublishedAt(item.pubDate),
        origin: 'naver',
        description: item.description,
      }));
  }
}

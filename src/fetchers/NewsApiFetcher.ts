import { z } from 'zod';
import { AppConfig } from '../config';
import { cleanHtml } from '../common/text';
import { DayWindow, RawNewsItem } from '../types';
import { HttpClient } from './http';
import { NewsSource, parsePublishedAt } from './NewsSource';

const newsApiResponseSchema = z.object({
  articles: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        publishedAt: z.string().nullish(),
        description: z.string().nullish(),
        content: z.string().nullish(),
        source: z.object({ name: z.string().nullish() }).nullish(),
      })
    )
    .default([]),
});

type NewsApiArticle = z.infer<typeof newsApiResponseSchema>['articles'][number];

// Fetcher for https://newsapi.org (/v2/everything keyword search).
// The free tier caps results per query, so the window is pinned with from = to = the target day.
export class NewsApiFetcher implements NewsSource {
  public readonly name = 'newsapi';
  public readonly maxPages: number;
  private readonly baseUrl = 'https://newsapi.org/v2';
  private readonly pageSize: number;
  private readonly language: string;

  public constructor(
    private readonly apiKey: string,
    config: Pick<AppConfig, 'newsApiMaxPages' | 'pageSize' | 'newsLanguage'>,
    private readonly http: HttpClient = new HttpClient({ label: 'NewsAPI' })
  ) {
    if (!apiKey) {
      throw new Error('NewsApiFetcher requires an API key');
    }
    this.maxPages = config.newsApiMaxPages;
    this.pageSize = Math.min(100, config.pageSize);
    this.language = config.newsLanguage;
  }

  public async fetchPage(keyword: string, page: number, window: DayWindow): Promise<RawNewsItem[]> {
    const params = new URLSearchParams({
      q: keyword,
      language: this.language,
      sortBy: 'publishedAt',
      pageSize: String(this.pageSize),
      page: String(page),
      from: window.dateKey,
      to: window.dateKey,
    });

    const json = await this.http.getJson(`${this.baseUrl}/everything?${params.toString()}`, { 'X-Api-Key': this.apiKey });
    const parsed = newsApiResponseSchema.parse(json);
    return parsed.articles.filter((a) => a.url && a.title).map((a) => normalizeNewsApiArticle(a));
  }
}

function normalizeNewsApiArticle(a: NewsApiArticle): RawNewsItem {
  return {
    title: cleanHtml(a.title ?? ''),
    url: a.url ?? '',
    publishedAt: parsePublishedAt(a.publishedAt ?? undefined),
    origin: 'newsapi',
    publisher: a.source?.name || undefined,
    description: a.description || a.content || '',
  };
}

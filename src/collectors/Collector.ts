import { errorMessage, PipelineAbortedError } from '../common/errors';
import { ProgressReporter, silentReporter } from '../common/ProgressReporter';
import { cleanHtml, extractLeadParagraph, normalizeTitle } from '../common/text';
import { leadScore } from '../dedup/scoring';
import { dedupByEmbedding, dedupByFingerprint } from '../dedup/similarityGroups';
import { NewsSource } from '../fetchers/NewsSource';
import { SimilarityEngine } from '../services/SimilarityEngine';
import { Article, DayWindow, RawNewsItem } from '../types';

export interface CollectorOptions {
  keywords: readonly string[];
  /** Stage-1 cosine threshold. */
  threshold: number;
  minYesterdayTarget: number;
  olderStopThreshold: number;
  leadSentences: number;
  /** Character-set Jaccard above which titles count as duplicates when embeddings are down. */
  fallbackJaccard?: number;
  now?: () => number;
}

export interface CollectionResult {
  /** Unique-URL articles inside the window. */
  collected: Article[];
  /** Survivors of the title+lead dedup. */
  deduplicated: Article[];
}

export class Collector {
  private readonly now: () => number;

  constructor(
    private readonly sources: readonly NewsSource[],
    private readonly engine: SimilarityEngine,
    private readonly options: CollectorOptions,
    private readonly reporter: ProgressReporter = silentReporter
  ) {
    this.now = options.now ?? Date.now;
  }

  public async run(window: DayWindow, signal?: AbortSignal): Promise<CollectionResult> {
    const collected = await this.collect(window, signal);
    const deduplicated = collected.length ? await this.deduplicate(collected) : [];
    return { collected, deduplicated };
  }

  /** Every keyword against every source; the first occurrence of a URL wins. */
  public async collect(window: DayWindow, signal?: AbortSignal): Promise<Article[]> {
    const byUrl = new Map<string, Article>();
    for (const keyword of this.options.keywords) {
      for (const source of this.sources) {
        const items = await this.collectFromSource(source, keyword, window, signal);
        for (const item of items) {
          if (!byUrl.has(item.url)) byUrl.set(item.url, this.toArticle(item));
        }
      }
    }
    return [...byUrl.values()];
  }

  public async deduplicate(articles: readonly Article[]): Promise<Article[]> {
    const now = this.now();
    const score = (a: Article) => leadScore(a, now);
    const result = await this.engine.embedBatch(articles.map((a) => `${a.title} ${a.lead}`));

    let survivors: Article[];
    if (!result.ok) {
      this.reporter.report({
        type: 'warning',
        stage: 'collect',
        message: `Embedding unavailable (${result.reason}); falling back to title fingerprint dedup`,
      });
      survivors = dedupByFingerprint(articles, {
        key: (a) => normalizeTitle(a.title),
        jaccardThreshold: this.options.fallbackJaccard ?? 0.8,
        score,
      });
    } else {
      if (result.degraded) {
        this.reporter.report({ type: 'warning', stage: 'collect', message: `${result.degraded} embeddings degraded to zero vectors` });
      }
      survivors = dedupByEmbedding(articles, result.vectors, (a, b) => this.engine.similarity(a, b), this.options.threshold, { score });
    }

    this.reporter.report({
      type: 'dedup',
      stage: 'collect',
      before: articles.length,
      after: survivors.length,
      method: result.ok ? 'embedding' : 'fingerprint',
    });
    return survivors;
  }

  private async collectFromSource(
    source: NewsSource,
    keyword: string,
    window: DayWindow,
    signal?: AbortSignal
  ): Promise<RawNewsItem[]> {
    const inWindow: RawNewsItem[] = [];
    for (let page = 1; page <= source.maxPages; page++) {
      if (signal?.aborted) throw new PipelineAbortedError();

      let items: RawNewsItem[];
      try {
        items = await source.fetchPage(keyword, page, window);
      } catch (e) {
        this.reporter.report({
          type: 'warning',
          stage: 'collect',
          message: `${source.name} "${keyword}" page ${page} failed: ${errorMessage(e)}`,
        });
        break;
      }

      if (!items.length) {
        this.stop(source, keyword, page, 'no more articles');
        break;
      }

      let today = 0;
      let yesterday = 0;
      let older = 0;
      for (const item of items) {
        const t = item.publishedAt.getTime();
        if (t > window.end) {
          today++;
        } else if (t >= window.start) {
          yesterday++;
          inWindow.push(item);
        } else {
          older++;
        }
      }
      this.reporter.report({ type: 'source-page', source: source.name, keyword, page, today, yesterday, older });

      if (older >= this.options.olderStopThreshold) {
        this.stop(source, keyword, page, `too many older articles (${older})`);
        break;
      }
      if (inWindow.length >= this.options.minYesterdayTarget && yesterday === 0 && older > 0) {
        this.stop(source, keyword, page, `reached target (${inWindow.length} articles)`);
        break;
      }
    }
    return inWindow;
  }

  private stop(source: NewsSource, keyword: string, page: number, reason: string): void {
    this.reporter.report({ type: 'source-stopped', source: source.name, keyword, page, reason });
  }

  private toArticle(item: RawNewsItem): Article {
    const lead = extractLeadParagraph(cleanHtml(item.description), this.options.leadSentences);
    return {
      title: item.title,
      url: item.url,
      publishedAt: item.publishedAt.toISOString(),
      origin: item.origin,
      publisher: item.publisher,
      lead,
      fingerprint: this.engine.fingerprint(`${item.title} ${lead}`),
    };
  }
}

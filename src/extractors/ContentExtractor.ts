import { Readability } from '@mozilla/readability';
import { JSDOM } from 'jsdom';
import { Clock, systemClock } from '../common/clock';
import { errorMessage, PipelineAbortedError } from '../common/errors';
import { ProgressReporter, silentReporter } from '../common/ProgressReporter';
import { fullTextScore } from '../dedup/scoring';
import { dedupByEmbedding, dedupByFingerprint } from '../dedup/similarityGroups';
import { SimilarityEngine } from '../services/SimilarityEngine';
import { Article, ClassificationVerdict, ExtractionMethod } from '../types';
import { PageFetcher } from './PageFetcher';

const NOISE_SELECTOR = 'script, style, nav, header, footer, aside, iframe';

// Portal containers first, then generic article markup.
export const CONTENT_SELECTORS = [
  '#articleBodyContents',
  '#articeBody',
  '.article_body',
  '#newsct_article',
  '.article_view',
  '#harmonyContainer',
  'article',
  '.article-body',
  '.article-content',
  '#article-body',
  '.news-content',
  'div[itemprop="articleBody"]',
  '.post-content',
  '.entry-content',
];

export interface ExtractedText {
  text: string;
  method: Extract<ExtractionMethod, 'readability' | 'selector'>;
  siteName?: string;
}

export interface ContentExtractorOptions {
  /** Stage-3 cosine threshold. */
  threshold: number;
  minLength: number;
  delayMs: number;
  clock?: Clock;
}

const collapse = (text: string | null | undefined) => (text ?? '').replace(/\s+/g, ' ').trim();

/**
 * Readability first; below `minLength` characters, strip page chrome and try the
 * known content containers, then every reasonably long paragraph.
 */
export function extractFromHtml(html: string, url: string, minLength: number): ExtractedText | null {
  // Readability mutates the document it reads, so the selector pass parses its own copy.
  const parsed = new Readability(new JSDOM(html, { url }).window.document).parse();
  const siteName = parsed?.siteName || undefined;
  const text = collapse(parsed?.textContent);
  if (text.length >= minLength) {
    return { text, method: 'readability', siteName };
  }

  const document = new JSDOM(html, { url }).window.document;
  document.querySelectorAll(NOISE_SELECTOR).forEach((el) => el.remove());

  for (const selector of CONTENT_SELECTORS) {
    const element = document.querySelector(selector);
    if (!element) continue;

    const paragraphs = Array.from(element.querySelectorAll('p'))
      .map((p) => collapse(p.textContent))
      .filter(Boolean);
    const fromParagraphs = paragraphs.join(' ');
    if (fromParagraphs.length >= minLength) return { text: fromParagraphs, method: 'selector', siteName };

    const direct = collapse(element.textContent);
    if (direct.length >= minLength) return { text: direct, method: 'selector', siteName };
  }

  const loose = Array.from(document.querySelectorAll('p'))
    .map((p) => collapse(p.textContent))
    .filter((t) => t.length > 20)
    .join(' ');
  if (loose.length >= minLength) return { text: loose, method: 'selector', siteName };

  return null;
}

/** Stage 3: best-effort full text, then dedup over full-text embeddings. */
export class ContentExtractor {
  private readonly clock: Clock;

  constructor(
    private readonly pages: PageFetcher,
    private readonly engine: SimilarityEngine,
    private readonly options: ContentExtractorOptions,
    private readonly reporter: ProgressReporter = silentReporter
  ) {
    this.clock = options.clock ?? systemClock;
  }

  public async run(verdicts: readonly ClassificationVerdict[], signal?: AbortSignal): Promise<ClassificationVerdict[]> {
    const extracted = await this.extractAll(verdicts, signal);
    return this.deduplicate(extracted);
  }

  public async extractAll(verdicts: readonly ClassificationVerdict[], signal?: AbortSignal): Promise<ClassificationVerdict[]> {
    const out: ClassificationVerdict[] = [];
    for (const [i, verdict] of verdicts.entries()) {
      if (signal?.aborted) throw new PipelineAbortedError();
      if (i > 0 && this.options.delayMs > 0) await this.clock.sleep(this.options.delayMs, signal);

      const article = await this.extract(verdict.article);
      const fellBack = article.extractionMethod === 'lead' || article.extractionMethod === 'title';
      this.reporter.report({
        type: 'item',
        stage: 'extract',
        index: i + 1,
        total: verdicts.length,
        title: article.title,
        outcome: fellBack ? 'defaulted' : 'passed',
        detail: `${article.extractionMethod} (${(article.fullText ?? '').length} chars)`,
      });
      out.push({ ...verdict, article });
    }
    return out;
  }

  /** Never throws: a failed fetch falls back to the lead, then the title. */
  public async extract(article: Article): Promise<Article> {
    let result: ExtractedText | null = null;
    try {
      const html = await this.pages.fetchHtml(article.url);
      if (html) result = extractFromHtml(html, article.url, this.options.minLength);
    } catch (e) {
      this.reporter.report({ type: 'warning', stage: 'extract', message: `${article.url}: ${errorMessage(e)}` });
    }

    if (result) {
      return {
        ...article,
        fullText: result.text,
        extractionMethod: result.method,
        publisher: article.publisher ?? result.siteName,
      };
    }
    if (article.lead) {
      return { ...article, fullText: article.lead, extractionMethod: 'lead' };
    }
    return { ...article, fullText: article.title, extractionMethod: 'title' };
  }

  public async deduplicate(verdicts: readonly ClassificationVerdict[]): Promise<ClassificationVerdict[]> {
    if (verdicts.length < 2) return [...verdicts];

    const policy = {
      score: (v: ClassificationVerdict) => fullTextScore(v.article, v.categories.length, v.isRegulatory),
      preferred: (v: ClassificationVerdict) => v.isRegulatory,
    };
    const result = await this.engine.embedBatch(verdicts.map((v) => v.article.fullText ?? v.article.title));

    let survivors: ClassificationVerdict[];
    if (!result.ok) {
      this.reporter.report({
        type: 'warning',
        stage: 'extract',
        message: `Embedding unavailable (${result.reason}); falling back to full-text fingerprint dedup`,
      });
      survivors = dedupByFingerprint(verdicts, { key: (v) => v.article.fullText ?? v.article.title, ...policy });
    } else {
      const embedded = verdicts.map((v, i) => ({
        ...v,
        article: { ...v.article, embedding: result.vectors[i] },
      }));
      survivors = dedupByEmbedding(
        embedded,
        result.vectors,
        (a, b) => this.engine.similarity(a, b),
        this.options.threshold,
        policy
      );
    }

    this.reporter.report({
      type: 'dedup',
      stage: 'extract',
      before: verdicts.length,
      after: survivors.length,
      method: result.ok ? 'embedding' : 'fingerprint',
    });
    return survivors;
  }
}

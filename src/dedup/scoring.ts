import { Article } from '../types';

const DAY_MS = 86_400_000;

export const LEAD_PUBLISHER_BONUS = 100;
export const FULLTEXT_PUBLISHER_BONUS = 500;
export const CATEGORY_BONUS = 100;
export const REGULATORY_BONUS = 1000;

/** Stage-1 informativeness: lead length, publisher named, newer is better. */
export function leadScore(article: Article, now: number): number {
  const published = Date.parse(article.publishedAt);
  const daysOld = Number.isNaN(published) ? 0 : Math.floor((now - published) / DAY_MS);
  return article.lead.length + (article.publisher ? LEAD_PUBLISHER_BONUS : 0) - daysOld;
}

/** Stage-3 informativeness: regulatory > publisher named > category count > text length. */
export function fullTextScore(article: Article, categoryCount: number, isRegulatory: boolean): number {
  return (
    (article.fullText ?? '').length +
    (article.publisher ? FULLTEXT_PUBLISHER_BONUS : 0) +
    CATEGORY_BONUS * categoryCount +
    (isRegulatory ? REGULATORY_BONUS : 0)
  );
}

export const CATEGORIES = ['solution', 'case', 'technology', 'regulation'] as const;
export type Category = (typeof CATEGORIES)[number];

export const IMPACT_TYPES = ['opportunity', 'threat', 'mixed', 'watchlist'] as const;
export type ImpactType = (typeof IMPACT_TYPES)[number];

export const IMPACT_AREAS = [
  'customer data usage',
  'targeting / segmentation',
  'advertising / data sales',
  'online-offline linkage',
  'legal / compliance',
  'none',
] as const;
export type ImpactArea = (typeof IMPACT_AREAS)[number];

export const RELEVANCE_LEVELS = ['direct', 'indirect'] as const;
export type Relevance = (typeof RELEVANCE_LEVELS)[number];

export const INDUSTRY_CATEGORIES = [
  'retail-marketing',
  'healthcare',
  'manufacturing',
  'robotics',
  'energy',
  'finance',
  'travel',
  'education',
  'infrastructure',
  'general-ai',
  'other',
] as const;
export type IndustryCategory = (typeof INDUSTRY_CATEGORIES)[number];

export type ExtractionMethod = 'readability' | 'selector' | 'lead' | 'title';

// Core normalized representation of an article fetched from any provider.
// Identity is the URL; stages derive new objects instead of mutating.
export interface Article {
  readonly title: string;
  readonly url: string;
  readonly publishedAt: string; // ISO-8601 UTC instant
  readonly origin: string; // source tag, e.g. 'newsapi' | 'naver'
  readonly publisher?: string;
  readonly lead: string;
  readonly fullText?: string;
  readonly fingerprint?: string;
  readonly embedding?: readonly number[];
  readonly extractionMethod?: ExtractionMethod;
}

// One item as returned by a news provider page, before window filtering.
export interface RawNewsItem {
  title: string;
  url: string;
  publishedAt: Date;
  origin: string;
  publisher?: string;
  description: string;
}

export interface ClassificationVerdict {
  readonly article: Article;
  readonly passed: boolean;
  readonly categories: readonly Category[];
  readonly rationale: string;
  readonly isRegulatory: boolean;
}

export interface ValueVerdict {
  readonly article: Article;
  readonly hasValue: boolean;
  readonly rationale: string;
  readonly isRegulatory: boolean;
  readonly categories: readonly Category[];
}

/** Anything that can be routed by its relevance (analyses, composed messages). */
export interface HasRelevance {
  readonly relevance: Relevance;
}

export interface ImpactAnalysis extends HasRelevance {
  readonly article: Article;
  readonly impactType: ImpactType;
  readonly impactAreas: readonly ImpactArea[];
  readonly rationale: string;
  readonly category: IndustryCategory;
  readonly isRegulatory: boolean;
  readonly categories: readonly Category[];
}

export interface OutputMessage extends HasRelevance {
  readonly articleUrl: string;
  readonly title: string;
  readonly category: IndustryCategory;
  readonly summary: string;
  readonly text: string; // delivery-ready block
}

export interface PartnerEntry {
  readonly name: string;
  readonly category: Category;
  readonly field: string;
  readonly recentAchievement: string;
  readonly collaborationPoint: string;
  readonly articleUrl: string;
}

export interface StatsSnapshot {
  collected: number;
  afterDedup1: number;
  afterFilter: number;
  afterDedup2: number;
  afterValidation: number;
  final: number;
  regulatoryFound: number;
  regulatoryRetained: number;
  startedAt: string;
  endedAt?: string;
}

export interface CheckpointRecord {
  dateKey: string; // YYYY-MM-DD
  collectedAt: string; // ISO timestamp
  analyses: ImpactAnalysis[];
  messages: OutputMessage[];
  partners: PartnerEntry[];
  stats: StatsSnapshot;
}

// A prior-day collection window in absolute epoch milliseconds.
export interface DayWindow {
  dateKey: string;
  start: number;
  end: number;
}

export function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some((v) => v === value);
}

export function isRegulatoryCategorySet(categories: readonly Category[]): boolean {
  return categories.includes('regulation');
}

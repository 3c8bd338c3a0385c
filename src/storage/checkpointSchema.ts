import { z } from 'zod';
import { CATEGORIES, IMPACT_AREAS, IMPACT_TYPES, INDUSTRY_CATEGORIES, RELEVANCE_LEVELS } from '../types';

const articleSchema = z.object({
  title: z.string(),
  url: z.string(),
  publishedAt: z.string(),
  origin: z.string(),
  publisher: z.string().optional(),
  lead: z.string(),
  fullText: z.string().optional(),
  fingerprint: z.string().optional(),
  extractionMethod: z.enum(['readability', 'selector', 'lead', 'title']).optional(),
});

const analysisSchema = z.object({
  article: articleSchema,
  impactType: z.enum(IMPACT_TYPES),
  impactAreas: z.array(z.enum(IMPACT_AREAS)),
  rationale: z.string(),
  relevance: z.enum(RELEVANCE_LEVELS),
  category: z.enum(INDUSTRY_CATEGORIES),
  isRegulatory: z.boolean(),
  categories: z.array(z.enum(CATEGORIES)),
});

const messageSchema = z.object({
  articleUrl: z.string(),
  title: z.string(),
  relevance: z.enum(RELEVANCE_LEVELS),
  category: z.enum(INDUSTRY_CATEGORIES),
  summary: z.string(),
  text: z.string(),
});

const partnerSchema = z.object({
  name: z.string(),
  category: z.enum(CATEGORIES),
  field: z.string(),
  recentAchievement: z.string(),
  collaborationPoint: z.string(),
  articleUrl: z.string(),
});

const statsSchema = z.object({
  collected: z.number(),
  afterDedup1: z.number(),
  afterFilter: z.number(),
  afterDedup2: z.number(),
  afterValidation: z.number(),
  final: z.number(),
  regulatoryFound: z.number(),
  regulatoryRetained: z.number(),
  startedAt: z.string(),
  endedAt: z.string().optional(),
});

export const checkpointSchema = z.object({
  dateKey: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  collectedAt: z.string(),
  analyses: z.array(analysisSchema),
  messages: z.array(messageSchema),
  partners: z.array(partnerSchema).default([]),
  stats: statsSchema,
});

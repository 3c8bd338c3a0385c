import { Article, ImpactAnalysis, ValueVerdict } from '../types';

// Prompt wording is tuned by hand; parsers downstream only rely on the JSON keys named here.

export function classificationPrompt(article: Article): string {
  return `You are a news classification assistant for an advertising and marketing team.
Decide whether the article below should PASS or FAIL.

Title: ${article.title}
Lead: ${article.lead || article.title}
Source: ${article.publisher ?? article.origin}

AI must be the main topic: the title or lead must explicitly discuss AI, machine learning, LLMs, chatbots or similar.

PASS only if the article fits one of these categories:
1. solution - AI marketing or advertising tools and services (targeting, personalization, CRM, ad platforms)
2. case - a company applying AI to marketing, advertising or customer service, ideally with measured results
3. technology - AI models, algorithms or data analysis techniques that could later apply to marketing
4. regulation - AI law, privacy, data regulation, AI ethics guidelines (never exclude these)

FAIL immediately for: local festivals or tourism without AI, trade or politics without AI industry impact,
personnel appointments, earnings or IPO news without an AI product, sports, entertainment, weather, accidents,
and vague "digital transformation" or "innovation" mentions without concrete AI.

Return ONLY JSON:
{"pass": true|false, "categories": ["solution"|"case"|"technology"|"regulation", ...], "reason": "brief explanation"}`;
}

export function valuePrompt(article: Article, categories: readonly string[], profile: string): string {
  return `You evaluate whether a news article has business value for ${profile}.

Title: ${article.title}
Categories: ${categories.join(', ')}
Content: ${(article.fullText ?? article.lead).slice(0, 2000)}

The article has business value when it offers something the business could act on: a tool to adopt,
a competitor or partner move to watch, a technique to reuse, or a rule to comply with.
Pure announcements with no concrete AI substance have no value.

Return ONLY JSON:
{"has_business_value": true|false, "reason": "brief explanation, say whether AI is discussed"}`;
}

export function contextPrompt(verdict: ValueVerdict, profile: string): string {
  const { article } = verdict;
  return `You analyze how a news article affects ${profile}.

Title: ${article.title}
Categories: ${verdict.categories.join(', ')}
Content: ${(article.fullText ?? article.lead).slice(0, 2000)}

Decide:
- industry_relevance: "direct" when the article concerns retail, marketing, advertising or customer data; otherwise "indirect"
- industry_category: one of retail-marketing, healthcare, manufacturing, robotics, energy, finance, travel, education, infrastructure, general-ai, other
- impact_type: opportunity, threat, mixed or watchlist
- impact_areas: any of "customer data usage", "targeting / segmentation", "advertising / data sales", "online-offline linkage", "legal / compliance", or ["none"]

Return ONLY JSON:
{"industry_relevance": "direct|indirect", "industry_category": "...", "impact_type": "...", "impact_areas": ["..."], "reasoning": "one sentence"}`;
}

export function summaryPrompt(analysis: ImpactAnalysis, profile: string): string {
  const { article } = analysis;
  return `You write a chat notification for marketing and advertising practitioners at ${profile}.

Title: ${article.title}
Content: ${(article.fullText ?? article.lead).slice(0, 2500)}
Impact: ${analysis.impactType} (${analysis.impactAreas.join(', ')})
Why it matters: ${analysis.rationale}

Write a 3-4 line summary: facts first, then at most one practical insight. No hype.

Return ONLY JSON:
{"key_summary": "..."}`;
}

export function partnerPrompt(analysis: ImpactAnalysis, profile: string): string {
  const { article } = analysis;
  return `You build a partnership database for ${profile}.

Title: ${article.title}
Content: ${(article.fullText ?? article.lead).slice(0, 2000)}
Impact: ${analysis.impactType}
Reasoning: ${analysis.rationale}

Extract every company or organization in this article that is actively doing something in AI and could be a partner.
Skip generic mentions such as "local companies" or "the industry".

For each one give:
- name: the organization name
- field: its specific AI field, e.g. "AI search", "ad platform"
- recent_achievement: what it achieved or announced in THIS article (one sentence)
- collaboration_point: one specific, actionable way to work with it

Return ONLY a JSON array:
[{"name": "...", "field": "...", "recent_achievement": "...", "collaboration_point": "..."}]`;
}

import { z } from 'zod';
import { describeFailure } from '../common/DefaultVerdictPolicy';
import { PipelineAbortedError } from '../common/errors';
import { JudgmentStage, JudgmentStageDeps } from '../common/judgment';
import { parseJsonResponse } from '../common/json';
import { mapWithConcurrency } from '../common/workerPool';
import { partnerPrompt } from '../prompts';
import { ImpactAnalysis, PartnerEntry } from '../types';

const partnerSchema = z.object({
  name: z.string().trim().min(1),
  field: z.string().trim(),
  recent_achievement: z.string().trim(),
  collaboration_point: z.string().trim(),
});

/**
 * Organizations mentioned in direct-relevance items. Best effort: a failed or
 * unparseable call contributes no entries.
 */
export class PartnerIndex extends JudgmentStage {
  constructor(
    deps: JudgmentStageDeps,
    private readonly profile: string
  ) {
    super(deps);
  }

  public async build(analyses: readonly ImpactAnalysis[], signal?: AbortSignal): Promise<PartnerEntry[]> {
    const direct = analyses.filter((a) => a.relevance === 'direct');
    const perArticle = await mapWithConcurrency(direct, this.deps.concurrency, (a) => this.extract(a, signal), signal);
    return dedupePartners(perArticle.flat());
  }

  public async extract(analysis: ImpactAnalysis, signal?: AbortSignal): Promise<PartnerEntry[]> {
    let items: unknown;
    try {
      items = parseJsonResponse(await this.ask(partnerPrompt(analysis, this.profile), signal), 'array');
    } catch (error) {
      if (error instanceof PipelineAbortedError) throw error;
      this.reporter.report({
        type: 'warning',
        stage: 'compose',
        message: `partner extraction for ${analysis.article.title.slice(0, 50)}: ${describeFailure(error)}`,
      });
      return [];
    }
    if (!Array.isArray(items)) return [];

    const category = analysis.categories[0] ?? 'technology';
    const entries: PartnerEntry[] = [];
    for (const item of items) {
      const parsed = partnerSchema.safeParse(item);
      if (!parsed.success) continue;
      entries.push({
        name: parsed.data.name,
        category,
        field: parsed.data.field,
        recentAchievement: parsed.data.recent_achievement,
        collaborationPoint: parsed.data.collaboration_point,
        articleUrl: analysis.article.url,
      });
    }
    return entries;
  }
}

/** One entry per case-insensitive name, keeping the longest achievement; earlier entries win ties. */
export function dedupePartners(entries: readonly PartnerEntry[]): PartnerEntry[] {
  const byName = new Map<string, PartnerEntry>();
  for (const entry of entries) {
    const key = entry.name.trim().toLowerCase();
    const current = byName.get(key);
    if (!current || entry.recentAchievement.length > current.recentAchievement.length) {
      byName.set(key, entry);
    }
  }
  return [...byName.values()];
}

import { z } from 'zod';
import { DefaultVerdictPolicy, describeFailure } from '../common/DefaultVerdictPolicy';
import { PipelineAbortedError } from '../common/errors';
import { JudgmentStage, JudgmentStageDeps } from '../common/judgment';
import { parseJsonResponse } from '../common/json';
import { ItemOutcome } from '../common/ProgressReporter';
import { mapWithConcurrency } from '../common/workerPool';
import { contextPrompt } from '../prompts';
import {
  IMPACT_AREAS,
  IMPACT_TYPES,
  ImpactAnalysis,
  ImpactArea,
  INDUSTRY_CATEGORIES,
  isOneOf,
  RELEVANCE_LEVELS,
  ValueVerdict,
} from '../types';

// Unknown enum values are coerced to a safe default instead of failing the item.
const contextSchema = z.object({
  industry_relevance: z.enum(RELEVANCE_LEVELS).catch('direct'),
  industry_category: z.enum(INDUSTRY_CATEGORIES).catch('other'),
  impact_type: z.enum(IMPACT_TYPES).catch('watchlist'),
  impact_areas: z
    .union([z.array(z.unknown()), z.string().transform((s) => [s])])
    .catch([])
    .transform((list: unknown[]) => list.filter((a): a is ImpactArea => isOneOf(IMPACT_AREAS, a))),
  reasoning: z.string().catch(''),
});

export const contextDefaultPolicy: DefaultVerdictPolicy<ValueVerdict, ImpactAnalysis> = {
  description: 'watchlist, impact area [none], relevance direct, category other',
  // Regulatory items keep the plain default too; retention is counted on isRegulatory.
  fallback: (verdict, error) => ({
    article: verdict.article,
    impactType: 'watchlist',
    impactAreas: ['none'],
    rationale: `Context analysis failed (${describeFailure(error)})`,
    relevance: 'direct',
    category: 'other',
    isRegulatory: verdict.isRegulatory,
    categories: verdict.categories,
  }),
};

export function normalizeImpactAreas(areas: readonly ImpactArea[]): ImpactArea[] {
  const unique = [...new Set(areas)];
  const specific = unique.filter((a) => a !== 'none');
  return specific.length ? specific : ['none'];
}

/** Regulatory items always carry the legal / compliance area. */
export function withRegulatoryArea(analysis: ImpactAnalysis): ImpactAnalysis {
  if (!analysis.isRegulatory || analysis.impactAreas.includes('legal / compliance')) return analysis;
  return {
    ...analysis,
    impactAreas: normalizeImpactAreas([...analysis.impactAreas, 'legal / compliance']),
    rationale: `${analysis.rationale} [Regulatory article retained: legal / compliance impact]`.trim(),
  };
}

/** Stage 5: impact type, areas, relevance and industry category. Never drops an item. */
export class ContextAnalyzer extends JudgmentStage {
  constructor(
    deps: JudgmentStageDeps,
    private readonly profile: string,
    private readonly policy: DefaultVerdictPolicy<ValueVerdict, ImpactAnalysis> = contextDefaultPolicy
  ) {
    super(deps);
  }

  public async analyzeAll(verdicts: readonly ValueVerdict[], signal?: AbortSignal): Promise<ImpactAnalysis[]> {
    let done = 0;
    return mapWithConcurrency(
      verdicts,
      this.deps.concurrency,
      async (verdict) => {
        const { analysis, outcome } = await this.analyze(verdict, signal);
        done++;
        this.reporter.report({
          type: 'item',
          stage: 'analyze',
          index: done,
          total: verdicts.length,
          title: verdict.article.title,
          outcome,
          detail: `${analysis.impactType} / ${analysis.relevance}`,
        });
        return analysis;
      },
      signal
    );
  }

  public async analyze(verdict: ValueVerdict, signal?: AbortSignal): Promise<{ analysis: ImpactAnalysis; outcome: ItemOutcome }> {
    let parsed: z.infer<typeof contextSchema>;
    try {
      const response = await this.ask(contextPrompt(verdict, this.profile), signal);
      parsed = contextSchema.parse(parseJsonResponse(response));
    } catch (error) {
      if (error instanceof PipelineAbortedError) throw error;
      this.reporter.report({
        type: 'warning',
        stage: 'analyze',
        message: `${verdict.article.title.slice(0, 50)}: ${describeFailure(error)}`,
      });
      return { analysis: this.policy.fallback(verdict, error), outcome: 'defaulted' };
    }

    const analysis = withRegulatoryArea({
      article: verdict.article,
      impactType: parsed.impact_type,
      impactAreas: normalizeImpactAreas(parsed.impact_areas),
      rationale: parsed.reasoning,
      relevance: parsed.industry_relevance,
      category: parsed.industry_category,
      isRegulatory: verdict.isRegulatory,
      categories: verdict.categories,
    });
    return { analysis, outcome: analysis.rationale === parsed.reasoning ? 'passed' : 'overridden' };
  }
}

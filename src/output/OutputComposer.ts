import { z } from 'zod';
import { DefaultVerdictPolicy, describeFailure } from '../common/DefaultVerdictPolicy';
import { PipelineAbortedError } from '../common/errors';
import { JudgmentStage, JudgmentStageDeps } from '../common/judgment';
import { parseJsonResponse } from '../common/json';
import { mapWithConcurrency } from '../common/workerPool';
import { summaryPrompt } from '../prompts';
import { ImpactAnalysis, IndustryCategory, OutputMessage } from '../types';

const MAX_SUMMARY = 600;
const MAX_FALLBACK_SUMMARY = 300;

export const INDUSTRY_LABELS: Record<IndustryCategory, string> = {
  'retail-marketing': 'Retail & Marketing',
  healthcare: 'Healthcare',
  manufacturing: 'Manufacturing',
  robotics: 'Robotics',
  energy: 'Energy',
  finance: 'Finance',
  travel: 'Travel',
  education: 'Education',
  infrastructure: 'Infrastructure',
  'general-ai': 'General AI',
  other: 'Other',
};

const summarySchema = z.object({
  key_summary: z.string().trim().min(1),
});

export const summaryDefaultPolicy: DefaultVerdictPolicy<ImpactAnalysis, string> = {
  description: 'title (100 chars) followed by the analysis rationale, capped at 300 chars',
  fallback: (analysis) => {
    const summary = `${analysis.article.title.slice(0, 100)}... ${analysis.rationale}`;
    return summary.length > MAX_FALLBACK_SUMMARY ? summary.slice(0, MAX_FALLBACK_SUMMARY - 3) + '...' : summary;
  },
};

export function briefSummary(analysis: ImpactAnalysis): string {
  return `[${INDUSTRY_LABELS[analysis.category]}] ${analysis.article.title}`;
}

export function formatMessageText(analysis: ImpactAnalysis, summary: string): string {
  const { article } = analysis;
  if (analysis.relevance === 'indirect') {
    return `${summary}\n🔗 ${article.url}`;
  }
  return [
    `**${article.title}**`,
    summary,
    `Impact: ${analysis.impactType} · ${analysis.impactAreas.join(', ')}`,
    `🔗 ${article.url}`,
  ].join('\n');
}

/**
 * Stages 6/7: a generated summary for every direct item, a templated one-liner
 * for indirect ones. Direct messages come first.
 */
export class OutputComposer extends JudgmentStage {
  constructor(
    deps: JudgmentStageDeps,
    private readonly profile: string,
    private readonly policy: DefaultVerdictPolicy<ImpactAnalysis, string> = summaryDefaultPolicy
  ) {
    super(deps);
  }

  public async compose(analyses: readonly ImpactAnalysis[], signal?: AbortSignal): Promise<OutputMessage[]> {
    const direct = analyses.filter((a) => a.relevance === 'direct');
    const indirect = analyses.filter((a) => a.relevance === 'indirect');

    let done = 0;
    const directMessages = await mapWithConcurrency(
      direct,
      this.deps.concurrency,
      async (analysis) => {
        const { summary, generated } = await this.summarize(analysis, signal);
        done++;
        this.reporter.report({
          type: 'item',
          stage: 'compose',
          index: done,
          total: direct.length,
          title: analysis.article.title,
          outcome: generated ? 'passed' : 'defaulted',
        });
        return this.toMessage(analysis, summary);
      },
      signal
    );
    const indirectMessages = indirect.map((analysis) => this.toMessage(analysis, briefSummary(analysis)));
    return [...directMessages, ...indirectMessages];
  }

  public async summarize(analysis: ImpactAnalysis, signal?: AbortSignal): Promise<{ summary: string; generated: boolean }> {
    try {
      const response = await this.ask(summaryPrompt(analysis, this.profile), signal);
      const { key_summary } = summarySchema.parse(parseJsonResponse(response));
      return { summary: key_summary.slice(0, MAX_SUMMARY), generated: true };
    } catch (error) {
      if (error instanceof PipelineAbortedError) throw error;
      this.reporter.report({
        type: 'warning',
        stage: 'compose',
        message: `${analysis.article.title.slice(0, 50)}: ${describeFailure(error)}`,
      });
      return { summary: this.policy.fallback(analysis, error), generated: false };
    }
  }

  private toMessage(analysis: ImpactAnalysis, summary: string): OutputMessage {
    return {
      articleUrl: analysis.article.url,
      title: analysis.article.title,
      relevance: analysis.relevance,
      category: analysis.category,
      summary,
      text: formatMessageText(analysis, summary),
    };
  }
}

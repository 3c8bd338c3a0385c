import { z } from 'zod';
import { DefaultVerdictPolicy, describeFailure } from '../common/DefaultVerdictPolicy';
import { PipelineAbortedError } from '../common/errors';
import { JudgmentStage, JudgmentStageDeps } from '../common/judgment';
import { parseJsonResponse } from '../common/json';
import { ItemOutcome } from '../common/ProgressReporter';
import { mapWithConcurrency } from '../common/workerPool';
import { valuePrompt } from '../prompts';
import { ClassificationVerdict, ValueVerdict } from '../types';

const valueSchema = z.object({
  has_business_value: z.union([
    z.boolean(),
    z.string().transform((s) => ['true', 'yes', '1'].includes(s.trim().toLowerCase())),
  ]),
  reason: z.string().catch(''),
});

export const valueDefaultPolicy: DefaultVerdictPolicy<ClassificationVerdict, ValueVerdict> = {
  description: 'keep (hasValue = true)',
  fallback: (verdict, error) => ({
    article: verdict.article,
    hasValue: true,
    rationale: `Validation failed, kept by default (${describeFailure(error)})`,
    isRegulatory: verdict.isRegulatory,
    categories: verdict.categories,
  }),
};

/** Stage 4: business-value check. Items judged without value are dropped, regulatory ones never. */
export class ValueValidator extends JudgmentStage {
  constructor(
    deps: JudgmentStageDeps,
    private readonly profile: string,
    private readonly policy: DefaultVerdictPolicy<ClassificationVerdict, ValueVerdict> = valueDefaultPolicy
  ) {
    super(deps);
  }

  public async validate(verdicts: readonly ClassificationVerdict[], signal?: AbortSignal): Promise<ValueVerdict[]> {
    let done = 0;
    const results = await mapWithConcurrency(
      verdicts,
      this.deps.concurrency,
      async (verdict) => {
        const { result, outcome } = await this.judge(verdict, signal);
        done++;
        this.reporter.report({
          type: 'item',
          stage: 'validate',
          index: done,
          total: verdicts.length,
          title: verdict.article.title,
          outcome,
          detail: result.rationale.slice(0, 50),
        });
        return result;
      },
      signal
    );
    return results.filter((r) => r.hasValue);
  }

  public async judge(verdict: ClassificationVerdict, signal?: AbortSignal): Promise<{ result: ValueVerdict; outcome: ItemOutcome }> {
    let parsed: z.infer<typeof valueSchema>;
    try {
      const response = await this.ask(valuePrompt(verdict.article, verdict.categories, this.profile), signal);
      parsed = valueSchema.parse(parseJsonResponse(response));
    } catch (error) {
      if (error instanceof PipelineAbortedError) throw error;
      this.reporter.report({
        type: 'warning',
        stage: 'validate',
        message: `${verdict.article.title.slice(0, 50)}: ${describeFailure(error)}`,
      });
      return { result: this.policy.fallback(verdict, error), outcome: 'defaulted' };
    }

    const base = { article: verdict.article, isRegulatory: verdict.isRegulatory, categories: verdict.categories };
    if (verdict.isRegulatory && !parsed.has_business_value) {
      return {
        result: { ...base, hasValue: true, rationale: `Regulatory article retained. Original: ${parsed.reason}` },
        outcome: 'overridden',
      };
    }
    return {
      result: { ...base, hasValue: parsed.has_business_value, rationale: parsed.reason },
      outcome: parsed.has_business_value ? 'passed' : 'dropped',
    };
  }
}

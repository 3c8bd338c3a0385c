import { z } from 'zod';
import { DefaultVerdictPolicy, describeFailure } from '../common/DefaultVerdictPolicy';
import { PipelineAbortedError } from '../common/errors';
import { JudgmentStage, JudgmentStageDeps } from '../common/judgment';
import { parseJsonResponse } from '../common/json';
import { ItemOutcome } from '../common/ProgressReporter';
import { mapWithConcurrency } from '../common/workerPool';
import { classificationPrompt } from '../prompts';
import { Article, CATEGORIES, Category, ClassificationVerdict, isOneOf, isRegulatoryCategorySet } from '../types';

const TRUTHY = ['true', 'yes', '1'];

const classificationSchema = z.object({
  pass: z.union([
    z.boolean(),
    z.string().transform((s) => TRUTHY.includes(s.trim().toLowerCase())),
    z.number().transform((n) => n === 1),
  ]),
  categories: z
    .union([z.array(z.unknown()), z.string().transform((s) => [s])])
    .transform((list: unknown[]) => list.filter((c): c is Category => isOneOf(CATEGORIES, c))),
  reason: z.string().catch(''),
});

export const classificationDefaultPolicy: DefaultVerdictPolicy<Article, ClassificationVerdict> = {
  description: 'pass with category [technology]',
  fallback: (article, error) => ({
    article,
    passed: true,
    categories: ['technology'],
    rationale: `Classification failed, passed by default (${describeFailure(error)})`,
    isRegulatory: false,
  }),
};

/**
 * Stage 2: pass/fail plus topical categories per article. The only stage allowed
 * to shrink the set on a negative judgment, and never for a regulatory item.
 */
export class CategoryClassifier extends JudgmentStage {
  constructor(
    deps: JudgmentStageDeps,
    private readonly policy: DefaultVerdictPolicy<Article, ClassificationVerdict> = classificationDefaultPolicy
  ) {
    super(deps);
  }

  /** Returns the passed verdicts only, in input order. */
  public async filter(articles: readonly Article[], signal?: AbortSignal): Promise<ClassificationVerdict[]> {
    let done = 0;
    const verdicts = await mapWithConcurrency(
      articles,
      this.deps.concurrency,
      async (article) => {
        const { verdict, outcome } = await this.classify(article, signal);
        done++;
        this.reporter.report({
          type: 'item',
          stage: 'classify',
          index: done,
          total: articles.length,
          title: article.title,
          outcome,
          detail: verdict.passed ? verdict.categories.join(', ') : verdict.rationale.slice(0, 30),
        });
        return verdict;
      },
      signal
    );
    return verdicts.filter((v) => v.passed);
  }

  public async classify(article: Article, signal?: AbortSignal): Promise<{ verdict: ClassificationVerdict; outcome: ItemOutcome }> {
    let parsed: z.infer<typeof classificationSchema>;
    try {
      const response = await this.ask(classificationPrompt(article), signal);
      parsed = classificationSchema.parse(parseJsonResponse(response));
    } catch (error) {
      if (error instanceof PipelineAbortedError) throw error;
      this.reporter.report({ type: 'warning', stage: 'classify', message: `${article.title.slice(0, 50)}: ${describeFailure(error)}` });
      return { verdict: this.policy.fallback(article, error), outcome: 'defaulted' };
    }

    const isRegulatory = isRegulatoryCategorySet(parsed.categories);
    if (isRegulatory && !parsed.pass) {
      return {
        verdict: {
          article,
          passed: true,
          categories: parsed.categories,
          rationale: `Regulatory article retained. Original: ${parsed.reason}`,
          isRegulatory,
        },
        outcome: 'overridden',
      };
    }
    return {
      verdict: { article, passed: parsed.pass, categories: parsed.categories, rationale: parsed.reason, isRegulatory },
      outcome: parsed.pass ? 'passed' : 'dropped',
    };
  }
}

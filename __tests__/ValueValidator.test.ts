import { describe, expect, it } from 'vitest';
import { ValueValidator } from '../src/analyzers/ValueValidator';
import { ClassificationVerdict } from '../src/types';
import { article, promptTitle, ScriptedJudge, stageDeps } from './fakes';

function verdict(title: string, isRegulatory = false): ClassificationVerdict {
  return {
    article: article({ title, url: `https://news.test/${encodeURIComponent(title)}` }),
    passed: true,
    categories: isRegulatory ? ['regulation'] : ['technology'],
    rationale: 'relevant',
    isRegulatory,
  };
}

const answers: Record<string, string | Error> = {
  'Privacy act amended': '{"has_business_value": false, "reason": "no direct use"}',
  'Vendor ships CDP feature': '{"has_business_value": true, "reason": "applicable to campaigns"}',
  'Lab publishes benchmark': '{"has_business_value": "no", "reason": "academic"}',
  'Rate limited': new Error('429 Too Many Requests'),
  'No reason given': '{"has_business_value": true}',
};

describe('ValueValidator', () => {
  const judge = new ScriptedJudge((prompt) => answers[promptTitle(prompt)] ?? new Error('unscripted'));
  const validator = new ValueValidator(stageDeps(judge), 'We run loyalty programs for retailers.');

  it('retains a regulatory article judged without value', async () => {
    const { result, outcome } = await validator.judge(verdict('Privacy act amended', true));

    expect(outcome).toBe('overridden');
    expect(result.hasValue).toBe(true);
    expect(result.rationale).toBe('Regulatory article retained. Original: no direct use');
  });

  it('drops non-regulatory items without value and keeps the rest', async () => {
    const kept = await validator.validate([
      verdict('Vendor ships CDP feature'),
      verdict('Lab publishes benchmark'),
      verdict('Rate limited'),
      verdict('No reason given'),
    ]);

    expect(kept.map((v) => v.article.title)).toEqual(['Vendor ships CDP feature', 'Rate limited', 'No reason given']);
    expect(kept[1].rationale).toBe('Validation failed, kept by default (429 Too Many Requests)');
    expect(kept[2].rationale).toBe('');
  });

  it('passes the company profile and categories into the prompt', async () => {
    await validator.judge(verdict('Vendor ships CDP feature'));
    const prompt = judge.prompts[judge.prompts.length - 1];

    expect(prompt).toContain('We run loyalty programs for retailers.');
    expect(prompt).toContain('technology');
  });
});

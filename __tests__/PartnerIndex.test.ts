import { describe, expect, it } from 'vitest';
import { dedupePartners, PartnerIndex } from '../src/output/PartnerIndex';
import { ImpactAnalysis, PartnerEntry, Relevance } from '../src/types';
import { article, promptTitle, ScriptedJudge, stageDeps } from './fakes';

function analysis(title: string, relevance: Relevance): ImpactAnalysis {
  return {
    article: article({ title, url: `https://news.test/${title.length}` }),
    impactType: 'opportunity',
    impactAreas: ['none'],
    rationale: '',
    relevance,
    category: 'robotics',
    isRegulatory: false,
    categories: ['case', 'technology'],
  };
}

function entry(name: string, recentAchievement: string): PartnerEntry {
  return { name, category: 'case', field: 'Retail AI', recentAchievement, collaborationPoint: 'pilot', articleUrl: 'u' };
}

describe('PartnerIndex', () => {
  const judge = new ScriptedJudge((prompt) => {
    switch (promptTitle(prompt)) {
      case 'Two vendors':
        return `Here you go:
[
  {"name": "Acme Robotics", "field": "Robotics, Logistics", "recent_achievement": "Raised a series B", "collaboration_point": "Store automation"},
  {"name": "", "field": "x", "recent_achievement": "y", "collaboration_point": "z"},
  {"name": "ShelfSense", "field": "Retail AI", "recent_achievement": "Launched shelf cameras", "collaboration_point": "In-store analytics"}
]`;
      case 'Same vendor again':
        return '[{"name": "acme robotics ", "field": "Robotics", "recent_achievement": "Raised a series B round", "collaboration_point": "Warehouse"}]';
      default:
        return 'no organizations mentioned';
    }
  });
  const index = new PartnerIndex(stageDeps(judge), 'a retail loyalty business');

  it('extracts valid entries and tags them with the primary category', async () => {
    const entries = await index.extract(analysis('Two vendors', 'direct'));

    expect(entries.map((e) => e.name)).toEqual(['Acme Robotics', 'ShelfSense']);
    expect(entries[0]).toEqual({
      name: 'Acme Robotics',
      category: 'case',
      field: 'Robotics, Logistics',
      recentAchievement: 'Raised a series B',
      collaborationPoint: 'Store automation',
      articleUrl: 'https://news.test/11',
    });
  });

  it('builds from direct items only and merges organizations by name', async () => {
    const before = judge.prompts.length;
    const partners = await index.build([
      analysis('Two vendors', 'direct'),
      analysis('Indirect piece', 'indirect'),
      analysis('Same vendor again', 'direct'),
      analysis('Nothing here', 'direct'),
    ]);

    expect(judge.prompts.slice(before).map(promptTitle).sort()).toEqual(['Nothing here', 'Same vendor again', 'Two vendors']);
    expect(partners.map((p) => [p.name, p.recentAchievement])).toEqual([
      ['acme robotics', 'Raised a series B round'],
      ['ShelfSense', 'Launched shelf cameras'],
    ]);
  });
});

describe('dedupePartners', () => {
  it('keeps the first entry when achievements are equally long', () => {
    const result = dedupePartners([entry('Nova', 'abc'), entry('NOVA', 'xyz'), entry('Orbit', '')]);
    expect(result).toEqual([entry('Nova', 'abc'), entry('Orbit', '')]);
  });
});

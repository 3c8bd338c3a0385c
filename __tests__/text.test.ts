import { describe, expect, it } from 'vitest';
import { MalformedResponseError } from '../src/common/errors';
import { extractJson, parseJsonResponse } from '../src/common/json';
import { characterJaccard, cleanHtml, extractLeadParagraph, normalizeTitle } from '../src/common/text';

describe('cleanHtml', () => {
  it('strips tags, decodes common entities and collapses whitespace', () => {
    expect(cleanHtml('<b>AI</b> &amp; ads&nbsp; &quot;now&quot;\n\n today')).toBe('AI & ads "now" today');
  });

  it('returns an empty string for missing input', () => {
    expect(cleanHtml(undefined)).toBe('');
  });
});

describe('extractLeadParagraph', () => {
  it('keeps the first N sentences', () => {
    const text = 'The first sentence is here. The second one follows! Is this the third? A fourth is dropped.';
    expect(extractLeadParagraph(text, 3)).toBe('The first sentence is here. The second one follows! Is this the third?');
  });

  it('does not split on short abbreviations', () => {
    expect(extractLeadParagraph('U.S. regulators moved today. Next.', 1)).toBe('U.S. regulators moved today.');
  });

  it('keeps an unterminated tail', () => {
    expect(extractLeadParagraph('No terminator at all', 3)).toBe('No terminator at all');
  });
});

describe('normalizeTitle', () => {
  it('lowercases and drops punctuation but keeps letters of any script', () => {
    expect(normalizeTitle('  OpenAI: GPT-5 출시! ')).toBe('openai gpt5 출시');
  });
});

describe('characterJaccard', () => {
  it('compares character sets', () => {
    expect(characterJaccard('abc', 'abd')).toBe(0.5);
    expect(characterJaccard('abc', 'CBA')).toBe(1);
    expect(characterJaccard('', 'abc')).toBe(0);
  });
});

describe('extractJson', () => {
  it('finds an object embedded in prose', () => {
    expect(extractJson('Sure! Here it is: {"pass": true} Hope that helps.')).toBe('{"pass": true}');
  });

  it('unwraps a fenced block', () => {
    expect(extractJson('```json\n{"a": {"b": 1}}\n```')).toBe('{"a": {"b": 1}}');
  });

  it('finds an array when asked for one', () => {
    expect(extractJson('Result:\n[{"name": "x"}]\nDone', 'array')).toBe('[{"name": "x"}]');
  });

  it('throws MalformedResponseError when nothing looks like JSON', () => {
    expect(() => extractJson('I cannot answer that.')).toThrow(MalformedResponseError);
  });
});

describe('parseJsonResponse', () => {
  it('parses the extracted JSON', () => {
    expect(parseJsonResponse('x {"n": 2} y')).toEqual({ n: 2 });
  });

  it('throws MalformedResponseError on invalid JSON', () => {
    expect(() => parseJsonResponse('{"n": }')).toThrow(MalformedResponseError);
  });
});

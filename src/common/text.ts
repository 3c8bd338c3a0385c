const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

export function cleanHtml(text: string | undefined): string {
  if (!text) return '';
  return text
    .replace(/<[^>]*>?/gm, '')
    .replace(/&(amp|lt|gt|quot|#39|apos|nbsp);/g, (m) => ENTITIES[m] ?? m)
    .replace(/\s\s+/g, ' ')
    .trim();
}

/**
 * First `sentences` sentences of `content`. A terminator only counts once the
 * running sentence is longer than 10 characters, which skips most abbreviations.
 */
export function extractLeadParagraph(content: string, sentences = 3): string {
  if (!content) return '';

  const found: string[] = [];
  let current = '';
  for (const ch of content) {
    current += ch;
    if ('.!?'.includes(ch) && current.length > 10) {
      found.push(current.trim());
      current = '';
      if (found.length >= sentences) break;
    }
  }
  if (current && found.length < sentences) found.push(current.trim());

  const lead = found.slice(0, sentences).join(' ');
  return lead || content.slice(0, 500);
}

export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}\s]/gu, '');
}

/** Character-set Jaccard similarity, case-insensitive. */
export function characterJaccard(a: string, b: string): number {
  if (!a || !b) return 0;
  const setA = new Set(a.toLowerCase());
  const setB = new Set(b.toLowerCase());
  let intersection = 0;
  for (const ch of setA) if (setB.has(ch)) intersection += 1;
  const union = setA.size + setB.size - intersection;
  return union > 0 ? intersection / union : 0;
}

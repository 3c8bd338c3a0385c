import { characterJaccard } from '../common/text';
import { fingerprint } from '../services/SimilarityEngine';

export type SimilarityFn = (a: readonly number[], b: readonly number[]) => number;

export interface SelectionPolicy<T> {
  score: (item: T) => number;
  /** When any member of a group matches, only matching members compete. */
  preferred?: (item: T) => boolean;
}

/**
 * Highest score wins; on equal scores the earlier member wins. Members matching
 * `preferred` are considered exclusively when present.
 */
export function selectBest<T>(group: readonly T[], { score, preferred }: SelectionPolicy<T>): T {
  const favoured = preferred ? group.filter(preferred) : [];
  const candidates = favoured.length ? favoured : group;
  let best = candidates[0];
  let bestScore = score(best);
  for (const candidate of candidates.slice(1)) {
    const s = score(candidate);
    if (s > bestScore) {
      best = candidate;
      bestScore = s;
    }
  }
  return best;
}

/**
 * Single-link-to-anchor grouping: each not-yet-grouped item anchors a group of
 * every later ungrouped item whose similarity to it reaches `threshold`.
 * Returns groups of indices in anchor order.
 */
export function anchorGroups(count: number, linked: (anchor: number, other: number) => boolean): number[][] {
  const grouped = new Array<boolean>(count).fill(false);
  const groups: number[][] = [];
  for (let i = 0; i < count; i++) {
    if (grouped[i]) continue;
    grouped[i] = true;
    const group = [i];
    for (let j = i + 1; j < count; j++) {
      if (!grouped[j] && linked(i, j)) {
        grouped[j] = true;
        group.push(j);
      }
    }
    groups.push(group);
  }
  return groups;
}

/**
 * Anchor grouping repeated over the survivors until a pass merges nothing, so
 * no surviving pair is at or above `threshold` and a second run removes nothing.
 */
export function dedupByEmbedding<T>(
  items: readonly T[],
  vectors: readonly (readonly number[])[],
  similarity: SimilarityFn,
  threshold: number,
  policy: SelectionPolicy<T>
): T[] {
  const { score, preferred } = policy;
  let current = items.map((item, i) => ({ item, vector: vectors[i] ?? [] }));
  for (;;) {
    const entries = current;
    const groups = anchorGroups(entries.length, (a, b) => similarity(entries[a].vector, entries[b].vector) >= threshold);
    if (groups.length === entries.length) break;
    current = groups.map((group) =>
      selectBest(
        group.map((i) => entries[i]),
        { score: (m) => score(m.item), preferred: preferred ? (m) => preferred(m.item) : undefined }
      )
    );
  }
  return current.map((entry) => entry.item);
}

export interface FingerprintOptions<T> extends SelectionPolicy<T> {
  key: (item: T) => string;
  /** Character-set Jaccard above which two keys also link. Omit for exact matching only. */
  jaccardThreshold?: number;
}

/** Fallback grouping when embeddings are unavailable. */
export function dedupByFingerprint<T>(items: readonly T[], options: FingerprintOptions<T>): T[] {
  const { key, jaccardThreshold, score, preferred } = options;
  let current = items.map((item) => {
    const text = key(item);
    return { item, text, hash: fingerprint(text) };
  });
  for (;;) {
    const entries = current;
    const groups = anchorGroups(entries.length, (a, b) => {
      const x = entries[a];
      const y = entries[b];
      if (x.hash && x.hash === y.hash) return true;
      return jaccardThreshold !== undefined && characterJaccard(x.text, y.text) > jaccardThreshold;
    });
    if (groups.length === entries.length) break;
    current = groups.map((group) =>
      selectBest(
        group.map((i) => entries[i]),
        { score: (m) => score(m.item), preferred: preferred ? (m) => preferred(m.item) : undefined }
      )
    );
  }
  return current.map((entry) => entry.item);
}

import { createHash } from 'crypto';
import { errorMessage } from '../common/errors';
import { EmbeddingProvider } from './OpenAIService';

export type EmbedResult =
  | { ok: true; vectors: number[][]; degraded: number }
  | { ok: false; reason: string };

/**
 * Embedding access for both dedup stages. Vectors are cached per run by the
 * text fingerprint, so identical normalized texts are embedded once.
 */
export class SimilarityEngine {
  private readonly cache = new Map<string, number[]>();

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly batchSize = 50
  ) {}

  public get dimensions(): number {
    return this.provider.dimensions;
  }

  public async embedBatch(texts: readonly string[]): Promise<EmbedResult> {
    if (!this.provider.enabled) {
      return { ok: false, reason: 'embedding provider not configured' };
    }

    const keys = texts.map((t) => this.fingerprint(t));
    const pending: string[] = [];
    const pendingText = new Map<string, string>();
    keys.forEach((key, i) => {
      if (key && !this.cache.has(key) && !pendingText.has(key)) {
        pending.push(key);
        pendingText.set(key, texts[i].trim());
      }
    });

    let degraded = 0;
    for (let i = 0; i < pending.length; i += this.batchSize) {
      const chunk = pending.slice(i, i + this.batchSize);
      let vectors: number[][];
      try {
        vectors = await this.provider.embed(chunk.map((k) => pendingText.get(k) ?? ''));
      } catch (e) {
        return { ok: false, reason: errorMessage(e) };
      }
      chunk.forEach((key, j) => {
        const vector = vectors[j];
        if (this.isUsable(vector)) {
          this.cache.set(key, vector);
        } else {
          degraded += 1;
        }
      });
    }

    const vectors = keys.map((key) => this.cache.get(key) ?? this.zeroVector());
    return { ok: true, vectors, degraded };
  }

  /** Cosine similarity clamped to [0, 1]; 0 for empty, zero or mismatched vectors. */
  public similarity(a: readonly number[], b: readonly number[]): number {
    if (!a.length || a.length !== b.length) return 0;
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
      dot += a[i] * b[i];
      normA += a[i] * a[i];
      normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) return 0;
    const cosine = dot / (Math.sqrt(normA) * Math.sqrt(normB));
    if (!Number.isFinite(cosine)) return 0;
    return Math.max(0, Math.min(1, cosine));
  }

  public fingerprint(text: string): string {
    return fingerprint(text);
  }

  private isUsable(vector: number[] | undefined): vector is number[] {
    return (
      vector !== undefined &&
      vector.length === this.provider.dimensions &&
      vector.every((x) => Number.isFinite(x)) &&
      vector.some((x) => x !== 0)
    );
  }

  private zeroVector(): number[] {
    return new Array<number>(this.provider.dimensions).fill(0);
  }
}

export function fingerprint(text: string): string {
  const normalized = text.trim().toLowerCase();
  if (!normalized) return '';
  return createHash('sha256').update(normalized).digest('hex');
}

import OpenAI from 'openai';
import { AppConfig } from '../config';

export interface JudgmentOptions {
  temperature?: number;
}

/** Free-text semantic judgment. Callers own validation of whatever JSON the reply carries. */
export interface JudgmentService {
  readonly enabled: boolean;
  invoke(prompt: string, options?: JudgmentOptions): Promise<string>;
}

/**
 * Batched embeddings. The returned list is index-aligned with `texts`; an entry
 * the provider did not return comes back empty.
 */
export interface EmbeddingProvider {
  readonly enabled: boolean;
  readonly dimensions: number;
  embed(texts: readonly string[]): Promise<number[][]>;
}

export class OpenAIService implements JudgmentService, EmbeddingProvider {
  private client: OpenAI | null;
  private readonly model: string;
  private readonly defaultTemperature: number;
  private readonly embeddingModel: string;
  public readonly dimensions: number;

  constructor(config: AppConfig) {
    if (config.allowInsecureTls) {
      // Disables TLS verification globally for this process. Use ONLY for debugging.
      process.env.NODE_TLS_REJECT_UNAUTHORIZED = '0';
      console.warn('[OpenAIService] WARNING: TLS verification disabled (ALLOW_INSECURE_TLS=true). Do not use in production.');
    }
    this.client = config.openAiKey ? new OpenAI({ apiKey: config.openAiKey }) : null;
    this.model = config.llmModel;
    this.defaultTemperature = config.llmTemperature;
    this.embeddingModel = config.embeddingModel;
    this.dimensions = config.embeddingDimensions;
  }

  public get enabled(): boolean {
    return this.client !== null;
  }

  public async invoke(prompt: string, { temperature }: JudgmentOptions = {}): Promise<string> {
    if (!this.client) {
      throw new Error('OpenAI client not configured');
    }

    let completion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: temperature ?? this.defaultTemperature,
      });
    } catch (e) {
      if (isTlsIssuerError(e)) {
        throw new Error(formatTlsGuidance('OpenAI', e));
      }
      throw e;
    }

    return completion.choices[0]?.message?.content ?? '';
  }

  public async embed(texts: readonly string[]): Promise<number[][]> {
    if (!this.client) {
      throw new Error('OpenAI client not configured');
    }
    if (!texts.length) return [];

    let response;
    try {
      response = await this.client.embeddings.create({
        model: this.embeddingModel,
        input: [...texts],
        dimensions: this.dimensions,
      });
    } catch (e) {
      if (isTlsIssuerError(e)) {
        throw new Error(formatTlsGuidance('OpenAI embeddings', e));
      }
      throw e;
    }

    const vectors: number[][] = texts.map(() => []);
    for (const item of response.data) {
      if (item.index >= 0 && item.index < vectors.length) {
        vectors[item.index] = item.embedding;
      }
    }
    return vectors;
  }
}

function errorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  if ('code' in e && typeof e.code === 'string') return e.code;
  if ('cause' in e) return errorCode(e.cause);
  return undefined;
}

export function isTlsIssuerError(e: unknown): boolean {
  return errorCode(e) === 'UNABLE_TO_GET_ISSUER_CERT_LOCALLY';
}

export function formatTlsGuidance(context: string, e: unknown): string {
  const message = e instanceof Error ? e.message : String(e);
  return `${context} TLS certificate chain not trusted. Steps:\n1. Export corporate/proxy root certificate as Base64 PEM.\n2. Save it inside the project, e.g. certs/corporate-root.pem.\n3. Set NODE_EXTRA_CA_CERTS=path/to/corporate-root.pem before running.\n4. (Temporary) set ALLOW_INSECURE_TLS=true to bypass verification.\nError: ${message}`;
}

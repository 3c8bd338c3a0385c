import { errorMessage } from '../common/errors';
import { DeliveryMode } from '../config';
import { HasRelevance, OutputMessage } from '../types';
import { DeliveryChannel } from './DeliveryChannel';

export interface DeliveryResult {
  articleUrl: string;
  ok: boolean;
  error?: string;
}

export interface DeliveryReport {
  mode: DeliveryMode;
  total: number;
  delivered: number;
  failed: number;
  results: DeliveryResult[];
}

export function directOnly<T extends HasRelevance>(items: readonly T[]): T[] {
  return items.filter((item) => item.relevance === 'direct');
}

export function batchDocument(messages: readonly OutputMessage[], dateKey: string): string {
  const header = `## Directly relevant news for ${dateKey}: ${messages.length} articles`;
  const body = messages.map((m, i) => `### ${i + 1}. ${m.title}\n${m.summary}\n🔗 ${m.articleUrl}`);
  return [header, ...body].join('\n\n');
}

/** The send phase: only direct-relevance messages reach the channel. */
export class DeliveryService {
  constructor(private readonly channel: DeliveryChannel) {}

  public async deliver(messages: readonly OutputMessage[], dateKey: string, mode: DeliveryMode): Promise<DeliveryReport> {
    const direct = directOnly(messages);
    if (!direct.length) {
      return { mode, total: 0, delivered: 0, failed: 0, results: [] };
    }
    return mode === 'batch' ? this.sendBatch(direct, dateKey) : this.sendEach(direct);
  }

  private async sendEach(messages: readonly OutputMessage[]): Promise<DeliveryReport> {
    const results: DeliveryResult[] = [];
    for (const [i, message] of messages.entries()) {
      try {
        await this.channel.send(message.text);
        results.push({ articleUrl: message.articleUrl, ok: true });
        console.log(`[delivery] [${i + 1}/${messages.length}] ✅ sent`);
      } catch (e) {
        results.push({ articleUrl: message.articleUrl, ok: false, error: errorMessage(e) });
        console.error(`[delivery] [${i + 1}/${messages.length}] ❌ ${errorMessage(e)}`);
      }
    }
    const delivered = results.filter((r) => r.ok).length;
    return { mode: 'single', total: messages.length, delivered, failed: messages.length - delivered, results };
  }

  private async sendBatch(messages: readonly OutputMessage[], dateKey: string): Promise<DeliveryReport> {
    let error: string | undefined;
    try {
      await this.channel.send(batchDocument(messages, dateKey));
      console.log(`[delivery] ✅ batch sent (${messages.length} articles)`);
    } catch (e) {
      error = errorMessage(e);
      console.error(`[delivery] ❌ batch failed: ${error}`);
    }
    const ok = error === undefined;
    return {
      mode: 'batch',
      total: messages.length,
      delivered: ok ? messages.length : 0,
      failed: ok ? 0 : messages.length,
      results: messages.map((m) => ({ articleUrl: m.articleUrl, ok, ...(error ? { error } : {}) })),
    };
  }
}

import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DeliveryError } from '../src/common/errors';
import { DeliveryChannel } from '../src/delivery/DeliveryChannel';
import { batchDocument, DeliveryService } from '../src/delivery/DeliveryService';
import { WebhookDeliveryChannel } from '../src/delivery/WebhookDeliveryChannel';
import { HttpClient } from '../src/fetchers/http';
import { OutputMessage, Relevance } from '../src/types';

class RecordingChannel implements DeliveryChannel {
  public readonly name = 'recording';
  public readonly sent: string[] = [];

  constructor(private readonly failOn: (markdown: string) => boolean = () => false) {}

  async send(markdown: string): Promise<void> {
    if (this.failOn(markdown)) throw new Error('room unavailable');
    this.sent.push(markdown);
  }
}

function message(title: string, relevance: Relevance): OutputMessage {
  return {
    articleUrl: `https://news.test/${title}`,
    title,
    relevance,
    category: 'retail-marketing',
    summary: `${title} summary`,
    text: `**${title}**`,
  };
}

const messages = [message('A', 'direct'), message('B', 'indirect'), message('C', 'direct')];

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('DeliveryService', () => {
  it('sends each direct message separately in single mode', async () => {
    const channel = new RecordingChannel((m) => m === '**C**');
    const report = await new DeliveryService(channel).deliver(messages, '2026-10-18', 'single');

    expect(channel.sent).toEqual(['**A**']);
    expect(report).toEqual({
      mode: 'single',
      total: 2,
      delivered: 1,
      failed: 1,
      results: [
        { articleUrl: 'https://news.test/A', ok: true },
        { articleUrl: 'https://news.test/C', ok: false, error: 'room unavailable' },
      ],
    });
  });

  it('sends one combined document in batch mode', async () => {
    const channel = new RecordingChannel();
    const report = await new DeliveryService(channel).deliver(messages, '2026-10-18', 'batch');

    expect(channel.sent).toEqual([
      [
        '## Directly relevant news for 2026-10-18: 2 articles',
        '### 1. A\nA summary\n🔗 https://news.test/A',
        '### 2. C\nC summary\n🔗 https://news.test/C',
      ].join('\n\n'),
    ]);
    expect(report).toMatchObject({ mode: 'batch', total: 2, delivered: 2, failed: 0 });
  });

  it('marks every message failed when the batch fails', async () => {
    const report = await new DeliveryService(new RecordingChannel(() => true)).deliver(messages, '2026-10-18', 'batch');

    expect(report).toMatchObject({ delivered: 0, failed: 2 });
    expect(report.results.every((r) => r.error === 'room unavailable')).toBe(true);
  });

  it('sends nothing when no message is direct', async () => {
    const channel = new RecordingChannel();
    const report = await new DeliveryService(channel).deliver([message('B', 'indirect')], '2026-10-18', 'single');

    expect(report).toEqual({ mode: 'single', total: 0, delivered: 0, failed: 0, results: [] });
    expect(channel.sent).toEqual([]);
  });

  it('numbers the batch document from one', () => {
    expect(batchDocument([], '2026-10-18')).toBe('## Directly relevant news for 2026-10-18: 0 articles');
  });
});

describe('WebhookDeliveryChannel', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  const channel = () =>
    new WebhookDeliveryChannel(
      { apiBase: 'https://chat.test/v1/', botToken: 'test-secret', roomId: 'room-1' },
      new HttpClient({ label: 'Delivery webhook', dispatcher: agent })
    );

  it('posts the markdown to the room with the bot token', async () => {
    let body = '';
    agent
      .get('https://chat.test')
      .intercept({
        path: '/v1/messages',
        method: 'POST',
        headers: { authorization: 'Bearer test-secret' },
        body: (b) => {
          body = b;
          return true;
        },
      })
      .reply(200, { id: 'msg-1' });

    await channel().send('**hello**');

    expect(JSON.parse(body)).toEqual({ roomId: 'room-1', markdown: '**hello**' });
  });

  it('raises a delivery error with the status on rejection', async () => {
    agent.get('https://chat.test').intercept({ path: '/v1/messages', method: 'POST' }).reply(403, 'room closed');

    const error = await channel()
      .send('x')
      .then(
        () => undefined,
        (e: unknown) => e
      );

    expect(error).toBeInstanceOf(DeliveryError);
    expect(error).toMatchObject({ status: 403, message: 'Delivery failed with 403: room closed' });
  });

  it('requires a token and a room', () => {
    expect(() => new WebhookDeliveryChannel({ apiBase: 'https://chat.test', botToken: '', roomId: 'room-1' })).toThrow(
      DeliveryError
    );
  });
});

import { DeliveryError } from '../common/errors';
import { HttpClient } from '../fetchers/http';
import { DeliveryChannel } from './DeliveryChannel';

export interface WebhookDeliveryOptions {
  apiBase: string;
  botToken: string;
  roomId: string;
}

/** Chat room delivery: `POST {apiBase}/messages` with `{ roomId, markdown }`. */
export class WebhookDeliveryChannel implements DeliveryChannel {
  public readonly name = 'webhook';

  constructor(
    private readonly options: WebhookDeliveryOptions,
    private readonly http: HttpClient = new HttpClient({ label: 'Delivery webhook' })
  ) {
    if (!options.botToken || !options.roomId) {
      throw new DeliveryError('Delivery webhook requires a bot token and a room id');
    }
  }

  public async send(markdown: string): Promise<void> {
    const res = await this.http.request(`${this.options.apiBase.replace(/\/+$/, '')}/messages`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.options.botToken}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ roomId: this.options.roomId, markdown }),
    });
    if (!res.ok) {
      const text = await res.text();
      throw new DeliveryError(`Delivery failed with ${res.status}: ${text.slice(0, 200)}`, res.status);
    }
    await res.body?.cancel();
  }
}

/** Anything that can post one pre-formatted markdown message. */
export interface DeliveryChannel {
  readonly name: string;
  send(markdown: string): Promise<void>;
}

/** Dry-run channel: prints what would be delivered. */
export class ConsoleDeliveryChannel implements DeliveryChannel {
  public readonly name = 'console';

  public async send(markdown: string): Promise<void> {
    console.log(`[delivery:dry-run]\n${markdown}\n`);
  }
}

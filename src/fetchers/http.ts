import { Agent, Dispatcher, fetch, Response } from 'undici';
import { Clock, systemClock } from '../common/clock';
import { formatTlsGuidance, isTlsIssuerError } from '../services/OpenAIService';

export interface HttpClientOptions {
  /** Label used in error messages, e.g. 'NewsAPI'. */
  label: string;
  allowInsecureTls?: boolean;
  /** Overrides the TLS agent; tests pass an undici MockAgent. */
  dispatcher?: Dispatcher;
  clock?: Clock;
  maxRetries?: number;
}

export interface HttpRequest {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
}

/** undici fetch with optional insecure TLS and linear back-off on HTTP 429. */
export class HttpClient {
  private readonly dispatcher?: Dispatcher;
  private readonly clock: Clock;
  private readonly maxRetries: number;

  constructor(private readonly options: HttpClientOptions) {
    // If ALLOW_INSECURE_TLS=true we disable certificate validation (NOT recommended for production).
    this.dispatcher =
      options.dispatcher ??
      (options.allowInsecureTls ? new Agent({ connect: { rejectUnauthorized: false } }) : undefined);
    this.clock = options.clock ?? systemClock;
    this.maxRetries = options.maxRetries ?? 3;
  }

  public async request(url: string, init: HttpRequest = {}, attempt = 1): Promise<Response> {
    let res: Response;
    try {
      res = await fetch(url, {
        method: init.method ?? 'GET',
        headers: init.headers,
        body: init.body,
        ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
      });
    } catch (e) {
      if (isTlsIssuerError(e)) {
        throw new Error(formatTlsGuidance(this.options.label, e));
      }
      throw e;
    }
    if (res.status === 429) {
      if (attempt > this.maxRetries) throw new Error(`${this.options.label} rate limit exceeded after retries`);
      const waitMs = 1000 * attempt * 5; // linear backoff
      await res.body?.cancel();
      await this.clock.sleep(waitMs);
      return this.request(url, init, attempt + 1);
    }
    return res;
  }

  public async getJson(url: string, headers: Record<string, string> = {}): Promise<unknown> {
    const res = await this.request(url, { headers });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`${this.options.label} error ${res.status}: ${text}`);
    }
    return res.json();
  }
}

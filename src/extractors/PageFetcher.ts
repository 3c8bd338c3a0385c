import axios from 'axios';

export interface PageFetcher {
  /** Page HTML, or null when the site answered with a client error. */
  fetchHtml(url: string): Promise<string | null>;
}

export class AxiosPageFetcher implements PageFetcher {
  constructor(private readonly timeoutMs = 10_000) {}

  public async fetchHtml(url: string): Promise<string | null> {
    const response = await axios.get<string>(url, {
      timeout: this.timeoutMs,
      responseType: 'text',
      headers: {
        'User-Agent': 'Mozilla/5.0 (compatible; NewsSieve/1.0; +bot)',
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Language': 'en-US,en;q=0.9,ko;q=0.8',
      },
      validateStatus: (status) => status < 500, // Don't throw on 4xx errors
    });

    if (response.status === 429) {
      throw new Error(`Rate limited (429) fetching ${url}`);
    }
    if (response.status >= 400) {
      return null;
    }
    return typeof response.data === 'string' ? response.data : String(response.data);
  }
}

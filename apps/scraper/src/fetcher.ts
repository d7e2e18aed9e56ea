export interface FetchOutcome {
  requestedUrl: string;
  /** URL after redirects. */
  finalUrl: string;
  statusCode: number;
  /** Present only for a 200 response. */
  body?: string;
}

export interface PageFetcher {
  fetch(url: string): Promise<FetchOutcome>;
}

export interface HttpFetcherOptions {
  userAgent?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Fetches a posting page once, following redirects. Network errors and
 * timeouts propagate to the caller.
 */
export class HttpFetcher implements PageFetcher {
  private readonly userAgent?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpFetcherOptions = {}) {
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetch(url: string): Promise<FetchOutcome> {
    const response = await this.fetchImpl(url, {
      headers: this.userAgent ? { 'User-Agent': this.userAgent } : undefined,
      redirect: 'follow',
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const outcome: FetchOutcome = {
      requestedUrl: url,
      finalUrl: response.url || url,
      statusCode: response.status,
    };

    if (response.status !== 200) {
      await response.body?.cancel();
      return outcome;
    }

    return { ...outcome, body: await response.text() };
  }
}

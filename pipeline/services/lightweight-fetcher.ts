import { ProxyAgent } from "undici";
import { errorMessage } from "../../packages/shared/src/text-utils.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36";

export const DEFAULT_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-SG,en;q=0.9"
};

export type LightweightFetchResult =
  | { ok: true; status: number; body: string; finalUrl: string }
  | { ok: false; status: number | null; error: string };

/** The plain-HTTP capability: one request, no retries. */
export interface LightweightFetcher {
  fetch(
    url: string,
    headers: Readonly<Record<string, string>>,
    timeoutMs: number
  ): Promise<LightweightFetchResult>;
}

interface HttpFetcherOptions {
  proxyUrl?: string | null;
}

/**
 * Lightweight fetcher on top of the global fetch. Any HTTP status >= 400 and
 * any transport error (including the timeout) come back as `ok: false`.
 */
export class HttpFetcher implements LightweightFetcher {
  private readonly proxyAgent: ProxyAgent | null;

  constructor(options?: HttpFetcherOptions) {
    this.proxyAgent = options?.proxyUrl ? new ProxyAgent(options.proxyUrl) : null;
  }

  async fetch(
    url: string,
    headers: Readonly<Record<string, string>>,
    timeoutMs: number
  ): Promise<LightweightFetchResult> {
    const requestInit: RequestInit = {
      headers: { ...headers },
      redirect: "follow",
      signal: AbortSignal.timeout(timeoutMs)
    };
    if (this.proxyAgent) {
      Object.assign(requestInit, { dispatcher: this.proxyAgent });
    }

    let response: Response;
    try {
      response = await fetch(url, requestInit);
    } catch (error) {
      return { ok: false, status: null, error: errorMessage(error) };
    }

    if (response.status >= 400) {
      await response.body?.cancel().catch(() => undefined);
      return { ok: false, status: response.status, error: `HTTP ${response.status}` };
    }

    try {
      const body = await response.text();
      return { ok: true, status: response.status, body, finalUrl: response.url || url };
    } catch (error) {
      return { ok: false, status: response.status, error: errorMessage(error) };
    }
  }

  async close(): Promise<void> {
    await this.proxyAgent?.close();
  }
}

import { load } from "cheerio";
import type { FetchMethod } from "../../packages/shared/src/contracts.js";
import { errorMessage, normalizeWhitespace } from "../../packages/shared/src/text-utils.js";
import type { HtmlCache } from "../utils/html-cache.js";
import { DEFAULT_REQUEST_HEADERS, type LightweightFetcher } from "./lightweight-fetcher.js";
import type { PageRenderer } from "./page-renderer.js";

export interface DetailFetchResult {
  html: string | null;
  method: FetchMethod;
}

export interface DetailFetcherOptions {
  cache: HtmlCache;
  lightweightFetcher: LightweightFetcher;
  renderer: PageRenderer;
  retries?: number;
  timeoutMs?: number;
  minTextLength?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  forceRender?: boolean;
  headers?: Readonly<Record<string, string>>;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  log?: (message: string) => void;
  verbose?: boolean;
}

const DEFAULT_OPTIONS = {
  retries: 2,
  timeoutMs: 25_000,
  minTextLength: 200,
  minDelayMs: 300,
  maxDelayMs: 900,
  forceRender: false
};

const defaultSleep = async (ms: number): Promise<void> => {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
};

/** Length of the text a reader would see, with scripts and styles removed. */
export const visibleTextLength = (html: string): number => {
  const $ = load(html);
  $("script, style, noscript, template").remove();
  return normalizeWhitespace($.root().text()).length;
};

/**
 * Detail pages are fetched through three tiers, cheapest first:
 * the HTML cache, a plain HTTP request, then a rendered browser page.
 * A plain response whose visible text is too short is treated as a
 * client-rendered shell and escalated.
 */
export class DetailFetcher {
  private readonly options: Required<
    Pick<
      DetailFetcherOptions,
      "retries" | "timeoutMs" | "minTextLength" | "minDelayMs" | "maxDelayMs" | "forceRender"
    >
  >;

  private readonly cache: HtmlCache;

  private readonly lightweightFetcher: LightweightFetcher;

  private readonly renderer: PageRenderer;

  private readonly headers: Readonly<Record<string, string>>;

  private readonly sleep: (ms: number) => Promise<void>;

  private readonly random: () => number;

  private readonly log: (message: string) => void;

  private readonly verbose: boolean;

  constructor(options: DetailFetcherOptions) {
    this.options = {
      retries: options.retries ?? DEFAULT_OPTIONS.retries,
      timeoutMs: options.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs,
      minTextLength: options.minTextLength ?? DEFAULT_OPTIONS.minTextLength,
      minDelayMs: options.minDelayMs ?? DEFAULT_OPTIONS.minDelayMs,
      maxDelayMs: options.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs,
      forceRender: options.forceRender ?? DEFAULT_OPTIONS.forceRender
    };
    this.cache = options.cache;
    this.lightweightFetcher = options.lightweightFetcher;
    this.renderer = options.renderer;
    this.headers = options.headers ?? DEFAULT_REQUEST_HEADERS;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.log = options.log ?? (() => {});
    this.verbose = options.verbose ?? false;
  }

  async fetchDetail(url: string, useCache: boolean): Promise<DetailFetchResult> {
    if (useCache) {
      const cached = await this.cache.get("detail", url);
      if (cached !== null) {
        this.debug(`[fetch] cache hit ${url}`);
        return { html: cached, method: "cache" };
      }
    }

    if (!this.options.forceRender) {
      const body = await this.fetchLightweight(url);
      if (body !== null) {
        const textLength = visibleTextLength(body);
        if (textLength > this.options.minTextLength) {
          await this.cache.set("detail", url, body);
          this.debug(`[fetch] lightweight ${url} (${textLength} chars)`);
          return { html: body, method: "lightweight" };
        }
        this.debug(`[fetch] lightweight body too thin (${textLength} chars); rendering ${url}`);
      }
    }

    try {
      const html = await this.renderer.render(url, { waitSelector: "body" });
      await this.cache.set("detail", url, html);
      this.debug(`[fetch] rendered ${url}`);
      return { html, method: "rendered" };
    } catch (error) {
      this.log(`[fetch] Render failed for ${url}: ${errorMessage(error)}`);
    }

    return { html: null, method: "none" };
  }

  private async fetchLightweight(url: string): Promise<string | null> {
    const attempts = this.options.retries + 1;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      await this.sleep(this.politenessDelay());
      const result = await this.lightweightFetcher.fetch(url, this.headers, this.options.timeoutMs);
      if (result.ok) {
        return result.body;
      }
      this.debug(`[fetch] attempt ${attempt}/${attempts} failed for ${url}: ${result.error}`);
    }

    return null;
  }

  private politenessDelay(): number {
    const { minDelayMs, maxDelayMs } = this.options;
    return Math.round(minDelayMs + this.random() * Math.max(0, maxDelayMs - minDelayMs));
  }

  private debug(message: string): void {
    if (this.verbose) {
      this.log(message);
    }
  }
}

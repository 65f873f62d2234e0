import type { DiscoveryRecord } from "../../packages/shared/src/contracts.js";
import { dedupeByUrl, errorMessage } from "../../packages/shared/src/text-utils.js";
import type { ListingStrategy, SourceConfig } from "../constants/sources.js";
import type { HtmlCache } from "../utils/html-cache.js";
import { extractListingLinks } from "./listing-parser.js";
import type { PageRenderer, ScrollPolicy } from "./page-renderer.js";

export interface ListingDiscoveryOptions {
  cache: HtmlCache;
  renderer: PageRenderer;
  /** When set, every listing page loaded is also written here for selector tuning. */
  htmlDump?: HtmlCache | null;
  log?: (message: string) => void;
  verbose?: boolean;
}

export interface DiscoverOptions {
  useCache: boolean;
  /** Ignore cached listing pages even when `useCache` is on. */
  refreshDiscovery?: boolean;
  /** Overrides each paged source's `maxPages`, still bounded by its `pageCap`. */
  maxPages?: number | null;
}

type PagedStrategy = Extract<ListingStrategy, { kind: "paged" }>;
type GrowthScrollStrategy = Extract<ListingStrategy, { kind: "growth-scroll" }>;

export const buildPageUrl = (baseUrl: string, pageParam: string, page: number): string => {
  const url = new URL(baseUrl);
  url.searchParams.set(pageParam, String(page));
  return url.toString();
};

export const resolvePageLimit = (strategy: PagedStrategy, override?: number | null): number =>
  Math.max(0, Math.min(override ?? strategy.maxPages, strategy.pageCap));

export const scrollPolicyFor = (strategy: GrowthScrollStrategy): ScrollPolicy =>
  strategy.itemSelector
    ? {
        kind: "until-no-growth",
        itemSelector: strategy.itemSelector,
        noGrowthLimit: strategy.noGrowthLimit,
        maxScrolls: strategy.maxScrolls
      }
    : { kind: "fixed", scrolls: strategy.blindScrolls };

/**
 * Stage A: walk each source's listing pages and collect candidate detail
 * URLs. Results are deduped by URL across pages and sources, first seen wins.
 */
export class ListingDiscovery {
  private readonly cache: HtmlCache;

  private readonly renderer: PageRenderer;

  private readonly htmlDump: HtmlCache | null;

  private readonly log: (message: string) => void;

  private readonly verbose: boolean;

  constructor(options: ListingDiscoveryOptions) {
    this.cache = options.cache;
    this.renderer = options.renderer;
    this.htmlDump = options.htmlDump ?? null;
    this.log = options.log ?? (() => {});
    this.verbose = options.verbose ?? false;
  }

  async discover(
    sources: readonly SourceConfig[],
    options: DiscoverOptions
  ): Promise<DiscoveryRecord[]> {
    const collected: DiscoveryRecord[] = [];

    for (const source of sources) {
      const before = collected.length;
      const strategy = source.strategy;

      if (strategy.kind === "paged") {
        collected.push(...(await this.discoverPaged(source, strategy, options)));
      } else {
        collected.push(...(await this.discoverGrowthScroll(source, strategy, options)));
      }

      this.log(`[discover] ${source.name}: ${collected.length - before} candidate link(s)`);
    }

    const unique = dedupeByUrl(collected);
    this.log(`[discover] ${unique.length} unique event URL(s) across ${sources.length} source(s)`);
    return unique;
  }

  private async discoverPaged(
    source: SourceConfig,
    strategy: PagedStrategy,
    options: DiscoverOptions
  ): Promise<DiscoveryRecord[]> {
    const records: DiscoveryRecord[] = [];
    const pageLimit = resolvePageLimit(strategy, options.maxPages);

    for (let offset = 0; offset < pageLimit; offset += 1) {
      const pageUrl = buildPageUrl(strategy.baseUrl, strategy.pageParam, strategy.startPage + offset);
      const html = await this.loadListingPage(pageUrl, source, { kind: "none" }, options);
      if (html === null) {
        break;
      }

      const links = extractListingLinks(source, pageUrl, html);
      if (this.verbose) {
        this.log(`[discover] ${source.name} page ${strategy.startPage + offset}: ${links.length} link(s)`);
      }

      if (links.length === 0 && strategy.stopOnEmptyPage) {
        this.log(`[discover] ${source.name}: empty page at ${pageUrl}; stopping`);
        break;
      }
      records.push(...links);
    }

    return records;
  }

  private async discoverGrowthScroll(
    source: SourceConfig,
    strategy: GrowthScrollStrategy,
    options: DiscoverOptions
  ): Promise<DiscoveryRecord[]> {
    const html = await this.loadListingPage(strategy.url, source, scrollPolicyFor(strategy), options);
    return html === null ? [] : extractListingLinks(source, strategy.url, html);
  }

  private async loadListingPage(
    pageUrl: string,
    source: SourceConfig,
    scrollPolicy: ScrollPolicy,
    options: DiscoverOptions
  ): Promise<string | null> {
    if (options.useCache && !options.refreshDiscovery) {
      const cached = await this.cache.get("listing", pageUrl);
      if (cached !== null) {
        if (this.verbose) {
          this.log(`[discover] cache hit ${pageUrl}`);
        }
        await this.htmlDump?.set("listing", pageUrl, cached);
        return cached;
      }
    }

    let html: string;
    try {
      html = await this.renderer.render(pageUrl, {
        waitSelector: source.waitSelector,
        scrollPolicy
      });
    } catch (error) {
      this.log(`[discover] ${source.name}: failed to load ${pageUrl}: ${errorMessage(error)}`);
      return null;
    }

    await this.cache.set("listing", pageUrl, html);
    await this.htmlDump?.set("listing", pageUrl, html);
    return html;
  }
}

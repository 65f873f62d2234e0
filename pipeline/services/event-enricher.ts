import type {
  DiscoveryRecord,
  EventRecord,
  FailedItem,
  FetchMethod
} from "../../packages/shared/src/contracts.js";
import {
  eventRecordListSchema,
  type PipelinePaths
} from "../../packages/shared/src/pipeline-types.js";
import { dedupeByUrl, errorMessage } from "../../packages/shared/src/text-utils.js";
import type { HtmlCache } from "../utils/html-cache.js";
import { readPipelineFileIfExists, writePipelineFile } from "../utils/pipeline-io.js";
import type { DetailFetcher } from "./detail-fetcher.js";
import type { DetailParser } from "./event-detail-parser.js";

export interface EventEnricherOptions {
  fetcher: Pick<DetailFetcher, "fetchDetail">;
  parsers: ReadonlyMap<string, DetailParser>;
  paths: Pick<PipelinePaths, "enriched" | "failed">;
  checkpointEvery?: number;
  offsetMinutes?: number;
  htmlDump?: Pick<HtmlCache, "set"> | null;
  now?: () => Date;
  log?: (message: string) => void;
  verbose?: boolean;
}

export interface EnrichOptions {
  useCache: boolean;
  /** Skip URLs already present in the enriched artifact and keep those rows. */
  resume: boolean;
}

export interface EnrichResult {
  enriched: EventRecord[];
  failed: FailedItem[];
  skipped: number;
}

const DEFAULT_CHECKPOINT_EVERY = 50;

/**
 * Stage B: fetch each discovered URL, parse it with its source's parser and
 * persist progress. Per-URL problems become `FailedItem`s; nothing here
 * stops the run.
 */
export class EventEnricher {
  private readonly options: EventEnricherOptions;

  private readonly checkpointEvery: number;

  private readonly now: () => Date;

  private readonly log: (message: string) => void;

  constructor(options: EventEnricherOptions) {
    this.options = options;
    this.checkpointEvery = Math.max(1, options.checkpointEvery ?? DEFAULT_CHECKPOINT_EVERY);
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? (() => {});
  }

  async enrich(discovered: readonly DiscoveryRecord[], options: EnrichOptions): Promise<EnrichResult> {
    const { fetcher, parsers, paths } = this.options;
    const enriched: EventRecord[] = [];
    const failed: FailedItem[] = [];
    const completedUrls = new Set<string>();

    if (options.resume) {
      const previous = (await readPipelineFileIfExists(paths.enriched, eventRecordListSchema)) ?? [];
      for (const record of previous) {
        enriched.push(record);
        completedUrls.add(record.url);
      }
      this.log(`[enrich] Resuming with ${completedUrls.size} already-enriched URL(s)`);
    }

    const queue = dedupeByUrl(discovered);
    const reference = this.now();
    let skipped = 0;
    let sinceCheckpoint = 0;

    for (const [index, item] of queue.entries()) {
      if (completedUrls.has(item.url)) {
        skipped += 1;
        continue;
      }

      if (this.options.verbose) {
        this.log(`[enrich] (${index + 1}/${queue.length}) ${item.url}`);
      }

      const parser = parsers.get(item.source);
      if (!parser) {
        failed.push({ url: item.url, reason: "unknown_source", source: item.source });
        continue;
      }

      let html: string | null;
      let method: FetchMethod;
      try {
        ({ html, method } = await fetcher.fetchDetail(item.url, options.useCache));
        if (html !== null) {
          await this.options.htmlDump?.set("detail", item.url, html);
        }
      } catch (error) {
        failed.push({
          url: item.url,
          reason: `fetch_failed: ${errorMessage(error)}`,
          source: item.source
        });
        continue;
      }
      if (html === null) {
        failed.push({ url: item.url, reason: "fetch_failed", source: item.source });
        continue;
      }

      let record: EventRecord;
      try {
        const fields = parser(html, { reference, offsetMinutes: this.options.offsetMinutes });
        record = {
          source: item.source,
          url: item.url,
          ...fields,
          title: fields.title || item.title,
          fetchMethod: method
        };
      } catch (error) {
        failed.push({
          url: item.url,
          reason: `parse_failed: ${errorMessage(error)}`,
          source: item.source
        });
        continue;
      }

      enriched.push(record);
      completedUrls.add(item.url);
      sinceCheckpoint += 1;

      if (sinceCheckpoint >= this.checkpointEvery) {
        sinceCheckpoint = 0;
        this.log(`[enrich] Checkpoint: ${enriched.length} enriched, ${failed.length} failed`);
        await this.persist(enriched, failed);
      }
    }

    const unique = dedupeByUrl(enriched);
    await this.persist(unique, failed);
    this.log(
      `[enrich] Done: ${unique.length} enriched, ${failed.length} failed, ${skipped} skipped (already enriched)`
    );

    return { enriched: unique, failed, skipped };
  }

  private async persist(enriched: readonly EventRecord[], failed: readonly FailedItem[]): Promise<void> {
    await writePipelineFile(this.options.paths.enriched, enriched, this.log);
    await writePipelineFile(this.options.paths.failed, failed, this.log);
  }
}

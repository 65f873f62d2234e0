/**
 * Event pipeline entry point.
 *
 *   a  discover  listing pages → data/pipeline/events-discovered.json
 *   b  enrich    detail pages  → events-enriched.json + events-failed.json
 *   c  classify  vibe labels   → events-kept.json + events-removed.json
 *
 * Usage: tsx pipeline/scripts/run-pipeline.ts --stage abc [options]
 */
import "dotenv/config";
import { Command } from "commander";
import { SOURCES } from "../constants/sources.js";
import { DetailFetcher } from "../services/detail-fetcher.js";
import { createDetailParserTable } from "../services/event-detail-parser.js";
import { EventEnricher } from "../services/event-enricher.js";
import { HttpFetcher } from "../services/lightweight-fetcher.js";
import { ListingDiscovery } from "../services/listing-discovery.js";
import { OpenAiClassificationService } from "../services/openai-classification-service.js";
import { PlaywrightPageRenderer } from "../services/page-renderer.js";
import { PipelineOrchestrator } from "../services/pipeline-orchestrator.js";
import { VibeClassifier } from "../services/vibe-classifier.js";
import { HtmlCache } from "../utils/html-cache.js";
import { buildPipelineConfig, type PipelineCliOptions } from "./pipeline-config.js";
import { createStealthBrowserContextFactory } from "./stealth-browser.js";

const program = new Command()
  .name("run-pipeline")
  .description("Discover, enrich and classify events from listing sites")
  .option("--stage <stages>", "stages to run: a, b, c, ab, bc or abc", "ab")
  .option("--use-cache", "read fetched pages from the HTML cache")
  .option("--no-cache", "never read the HTML cache, even with --use-cache")
  .option("--refresh-discovery", "ignore cached listing pages in stage a")
  .option("--resume", "skip URLs already present in events-enriched.json")
  .option("--sources <names>", `comma-separated sources (${SOURCES.map((source) => source.name).join(", ")})`)
  .option("--max-pages <n>", "page ceiling for paged listings")
  .option("--batch-size <n>", "events per classification request")
  .option("--model <id>", "classification model")
  .option("--remove-categories <names>", "comma-separated vibe categories to drop from the kept set")
  .option("--force-render", "always render detail pages in the browser")
  .option("--save-html", "dump every fetched page for selector tuning")
  .option("--verbose", "log every URL");

const main = async () => {
  program.parse();
  const config = buildPipelineConfig(program.opts<PipelineCliOptions>());
  const log = (message: string) => console.log(message);
  const startTime = Date.now();

  console.log(`=== Pipeline: stages ${[...config.stages].join(" → ")} ===\n`);

  const cache = new HtmlCache({ directory: config.htmlCacheDirectory });
  const htmlDump = config.saveHtml ? new HtmlCache({ directory: config.htmlDumpDirectory }) : null;
  const renderer = new PlaywrightPageRenderer({
    headless: config.headless,
    browserContextFactory: createStealthBrowserContextFactory({
      headless: config.headless,
      browserProfileDirectory: config.browserProfileDirectory
    }),
    log: config.verbose ? log : undefined
  });
  const httpFetcher = new HttpFetcher({ proxyUrl: config.proxyUrl });

  const apiKey = config.classification.apiKey;
  const classifier = apiKey
    ? new VibeClassifier({
        service: new OpenAiClassificationService({
          apiKey,
          baseUrl: config.classification.baseUrl
        }),
        model: config.classification.model,
        batchSize: config.classification.batchSize,
        batchDelayMs: config.classification.batchDelayMs,
        removeCategories: config.classification.removeCategories,
        log
      })
    : null;

  const orchestrator = new PipelineOrchestrator({
    settings: config,
    discovery: new ListingDiscovery({ cache, renderer, htmlDump, log, verbose: config.verbose }),
    enricher: new EventEnricher({
      fetcher: new DetailFetcher({
        cache,
        lightweightFetcher: httpFetcher,
        renderer,
        forceRender: config.forceRender,
        log,
        verbose: config.verbose
      }),
      parsers: createDetailParserTable(SOURCES),
      paths: config.paths,
      htmlDump,
      log,
      verbose: config.verbose
    }),
    classifier,
    log
  });

  try {
    const summary = await orchestrator.run();
    const elapsedSeconds = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`\n✓ Pipeline complete (${elapsedSeconds}s)`);
    for (const [label, count] of Object.entries(summary)) {
      if (count !== null) {
        console.log(`  ${label}: ${count}`);
      }
    }
  } finally {
    await renderer.close();
    await httpFetcher.close();
  }
};

main().catch((error) => {
  console.error("Fatal error in run-pipeline:");
  console.error(error);
  process.exit(1);
});

import { access } from "node:fs/promises";
import type { DiscoveryRecord, EventRecord } from "../../packages/shared/src/contracts.js";
import {
  discoveryRecordListSchema,
  eventRecordListSchema,
  type PipelinePaths
} from "../../packages/shared/src/pipeline-types.js";
import type { SourceConfig } from "../constants/sources.js";
import { PipelineConfigError } from "../utils/pipeline-config-error.js";
import { readPipelineFile, writePipelineFile } from "../utils/pipeline-io.js";
import type { EventEnricher } from "./event-enricher.js";
import type { ListingDiscovery } from "./listing-discovery.js";
import type { VibeClassifier } from "./vibe-classifier.js";

export type PipelineStage = "discover" | "enrich" | "classify";

export interface PipelineRunSettings {
  stages: ReadonlySet<PipelineStage>;
  sources: readonly SourceConfig[];
  paths: PipelinePaths;
  useCache: boolean;
  refreshDiscovery: boolean;
  resume: boolean;
  maxPages: number | null;
}

export interface PipelineOrchestratorOptions {
  settings: PipelineRunSettings;
  discovery: Pick<ListingDiscovery, "discover">;
  enricher: Pick<EventEnricher, "enrich">;
  /** Required when the classify stage runs. */
  classifier: Pick<VibeClassifier, "classify"> | null;
  log?: (message: string) => void;
}

export interface PipelineRunSummary {
  discovered: number | null;
  enriched: number | null;
  failed: number | null;
  kept: number | null;
  removed: number | null;
}

const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
};

/**
 * Runs the selected stages in order, handing each stage's output to the
 * next in memory and through its artifact file. A stage that runs without
 * its predecessor reads the predecessor's artifact instead.
 */
export class PipelineOrchestrator {
  private readonly options: PipelineOrchestratorOptions;

  private readonly log: (message: string) => void;

  constructor(options: PipelineOrchestratorOptions) {
    this.options = options;
    this.log = options.log ?? ((message) => console.log(message));
  }

  /** Inputs every selected stage needs, checked before anything is fetched. */
  async assertRunnable(): Promise<void> {
    const { stages, paths } = this.options.settings;

    if (stages.size === 0) {
      throw new PipelineConfigError("No pipeline stage selected.");
    }

    if (stages.has("enrich") && !stages.has("discover") && !(await fileExists(paths.discovered))) {
      throw new PipelineConfigError(
        `Stage b needs discovery output at ${paths.discovered}; run stage a first.`
      );
    }

    if (stages.has("classify") && !stages.has("enrich") && !(await fileExists(paths.enriched))) {
      throw new PipelineConfigError(
        `Stage c needs enriched events at ${paths.enriched}; run stage b first.`
      );
    }

    if (stages.has("classify") && !this.options.classifier) {
      throw new PipelineConfigError("Stage c needs a classification service.");
    }
  }

  async run(): Promise<PipelineRunSummary> {
    await this.assertRunnable();

    const { settings, discovery, enricher, classifier } = this.options;
    const { stages, paths } = settings;
    const summary: PipelineRunSummary = {
      discovered: null,
      enriched: null,
      failed: null,
      kept: null,
      removed: null
    };

    let discovered: DiscoveryRecord[] | null = null;
    let enriched: EventRecord[] | null = null;

    if (stages.has("discover")) {
      this.log(`[discover] Sources: ${settings.sources.map((source) => source.name).join(", ")}`);
      discovered = await discovery.discover(settings.sources, {
        useCache: settings.useCache,
        refreshDiscovery: settings.refreshDiscovery,
        maxPages: settings.maxPages
      });
      await writePipelineFile(paths.discovered, discovered, this.log);
      summary.discovered = discovered.length;
    }

    if (stages.has("enrich")) {
      const input = discovered ?? (await readPipelineFile(paths.discovered, discoveryRecordListSchema, "a"));
      this.log(`[enrich] ${input.length} discovered URL(s) to process`);
      const result = await enricher.enrich(input, {
        useCache: settings.useCache,
        resume: settings.resume
      });
      enriched = result.enriched;
      summary.enriched = result.enriched.length;
      summary.failed = result.failed.length;
    }

    if (stages.has("classify") && classifier) {
      const input = enriched ?? (await readPipelineFile(paths.enriched, eventRecordListSchema, "b"));
      this.log(`[classify] ${input.length} event(s) to classify`);
      const result = await classifier.classify(input);
      await writePipelineFile(paths.kept, result.kept, this.log);
      await writePipelineFile(paths.removed, result.removed, this.log);
      summary.kept = result.kept.length;
      summary.removed = result.removed.length;
    }

    return summary;
  }
}

import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  createEmptyEventFields,
  type ClassifiedEventRecord,
  type DiscoveryRecord,
  type EventRecord
} from "../../packages/shared/src/contracts.js";
import { buildPipelinePaths, type PipelinePaths } from "../../packages/shared/src/pipeline-types.js";
import { SOURCES } from "../../pipeline/constants/sources.js";
import type { DiscoverOptions } from "../../pipeline/services/listing-discovery.js";
import type { EnrichOptions, EnrichResult } from "../../pipeline/services/event-enricher.js";
import {
  PipelineOrchestrator,
  type PipelineRunSettings,
  type PipelineStage
} from "../../pipeline/services/pipeline-orchestrator.js";
import type { ClassificationResult } from "../../pipeline/services/vibe-classifier.js";
import { PipelineConfigError } from "../../pipeline/utils/pipeline-config-error.js";
import { writePipelineFile } from "../../pipeline/utils/pipeline-io.js";

const DISCOVERED: DiscoveryRecord[] = [{ url: "https://e.test/1", title: "Jazz", source: "peatix" }];

const ENRICHED: EventRecord = {
  ...createEmptyEventFields(),
  source: "peatix",
  url: "https://e.test/1",
  title: "Jazz by the Bay",
  fetchMethod: "cache"
};

const readJson = (path: string): unknown => JSON.parse(readFileSync(path, "utf8"));

const createFakes = () => {
  const discover = vi.fn(
    async (_sources: unknown, _options: DiscoverOptions): Promise<DiscoveryRecord[]> => DISCOVERED
  );
  const enrich = vi.fn(
    async (records: readonly DiscoveryRecord[], _options: EnrichOptions): Promise<EnrichResult> => ({
      enriched: records.map((record) => ({ ...ENRICHED, url: record.url })),
      failed: [],
      skipped: 0
    })
  );
  const classify = vi.fn(async (events: readonly EventRecord[]): Promise<ClassificationResult> => {
    const classified: ClassifiedEventRecord[] = events.map((event) => ({
      ...event,
      vibeCategory: "music_concert"
    }));
    return { classified, kept: classified, removed: [], fallbackCount: 0 };
  });
  return { discover, enrich, classify };
};

describe("PipelineOrchestrator", () => {
  let tmpDir: string;
  let paths: PipelinePaths;

  const settingsFor = (stages: PipelineStage[]): PipelineRunSettings => ({
    stages: new Set(stages),
    sources: SOURCES.filter((source) => source.enabled),
    paths,
    useCache: true,
    refreshDiscovery: false,
    resume: false,
    maxPages: 2
  });

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "event-orchestrator-"));
    paths = buildPipelinePaths(tmpDir);
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("refuses to enrich without discovery output", async () => {
    const { discover, enrich } = createFakes();
    const orchestrator = new PipelineOrchestrator({
      settings: settingsFor(["enrich"]),
      discovery: { discover },
      enricher: { enrich },
      classifier: null,
      log: () => {}
    });

    await expect(orchestrator.run()).rejects.toThrow(PipelineConfigError);
    await expect(orchestrator.run()).rejects.toThrow(
      `Stage b needs discovery output at ${paths.discovered}; run stage a first.`
    );
    expect(enrich).not.toHaveBeenCalled();
  });

  it("refuses to classify without a classifier or enriched events", async () => {
    const { discover, enrich } = createFakes();

    await expect(
      new PipelineOrchestrator({
        settings: settingsFor(["classify"]),
        discovery: { discover },
        enricher: { enrich },
        classifier: null,
        log: () => {}
      }).run()
    ).rejects.toThrow(`Stage c needs enriched events at ${paths.enriched}; run stage b first.`);

    await writePipelineFile(paths.enriched, [ENRICHED]);
    await expect(
      new PipelineOrchestrator({
        settings: settingsFor(["classify"]),
        discovery: { discover },
        enricher: { enrich },
        classifier: null,
        log: () => {}
      }).run()
    ).rejects.toThrow("Stage c needs a classification service.");
  });

  it("hands discovery output to enrichment in memory and on disk", async () => {
    const { discover, enrich } = createFakes();
    const orchestrator = new PipelineOrchestrator({
      settings: settingsFor(["discover", "enrich"]),
      discovery: { discover },
      enricher: { enrich },
      classifier: null,
      log: () => {}
    });

    const summary = await orchestrator.run();

    expect(summary).toEqual({ discovered: 1, enriched: 1, failed: 0, kept: null, removed: null });
    expect(discover).toHaveBeenCalledWith(settingsFor([]).sources, {
      useCache: true,
      refreshDiscovery: false,
      maxPages: 2
    });
    expect(enrich).toHaveBeenCalledWith(DISCOVERED, { useCache: true, resume: false });
    expect(readJson(paths.discovered)).toEqual(DISCOVERED);
  });

  it("classifies a previous run's enriched events on its own", async () => {
    await writePipelineFile(paths.enriched, [ENRICHED]);
    const { discover, enrich, classify } = createFakes();
    const orchestrator = new PipelineOrchestrator({
      settings: settingsFor(["classify"]),
      discovery: { discover },
      enricher: { enrich },
      classifier: { classify },
      log: () => {}
    });

    const summary = await orchestrator.run();

    expect(summary).toEqual({ discovered: null, enriched: null, failed: null, kept: 1, removed: 0 });
    expect(discover).not.toHaveBeenCalled();
    expect(classify).toHaveBeenCalledWith([ENRICHED]);
    expect(readJson(paths.kept)).toEqual([{ ...ENRICHED, vibeCategory: "music_concert" }]);
    expect(readJson(paths.removed)).toEqual([]);
  });

  it("rejects an empty stage selection", async () => {
    const { discover, enrich } = createFakes();

    await expect(
      new PipelineOrchestrator({
        settings: settingsFor([]),
        discovery: { discover },
        enricher: { enrich },
        classifier: null,
        log: () => {}
      }).run()
    ).rejects.toThrow("No pipeline stage selected.");
  });
});

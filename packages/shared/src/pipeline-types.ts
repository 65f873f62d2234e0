import { join } from "node:path";
import { z } from "zod";
import { VIBE_CATEGORIES } from "./contracts.js";

// ---------------------------------------------------------------------------
// Stage artifacts
// ---------------------------------------------------------------------------

export const DEFAULT_PIPELINE_DIRECTORY = join("data", "pipeline");

export const DEFAULT_HTML_CACHE_DIRECTORY = join("data", "cache", "html");

export const DEFAULT_HTML_DUMP_DIRECTORY = join("data", "html-dumps");

export const PIPELINE_FILE_NAMES = {
  discovered: "events-discovered.json",
  enriched: "events-enriched.json",
  failed: "events-failed.json",
  kept: "events-kept.json",
  removed: "events-removed.json"
} as const;

export type PipelineArtifact = keyof typeof PIPELINE_FILE_NAMES;

export type PipelinePaths = Readonly<Record<PipelineArtifact, string>>;

export const buildPipelinePaths = (directory: string): PipelinePaths => ({
  discovered: join(directory, PIPELINE_FILE_NAMES.discovered),
  enriched: join(directory, PIPELINE_FILE_NAMES.enriched),
  failed: join(directory, PIPELINE_FILE_NAMES.failed),
  kept: join(directory, PIPELINE_FILE_NAMES.kept),
  removed: join(directory, PIPELINE_FILE_NAMES.removed)
});

// ---------------------------------------------------------------------------
// Artifact schemas (validated whenever a stage reads a previous stage's file)
// ---------------------------------------------------------------------------

export const discoveryRecordSchema = z.object({
  url: z.string(),
  title: z.string().default(""),
  source: z.string()
});

export const eventRecordSchema = z.object({
  source: z.string(),
  url: z.string(),
  title: z.string().default(""),
  description: z.string().default(""),
  location: z.string().default(""),
  price: z.string().default(""),
  capacity: z.string().default(""),
  dateText: z.string().default(""),
  startDatetime: z.string().default(""),
  endDatetime: z.string().default(""),
  fetchMethod: z.enum(["cache", "lightweight", "rendered", "none"]),
  vibeCategory: z.enum(VIBE_CATEGORIES).optional()
});

export const discoveryRecordListSchema = z.array(discoveryRecordSchema);
export const eventRecordListSchema = z.array(eventRecordSchema);

import { z } from "zod";
import {
  DEFAULT_REMOVED_VIBE_CATEGORIES,
  VIBE_CATEGORIES,
  isVibeCategory,
  type VibeCategory
} from "../../packages/shared/src/contracts.js";
import {
  DEFAULT_HTML_CACHE_DIRECTORY,
  DEFAULT_HTML_DUMP_DIRECTORY,
  DEFAULT_PIPELINE_DIRECTORY,
  buildPipelinePaths,
  type PipelinePaths
} from "../../packages/shared/src/pipeline-types.js";
import { SOURCES, type SourceConfig } from "../constants/sources.js";
import {
  DEFAULT_OPENAI_BASE_URL,
  DEFAULT_VIBE_MODEL
} from "../services/openai-classification-service.js";
import type { PipelineStage } from "../services/pipeline-orchestrator.js";
import { PipelineConfigError } from "../utils/pipeline-config-error.js";

// ---------------------------------------------------------------------------
// Environment helpers
// ---------------------------------------------------------------------------

export const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return fallback;
};

export const parsePositiveInteger = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
};

const splitList = (value: string | undefined): string[] =>
  (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

// ---------------------------------------------------------------------------
// Raw inputs
// ---------------------------------------------------------------------------

const STAGE_LETTERS: Readonly<Record<string, PipelineStage>> = {
  a: "discover",
  b: "enrich",
  c: "classify"
};

/** Option values as commander hands them over. */
export interface PipelineCliOptions {
  stage?: string;
  useCache?: boolean;
  cache?: boolean;
  refreshDiscovery?: boolean;
  resume?: boolean;
  sources?: string;
  maxPages?: string;
  batchSize?: string;
  model?: string;
  removeCategories?: string;
  forceRender?: boolean;
  saveHtml?: boolean;
  verbose?: boolean;
}

const positiveIntegerText = (flag: string) =>
  z
    .string()
    .regex(/^\d+$/, `${flag} must be a positive integer`)
    .transform((value) => Number.parseInt(value, 10))
    .refine((value) => value > 0, `${flag} must be a positive integer`);

const cliOptionsSchema = z.object({
  stage: z
    .enum(["a", "b", "c", "ab", "bc", "abc"], {
      errorMap: () => ({ message: "--stage must be one of a, b, c, ab, bc, abc" })
    })
    .default("ab"),
  maxPages: positiveIntegerText("--max-pages").optional(),
  batchSize: positiveIntegerText("--batch-size").optional()
});

/** Blank variables (`KEY=` in .env) count as unset. */
const optionalSetting = <Schema extends z.ZodTypeAny>(schema: Schema) =>
  z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    schema.optional()
  );

const envSchema = z.object({
  OPENAI_API_KEY: optionalSetting(z.string().trim()),
  OPENAI_BASE_URL: optionalSetting(z.string().trim().url("OPENAI_BASE_URL must be a URL")),
  VIBE_MODEL: optionalSetting(z.string().trim()),
  PIPELINE_DATA_DIR: optionalSetting(z.string().trim()),
  HTML_CACHE_DIR: optionalSetting(z.string().trim()),
  HTML_DUMP_DIR: optionalSetting(z.string().trim()),
  BROWSER_PROFILE_DIR: optionalSetting(z.string().trim()),
  PROXY_URL: optionalSetting(z.string().trim().url("PROXY_URL must be a URL")),
  VIBE_REMOVE_CATEGORIES: optionalSetting(z.string()),
  VIBE_BATCH_DELAY_MS: optionalSetting(z.string()),
  BROWSER_HEADLESS: optionalSetting(z.string())
});

// ---------------------------------------------------------------------------
// Resolved configuration
// ---------------------------------------------------------------------------

export interface ClassificationConfig {
  apiKey: string | null;
  baseUrl: string;
  model: string;
  batchSize: number;
  batchDelayMs: number;
  removeCategories: readonly VibeCategory[];
}

export interface PipelineConfig {
  stages: ReadonlySet<PipelineStage>;
  sources: readonly SourceConfig[];
  useCache: boolean;
  refreshDiscovery: boolean;
  resume: boolean;
  forceRender: boolean;
  saveHtml: boolean;
  verbose: boolean;
  maxPages: number | null;
  paths: PipelinePaths;
  htmlCacheDirectory: string;
  htmlDumpDirectory: string;
  browserProfileDirectory: string | null;
  proxyUrl: string | null;
  headless: boolean;
  classification: ClassificationConfig;
}

const firstIssueMessage = (error: z.ZodError): string =>
  error.issues[0]?.message ?? "invalid configuration";

export const parseStages = (value: string): ReadonlySet<PipelineStage> => {
  const stages = new Set<PipelineStage>();
  for (const letter of value) {
    const stage = STAGE_LETTERS[letter];
    if (stage) {
      stages.add(stage);
    }
  }
  return stages;
};

const selectSources = (
  requested: string | undefined,
  catalog: readonly SourceConfig[]
): readonly SourceConfig[] => {
  const names = splitList(requested);

  if (names.length === 0) {
    const enabled = catalog.filter((source) => source.enabled);
    if (enabled.length === 0) {
      throw new PipelineConfigError("No sources are enabled; pass --sources to pick some.");
    }
    return enabled;
  }

  return names.map((name) => {
    const source = catalog.find((candidate) => candidate.name === name);
    if (!source) {
      throw new PipelineConfigError(
        `Unknown source "${name}". Known sources: ${catalog.map((candidate) => candidate.name).join(", ")}`
      );
    }
    return source;
  });
};

export const parseRemoveCategories = (value: string | undefined): readonly VibeCategory[] => {
  if (value === undefined) {
    return DEFAULT_REMOVED_VIBE_CATEGORIES;
  }

  return splitList(value).map((name) => {
    if (!isVibeCategory(name)) {
      throw new PipelineConfigError(
        `Unknown vibe category "${name}". Known categories: ${VIBE_CATEGORIES.join(", ")}`
      );
    }
    return name;
  });
};

/**
 * Merge CLI options over environment settings into one frozen configuration.
 * Every problem that can be known up front throws `PipelineConfigError`.
 */
export const buildPipelineConfig = (
  cli: PipelineCliOptions,
  env: NodeJS.ProcessEnv = process.env,
  catalog: readonly SourceConfig[] = SOURCES
): Readonly<PipelineConfig> => {
  const parsedCli = cliOptionsSchema.safeParse({
    stage: cli.stage,
    maxPages: cli.maxPages,
    batchSize: cli.batchSize
  });
  if (!parsedCli.success) {
    throw new PipelineConfigError(firstIssueMessage(parsedCli.error));
  }

  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new PipelineConfigError(firstIssueMessage(parsedEnv.error));
  }

  const options = parsedCli.data;
  const settings = parsedEnv.data;
  const stages = parseStages(options.stage);
  const sources = selectSources(cli.sources, catalog);
  const apiKey = settings.OPENAI_API_KEY ?? null;

  if (stages.has("classify") && !apiKey) {
    throw new PipelineConfigError("OPENAI_API_KEY is required to run the classify stage (c).");
  }

  const dataDirectory = settings.PIPELINE_DATA_DIR ?? DEFAULT_PIPELINE_DIRECTORY;

  return Object.freeze({
    stages,
    sources,
    useCache: cli.useCache === true && cli.cache !== false,
    refreshDiscovery: cli.refreshDiscovery ?? false,
    resume: cli.resume ?? false,
    forceRender: cli.forceRender ?? false,
    saveHtml: cli.saveHtml ?? false,
    verbose: cli.verbose ?? false,
    maxPages: options.maxPages ?? null,
    paths: buildPipelinePaths(dataDirectory),
    htmlCacheDirectory: settings.HTML_CACHE_DIR ?? DEFAULT_HTML_CACHE_DIRECTORY,
    htmlDumpDirectory: settings.HTML_DUMP_DIR ?? DEFAULT_HTML_DUMP_DIRECTORY,
    browserProfileDirectory: settings.BROWSER_PROFILE_DIR ?? null,
    proxyUrl: settings.PROXY_URL ?? null,
    headless: parseBoolean(settings.BROWSER_HEADLESS, true),
    classification: Object.freeze({
      apiKey,
      baseUrl: settings.OPENAI_BASE_URL ?? DEFAULT_OPENAI_BASE_URL,
      model: cli.model?.trim() || settings.VIBE_MODEL || DEFAULT_VIBE_MODEL,
      batchSize: options.batchSize ?? 30,
      batchDelayMs: parsePositiveInteger(settings.VIBE_BATCH_DELAY_MS, 1_000),
      removeCategories: parseRemoveCategories(cli.removeCategories ?? settings.VIBE_REMOVE_CATEGORIES)
    })
  });
};

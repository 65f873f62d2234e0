import { z } from "zod";
import {
  VIBE_CATEGORIES,
  isVibeCategory,
  type ClassifiedEventRecord,
  type EventRecord,
  type VibeCategory
} from "../../packages/shared/src/contracts.js";
import { clampText, errorMessage } from "../../packages/shared/src/text-utils.js";
import type { ClassificationService } from "./openai-classification-service.js";
import {
  buildClassificationIdentity,
  classifyByKeywords,
  loadKeywordGroups,
  type KeywordGroup
} from "./vibe-rules.js";

export const MAX_PROMPT_DESCRIPTION_CHARS = 500;

const SYSTEM_PROMPT =
  "You label events for a city events feed. Reply with a JSON array only, no prose and no code fences.";

export interface ClassificationPromptRow {
  id: string;
  title: string;
  description: string;
}

export interface VibeClassifierOptions {
  service: ClassificationService;
  model: string;
  removeCategories: readonly VibeCategory[];
  batchSize?: number;
  batchDelayMs?: number;
  keywordGroups?: readonly KeywordGroup[];
  sleep?: (ms: number) => Promise<void>;
  log?: (message: string) => void;
}

export interface ClassificationResult {
  classified: ClassifiedEventRecord[];
  kept: ClassifiedEventRecord[];
  removed: ClassifiedEventRecord[];
  /** Events labelled by the keyword fallback instead of the service. */
  fallbackCount: number;
}

export const buildClassificationPrompt = (rows: readonly ClassificationPromptRow[]): string =>
  [
    "Classify each event into exactly one of these categories:",
    ...VIBE_CATEGORIES.map((category) => `- ${category}`),
    "",
    'Return a JSON array with one object per event: [{"id": "<event id>", "category": "<category>"}].',
    'Use only the categories listed above; use "other" when nothing fits.',
    "",
    "Events:",
    JSON.stringify(rows, null, 2)
  ].join("\n");

const classificationRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((value) => String(value)),
  category: z.string()
});

const tryParseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

const findRows = (text: string): unknown[] | null => {
  const whole = tryParseJson(text.trim());
  if (Array.isArray(whole)) {
    return whole;
  }
  if (typeof whole === "object" && whole !== null) {
    const nested = Object.values(whole).find((value) => Array.isArray(value));
    if (Array.isArray(nested)) {
      return nested;
    }
  }

  for (let start = text.indexOf("["); start !== -1; start = text.indexOf("[", start + 1)) {
    for (let end = text.indexOf("]", start); end !== -1; end = text.indexOf("]", end + 1)) {
      const embedded = tryParseJson(text.slice(start, end + 1));
      if (Array.isArray(embedded)) {
        return embedded;
      }
    }
  }
  return null;
};

/**
 * id → category from a completion. Accepts a bare JSON array, an object
 * wrapping one, or the first array embedded in surrounding text. Malformed rows and
 * categories outside the taxonomy are dropped.
 */
export const parseClassificationResponse = (text: string): Map<string, VibeCategory> => {
  const mapping = new Map<string, VibeCategory>();

  for (const row of findRows(text) ?? []) {
    const parsed = classificationRowSchema.safeParse(row);
    if (!parsed.success) {
      continue;
    }
    const category = parsed.data.category.trim().toLowerCase();
    if (isVibeCategory(category) && !mapping.has(parsed.data.id)) {
      mapping.set(parsed.data.id, category);
    }
  }

  return mapping;
};

const defaultSleep = async (ms: number): Promise<void> => {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
};

/**
 * Stage C: label every event with exactly one vibe category. Whatever the
 * service does not answer for (including a whole failed batch) is labelled
 * by the keyword rules.
 */
export class VibeClassifier {
  private readonly service: ClassificationService;

  private readonly model: string;

  private readonly removeCategories: ReadonlySet<VibeCategory>;

  private readonly batchSize: number;

  private readonly batchDelayMs: number;

  private readonly keywordGroups: readonly KeywordGroup[];

  private readonly sleep: (ms: number) => Promise<void>;

  private readonly log: (message: string) => void;

  constructor(options: VibeClassifierOptions) {
    this.service = options.service;
    this.model = options.model;
    this.removeCategories = new Set(options.removeCategories);
    this.batchSize = Math.max(1, options.batchSize ?? 30);
    this.batchDelayMs = options.batchDelayMs ?? 1_000;
    this.keywordGroups = options.keywordGroups ?? loadKeywordGroups();
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.log ?? (() => {});
  }

  async classify(events: readonly EventRecord[]): Promise<ClassificationResult> {
    const classified: ClassifiedEventRecord[] = [];
    const batchCount = Math.ceil(events.length / this.batchSize);
    let fallbackCount = 0;

    for (let batchIndex = 0; batchIndex < batchCount; batchIndex += 1) {
      const batch = events.slice(batchIndex * this.batchSize, (batchIndex + 1) * this.batchSize);
      const identities = batch.map((event) => buildClassificationIdentity(event));
      const mapping = await this.requestBatch(batch, identities, batchIndex, batchCount);

      batch.forEach((event, index) => {
        const identity = identities[index] ?? buildClassificationIdentity(event);
        let category = mapping.get(identity);
        if (!category) {
          category = classifyByKeywords(event.title, event.description, this.keywordGroups);
          fallbackCount += 1;
        }
        classified.push({ ...event, vibeCategory: category });
      });

      if (batchIndex < batchCount - 1 && this.batchDelayMs > 0) {
        await this.sleep(this.batchDelayMs);
      }
    }

    const kept = classified.filter((event) => !this.removeCategories.has(event.vibeCategory));
    const removed = classified.filter((event) => this.removeCategories.has(event.vibeCategory));

    this.log(
      `[classify] ${classified.length} event(s): ${kept.length} kept, ${removed.length} removed, ` +
        `${fallbackCount} labelled by keyword fallback`
    );

    return { classified, kept, removed, fallbackCount };
  }

  private async requestBatch(
    batch: readonly EventRecord[],
    identities: readonly string[],
    batchIndex: number,
    batchCount: number
  ): Promise<Map<string, VibeCategory>> {
    const rows: ClassificationPromptRow[] = batch.map((event, index) => ({
      id: identities[index] ?? buildClassificationIdentity(event),
      title: event.title,
      description: clampText(event.description, MAX_PROMPT_DESCRIPTION_CHARS)
    }));

    try {
      const completion = await this.service.complete({
        model: this.model,
        system: SYSTEM_PROMPT,
        prompt: buildClassificationPrompt(rows)
      });
      const mapping = parseClassificationResponse(completion);
      this.log(
        `[classify] Batch ${batchIndex + 1}/${batchCount}: service labelled ${mapping.size}/${batch.length}`
      );
      return mapping;
    } catch (error) {
      this.log(
        `[classify] Batch ${batchIndex + 1}/${batchCount} failed (${errorMessage(error)}); using keyword fallback`
      );
      return new Map();
    }
  }
}

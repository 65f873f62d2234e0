import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  DEFAULT_VIBE_CATEGORY,
  VIBE_CATEGORIES,
  type EventRecord,
  type VibeCategory
} from "../../packages/shared/src/contracts.js";
import { normalizeWhitespace } from "../../packages/shared/src/text-utils.js";

export const DEFAULT_KEYWORD_GROUPS_PATH = fileURLToPath(
  new URL("../constants/vibe-keyword-groups.json", import.meta.url)
);

const keywordGroupsFileSchema = z.object({
  groups: z.array(
    z.object({
      category: z.enum(VIBE_CATEGORIES),
      keywords: z.array(z.string().min(1))
    })
  )
});

export interface KeywordGroup {
  category: VibeCategory;
  patterns: RegExp[];
}

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const toKeywordPattern = (keyword: string): RegExp =>
  new RegExp(`\\b${escapeRegExp(keyword.toLowerCase()).replace(/ /g, "\\s+")}\\b`);

const loadedGroups = new Map<string, KeywordGroup[]>();

/** Keyword groups in priority order; earlier groups win ties. Cached per path. */
export const loadKeywordGroups = (filePath: string = DEFAULT_KEYWORD_GROUPS_PATH): KeywordGroup[] => {
  const cached = loadedGroups.get(filePath);
  if (cached) {
    return cached;
  }

  const parsed = keywordGroupsFileSchema.parse(JSON.parse(readFileSync(filePath, "utf8")));
  const groups = parsed.groups.map((group) => ({
    category: group.category,
    patterns: group.keywords.map(toKeywordPattern)
  }));
  loadedGroups.set(filePath, groups);
  return groups;
};

/**
 * Deterministic fallback classifier: the first group with any whole-word
 * keyword in the title or description decides; otherwise `other`.
 */
export const classifyByKeywords = (
  title: string,
  description: string,
  groups: readonly KeywordGroup[] = loadKeywordGroups()
): VibeCategory => {
  const text = normalizeWhitespace(`${title} ${description}`).toLowerCase();
  if (!text) {
    return DEFAULT_VIBE_CATEGORY;
  }

  const match = groups.find((group) => group.patterns.some((pattern) => pattern.test(text)));
  return match?.category ?? DEFAULT_VIBE_CATEGORY;
};

/** `url:<url>`, or a content hash for events that somehow lack a URL. */
export const buildClassificationIdentity = (
  event: Pick<EventRecord, "url" | "title" | "description">
): string => {
  const url = event.url.trim();
  if (url) {
    return `url:${url}`;
  }
  const digest = createHash("sha1").update(`${event.title}\n${event.description}`, "utf8").digest("hex");
  return `hash:${digest}`;
};

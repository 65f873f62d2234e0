export type FetchMethod = "cache" | "lightweight" | "rendered" | "none";

export type CacheKind = "listing" | "detail";

export const VIBE_CATEGORIES = [
  "business_networking",
  "career_learning",
  "tech_talk",
  "nightlife_party",
  "music_concert",
  "arts_culture",
  "food_drink",
  "sports_fitness",
  "wellness_mindfulness",
  "outdoor_adventure",
  "community_social",
  "family_kids",
  "religious_spiritual",
  "other"
] as const;

export type VibeCategory = (typeof VIBE_CATEGORIES)[number];

export const DEFAULT_VIBE_CATEGORY: VibeCategory = "other";

/** Categories dropped from the kept set unless the operator configures otherwise. */
export const DEFAULT_REMOVED_VIBE_CATEGORIES: readonly VibeCategory[] = [
  "business_networking",
  "career_learning",
  "religious_spiritual"
];

export const isVibeCategory = (value: unknown): value is VibeCategory =>
  typeof value === "string" && VIBE_CATEGORIES.some((category) => category === value);

/** Stage A output: one candidate detail page found on a listing page. */
export interface DiscoveryRecord {
  url: string;
  title: string;
  source: string;
}

/** Fields a detail parser can produce; every value is whitespace-normalized text. */
export interface EventFields {
  title: string;
  description: string;
  location: string;
  price: string;
  capacity: string;
  dateText: string;
  startDatetime: string;
  endDatetime: string;
}

export interface EventRecord extends EventFields {
  source: string;
  url: string;
  fetchMethod: FetchMethod;
  vibeCategory?: VibeCategory;
}

export interface ClassifiedEventRecord extends EventRecord {
  vibeCategory: VibeCategory;
}

/** `unknown_source`, `fetch_failed[: <error message>]` or `parse_failed: <error message>`. */
export interface FailedItem {
  url: string;
  reason: string;
  source: string;
}

export const createEmptyEventFields = (): EventFields => ({
  title: "",
  description: "",
  location: "",
  price: "",
  capacity: "",
  dateText: "",
  startDatetime: "",
  endDatetime: ""
});

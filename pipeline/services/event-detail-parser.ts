import { load, type CheerioAPI } from "cheerio";
import {
  createEmptyEventFields,
  type EventFields
} from "../../packages/shared/src/contracts.js";
import {
  firstNonEmpty,
  fuseLayers,
  normalizeWhitespace
} from "../../packages/shared/src/text-utils.js";
import type { DetailParserProfile, SourceConfig } from "../constants/sources.js";
import {
  DEFAULT_UTC_OFFSET_MINUTES,
  chronoDateParser,
  resolveEventDate,
  type NaturalDateParser
} from "./date-resolution.js";
import { extractJsonLdEvent, extractMicrodataEvent } from "./structured-markup.js";

export const CAPACITY_PHRASES = [
  "Sold out",
  "Selling fast",
  "Few tickets left",
  "Limited spots"
] as const;

export interface DetailParseContext {
  /** "Now" for relative date text such as "Tomorrow 2pm". */
  reference: Date;
  offsetMinutes?: number;
  dateParser?: NaturalDateParser;
}

export type DetailParser = (html: string, context: DetailParseContext) => EventFields;

/**
 * First decimal number in the text, thousands separators dropped
 * ("SGD 1,025.50" → "1025.50"). Text without digits is kept as-is.
 */
export const normalizePrice = (value: string): string => {
  const text = normalizeWhitespace(value);
  const match = /\d[\d,]*(?:\.\d+)?/.exec(text);
  return match ? match[0].replace(/,/g, "") : text;
};

/** First vocabulary phrase found anywhere in the text, in vocabulary order. */
export const detectCapacity = (pageText: string): string => {
  const haystack = pageText.toLowerCase();
  return CAPACITY_PHRASES.find((phrase) => haystack.includes(phrase.toLowerCase())) ?? "";
};

const readMeta = ($: CheerioAPI, selector: string): string =>
  normalizeWhitespace($(selector).first().attr("content"));

export const extractMetaLayer = ($: CheerioAPI): Partial<EventFields> => ({
  title: firstNonEmpty(readMeta($, 'meta[property="og:title"]'), readMeta($, 'meta[name="title"]')),
  description: firstNonEmpty(
    readMeta($, 'meta[name="description"]'),
    readMeta($, 'meta[property="og:description"]')
  )
});

const firstMatchingText = (
  $: CheerioAPI,
  selectors: readonly string[],
  preferDatetimeAttribute = false
): string => {
  for (const selector of selectors) {
    const element = $(selector).first();
    if (element.length === 0) {
      continue;
    }
    const text = normalizeWhitespace(
      (preferDatetimeAttribute ? element.attr("datetime") : undefined) ?? element.text()
    );
    if (text) {
      return text;
    }
  }
  return "";
};

export const extractVisibleLayer = (
  $: CheerioAPI,
  profile: DetailParserProfile
): Partial<EventFields> => ({
  title: firstNonEmpty(firstMatchingText($, profile.title), $("title").first().text()),
  description: firstMatchingText($, profile.description),
  dateText: firstMatchingText($, profile.date, true),
  location: firstMatchingText($, profile.location),
  price: firstMatchingText($, profile.price)
});

/**
 * Extract event fields from a detail page. Layers are fused highest
 * priority first (microdata, JSON-LD, meta tags, visible DOM); a lower
 * layer only fills fields the higher ones left empty.
 */
export const parseEventDetail = (
  html: string,
  profile: DetailParserProfile,
  context: DetailParseContext
): EventFields => {
  const $ = load(html);

  const fused = fuseLayers(createEmptyEventFields(), [
    extractMicrodataEvent($),
    extractJsonLdEvent($),
    extractMetaLayer($),
    extractVisibleLayer($, profile)
  ]);

  $("script, style, noscript").remove();
  const resolved = resolveEventDate(
    fused.dateText,
    context.reference,
    context.offsetMinutes ?? DEFAULT_UTC_OFFSET_MINUTES,
    context.dateParser ?? chronoDateParser
  );

  return {
    ...fused,
    price: normalizePrice(fused.price),
    capacity: detectCapacity($.root().text()),
    dateText: resolved.dateText,
    startDatetime: resolved.startDatetime,
    endDatetime: fused.endDatetime || resolved.endDatetime
  };
};

/** Source name → detail parser. Sources missing from the table are unknown. */
export const createDetailParserTable = (
  sources: readonly SourceConfig[]
): ReadonlyMap<string, DetailParser> =>
  new Map(
    sources.map((source): [string, DetailParser] => [
      source.name,
      (html, context) => parseEventDetail(html, source.detail, context)
    ])
  );

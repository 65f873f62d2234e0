import type { Cheerio, CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";
import { z } from "zod";
import type { EventFields } from "../../packages/shared/src/contracts.js";
import { normalizeWhitespace } from "../../packages/shared/src/text-utils.js";
import { normalizeInstantLike } from "./date-resolution.js";

const EVENT_SCOPE_SELECTOR = [
  '[itemscope][itemtype="http://schema.org/Event"]',
  '[itemscope][itemtype="https://schema.org/Event"]'
].join(", ");

/**
 * Value of an `itemprop` that belongs directly to `scope`, skipping
 * properties of nested item scopes.
 */
const readItemProp = ($: CheerioAPI, scope: Cheerio<AnyNode>, prop: string): string => {
  const owned = scope
    .find(`[itemprop="${prop}"]`)
    .filter((_, element) => $(element).parent().closest("[itemscope]").get(0) === scope.get(0))
    .first();

  if (owned.length === 0) {
    return "";
  }

  return normalizeWhitespace(owned.attr("content") ?? owned.attr("datetime") ?? owned.text());
};

/** schema.org `Event` microdata: name, start date, location and offer price. */
export const extractMicrodataEvent = ($: CheerioAPI): Partial<EventFields> => {
  const scope = $(EVENT_SCOPE_SELECTOR).first();
  if (scope.length === 0) {
    return {};
  }

  const fields: Partial<EventFields> = {
    title: readItemProp($, scope, "name"),
    dateText: readItemProp($, scope, "startDate"),
    description: readItemProp($, scope, "description")
  };

  const location = scope.find('[itemprop="location"][itemscope]').first();
  if (location.length > 0) {
    fields.location = [readItemProp($, location, "name"), readItemProp($, location, "address")]
      .filter(Boolean)
      .join(", ");
  }

  const offers = scope.find('[itemprop="offers"][itemscope]').first();
  if (offers.length > 0) {
    fields.price = readItemProp($, offers, "price");
  }

  return fields;
};

/** A leaf of the wrong type is dropped on its own instead of failing the whole event. */
const lenientText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .nullish()
  .catch(undefined);

const lenientString = z.string().nullish().catch(undefined);

const postalAddressSchema = z.union([
  z.string(),
  z
    .object({
      streetAddress: lenientText,
      addressLocality: lenientText,
      postalCode: lenientText
    })
    .transform((address) =>
      [address.streetAddress, address.addressLocality, address.postalCode].filter(Boolean).join(", ")
    )
]);

const placeSchema = z.union([
  z.string(),
  z
    .object({ name: lenientText, address: postalAddressSchema.nullish().catch(undefined) })
    .transform((place) => [place.name, place.address].filter(Boolean).join(", "))
]);

const offerSchema = z.object({ price: lenientText });

const jsonLdEventSchema = z.object({
  "@type": z.union([z.string(), z.array(z.string())]),
  name: lenientString,
  description: lenientString,
  startDate: lenientString,
  endDate: lenientString,
  location: z.union([placeSchema, z.array(placeSchema)]).optional().catch(undefined),
  offers: z.union([offerSchema, z.array(offerSchema)]).optional().catch(undefined)
});

type JsonLdEvent = z.infer<typeof jsonLdEventSchema>;

const graphSchema = z.object({ "@graph": z.array(z.unknown()) });

const isEventType = (type: string | string[]): boolean =>
  (Array.isArray(type) ? type : [type]).some((value) => /Event$/.test(value));

const findJsonLdEvent = (value: unknown): JsonLdEvent | null => {
  if (Array.isArray(value)) {
    for (const item of value) {
      const found = findJsonLdEvent(item);
      if (found) {
        return found;
      }
    }
    return null;
  }

  const event = jsonLdEventSchema.safeParse(value);
  if (event.success && isEventType(event.data["@type"])) {
    return event.data;
  }

  const graph = graphSchema.safeParse(value);
  return graph.success ? findJsonLdEvent(graph.data["@graph"]) : null;
};

const firstOf = <T>(value: T | T[] | undefined): T | undefined =>
  Array.isArray(value) ? value[0] : value;

/** First `Event`-typed object (any `*Event` subtype) in the page's JSON-LD blocks. */
export const extractJsonLdEvent = ($: CheerioAPI): Partial<EventFields> => {
  const blocks = $('script[type="application/ld+json"]')
    .map((_, element) => $(element).text())
    .get();

  for (const block of blocks) {
    let json: unknown;
    try {
      json = JSON.parse(block);
    } catch {
      continue;
    }

    const event = findJsonLdEvent(json);
    if (!event) {
      continue;
    }

    return {
      title: normalizeWhitespace(event.name),
      description: normalizeWhitespace(event.description),
      dateText: normalizeWhitespace(event.startDate),
      endDatetime: normalizeInstantLike(event.endDate),
      location: normalizeWhitespace(firstOf(event.location)),
      price: normalizeWhitespace(firstOf(event.offers)?.price)
    };
  }

  return {};
};

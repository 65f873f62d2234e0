import { load } from "cheerio";
import type { DiscoveryRecord } from "../../packages/shared/src/contracts.js";
import {
  canonicalizeUrl,
  dedupeByUrl,
  firstNonEmpty,
  isHttpUrl
} from "../../packages/shared/src/text-utils.js";
import type { SourceConfig } from "../constants/sources.js";

/**
 * Pull candidate detail-page links out of one listing page. Every link
 * selector contributes; relative hrefs are resolved against `pageUrl`, and
 * only http(s) URLs containing the source's filter substring survive.
 */
export const extractListingLinks = (
  source: Pick<SourceConfig, "name" | "links">,
  pageUrl: string,
  html: string
): DiscoveryRecord[] => {
  const $ = load(html);
  const { linkSelectors, hrefFilter, titleSelector } = source.links;
  const records: DiscoveryRecord[] = [];

  for (const selector of linkSelectors) {
    $(selector).each((_, element) => {
      const anchor = $(element);
      const url = canonicalizeUrl(anchor.attr("href"), pageUrl);
      if (!url || !isHttpUrl(url) || !url.includes(hrefFilter)) {
        return;
      }

      const titleFromSelector = titleSelector
        ? anchor.is(titleSelector)
          ? anchor.text()
          : anchor.find(titleSelector).first().text()
        : "";

      records.push({
        url,
        title: firstNonEmpty(
          titleFromSelector,
          anchor.attr("title"),
          anchor.attr("aria-label"),
          anchor.text()
        ),
        source: source.name
      });
    });
  }

  return dedupeByUrl(records);
};

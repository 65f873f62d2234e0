import type { BrowserContext } from "playwright";

/**
 * Resource types that never contribute to the HTML snapshot we extract from.
 */
const BLOCKED_RESOURCE_TYPES = new Set(["image", "stylesheet", "font", "media"]);

/**
 * Analytics, ads and embed hosts that event sites load alongside their pages.
 * Script hosts the listing apps hydrate from stay reachable.
 */
const BLOCKED_DOMAINS = [
  "googletagmanager.com",
  "google-analytics.com",
  "doubleclick.net",
  "connect.facebook.net",
  "analytics.tiktok.com",
  "static.hotjar.com",
  "cdn.segment.com",
  "browser.sentry-cdn.com",
  "maps.googleapis.com",
  "maps.gstatic.com",
  "fonts.gstatic.com",
  "fonts.googleapis.com"
];

export const shouldBlockRequest = (resourceType: string, url: string): boolean =>
  BLOCKED_RESOURCE_TYPES.has(resourceType) ||
  BLOCKED_DOMAINS.some((domain) => url.includes(domain));

export const installResourceBlockingRoutes = async (
  context: BrowserContext,
  log?: (message: string) => void
): Promise<void> => {
  log?.("[resource-blocking] Installing route filters (images, CSS, fonts, media, analytics)");

  await context.route("**/*", (route) => {
    const request = route.request();
    if (shouldBlockRequest(request.resourceType(), request.url())) {
      return route.abort();
    }
    return route.continue();
  });
};

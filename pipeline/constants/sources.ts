export type ListingStrategy =
  | {
      kind: "paged";
      baseUrl: string;
      pageParam: string;
      startPage: number;
      maxPages: number;
      stopOnEmptyPage: boolean;
      /** Hard ceiling that a `--max-pages` override cannot exceed. */
      pageCap: number;
    }
  | {
      kind: "growth-scroll";
      url: string;
      /** Without an item selector the page is scrolled `blindScrolls` times. */
      itemSelector?: string;
      noGrowthLimit: number;
      maxScrolls: number;
      blindScrolls: number;
    };

export interface ListingLinkRules {
  /** Anchor selectors; every selector is tried and the results are unioned. */
  linkSelectors: readonly string[];
  /** Kept only when the absolute URL contains this substring. */
  hrefFilter: string;
  /** Optional selector, relative to the anchor, holding the card title. */
  titleSelector?: string;
}

/**
 * Visible-DOM selectors per field, best first. The first selector with
 * non-empty text wins.
 */
export interface DetailParserProfile {
  title: readonly string[];
  description: readonly string[];
  date: readonly string[];
  location: readonly string[];
  price: readonly string[];
}

export interface SourceConfig {
  name: string;
  enabled: boolean;
  strategy: ListingStrategy;
  links: ListingLinkRules;
  /** Selector the renderer waits for on listing pages. */
  waitSelector?: string;
  detail: DetailParserProfile;
}

export const DEFAULT_MAX_PAGES = 2;

const DEFAULT_PAGE_CAP = 50;

export const SOURCES: readonly SourceConfig[] = [
  {
    name: "peatix",
    enabled: true,
    strategy: {
      kind: "paged",
      baseUrl: "https://peatix.com/search?p=1",
      pageParam: "p",
      startPage: 1,
      maxPages: DEFAULT_MAX_PAGES,
      stopOnEmptyPage: true,
      pageCap: DEFAULT_PAGE_CAP
    },
    links: {
      linkSelectors: ["a.event-card__title", "a[href*='/event/']"],
      hrefFilter: "/event/",
      titleSelector: ".event-card__title"
    },
    waitSelector: ".event-card",
    detail: {
      title: ["h1", ".event-summary__title"],
      description: [
        ".event-description",
        "[data-testid='event-description']",
        ".event__description",
        "article"
      ],
      date: ["time", ".event-date", ".event-summary__date"],
      location: [".event__venue", ".event-venue", "[data-testid='venue']"],
      price: [".event__ticket", ".ticket", "[data-testid='ticket-price']"]
    }
  },
  {
    name: "eventbrite",
    enabled: false,
    strategy: {
      kind: "paged",
      baseUrl: "https://www.eventbrite.sg/d/singapore--singapore/all-events/?page=1",
      pageParam: "page",
      startPage: 1,
      maxPages: DEFAULT_MAX_PAGES,
      stopOnEmptyPage: true,
      pageCap: DEFAULT_PAGE_CAP
    },
    links: {
      linkSelectors: ["a[href*='/e/']", "a[href*='eventbrite.sg/e/']"],
      hrefFilter: "/e/"
    },
    detail: {
      title: ["h1"],
      description: [
        "[data-testid='event-description']",
        ".structured-content",
        "section[aria-label*='Description']",
        "article"
      ],
      date: ["time", "[data-testid='event-date']", "div.event-details__data"],
      location: [
        "[data-testid='event-location']",
        "div.location-info__address",
        "section[aria-label*='Location']"
      ],
      price: ["[data-testid='event-price']", "div.conversion-bar__panel-info"]
    }
  },
  {
    name: "luma",
    enabled: false,
    strategy: {
      kind: "growth-scroll",
      url: "https://luma.com/singapore",
      itemSelector: ".card-wrapper",
      noGrowthLimit: 3,
      maxScrolls: 2,
      blindScrolls: 2
    },
    links: {
      linkSelectors: ["a[href*='luma.com/']", "a[href^='/']"],
      hrefFilter: "luma.com/"
    },
    detail: {
      title: ["h1"],
      description: ["main", "article"],
      date: ["time"],
      location: ["[data-testid='location']", "a[href*='maps']"],
      price: []
    }
  },
  {
    name: "fever",
    enabled: false,
    strategy: {
      kind: "growth-scroll",
      url: "https://feverup.com/en/singapore/things-to-do",
      itemSelector: "[data-testid^='fv-plan-card']",
      noGrowthLimit: 3,
      maxScrolls: 2,
      blindScrolls: 2
    },
    links: {
      linkSelectors: ["a[href*='/en/singapore/']", "a[href^='/']"],
      hrefFilter: "/en/singapore/"
    },
    detail: {
      title: ["h1"],
      description: ["main", "article"],
      date: ["time"],
      location: ["[data-testid='venue']"],
      price: ["[data-testid='price']", ".price"]
    }
  }
];

import { chromium, type BrowserContext, type Page } from "playwright";
import { installResourceBlockingRoutes } from "../utils/resource-blocking.js";

export type ScrollPolicy =
  | { kind: "none" }
  | { kind: "fixed"; scrolls: number }
  | { kind: "until-no-growth"; itemSelector: string; noGrowthLimit: number; maxScrolls: number };

export interface RenderOptions {
  /** CSS selector to wait for before capturing; a timeout is not fatal. */
  waitSelector?: string;
  scrollPolicy?: ScrollPolicy;
}

/** The browser-rendering capability: load a page and return its DOM as HTML. */
export interface PageRenderer {
  render(url: string, options?: RenderOptions): Promise<string>;
  close(): Promise<void>;
}

export interface ScrollDriver {
  countItems(selector: string): Promise<number>;
  scrollToBottom(): Promise<void>;
}

export interface ScrollOutcome {
  scrolls: number;
  lastCount: number | null;
}

const sleep = async (ms: number): Promise<void> => {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
};

/**
 * Drive infinite-scroll loading.
 *
 * `until-no-growth` counts matching items before each scroll and stops once
 * the count has stayed the same for `noGrowthLimit` consecutive checks, or
 * after `maxScrolls` scrolls, whichever comes first. A failed count reads as -1.
 */
export const runScrollPolicy = async (
  driver: ScrollDriver,
  policy: ScrollPolicy,
  options: { pauseMs: number; sleep?: (ms: number) => Promise<void> }
): Promise<ScrollOutcome> => {
  const pause = options.sleep ?? sleep;

  if (policy.kind === "none") {
    return { scrolls: 0, lastCount: null };
  }

  if (policy.kind === "fixed") {
    for (let scroll = 0; scroll < policy.scrolls; scroll += 1) {
      await driver.scrollToBottom();
      await pause(options.pauseMs);
    }
    return { scrolls: Math.max(0, policy.scrolls), lastCount: null };
  }

  let lastCount = -1;
  let noGrowthRounds = 0;
  let scrolls = 0;

  for (;;) {
    const currentCount = await driver.countItems(policy.itemSelector).catch(() => -1);

    if (currentCount === lastCount) {
      noGrowthRounds += 1;
    } else {
      noGrowthRounds = 0;
    }

    if (noGrowthRounds >= policy.noGrowthLimit || scrolls >= policy.maxScrolls) {
      return { scrolls, lastCount: currentCount };
    }

    lastCount = currentCount;
    await driver.scrollToBottom();
    await pause(options.pauseMs);
    scrolls += 1;
  }
};

export const createPlaywrightScrollDriver = (page: Page): ScrollDriver => ({
  countItems: async (selector) => page.locator(selector).count(),
  scrollToBottom: async () => {
    await page.evaluate("window.scrollTo(0, document.body.scrollHeight)");
  }
});

interface BrowserContextFactoryResult {
  context: BrowserContext;
  cleanup: () => Promise<void>;
}

export type BrowserContextFactory = () => Promise<BrowserContextFactoryResult>;

export interface PlaywrightPageRendererOptions {
  timeoutMs?: number;
  scrollPauseMs?: number;
  headless?: boolean;
  browserContextFactory?: BrowserContextFactory;
  log?: (message: string) => void;
}

const DEFAULT_TIMEOUT_MS = 20_000;
const DEFAULT_SCROLL_PAUSE_MS = 1_200;

/**
 * Renders pages in a single lazily-created browser context that is reused for
 * the whole run; call `close()` once the run is finished.
 */
export class PlaywrightPageRenderer implements PageRenderer {
  private readonly timeoutMs: number;

  private readonly scrollPauseMs: number;

  private readonly headless: boolean;

  private readonly browserContextFactory: BrowserContextFactory | null;

  private readonly log: (message: string) => void;

  private contextPromise: Promise<BrowserContextFactoryResult> | null = null;

  constructor(options?: PlaywrightPageRendererOptions) {
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.scrollPauseMs = options?.scrollPauseMs ?? DEFAULT_SCROLL_PAUSE_MS;
    this.headless = options?.headless ?? true;
    this.browserContextFactory = options?.browserContextFactory ?? null;
    this.log = options?.log ?? (() => {});
  }

  async render(url: string, options?: RenderOptions): Promise<string> {
    const { context } = await this.getContext();
    const page = await context.newPage();

    try {
      this.log(`[render] → ${url}`);
      await page.goto(url, { waitUntil: "domcontentloaded", timeout: this.timeoutMs });

      if (options?.waitSelector) {
        try {
          await page.waitForSelector(options.waitSelector, { timeout: this.timeoutMs });
        } catch {
          this.log(`[render] Timed out waiting for "${options.waitSelector}"; capturing anyway`);
        }
      }

      const scrollPolicy = options?.scrollPolicy ?? { kind: "none" };
      const outcome = await runScrollPolicy(createPlaywrightScrollDriver(page), scrollPolicy, {
        pauseMs: this.scrollPauseMs
      });
      if (outcome.scrolls > 0) {
        this.log(
          `[render] Scrolled ${outcome.scrolls} time(s)` +
            (outcome.lastCount === null ? "" : `, ${outcome.lastCount} item(s) visible`)
        );
      }

      return await page.content();
    } finally {
      await page.close();
    }
  }

  async close(): Promise<void> {
    if (!this.contextPromise) {
      return;
    }

    const pending = this.contextPromise;
    this.contextPromise = null;
    const { cleanup } = await pending;
    await cleanup();
  }

  private async getContext(): Promise<BrowserContextFactoryResult> {
    if (!this.contextPromise) {
      this.contextPromise = this.createContext().catch((error: unknown) => {
        this.contextPromise = null;
        throw error;
      });
    }
    return this.contextPromise;
  }

  private async createContext(): Promise<BrowserContextFactoryResult> {
    const created = this.browserContextFactory
      ? await this.browserContextFactory()
      : await this.launchDefaultContext();
    await installResourceBlockingRoutes(created.context, this.log);
    return created;
  }

  private async launchDefaultContext(): Promise<BrowserContextFactoryResult> {
    const browser = await chromium.launch({ headless: this.headless });
    const context = await browser.newContext({ locale: "en-SG", timezoneId: "Asia/Singapore" });
    return {
      context,
      cleanup: async () => {
        await context.close();
        await browser.close();
      }
    };
  }
}

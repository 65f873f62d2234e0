import { existsSync, mkdirSync } from "node:fs";
import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import type { BrowserContextFactory } from "../services/page-renderer.js";

let stealthInstalled = false;

// ---------------------------------------------------------------------------
// playwright-extra stealth plugin workaround
// ---------------------------------------------------------------------------
const installStealth = (): void => {
  if (stealthInstalled) {
    return;
  }
  stealthInstalled = true;

  process.on("unhandledRejection", (reason: unknown) => {
    const message = reason instanceof Error ? reason.message : String(reason);
    if (message.includes("Target page, context or browser has been closed")) {
      console.warn("[playwright-extra] Suppressed CDP session race (page already closed).");
      return;
    }
    throw reason;
  });

  chromium.use(StealthPlugin());
};

interface StealthBrowserOptions {
  headless: boolean;
  browserProfileDirectory: string | null;
}

/** Chromium with the stealth plugin, in a persistent profile when one is configured. */
export const createStealthBrowserContextFactory = (
  options: StealthBrowserOptions
): BrowserContextFactory => async () => {
  installStealth();

  const contextOptions = {
    headless: options.headless,
    locale: "en-SG",
    timezoneId: "Asia/Singapore",
    viewport: { width: 1440, height: 900 }
  };

  const profileDirectory = options.browserProfileDirectory;
  if (profileDirectory) {
    if (!existsSync(profileDirectory)) {
      mkdirSync(profileDirectory, { recursive: true });
    }
    console.log(`Launching stealth browser (profile: ${profileDirectory})...`);
    const context = await chromium.launchPersistentContext(profileDirectory, contextOptions);
    return {
      context,
      cleanup: async () => {
        await context.close();
      }
    };
  }

  console.log("Launching stealth browser...");
  const browser = await chromium.launch({ headless: options.headless });
  const context = await browser.newContext({
    locale: contextOptions.locale,
    timezoneId: contextOptions.timezoneId,
    viewport: contextOptions.viewport
  });
  return {
    context,
    cleanup: async () => {
      await context.close();
      await browser.close();
    }
  };
};

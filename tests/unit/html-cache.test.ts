import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { describe, expect, it } from "vitest";
import { HtmlCache, hashUrl } from "../../pipeline/utils/html-cache.js";

describe("HtmlCache", () => {
  it("stores pages per kind and URL", async () => {
    const tmpDir = mkdtempSync(join(tmpdir(), "event-html-cache-"));

    try {
      const cache = new HtmlCache({ directory: join(tmpDir, "html") });
      await cache.set("detail", "https://x.test/event/1", "<html>detail</html>");

      await expect(cache.get("detail", "https://x.test/event/1")).resolves.toBe("<html>detail</html>");
      await expect(cache.get("listing", "https://x.test/event/1")).resolves.toBeNull();
      await expect(cache.get("detail", "https://x.test/event/2")).resolves.toBeNull();
    } finally {
      rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("names files by kind and the SHA-1 of the URL", () => {
    const cache = new HtmlCache({ directory: "cache" });
    const url = "https://x.test/event/1";

    expect(hashUrl(url)).toMatch(/^[0-9a-f]{40}$/);
    expect(basename(cache.pathFor("listing", url))).toBe(`listing_${hashUrl(url)}.html`);
  });

  it("clears the whole directory", async () => {
    const tmpDir = mkdtempSync(join(tmpdir(), "event-html-cache-"));
    const directory = join(tmpDir, "html");

    try {
      const cache = new HtmlCache({ directory });
      await cache.set("listing", "https://x.test/list", "<html>list</html>");
      await cache.clear();

      expect(existsSync(directory)).toBe(false);
      await expect(cache.get("listing", "https://x.test/list")).resolves.toBeNull();

      await cache.set("listing", "https://x.test/list", "<html>again</html>");
      await expect(cache.get("listing", "https://x.test/list")).resolves.toBe("<html>again</html>");
    } finally {
      rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});

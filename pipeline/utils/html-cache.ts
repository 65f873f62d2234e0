import { createHash } from "node:crypto";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { CacheKind } from "../../packages/shared/src/contracts.js";

interface HtmlCacheOptions {
  directory: string;
}

export const hashUrl = (url: string): string =>
  createHash("sha1").update(url, "utf8").digest("hex");

/**
 * Content-addressed store of fetched pages: one file per (kind, URL) pair,
 * named `<kind>_<sha1(url)>.html`. Entries never expire; deleting the
 * directory is the only invalidation.
 */
export class HtmlCache {
  private readonly directory: string;

  private directoryReady: Promise<void> | null = null;

  constructor(options: HtmlCacheOptions) {
    this.directory = options.directory;
  }

  pathFor(kind: CacheKind, url: string): string {
    return join(this.directory, `${kind}_${hashUrl(url)}.html`);
  }

  async get(kind: CacheKind, url: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(kind, url), "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }
  }

  async set(kind: CacheKind, url: string, html: string): Promise<void> {
    await this.ensureDirectory();
    await writeFile(this.pathFor(kind, url), html, "utf8");
  }

  async clear(): Promise<void> {
    await rm(this.directory, { recursive: true, force: true });
    this.directoryReady = null;
  }

  private async ensureDirectory(): Promise<void> {
    if (!this.directoryReady) {
      this.directoryReady = mkdir(this.directory, { recursive: true }).then(() => undefined);
    }
    await this.directoryReady;
  }
}

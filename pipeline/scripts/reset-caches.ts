import "dotenv/config";
import { existsSync } from "node:fs";
import {
  DEFAULT_HTML_CACHE_DIRECTORY,
  DEFAULT_HTML_DUMP_DIRECTORY
} from "../../packages/shared/src/pipeline-types.js";
import { HtmlCache } from "../utils/html-cache.js";

const cacheDirectories = [
  process.env.HTML_CACHE_DIR || DEFAULT_HTML_CACHE_DIRECTORY,
  process.env.HTML_DUMP_DIR || DEFAULT_HTML_DUMP_DIRECTORY
];

const main = async () => {
  let removedDirectories = 0;

  for (const directory of cacheDirectories) {
    if (!existsSync(directory)) {
      continue;
    }

    await new HtmlCache({ directory }).clear();
    removedDirectories += 1;
    console.log(`Removed ${directory}`);
  }

  console.log(`Cache reset complete. Removed ${removedDirectories} cache director${removedDirectories === 1 ? "y" : "ies"}.`);
};

main().catch((error) => {
  console.error("Fatal error in reset-caches:");
  console.error(error);
  process.exit(1);
});

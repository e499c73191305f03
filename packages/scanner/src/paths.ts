import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";

/**
 * Candidate locations of the bundled data directory: beside `src/` when run
 * from sources, and back in the package when run from the compiled `dist/`
 * tree at the repository root.
 */
const DATA_DIR_CANDIDATES = [
  new URL("../data/", import.meta.url),
  new URL("../../../packages/scanner/data/", import.meta.url),
];

function locateDataDir(): string {
  for (const candidate of DATA_DIR_CANDIDATES) {
    const path = fileURLToPath(candidate);
    if (existsSync(path)) {
      return path;
    }
  }
  return fileURLToPath(DATA_DIR_CANDIDATES[0] ?? new URL("../data/", import.meta.url));
}

/** Directory holding trackers.json, pii-patterns.json, page-probes.json and rules/ */
export const DEFAULT_DATA_DIR = locateDataDir();

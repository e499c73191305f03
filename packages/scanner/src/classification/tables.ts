import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { ClassificationTableInvalidError, getErrorMessage } from "@privacy-probe/errors";
import type { z } from "zod";
import {
  PageProbeTableSchema,
  PiiPatternTableSchema,
  TrackerTableSchema,
} from "../validation.js";
import { PiiMatcher } from "./pii-matcher.js";
import { TrackerMatcher } from "./tracker-matcher.js";

export const TRACKER_TABLE_FILE = "trackers.json";
export const PII_TABLE_FILE = "pii-patterns.json";
export const PAGE_PROBE_TABLE_FILE = "page-probes.json";

/** Selectors and text patterns the page probes look for */
export type PageProbeTable = Readonly<z.output<typeof PageProbeTableSchema>>;

/** Compiled, shared read-only lookup tables for one scan */
export interface ClassificationTables {
  readonly trackers: TrackerMatcher;
  readonly pii: PiiMatcher;
  readonly probes: PageProbeTable;
  readonly versions: { readonly trackers: string; readonly pii: string };
}

async function readTable<S extends z.ZodTypeAny>(
  dataDir: string,
  file: string,
  schema: S,
): Promise<z.output<S>> {
  let raw: string;
  try {
    raw = await readFile(join(dataDir, file), "utf8");
  } catch (error) {
    throw new ClassificationTableInvalidError(
      file,
      "file could not be read",
      error instanceof Error ? error : undefined,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ClassificationTableInvalidError(
      file,
      "not valid JSON",
      error instanceof Error ? error : undefined,
    );
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ClassificationTableInvalidError(file, issues.join("; "));
  }
  return result.data;
}

/**
 * Load and compile the tracker, PII and page-probe tables from `dataDir`.
 * Any unreadable or malformed table fails the whole load.
 */
export async function loadClassificationTables(dataDir: string): Promise<ClassificationTables> {
  const [trackerTable, piiTable, probes] = await Promise.all([
    readTable(dataDir, TRACKER_TABLE_FILE, TrackerTableSchema),
    readTable(dataDir, PII_TABLE_FILE, PiiPatternTableSchema),
    readTable(dataDir, PAGE_PROBE_TABLE_FILE, PageProbeTableSchema),
  ]);

  let pii: PiiMatcher;
  try {
    pii = new PiiMatcher(piiTable.indicators);
  } catch (error) {
    throw new ClassificationTableInvalidError(
      PII_TABLE_FILE,
      `pattern does not compile: ${getErrorMessage(error)}`,
      error instanceof Error ? error : undefined,
    );
  }

  return {
    trackers: new TrackerMatcher(trackerTable.domains),
    pii,
    probes,
    versions: { trackers: trackerTable.version, pii: piiTable.version },
  };
}

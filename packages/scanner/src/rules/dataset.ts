import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { RuleDatasetUnavailableError } from "@privacy-probe/errors";
import { RuleDatasetSchema } from "../validation.js";
import type { Rule, RuleDataset } from "../types.js";

/** `rules/<JURISDICTION>.json` under the rules directory */
export function datasetPath(rulesDir: string, jurisdiction: string): string {
  return join(rulesDir, `${jurisdiction.toUpperCase()}.json`);
}

/**
 * Load the versioned rule dataset for one jurisdiction. A missing, empty,
 * malformed or mislabelled dataset fails with RuleDatasetUnavailableError.
 */
export async function loadRuleDataset(
  jurisdiction: string,
  rulesDir: string,
): Promise<RuleDataset> {
  const key = jurisdiction.toUpperCase();

  let raw: string;
  try {
    raw = await readFile(datasetPath(rulesDir, key), "utf8");
  } catch (error) {
    throw new RuleDatasetUnavailableError(
      key,
      "dataset file not found",
      error instanceof Error ? error : undefined,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new RuleDatasetUnavailableError(
      key,
      "dataset is not valid JSON",
      error instanceof Error ? error : undefined,
    );
  }

  const result = RuleDatasetSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new RuleDatasetUnavailableError(key, issues.join("; "));
  }

  const dataset = result.data;
  if (dataset.jurisdiction.toUpperCase() !== key) {
    throw new RuleDatasetUnavailableError(
      key,
      `dataset declares jurisdiction "${dataset.jurisdiction}"`,
    );
  }

  const ids = new Set<string>();
  for (const rule of dataset.rules) {
    if (rule.jurisdiction.toUpperCase() !== key) {
      throw new RuleDatasetUnavailableError(
        key,
        `rule ${rule.ruleId} belongs to jurisdiction "${rule.jurisdiction}"`,
      );
    }
    if (ids.has(rule.ruleId)) {
      throw new RuleDatasetUnavailableError(key, `duplicate rule id ${rule.ruleId}`);
    }
    ids.add(rule.ruleId);
  }

  const rules: Rule[] = dataset.rules.map((rule) => Object.freeze({ ...rule }));
  return Object.freeze({
    jurisdiction: key,
    name: dataset.name,
    version: dataset.version,
    rules: Object.freeze(rules),
  });
}

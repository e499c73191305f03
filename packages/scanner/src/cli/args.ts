import type { EnrichmentProviderConfig } from "@privacy-probe/enrichment";
import type { ScanConfig } from "../validation.js";
import type { ScanOutcome, SupersessionMode } from "../types.js";

// ---------------------------------------------------------------------------
// Argument parsing (minimal, no external CLI lib)
// ---------------------------------------------------------------------------

export type OutputFormat = "terminal" | "json";

export interface CliArgs {
  readonly command: "scan" | "help";
  readonly itineraryFile?: string;
  readonly urls: readonly string[];
  readonly jurisdiction?: string;
  readonly format: OutputFormat;
  readonly exportDir?: string;
  readonly dataDir?: string;
  readonly rulesDir?: string;
  readonly leakThresholdMs?: number;
  readonly perPageTimeoutMs?: number;
  readonly totalTimeoutMs?: number;
  readonly supersession?: SupersessionMode;
  readonly headed: boolean;
  readonly enrich: boolean;
  readonly quiet: boolean;
  readonly errors: readonly string[];
}

function parseMs(flag: string, value: string | undefined, errors: string[]): number | undefined {
  const parsed = value === undefined ? Number.NaN : Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    errors.push(`${flag} expects a positive integer number of milliseconds`);
    return undefined;
  }
  return parsed;
}

/** Parse `process.argv`-shaped input (node path and script path first). */
export function parseArgs(argv: readonly string[]): CliArgs {
  let command: CliArgs["command"] = "help";
  let itineraryFile: string | undefined;
  const urls: string[] = [];
  let jurisdiction: string | undefined;
  let format: OutputFormat = "terminal";
  let exportDir: string | undefined;
  let dataDir: string | undefined;
  let rulesDir: string | undefined;
  let leakThresholdMs: number | undefined;
  let perPageTimeoutMs: number | undefined;
  let totalTimeoutMs: number | undefined;
  let supersession: SupersessionMode | undefined;
  let headed = false;
  let enrich = true;
  let quiet = false;
  const errors: string[] = [];

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case "scan":
        command = "scan";
        break;
      case "help":
      case "--help":
      case "-h":
        command = "help";
        break;
      case "--itinerary":
        if (next) {
          itineraryFile = next;
          i++;
        } else {
          errors.push("--itinerary expects a file path");
        }
        break;
      case "--url":
        if (next) {
          urls.push(next);
          i++;
        } else {
          errors.push("--url expects a URL");
        }
        break;
      case "--jurisdiction":
        if (next) {
          jurisdiction = next;
          i++;
        } else {
          errors.push("--jurisdiction expects a key such as CCPA");
        }
        break;
      case "--format":
        if (next === "json" || next === "terminal") {
          format = next;
          i++;
        } else {
          errors.push("--format expects terminal or json");
        }
        break;
      case "--export":
        if (next) {
          exportDir = next;
          i++;
        } else {
          errors.push("--export expects a directory");
        }
        break;
      case "--data-dir":
        if (next) {
          dataDir = next;
          i++;
        } else {
          errors.push("--data-dir expects a directory");
        }
        break;
      case "--rules-dir":
        if (next) {
          rulesDir = next;
          i++;
        } else {
          errors.push("--rules-dir expects a directory");
        }
        break;
      case "--leak-threshold":
        leakThresholdMs = parseMs(arg, next, errors);
        i++;
        break;
      case "--page-timeout":
        perPageTimeoutMs = parseMs(arg, next, errors);
        i++;
        break;
      case "--total-timeout":
        totalTimeoutMs = parseMs(arg, next, errors);
        i++;
        break;
      case "--supersession":
        if (next === "prefer-latest" || next === "load-all") {
          supersession = next;
          i++;
        } else {
          errors.push("--supersession expects prefer-latest or load-all");
        }
        break;
      case "--headed":
        headed = true;
        break;
      case "--no-enrich":
        enrich = false;
        break;
      case "--quiet":
        quiet = true;
        break;
      default:
        errors.push(`unknown argument: ${arg}`);
    }
  }

  if (command === "scan") {
    if (!jurisdiction) {
      errors.push("--jurisdiction is required");
    }
    if (!itineraryFile && urls.length === 0) {
      errors.push("--itinerary or at least one --url is required");
    }
  }

  return {
    command,
    urls,
    format,
    headed,
    enrich,
    quiet,
    errors,
    ...(itineraryFile ? { itineraryFile } : {}),
    ...(jurisdiction ? { jurisdiction } : {}),
    ...(exportDir ? { exportDir } : {}),
    ...(dataDir ? { dataDir } : {}),
    ...(rulesDir ? { rulesDir } : {}),
    ...(leakThresholdMs !== undefined ? { leakThresholdMs } : {}),
    ...(perPageTimeoutMs !== undefined ? { perPageTimeoutMs } : {}),
    ...(totalTimeoutMs !== undefined ? { totalTimeoutMs } : {}),
    ...(supersession ? { supersession } : {}),
  };
}

/**
 * Itinerary files are either a JSON array of URLs or one URL per line;
 * blank lines and lines starting with `#` are ignored.
 */
export function parseItinerary(text: string): string[] {
  const trimmed = text.trim();
  if (trimmed.startsWith("[")) {
    const parsed: unknown = JSON.parse(trimmed);
    if (!Array.isArray(parsed) || !parsed.every((u): u is string => typeof u === "string")) {
      throw new Error("itinerary JSON must be an array of URL strings");
    }
    return parsed;
  }
  return trimmed
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/** Assemble the raw scan input handed to runScan's validation. */
export function buildScanInput(
  args: CliArgs,
  itinerary: readonly string[],
  providers: readonly EnrichmentProviderConfig[],
): ScanConfig {
  const timing = {
    ...(args.leakThresholdMs !== undefined ? { leakThresholdMs: args.leakThresholdMs } : {}),
    ...(args.perPageTimeoutMs !== undefined ? { perPageTimeoutMs: args.perPageTimeoutMs } : {}),
    ...(args.totalTimeoutMs !== undefined ? { totalTimeoutMs: args.totalTimeoutMs } : {}),
  };
  return {
    jurisdiction: args.jurisdiction ?? "",
    itinerary: [...itinerary],
    browser: { headless: !args.headed },
    ...(Object.keys(timing).length > 0 ? { timing } : {}),
    ...(args.supersession ? { supersession: args.supersession } : {}),
    ...(args.dataDir ? { dataDir: args.dataDir } : {}),
    ...(args.rulesDir ? { rulesDir: args.rulesDir } : {}),
    ...(args.exportDir ? { exportDir: args.exportDir } : {}),
    enrichment: { providers: args.enrich ? providers.map((p) => ({ ...p })) : [] },
  };
}

export function exitCodeFor(outcome: ScanOutcome): number {
  switch (outcome) {
    case "NO_VIOLATIONS":
      return 0;
    case "VIOLATIONS_FOUND":
      return 1;
    case "INSUFFICIENT_DATA":
      return 2;
  }
}

export const HELP_TEXT = `
privacy-probe: test whether a website honors browser privacy signals

Usage: privacy-probe scan --jurisdiction <key> (--itinerary <file> | --url <url>...) [options]

Options:
  --itinerary <file>         JSON array or newline-separated list of page URLs
  --url <url>                Page to visit (repeatable; appended after the itinerary)
  --jurisdiction <key>       Rule dataset to evaluate against (CCPA, GDPR)
  --format terminal|json     Output format (default: terminal)
  --export <dir>             Write per-session logs and evidence-report.json
  --leak-threshold <ms>      Temporal leak window after page load (default: 500)
  --page-timeout <ms>        Per-page navigation timeout (default: 30000)
  --total-timeout <ms>       Per-session time budget (default: 600000)
  --supersession <mode>      prefer-latest (default) or load-all
  --data-dir <path>          Directory with tracker, PII and probe tables
  --rules-dir <path>         Directory with <JURISDICTION>.json rule datasets
  --headed                   Show the browser windows
  --no-enrich                Skip explanations even when API keys are set
  --quiet                    Do not print progress events
  --help                     Show this help message

Environment:
  ANTHROPIC_API_KEY, OPENAI_API_KEY   Enable violation explanations (tried in that order)
  OTEL_ENABLED=true                   Export traces over OTLP

Exit codes: 0 no violations, 1 violations found, 2 insufficient data, 3 fatal error
`;

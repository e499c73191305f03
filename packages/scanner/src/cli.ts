#!/usr/bin/env node

import { readFile } from "node:fs/promises";
import { providerConfigsFromEnv } from "@privacy-probe/enrichment";
import { describeError, isPreflightError } from "@privacy-probe/errors";
import { setupTelemetry, shutdownTelemetry } from "@privacy-probe/telemetry";
import { HELP_TEXT, buildScanInput, exitCodeFor, parseArgs, parseItinerary } from "./cli/args.js";
import { ScanEventLog } from "./events.js";
import { type ConsoleLike, attachConsoleSink } from "./reporters/console-sink.js";
import { JsonReporter } from "./reporters/json-reporter.js";
import { TerminalReporter } from "./reporters/terminal-reporter.js";
import { runScan } from "./scan.js";

const FATAL_EXIT_CODE = 3;

// Progress goes to stderr so `--format json` output stays parseable.
const stderrConsole: ConsoleLike = {
  log: (message) => console.error(message),
  warn: (message) => console.error(message),
  error: (message) => console.error(message),
};

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<number> {
  const args = parseArgs(process.argv);

  if (args.errors.length > 0) {
    for (const error of args.errors) {
      console.error(`Error: ${error}`);
    }
    console.error("Run with --help for usage.");
    return FATAL_EXIT_CODE;
  }
  if (args.command === "help") {
    console.log(HELP_TEXT);
    return 0;
  }

  const itinerary: string[] = [];
  if (args.itineraryFile) {
    itinerary.push(...parseItinerary(await readFile(args.itineraryFile, "utf8")));
  }
  itinerary.push(...args.urls);

  const input = buildScanInput(args, itinerary, providerConfigsFromEnv(process.env));

  await setupTelemetry();
  const events = new ScanEventLog();
  if (!args.quiet) {
    attachConsoleSink(events, args.format === "json" ? stderrConsole : console);
  }

  try {
    const result = await runScan(input, { events });
    const reporter = args.format === "json" ? new JsonReporter() : new TerminalReporter();
    console.log(reporter.report(result.report));
    return exitCodeFor(result.report.outcome);
  } finally {
    await shutdownTelemetry();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    // Preflight problems (config, dataset, tables) are the user's to fix; no "Fatal" banner.
    console.error(isPreflightError(err) ? `Error: ${describeError(err)}` : `Fatal: ${describeError(err)}`);
    process.exit(FATAL_EXIT_CODE);
  });

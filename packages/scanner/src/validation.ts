import { randomUUID } from "node:crypto";
import { join } from "node:path";
import { EnrichmentProviderConfigSchema } from "@privacy-probe/enrichment";
import { ScanConfigurationInvalidError, type ValidationIssue } from "@privacy-probe/errors";
import { z } from "zod";
import { DEFAULT_DATA_DIR } from "./paths.js";
import type { ResolvedScanConfig, SignalConfig, SupersessionMode } from "./types.js";

// ============================================================================
// CONFIG DEFAULTS
// ============================================================================

/** Asserts navigator.globalPrivacyControl before any page script runs */
export const GPC_INIT_SCRIPT =
  "Object.defineProperty(navigator, 'globalPrivacyControl', { get: () => true, configurable: true });";

export const DEFAULT_SIGNAL_CONFIGS: readonly SignalConfig[] = [
  { label: "baseline", httpHeaders: {}, scriptOverrides: [], simulateRejectAction: false },
  {
    label: "compliance",
    httpHeaders: { "Sec-GPC": "1" },
    scriptOverrides: [GPC_INIT_SCRIPT],
    simulateRejectAction: true,
  },
];

export const CONFIG_DEFAULTS = {
  baselineLabel: "baseline",
  complianceLabel: "compliance",
  timing: {
    perPageTimeoutMs: 30_000,
    totalTimeoutMs: 600_000,
    settleWaitMs: 10_000,
    actionDelayMs: 800,
    scrollSteps: 3,
    leakThresholdMs: 500,
  },
  browser: {
    headless: true,
    viewport: { width: 1280, height: 800 },
    ignoreHttpsErrors: true,
  },
  supersession: "prefer-latest",
  enrichment: {
    maxViolations: 20,
  },
} as const;

const DEFAULT_SUPERSESSION: SupersessionMode = CONFIG_DEFAULTS.supersession;

// ============================================================================
// SCHEMAS
// ============================================================================

const LABEL_PATTERN = /^[a-z0-9][a-z0-9_-]*$/i;

const httpUrlSchema = z
  .string()
  .url({ message: "itinerary entries must be absolute URLs" })
  .refine((value) => /^https?:\/\//i.test(value), {
    message: "itinerary entries must use http or https",
  });

export const SignalConfigSchema = z.object({
  label: z
    .string()
    .regex(LABEL_PATTERN, { message: "session label must be alphanumeric, '-' or '_'" }),
  httpHeaders: z.record(z.string()).default({}),
  scriptOverrides: z.array(z.string().min(1)).default([]),
  simulateRejectAction: z.boolean().default(false),
});

const timingSchema = z.object({
  perPageTimeoutMs: z
    .number()
    .int()
    .positive()
    .max(120_000, { message: "timing.perPageTimeoutMs must not exceed 120000ms" })
    .optional(),
  totalTimeoutMs: z
    .number()
    .int()
    .positive()
    .max(3_600_000, { message: "timing.totalTimeoutMs must not exceed 3600000ms (1 h)" })
    .optional(),
  settleWaitMs: z.number().int().nonnegative().max(60_000).optional(),
  actionDelayMs: z.number().int().nonnegative().max(10_000).optional(),
  scrollSteps: z.number().int().nonnegative().max(20).optional(),
  leakThresholdMs: z
    .number()
    .int()
    .positive({ message: "timing.leakThresholdMs must be a positive integer" })
    .max(60_000)
    .optional(),
});

const browserSchema = z.object({
  headless: z.boolean().optional(),
  viewport: z
    .object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    })
    .optional(),
  userAgent: z.string().min(1).optional(),
  ignoreHttpsErrors: z.boolean().optional(),
});

const enrichmentSchema = z.object({
  providers: z.array(EnrichmentProviderConfigSchema).default([]),
  maxViolations: z.number().int().nonnegative().optional(),
});

export const ScanConfigSchema = z
  .object({
    scanId: z.string().min(1).optional(),
    jurisdiction: z
      .string()
      .regex(/^[a-z][a-z0-9_-]*$/i, { message: "jurisdiction must be a dataset key such as CCPA" }),
    itinerary: z
      .array(httpUrlSchema)
      .min(1, { message: "itinerary must contain at least one URL" })
      .max(100, { message: "itinerary must not exceed 100 URLs" }),
    sessions: z.array(SignalConfigSchema).min(2, { message: "at least two sessions are required" }).optional(),
    baselineLabel: z.string().min(1).optional(),
    complianceLabel: z.string().min(1).optional(),
    timing: timingSchema.optional(),
    browser: browserSchema.optional(),
    supersession: z.enum(["prefer-latest", "load-all"]).optional(),
    dataDir: z.string().min(1).optional(),
    rulesDir: z.string().min(1).optional(),
    exportDir: z.string().min(1).optional(),
    enrichment: enrichmentSchema.optional(),
  })
  .superRefine((config, ctx) => {
    const sessions: readonly SignalConfig[] = config.sessions ?? DEFAULT_SIGNAL_CONFIGS;
    const labels = sessions.map((s) => s.label);
    const seen = new Set<string>();
    for (const label of labels) {
      if (seen.has(label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sessions"],
          message: `duplicate session label "${label}"`,
        });
      }
      seen.add(label);
    }
    const baseline = config.baselineLabel ?? CONFIG_DEFAULTS.baselineLabel;
    const compliance = config.complianceLabel ?? CONFIG_DEFAULTS.complianceLabel;
    if (baseline === compliance) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["complianceLabel"],
        message: "baseline and compliance sessions must differ",
      });
    }
    for (const [key, label] of [
      ["baselineLabel", baseline],
      ["complianceLabel", compliance],
    ] as const) {
      if (!seen.has(label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `no session labelled "${label}"`,
        });
      }
    }
  });

export type ScanConfig = z.input<typeof ScanConfigSchema>;
export type ParsedScanConfig = z.output<typeof ScanConfigSchema>;

// ----------------------------------------------------------------------------
// Data tables
// ----------------------------------------------------------------------------

export const RuleSchema = z.object({
  ruleId: z.string().min(1),
  jurisdiction: z.string().min(1),
  sectionCitation: z.string().min(1),
  title: z.string().min(1),
  ruleText: z.string().min(1),
  detectorKey: z.string().min(1).nullable(),
  penaltyMin: z.number().nonnegative().nullable(),
  penaltyMax: z.number().nonnegative().nullable(),
  appliesTo: z.string(),
  supersedes: z.string().min(1).optional(),
});

export const RuleDatasetSchema = z.object({
  jurisdiction: z.string().min(1),
  name: z.string().min(1),
  version: z.string().min(1),
  rules: z.array(RuleSchema).min(1, { message: "dataset contains no rules" }),
});

export const TrackerTableSchema = z.object({
  version: z.string().min(1),
  domains: z
    .array(z.string().regex(/^\.?[a-z0-9-]+(\.[a-z0-9-]+)+$/i, { message: "not a domain name" }))
    .min(1),
});

export const PiiPatternTableSchema = z.object({
  version: z.string().min(1),
  indicators: z
    .array(
      z.object({
        name: z.string().min(1),
        pattern: z.string().min(1),
        flags: z
          .string()
          .regex(/^[imsu]*$/, { message: "only the i, m, s and u flags are allowed" })
          .optional(),
      }),
    )
    .min(1),
});

export const PageProbeTableSchema = z.object({
  consentBannerSelectors: z.array(z.string().min(1)).min(1),
  optOutLinkPatterns: z.array(z.string().min(1)).min(1),
  rejectButtonPatterns: z.array(z.string().min(1)).min(1),
  rejectFallbackSelectors: z.array(z.string().min(1)),
});

// ----------------------------------------------------------------------------
// Evidence report
// ----------------------------------------------------------------------------

const severitySchema = z.enum(["HIGH", "MEDIUM", "LOW"]);

const pageProbeEvidenceSchema = z.object({
  affectedPages: z.number().int().nonnegative(),
  sampleUrls: z.array(z.string()),
  pagesChecked: z.number().int().nonnegative(),
});

const violationSchema = z
  .discriminatedUnion("violationType", [
    z.object({
      violationType: z.literal("SIGNAL_NOT_HONORED"),
      evidence: z.object({
        domainsIgnoringSignal: z.array(z.string()).min(1),
        baselineTrackerRequests: z.number().int().nonnegative(),
        complianceTrackerRequests: z.number().int().nonnegative(),
        reductionPercent: z.number(),
      }),
    }),
    z.object({
      violationType: z.literal("TEMPORAL_LEAK"),
      evidence: z.object({
        leakCount: z.number().int().positive(),
        leakedDomains: z.array(z.string()),
        sampleLeaks: z
          .array(
            z.object({
              domain: z.string(),
              fullUrl: z.string(),
              pageUrl: z.string(),
              msAfterLoad: z.number().nonnegative(),
            }),
          )
          .max(3),
        windowMs: z.number().int().positive(),
      }),
    }),
    z.object({ violationType: z.literal("MISSING_OPT_OUT_LINK"), evidence: pageProbeEvidenceSchema }),
    z.object({ violationType: z.literal("MISSING_CONSENT_BANNER"), evidence: pageProbeEvidenceSchema }),
    z.object({
      violationType: z.literal("PII_IN_TRACKING_REQUEST"),
      evidence: z.object({
        requestCount: z.number().int().positive(),
        sampleDomains: z.array(z.string()),
        indicators: z.array(z.string()),
        perSession: z.record(z.number().int().nonnegative()),
      }),
    }),
  ])
  .and(
    z.object({
      ruleId: z.string().min(1),
      sectionCitation: z.string().min(1),
      title: z.string().min(1),
      severity: severitySchema,
      penaltyMinUsd: z.number().nullable(),
      penaltyMaxUsd: z.number().nullable(),
      recommendation: z.string().min(1),
      enrichment: z
        .object({
          plainEnglish: z.string(),
          technicalFix: z.string(),
          providerId: z.string(),
        })
        .optional(),
    }),
  );

const sessionStatsSchema = z.object({
  duplicatesDropped: z.number().int().nonnegative(),
  classificationErrors: z.number().int().nonnegative(),
  lateRequests: z.number().int().nonnegative(),
});

export const EvidenceReportSchema = z.object({
  metadata: z.object({
    tool: z.object({ name: z.string(), version: z.string() }),
    scanId: z.string().min(1),
    jurisdiction: z.string().min(1),
    datasetVersion: z.string(),
    startedAt: z.string().datetime(),
    completedAt: z.string().datetime(),
    durationMs: z.number().nonnegative(),
    itinerary: z.array(z.string()).min(1),
    leakThresholdMs: z.number().int().positive(),
    baselineLabel: z.string(),
    complianceLabel: z.string(),
    warnings: z.array(z.string()),
    enrichmentProviders: z.array(z.string()),
  }),
  sessions: z.array(
    z.object({
      label: z.string(),
      pagesVisited: z.number().int().nonnegative(),
      pagesOk: z.number().int().nonnegative(),
      pagesFailed: z.number().int().nonnegative(),
      totalRequests: z.number().int().nonnegative(),
      trackerRequests: z.number().int().nonnegative(),
      uniqueTrackerDomains: z.array(z.string()),
      temporalLeaks: z.number().int().nonnegative(),
      aborted: z.boolean(),
      warnings: z.array(z.string()),
      stats: sessionStatsSchema,
    }),
  ),
  verdict: z.object({
    verdict: z.enum(["COMPLIANT", "NON_COMPLIANT", "INSUFFICIENT_DATA"]),
    domainsIgnoringSignal: z.array(z.string()),
    leakCount: z.number().int().nonnegative(),
  }),
  violations: z.array(violationSchema),
  ruleRuns: z.array(
    z.object({
      ruleId: z.string(),
      detectorKey: z.string().nullable(),
      status: z.enum([
        "violation",
        "compliant",
        "not_evaluable",
        "error",
        "skipped_definitional",
        "unmapped",
        "superseded",
      ]),
      reason: z.string().optional(),
    }),
  ),
  summary: z.object({
    totalViolations: z.number().int().nonnegative(),
    severityCounts: z.object({
      HIGH: z.number().int().nonnegative(),
      MEDIUM: z.number().int().nonnegative(),
      LOW: z.number().int().nonnegative(),
    }),
    minPotentialPenaltyUsd: z.number().nonnegative(),
    maxPotentialPenaltyUsd: z.number().nonnegative(),
    rulesEvaluated: z.number().int().nonnegative(),
    enrichedViolations: z.number().int().nonnegative(),
  }),
  outcome: z.enum(["VIOLATIONS_FOUND", "NO_VIOLATIONS", "INSUFFICIENT_DATA"]),
});

// ============================================================================
// EXPORTS
// ============================================================================

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}

function formatIssues(issues: readonly ValidationIssue[]): string[] {
  return issues.map((issue) => (issue.field ? `${issue.field}: ${issue.message}` : issue.message));
}

/**
 * Validate raw scan input, throwing ScanConfigurationInvalidError with one
 * entry per issue.
 */
export function validateScanConfig(config: unknown): ParsedScanConfig {
  const result = ScanConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = toIssues(result.error);
    throw new ScanConfigurationInvalidError(formatIssues(issues), issues);
  }
  return result.data;
}

/**
 * Validate a report document against EvidenceReportSchema.
 */
export function validateEvidenceReport(report: unknown): string[] {
  const result = EvidenceReportSchema.safeParse(report);
  return result.success ? [] : formatIssues(toIssues(result.error));
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Apply defaults to validated config and freeze the result. The returned
 * object is passed explicitly to every component of a single scan.
 */
export function resolveScanConfig(
  config: ParsedScanConfig,
  generateId: () => string = randomUUID,
): ResolvedScanConfig {
  const dataDir = config.dataDir ?? DEFAULT_DATA_DIR;
  const sessions: readonly SignalConfig[] = config.sessions ?? DEFAULT_SIGNAL_CONFIGS;
  const resolved: ResolvedScanConfig = {
    scanId: config.scanId ?? generateId(),
    jurisdiction: config.jurisdiction.toUpperCase(),
    itinerary: [...config.itinerary],
    sessions: sessions.map((s) => ({
      label: s.label,
      httpHeaders: { ...s.httpHeaders },
      scriptOverrides: [...s.scriptOverrides],
      simulateRejectAction: s.simulateRejectAction,
    })),
    baselineLabel: config.baselineLabel ?? CONFIG_DEFAULTS.baselineLabel,
    complianceLabel: config.complianceLabel ?? CONFIG_DEFAULTS.complianceLabel,
    timing: {
      perPageTimeoutMs: config.timing?.perPageTimeoutMs ?? CONFIG_DEFAULTS.timing.perPageTimeoutMs,
      totalTimeoutMs: config.timing?.totalTimeoutMs ?? CONFIG_DEFAULTS.timing.totalTimeoutMs,
      settleWaitMs: config.timing?.settleWaitMs ?? CONFIG_DEFAULTS.timing.settleWaitMs,
      actionDelayMs: config.timing?.actionDelayMs ?? CONFIG_DEFAULTS.timing.actionDelayMs,
      scrollSteps: config.timing?.scrollSteps ?? CONFIG_DEFAULTS.timing.scrollSteps,
      leakThresholdMs: config.timing?.leakThresholdMs ?? CONFIG_DEFAULTS.timing.leakThresholdMs,
    },
    browser: {
      headless: config.browser?.headless ?? CONFIG_DEFAULTS.browser.headless,
      viewport: config.browser?.viewport ?? { ...CONFIG_DEFAULTS.browser.viewport },
      ...(config.browser?.userAgent ? { userAgent: config.browser.userAgent } : {}),
      ignoreHttpsErrors:
        config.browser?.ignoreHttpsErrors ?? CONFIG_DEFAULTS.browser.ignoreHttpsErrors,
    },
    supersession: config.supersession ?? DEFAULT_SUPERSESSION,
    dataDir,
    rulesDir: config.rulesDir ?? join(dataDir, "rules"),
    ...(config.exportDir ? { exportDir: config.exportDir } : {}),
    enrichment: {
      providers: config.enrichment?.providers ?? [],
      maxViolations:
        config.enrichment?.maxViolations ?? CONFIG_DEFAULTS.enrichment.maxViolations,
    },
  };
  return deepFreeze(resolved);
}


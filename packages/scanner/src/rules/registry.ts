import { DetectorFailedError, getErrorMessage } from "@privacy-probe/errors";
import { getViolationsEmitted } from "@privacy-probe/telemetry";
import { SYSTEM_SOURCE, type ScanEventLog } from "../events.js";
import type {
  Detector,
  DetectorInput,
  EvaluationResult,
  Rule,
  RuleRunRecord,
  SupersessionMode,
  Violation,
} from "../types.js";
import {
  DETECTOR_KEYS,
  missingConsentBanner,
  missingOptOutLink,
  piiInTrackingRequest,
  signalNotHonored,
  temporalLeak,
} from "./detectors.js";

// ============================================================================
// REGISTRY
// ============================================================================

/**
 * Immutable mapping from detector key to detector. `register` returns a new
 * registry and leaves the receiver untouched.
 */
export class DetectorRegistry {
  private readonly detectors: ReadonlyMap<string, Detector>;

  constructor(entries: Iterable<readonly [string, Detector]> = []) {
    this.detectors = new Map(entries);
  }

  register(key: string, detector: Detector): DetectorRegistry {
    return new DetectorRegistry([...this.detectors, [key, detector]]);
  }

  get(key: string): Detector | undefined {
    return this.detectors.get(key);
  }

  has(key: string): boolean {
    return this.detectors.has(key);
  }

  keys(): string[] {
    return [...this.detectors.keys()];
  }
}

export function createDefaultRegistry(): DetectorRegistry {
  return new DetectorRegistry([
    [DETECTOR_KEYS.signalNotHonored, signalNotHonored],
    [DETECTOR_KEYS.temporalLeak, temporalLeak],
    [DETECTOR_KEYS.missingOptOutLink, missingOptOutLink],
    [DETECTOR_KEYS.missingConsentBanner, missingConsentBanner],
    [DETECTOR_KEYS.piiInTrackingRequest, piiInTrackingRequest],
  ]);
}

// ============================================================================
// EVALUATION
// ============================================================================

export interface EvaluateOptions {
  readonly registry?: DetectorRegistry;
  readonly supersession?: SupersessionMode;
  readonly events?: ScanEventLog;
}

function isDefinitional(rule: Rule): boolean {
  return rule.penaltyMin === null && rule.penaltyMax === null;
}

/** ruleId → id of the loaded rule that supersedes it */
function supersededBy(rules: readonly Rule[]): Map<string, string> {
  const ids = new Set(rules.map((r) => r.ruleId));
  const map = new Map<string, string>();
  for (const rule of rules) {
    if (rule.supersedes !== undefined && ids.has(rule.supersedes)) {
      map.set(rule.supersedes, rule.ruleId);
    }
  }
  return map;
}

/**
 * Run every rule's detector against the aggregated session data.
 *
 * Each rule yields exactly one run record. Compliant and not-evaluable
 * outcomes each get their own event (INFO and WARNING), so a rule that could
 * not be checked never reads as a clean result. A throwing detector is
 * recorded as `error` with an ERROR event and evaluation moves on.
 */
export function evaluateRules(
  rules: readonly Rule[],
  input: DetectorInput,
  options: EvaluateOptions = {},
): EvaluationResult {
  const registry = options.registry ?? createDefaultRegistry();
  const supersession = options.supersession ?? "prefer-latest";
  const superseded = supersededBy(rules);
  const violations: Violation[] = [];
  const runs: RuleRunRecord[] = [];

  if (supersession === "load-all") {
    for (const [older, newer] of superseded) {
      options.events?.warn(
        SYSTEM_SOURCE,
        `Rules ${newer} and ${older} cover the same provision; both are evaluated`,
      );
    }
  }

  for (const rule of rules) {
    const detectorKey = rule.detectorKey;
    const newer = superseded.get(rule.ruleId);

    if (supersession === "prefer-latest" && newer !== undefined) {
      runs.push({ ruleId: rule.ruleId, detectorKey, status: "superseded", reason: `superseded by ${newer}` });
      continue;
    }
    if (isDefinitional(rule)) {
      runs.push({ ruleId: rule.ruleId, detectorKey, status: "skipped_definitional" });
      continue;
    }
    const detector = detectorKey === null ? undefined : registry.get(detectorKey);
    if (detectorKey === null || detector === undefined) {
      runs.push({
        ruleId: rule.ruleId,
        detectorKey,
        status: "unmapped",
        reason: detectorKey === null ? "no detector key" : `no detector registered for "${detectorKey}"`,
      });
      continue;
    }

    try {
      const outcome = detector(input, rule);
      switch (outcome.kind) {
        case "violation":
          violations.push({
            ...outcome.finding,
            ruleId: rule.ruleId,
            sectionCitation: rule.sectionCitation,
            title: rule.title,
            penaltyMinUsd: rule.penaltyMin,
            penaltyMaxUsd: rule.penaltyMax,
          });
          getViolationsEmitted().add(1, {
            "violation.type": outcome.finding.violationType,
            severity: outcome.finding.severity,
          });
          runs.push({ ruleId: rule.ruleId, detectorKey, status: "violation" });
          break;
        case "compliant":
          options.events?.info(SYSTEM_SOURCE, `Rule ${rule.ruleId} checked: compliant`);
          runs.push({ ruleId: rule.ruleId, detectorKey, status: "compliant" });
          break;
        case "not_evaluable":
          options.events?.warn(SYSTEM_SOURCE, `Rule ${rule.ruleId} not evaluated: ${outcome.reason}`);
          runs.push({ ruleId: rule.ruleId, detectorKey, status: "not_evaluable", reason: outcome.reason });
          break;
      }
    } catch (error) {
      const failure = new DetectorFailedError(
        rule.ruleId,
        detectorKey,
        error instanceof Error ? error : undefined,
      );
      options.events?.error(SYSTEM_SOURCE, failure.message);
      runs.push({
        ruleId: rule.ruleId,
        detectorKey,
        status: "error",
        reason: getErrorMessage(error),
      });
    }
  }

  return { violations, runs };
}

import type { Finding, Severity } from "./types.js";
import { SEVERITIES } from "./types.js";

export type FailOn = Severity | "none";

const SEVERITY_RANK: Record<Severity, number> = {
  info: 0,
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export function severityRank(severity: Severity): number {
  return SEVERITY_RANK[severity];
}

export function parseSeverityName(value: string): Severity | undefined {
  const normalized = value.trim().toLowerCase();
  return SEVERITIES.find((severity) => severity === normalized);
}

export function atOrAbove(severity: Severity, threshold: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
}

/** True when any finding reaches the `--fail-on` threshold. */
export function breachesThreshold(findings: readonly Finding[], failOn: FailOn): boolean {
  if (failOn === "none") {
    return false;
  }
  return findings.some((finding) => atOrAbove(finding.severity, failOn));
}

import type {
  ComplianceReport,
  ComplianceStatus,
  Finding,
  IgnoredFinding,
  RiskScore,
  Severity,
} from "./types.js";
import { SEVERITIES } from "./types.js";
import type { Catalog } from "./catalog.js";
import { ReportIntegrityError } from "./errors.js";
import { atOrAbove } from "./filters.js";
import { compareFindings, sortFindings } from "./evaluator.js";

export interface StatusPolicy {
  /** Any finding at or above this severity makes a category NonCompliant. */
  nonCompliantAt: Severity;
  /** Any finding at or above this (and below `nonCompliantAt`) makes it PartiallyCompliant. */
  partialAt: Severity;
}

export const DEFAULT_POLICY: StatusPolicy = Object.freeze({
  nonCompliantAt: "medium",
  partialAt: "info",
});

export interface AggregateOptions {
  catalog: Catalog;
  scannedDocuments: number;
  incomplete?: boolean;
  policy?: StatusPolicy;
  ignored?: readonly IgnoredFinding[];
}

const STATUS_ORDER: Record<ComplianceStatus, number> = {
  Compliant: 0,
  PartiallyCompliant: 1,
  NonCompliant: 2,
};

export function emptyCounts(): Record<Severity, number> {
  return { info: 0, low: 0, medium: 0, high: 0, critical: 0 };
}

export function findingKey(finding: Finding): string {
  return [finding.ruleId, finding.path, finding.location.path, finding.location.start].join("|");
}

export function dedupeFindings(findings: readonly Finding[]): Finding[] {
  const seen = new Set<string>();
  const unique: Finding[] = [];
  for (const finding of findings) {
    const key = findingKey(finding);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(finding);
  }
  return unique;
}

export function statusFor(counts: Record<Severity, number>, policy: StatusPolicy = DEFAULT_POLICY): ComplianceStatus {
  const present = SEVERITIES.filter((severity) => counts[severity] > 0);
  if (present.some((severity) => atOrAbove(severity, policy.nonCompliantAt))) {
    return "NonCompliant";
  }
  if (present.some((severity) => atOrAbove(severity, policy.partialAt))) {
    return "PartiallyCompliant";
  }
  return "Compliant";
}

export function worstStatus(statuses: readonly ComplianceStatus[]): ComplianceStatus {
  return statuses.reduce<ComplianceStatus>(
    (worst, status) => (STATUS_ORDER[status] > STATUS_ORDER[worst] ? status : worst),
    "Compliant",
  );
}

/** Folds findings into per-category scores and an overall posture. Pure. */
export function aggregate(findings: readonly Finding[], options: AggregateOptions): ComplianceReport {
  const policy = options.policy ?? DEFAULT_POLICY;
  const { catalog } = options;

  for (const finding of [...findings, ...(options.ignored ?? []).map((entry) => entry.finding)]) {
    if (!catalog.get(finding.ruleId)) {
      throw new ReportIntegrityError(
        `Finding for ${finding.path} references rule "${finding.ruleId}", which is not in catalog ${catalog.version}`,
      );
    }
  }

  const unique = sortFindings(dedupeFindings(findings));

  const categories: RiskScore[] = catalog.categories.map((category) => {
    const counts = emptyCounts();
    for (const finding of unique) {
      if (finding.category === category.id) {
        counts[finding.severity] += 1;
      }
    }
    return Object.freeze({
      id: category.id,
      key: category.key,
      name: category.name,
      status: statusFor(counts, policy),
      counts: Object.freeze(counts),
    });
  });

  const ignored = [...(options.ignored ?? [])].sort((a, b) => compareFindings(a.finding, b.finding));

  return Object.freeze({
    catalogVersion: catalog.version,
    scannedDocuments: options.scannedDocuments,
    incomplete: options.incomplete ?? false,
    posture: worstStatus(categories.map((category) => category.status)),
    categories,
    findings: unique,
    ignored,
  });
}

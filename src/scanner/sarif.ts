import type { ComplianceReport, Finding, RuleDefinition, Severity } from "./types.js";
import type { Catalog } from "./catalog.js";

export const SARIF_VERSION = "2.1.0";
export const SARIF_SCHEMA = "https://json.schemastore.org/sarif-2.1.0.json";

export type SarifLevel = "error" | "warning" | "note";

export interface SarifRule {
  id: string;
  name: string;
  shortDescription: { text: string };
  fullDescription: { text: string };
  help: { text: string };
  defaultConfiguration: { level: SarifLevel };
  properties: { category: string; severity: Severity; tags: string[] };
}

export interface SarifResult {
  ruleId: string;
  ruleIndex: number;
  level: SarifLevel;
  message: { text: string };
  locations: Array<{
    physicalLocation: {
      artifactLocation: { uri: string };
      region: { startLine: number; byteOffset: number; byteLength: number };
    };
    logicalLocations: Array<{ fullyQualifiedName: string }>;
  }>;
  partialFingerprints: Record<string, string>;
  suppressions?: Array<{ kind: "inSource"; justification: string }>;
}

export interface SarifLog {
  $schema: string;
  version: typeof SARIF_VERSION;
  runs: Array<{
    tool: { driver: { name: string; version: string; rules: SarifRule[] } };
    results: SarifResult[];
    properties: { scannedDocuments: number; incomplete: boolean; posture: string };
  }>;
}

export function sarifLevel(severity: Severity): SarifLevel {
  switch (severity) {
    case "critical":
    case "high":
      return "error";
    case "medium":
      return "warning";
    default:
      return "note";
  }
}

function toSarifRule(rule: RuleDefinition, catalog: Catalog): SarifRule {
  const category = catalog.categories.find((entry) => entry.id === rule.category);
  return {
    id: rule.id,
    name: rule.title,
    shortDescription: { text: rule.title },
    fullDescription: { text: rule.description },
    help: { text: rule.example ? `${rule.remediation}\n\n${rule.example}` : rule.remediation },
    defaultConfiguration: { level: sarifLevel(rule.severity) },
    properties: {
      category: category?.key ?? `CICD-SEC-${rule.category}`,
      severity: rule.severity,
      tags: ["security", "ci-cd"],
    },
  };
}

function toSarifResult(finding: Finding, ruleIndex: number, justification?: string): SarifResult {
  const result: SarifResult = {
    ruleId: finding.ruleId,
    ruleIndex,
    level: sarifLevel(finding.severity),
    message: { text: finding.message },
    locations: [
      {
        physicalLocation: {
          artifactLocation: { uri: finding.path },
          region: {
            startLine: finding.location.line,
            byteOffset: finding.location.start,
            byteLength: Math.max(0, finding.location.end - finding.location.start),
          },
        },
        logicalLocations: [{ fullyQualifiedName: finding.location.path }],
      },
    ],
    partialFingerprints: {
      "pipewardenFinding/v1": `${finding.ruleId}|${finding.path}|${finding.location.path}`,
    },
  };
  if (justification !== undefined) {
    result.suppressions = [{ kind: "inSource", justification }];
  }
  return result;
}

/** SARIF 2.1.0 log with the full catalog as the driver's rules. No timestamps. */
export function buildSarifLog(report: ComplianceReport, catalog: Catalog): SarifLog {
  const rules = catalog.rules.map((rule) => toSarifRule(rule, catalog));
  const indexOf = new Map(rules.map((rule, index) => [rule.id, index]));

  const results = [
    ...report.findings.map((finding) => toSarifResult(finding, indexOf.get(finding.ruleId) ?? -1)),
    ...report.ignored.map((entry) =>
      toSarifResult(entry.finding, indexOf.get(entry.finding.ruleId) ?? -1, entry.reason),
    ),
  ];

  return {
    $schema: SARIF_SCHEMA,
    version: SARIF_VERSION,
    runs: [
      {
        tool: { driver: { name: "pipewarden", version: report.catalogVersion, rules } },
        results,
        properties: {
          scannedDocuments: report.scannedDocuments,
          incomplete: report.incomplete,
          posture: report.posture,
        },
      },
    ],
  };
}

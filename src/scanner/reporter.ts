import kleur from "kleur";
import type { ComplianceReport, ComplianceStatus, Finding, RiskScore, Severity } from "./types.js";
import type { Catalog } from "./catalog.js";
import type { ReportFormat } from "../config.js";
import { buildSarifLog } from "./sarif.js";
import { severityRank } from "./filters.js";
import { ScanError } from "./errors.js";

export interface FormatOptions {
  /** Needed for SARIF, which lists every catalog rule. */
  catalog?: Catalog;
  color?: boolean;
}

export interface TerminalOptions {
  /** Findings listed before the summary cuts off. */
  limit?: number;
  color?: boolean;
}

/** Renders a report. Never writes anything; identical reports render to identical strings. */
export function formatReport(report: ComplianceReport, format: ReportFormat, options: FormatOptions = {}): string {
  switch (format) {
    case "json":
      return `${JSON.stringify(toJsonReport(report), null, 2)}\n`;
    case "markdown":
      return formatMarkdown(report);
    case "sarif":
      if (!options.catalog) {
        throw new ScanError("SARIF output needs the catalog the report was built from");
      }
      return `${JSON.stringify(buildSarifLog(report, options.catalog), null, 2)}\n`;
    default:
      return `${formatText(report, { color: options.color })}\n`;
  }
}

/** Output format implied by a file extension, if any. */
export function formatForPath(filePath: string): ReportFormat | undefined {
  const lower = filePath.toLowerCase();
  if (lower.endsWith(".json")) {
    return "json";
  }
  if (lower.endsWith(".md") || lower.endsWith(".markdown")) {
    return "markdown";
  }
  if (lower.endsWith(".sarif") || lower.endsWith(".sarif.json")) {
    return "sarif";
  }
  if (lower.endsWith(".txt")) {
    return "text";
  }
  return undefined;
}

export function toJsonReport(report: ComplianceReport): object {
  return {
    tool: "pipewarden",
    catalogVersion: report.catalogVersion,
    scannedDocuments: report.scannedDocuments,
    incomplete: report.incomplete,
    posture: report.posture,
    categories: report.categories.map((category) => ({
      id: category.id,
      key: category.key,
      name: category.name,
      status: category.status,
      counts: category.counts,
    })),
    findings: report.findings.map(jsonFinding),
    ignored: report.ignored.map((entry) => ({
      ...jsonFinding(entry.finding),
      reason: entry.reason,
      annotationLine: entry.annotationLine,
    })),
  };
}

function jsonFinding(finding: Finding): object {
  return {
    ruleId: finding.ruleId,
    category: finding.category,
    severity: finding.severity,
    title: finding.title,
    path: finding.path,
    location: {
      path: finding.location.path,
      line: finding.location.line,
      start: finding.location.start,
      end: finding.location.end,
    },
    message: finding.message,
    remediation: finding.remediation,
  };
}

export function formatText(report: ComplianceReport, options: TerminalOptions = {}): string {
  const color = options.color ?? false;
  const lines: string[] = [];
  const total = report.findings.length;

  lines.push("pipewarden compliance report");
  lines.push("============================");
  lines.push(`Catalog       : ${report.catalogVersion}`);
  lines.push(`Documents     : ${report.scannedDocuments}`);
  lines.push(`Posture       : ${paintStatus(report.posture, color)}`);
  lines.push(`Findings      : ${total}${severityBreakdown(report.findings)}`);
  if (report.ignored.length > 0) {
    lines.push(`Ignored       : ${report.ignored.length}`);
  }
  if (report.incomplete) {
    lines.push("Incomplete    : evaluation stopped before every rule ran");
  }
  lines.push("");

  lines.push("Risk categories");
  lines.push("---------------");
  for (const category of report.categories) {
    lines.push(`${category.key.padEnd(12)} ${paintStatus(category.status, color).padEnd(statusWidth(color))} ${category.name}`);
  }

  if (total === 0) {
    lines.push("");
    lines.push("No findings.");
    return lines.join("\n");
  }

  const limit = options.limit ?? Number.POSITIVE_INFINITY;
  let shown = 0;
  for (const category of categoriesWorstFirst(report.categories)) {
    const findings = report.findings.filter((finding) => finding.category === category.id);
    if (findings.length === 0 || shown >= limit) {
      continue;
    }
    lines.push("");
    lines.push(`${category.key} ${category.name} (${category.status})`);
    for (const finding of findings) {
      if (shown >= limit) {
        break;
      }
      shown += 1;
      lines.push(`  ${paintSeverity(finding.severity, color)} ${finding.ruleId} ${finding.path}:${finding.location.line}`);
      lines.push(`    ${finding.message}`);
      lines.push(`    at ${finding.location.path}`);
      lines.push(`    Fix: ${finding.remediation}`);
    }
  }

  if (shown < total) {
    lines.push("");
    lines.push(`Showing ${shown} of ${total} findings. Use --output to export the full report.`);
  }

  return lines.join("\n");
}

/** Short summary for the terminal when the full report goes to a file. */
export function formatTerminalReport(report: ComplianceReport, options: TerminalOptions = {}): string {
  return formatText(report, { limit: options.limit ?? 5, color: options.color });
}

function formatMarkdown(report: ComplianceReport): string {
  const lines: string[] = [];

  lines.push("# pipewarden compliance report");
  lines.push("");
  lines.push(`- Catalog: ${report.catalogVersion}`);
  lines.push(`- Documents scanned: ${report.scannedDocuments}`);
  lines.push(`- Posture: **${report.posture}**`);
  lines.push(`- Findings: ${report.findings.length}`);
  if (report.incomplete) {
    lines.push("- Evaluation was incomplete: the deadline passed before every rule ran.");
  }
  lines.push("");

  lines.push("## Risk categories");
  lines.push("");
  lines.push("| Category | Name | Status | Critical | High | Medium | Low | Info |");
  lines.push("|---|---|---|---|---|---|---|---|");
  for (const category of report.categories) {
    const { counts } = category;
    lines.push(
      `| ${category.key} | ${category.name} | ${category.status} | ${counts.critical} | ${counts.high} | ${counts.medium} | ${counts.low} | ${counts.info} |`,
    );
  }

  for (const category of categoriesWorstFirst(report.categories)) {
    const findings = report.findings.filter((finding) => finding.category === category.id);
    if (findings.length === 0) {
      continue;
    }
    lines.push("");
    lines.push(`## ${category.key}: ${category.name}`);
    for (const finding of findings) {
      lines.push("");
      lines.push(`### ${severityLabel(finding.severity)} ${finding.ruleId}: ${finding.title}`);
      lines.push("");
      lines.push(`- Location: \`${finding.path}:${finding.location.line}\` (\`${finding.location.path}\`)`);
      lines.push(`- ${escapeMarkdown(finding.message)}`);
      lines.push(`- Fix: ${escapeMarkdown(finding.remediation)}`);
    }
  }

  if (report.ignored.length > 0) {
    lines.push("");
    lines.push("## Ignored findings");
    lines.push("");
    for (const entry of report.ignored) {
      lines.push(
        `- ${entry.finding.ruleId} \`${entry.finding.path}:${entry.finding.location.line}\`: ${escapeMarkdown(entry.reason)} (annotation on line ${entry.annotationLine})`,
      );
    }
  }

  lines.push("");
  return lines.join("\n");
}

const STATUS_RANK: Record<ComplianceStatus, number> = {
  NonCompliant: 2,
  PartiallyCompliant: 1,
  Compliant: 0,
};

function categoriesWorstFirst(categories: readonly RiskScore[]): RiskScore[] {
  return [...categories].sort((a, b) => STATUS_RANK[b.status] - STATUS_RANK[a.status] || a.id - b.id);
}

function severityBreakdown(findings: readonly Finding[]): string {
  if (findings.length === 0) {
    return "";
  }
  const counts = new Map<Severity, number>();
  for (const finding of findings) {
    counts.set(finding.severity, (counts.get(finding.severity) ?? 0) + 1);
  }
  const parts = [...counts.entries()]
    .sort(([a], [b]) => severityRank(b) - severityRank(a))
    .map(([severity, count]) => `${severityLabel(severity)} ${count}`);
  return ` (${parts.join(" | ")})`;
}

export function severityLabel(severity: Severity): string {
  switch (severity) {
    case "critical":
      return "CRITICAL";
    case "high":
      return "HIGH";
    case "medium":
      return "MEDIUM";
    case "low":
      return "LOW";
    default:
      return "INFO";
  }
}

function paintSeverity(severity: Severity, color: boolean): string {
  const label = `[${severityLabel(severity)}]`;
  if (!color) {
    return label;
  }
  switch (severity) {
    case "critical":
      return kleur.bold().red(label);
    case "high":
      return kleur.red(label);
    case "medium":
      return kleur.yellow(label);
    case "low":
      return kleur.cyan(label);
    default:
      return kleur.gray(label);
  }
}

function paintStatus(status: ComplianceStatus, color: boolean): string {
  if (!color) {
    return status;
  }
  switch (status) {
    case "NonCompliant":
      return kleur.red(status);
    case "PartiallyCompliant":
      return kleur.yellow(status);
    default:
      return kleur.green(status);
  }
}

/** Pads to the widest status; ANSI escapes add ten invisible characters. */
function statusWidth(color: boolean): number {
  return "PartiallyCompliant".length + (color ? 10 : 0);
}

function escapeMarkdown(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

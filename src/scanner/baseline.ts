import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { Finding } from "./types.js";
import { ConfigError, describeError } from "./errors.js";
import { severityRank } from "./filters.js";

export const BASELINE_SCHEMA = "pipewarden-baseline/v1";

const BaselineEntrySchema = z.object({
  ruleId: z.string(),
  path: z.string(),
  location: z.string(),
  severity: z.enum(["info", "low", "medium", "high", "critical"]),
});

const BaselineFileSchema = z.object({
  schema: z.literal(BASELINE_SCHEMA),
  createdAt: z.string().optional(),
  findings: z.array(BaselineEntrySchema),
});

export type BaselineEntry = z.infer<typeof BaselineEntrySchema>;
export type BaselineFile = z.infer<typeof BaselineFileSchema>;

export interface BaselineResult {
  created: boolean;
  baselinePath: string;
  baselineCount: number;
  /** Findings not in the baseline, or whose severity went up. */
  findings: Finding[];
  unchangedCount: number;
}

export function applyBaseline(filePath: string, findings: readonly Finding[]): BaselineResult {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    writeBaseline(resolved, findings);
    return {
      created: true,
      baselinePath: resolved,
      baselineCount: findings.length,
      findings: [...findings],
      unchangedCount: 0,
    };
  }

  const baseline = readBaseline(resolved);
  return {
    created: false,
    baselinePath: resolved,
    baselineCount: baseline.findings.length,
    ...diffAgainstBaseline(baseline, findings),
  };
}

export function diffAgainstBaseline(
  baseline: BaselineFile,
  findings: readonly Finding[],
): { findings: Finding[]; unchangedCount: number } {
  const baselineByKey = new Map<string, BaselineEntry>();
  for (const entry of baseline.findings) {
    baselineByKey.set(baselineKey(entry.ruleId, entry.path, entry.location), entry);
  }

  const diff = findings.filter((finding) => {
    const previous = baselineByKey.get(baselineKey(finding.ruleId, finding.path, finding.location.path));
    if (!previous) {
      return true;
    }
    return severityRank(finding.severity) > severityRank(previous.severity);
  });

  return { findings: diff, unchangedCount: findings.length - diff.length };
}

export function toBaselineFile(findings: readonly Finding[], createdAt = new Date().toISOString()): BaselineFile {
  return {
    schema: BASELINE_SCHEMA,
    createdAt,
    findings: findings
      .map((finding) => ({
        ruleId: finding.ruleId,
        path: finding.path,
        location: finding.location.path,
        severity: finding.severity,
      }))
      .sort((a, b) => {
        const keyA = baselineKey(a.ruleId, a.path, a.location);
        const keyB = baselineKey(b.ruleId, b.path, b.location);
        return keyA < keyB ? -1 : keyA > keyB ? 1 : 0;
      }),
  };
}

function writeBaseline(filePath: string, findings: readonly Finding[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(toBaselineFile(findings), null, 2)}\n`, "utf-8");
}

function readBaseline(filePath: string): BaselineFile {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Could not read baseline "${filePath}": ${describeError(error)}`, { cause: error });
  }
  const parsed = BaselineFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid baseline file "${filePath}". Expected schema "${BASELINE_SCHEMA}".`);
  }
  return parsed.data;
}

function baselineKey(ruleId: string, filePath: string, location: string): string {
  return `${ruleId}|${filePath.replace(/\\/g, "/")}|${location}`;
}

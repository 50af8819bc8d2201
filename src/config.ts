import fs from "node:fs/promises";
import path from "node:path";
import { YAMLException, load } from "js-yaml";
import { z } from "zod";
import { ConfigError, describeError } from "./scanner/errors.js";
import type { StatusPolicy } from "./scanner/aggregator.js";
import { DEFAULT_POLICY } from "./scanner/aggregator.js";
import { severityRank, type FailOn } from "./scanner/filters.js";

export const CONFIG_FILE_NAMES = [".pipewarden.yml", ".pipewarden.yaml"];

export const REPORT_FORMATS = ["json", "text", "markdown", "sarif"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

const SeveritySchema = z.enum(["info", "low", "medium", "high", "critical"]);

const DURATION = /^(\d+)(ms|s|m)?$/;

/** `500ms`, `30s`, `2m`, or bare milliseconds. */
export function parseDuration(value: string | number): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value > 0 ? value : undefined;
  }
  const match = DURATION.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const amount = Number(match[1]);
  const unit = match[2] ?? "ms";
  const milliseconds = unit === "m" ? amount * 60_000 : unit === "s" ? amount * 1000 : amount;
  return milliseconds > 0 ? milliseconds : undefined;
}

const ConfigSchema = z
  .object({
    failOn: z.union([SeveritySchema, z.literal("none")]).optional(),
    format: z.enum(REPORT_FORMATS).optional(),
    timeout: z
      .union([z.string(), z.number()])
      .transform((value, context) => {
        const parsed = parseDuration(value);
        if (parsed === undefined) {
          context.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration "${value}"` });
          return z.NEVER;
        }
        return parsed;
      })
      .optional(),
    include: z.array(z.string().min(1)).optional(),
    exclude: z.array(z.string().min(1)).optional(),
    rules: z.array(z.string().min(1)).optional(),
    disable: z.array(z.string().min(1)).optional(),
    catalog: z.string().min(1).optional(),
    policy: z
      .object({
        nonCompliantAt: SeveritySchema.optional(),
        partialAt: SeveritySchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof ConfigSchema>;

export interface ScanSettings {
  failOn: FailOn;
  format: ReportFormat;
  timeoutMs?: number;
  include: string[];
  exclude: string[];
  rules: string[];
  disable: string[];
  catalogPath?: string;
  policy: StatusPolicy;
}

export const DEFAULT_SETTINGS: ScanSettings = {
  failOn: "high",
  format: "text",
  include: [],
  exclude: [],
  rules: [],
  disable: [],
  policy: DEFAULT_POLICY,
};

export function parseConfig(source: string, sourceName: string): FileConfig {
  let raw: unknown;
  try {
    raw = load(source, { filename: sourceName });
  } catch (error) {
    const reason = error instanceof YAMLException ? error.message : describeError(error);
    throw new ConfigError(`Could not parse config ${sourceName}: ${reason}`, { cause: error });
  }
  if (raw === undefined || raw === null) {
    return {};
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid config ${sourceName}: ${problems.join("; ")}`);
  }
  const config = parsed.data;
  const nonCompliantAt = config.policy?.nonCompliantAt ?? DEFAULT_POLICY.nonCompliantAt;
  const partialAt = config.policy?.partialAt ?? DEFAULT_POLICY.partialAt;
  if (severityRank(partialAt) > severityRank(nonCompliantAt)) {
    throw new ConfigError(
      `Invalid config ${sourceName}: policy.partialAt (${partialAt}) is above policy.nonCompliantAt (${nonCompliantAt})`,
    );
  }
  return config;
}

/**
 * Reads `explicitPath`, or the first `.pipewarden.yml` found in the scan root.
 * Paths inside the file (catalog) resolve against the file's directory.
 */
export async function loadConfig(
  rootPath: string,
  explicitPath?: string,
): Promise<{ config: FileConfig; path?: string }> {
  const candidates = explicitPath
    ? [path.resolve(explicitPath)]
    : CONFIG_FILE_NAMES.map((name) => path.join(path.resolve(rootPath), name));

  for (const candidate of candidates) {
    let source: string;
    try {
      source = await fs.readFile(candidate, "utf-8");
    } catch (error) {
      if (explicitPath) {
        throw new ConfigError(`Could not read config ${candidate}: ${describeError(error)}`, { cause: error });
      }
      continue;
    }
    const config = parseConfig(source, candidate);
    if (config.catalog) {
      config.catalog = path.resolve(path.dirname(candidate), config.catalog);
    }
    return { config, path: candidate };
  }

  return { config: {} };
}

export type SettingsOverrides = Partial<Omit<ScanSettings, "policy">>;

/** Flags override the config file; the config file overrides defaults. */
export function resolveSettings(config: FileConfig, overrides: SettingsOverrides = {}): ScanSettings {
  const pick = <T>(flag: T | undefined, fromFile: T | undefined, fallback: T): T => flag ?? fromFile ?? fallback;
  const pickList = (flag: string[] | undefined, fromFile: string[] | undefined): string[] =>
    flag && flag.length > 0 ? flag : fromFile ?? [];

  const policy: StatusPolicy = {
    nonCompliantAt: config.policy?.nonCompliantAt ?? DEFAULT_POLICY.nonCompliantAt,
    partialAt: config.policy?.partialAt ?? DEFAULT_POLICY.partialAt,
  };

  return {
    failOn: pick<FailOn>(overrides.failOn, config.failOn, DEFAULT_SETTINGS.failOn),
    format: pick<ReportFormat>(overrides.format, config.format, DEFAULT_SETTINGS.format),
    timeoutMs: overrides.timeoutMs ?? config.timeout,
    include: pickList(overrides.include, config.include),
    exclude: [...(config.exclude ?? []), ...(overrides.exclude ?? [])],
    rules: pickList(overrides.rules, config.rules),
    disable: [...(config.disable ?? []), ...(overrides.disable ?? [])],
    catalogPath: overrides.catalogPath ?? config.catalog,
    policy,
  };
}

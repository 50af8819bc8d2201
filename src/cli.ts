import fs from "node:fs/promises";
import path from "node:path";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import kleur from "kleur";
import { loadConfig, parseDuration, REPORT_FORMATS, resolveSettings, type ReportFormat } from "./config.js";
import { scanRepository, resolveCatalog } from "./scanner/scan.js";
import { formatForPath, formatReport, formatTerminalReport } from "./scanner/reporter.js";
import { breachesThreshold, parseSeverityName, type FailOn } from "./scanner/filters.js";
import { CatalogExplainer, formatExplanation } from "./scanner/explainer.js";
import { describeError } from "./scanner/errors.js";
import { ConsoleLogger, type LogSink } from "./utils/logger.js";

export const EXIT_OK = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_FATAL = 2;

export interface CliIo {
  stdout: LogSink;
  stderr: LogSink;
  color: boolean;
  /** Aborting stops evaluation; the scan still reports what it found. */
  signal?: AbortSignal;
}

function processIo(): CliIo {
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    color: Boolean(process.stdout.isTTY) && kleur.enabled,
    signal: controller.signal,
  };
}

function parseFailOn(value: string): FailOn {
  const normalized = value.trim().toLowerCase();
  if (normalized === "none") {
    return "none";
  }
  const severity = parseSeverityName(normalized);
  if (!severity) {
    throw new InvalidArgumentError("Expected one of: info, low, medium, high, critical, none.");
  }
  return severity;
}

function parseFormat(value: string): ReportFormat {
  const normalized = value.trim().toLowerCase();
  const format = REPORT_FORMATS.find((candidate) => candidate === normalized);
  if (!format) {
    throw new InvalidArgumentError(`Expected one of: ${REPORT_FORMATS.join(", ")}.`);
  }
  return format;
}

function parseTimeout(value: string): number {
  const milliseconds = parseDuration(value);
  if (milliseconds === undefined) {
    throw new InvalidArgumentError("Expected a duration such as 500ms, 30s, 2m, or milliseconds.");
  }
  return milliseconds;
}

function parseRuleList(value: string): string[] {
  const rules = value
    .split(",")
    .map((rule) => rule.trim())
    .filter((rule) => rule.length > 0);
  if (rules.length === 0) {
    throw new InvalidArgumentError("Provide a comma-separated list of rule ids.");
  }
  return rules;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

interface ScanCommandOptions {
  format?: ReportFormat;
  failOn?: FailOn;
  timeout?: number;
  include: string[];
  exclude: string[];
  rules?: string[];
  config?: string;
  catalog?: string;
  output?: string;
  baseline?: string;
  debug?: boolean;
}

/** Runs the CLI against `args` (without the node and script entries) and resolves to the exit code. */
export async function runCli(args: string[], io: CliIo = processIo()): Promise<number> {
  let exitCode = EXIT_OK;
  const program = new Command();

  program
    .name("pipewarden")
    .description("Check CI/CD pipelines and Terraform against the OWASP Top 10 CI/CD Security Risks")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    })
    .addHelpText(
      "after",
      "\nIgnore annotations:\n  # pipewarden-ignore <RULE_ID>: <reason>\nIgnores the next matching finding below it and lists it under ignored findings.\n",
    );

  program
    .command("scan")
    .description("Scan a repository tree and report compliance per risk category")
    .argument("<root>", "Repository root to scan")
    .option("-f, --format <format>", `Report format: ${REPORT_FORMATS.join(" | ")}`, parseFormat)
    .option("--fail-on <severity>", "Exit 1 when a finding is at or above: info | low | medium | high | critical | none", parseFailOn)
    .option("--timeout <duration>", "Stop evaluating after this long (500ms, 30s, 2m)", parseTimeout)
    .option("--include <glob>", "Only scan files matching this glob (repeatable)", collect, [])
    .option("--exclude <glob>", "Skip files matching this glob (repeatable)", collect, [])
    .option("-r, --rules <ids>", "Comma-separated rule ids or families (SEC-4)", parseRuleList)
    .option("-c, --config <file>", "Config file (default: .pipewarden.yml in the root)")
    .option("--catalog <file>", "Rule catalog to use instead of the bundled one")
    .option("-o, --output <file>", "Write the full report to a file (.json, .md, .sarif, .txt)")
    .option("--baseline <file>", "Report only findings that are new or worse than the baseline")
    .option("--debug", "Log discovery and evaluation details to stderr")
    .action(async (root: string, options: ScanCommandOptions) => {
      exitCode = await runScan(root, options, io);
    });

  program
    .command("explain")
    .description("Explain a rule and how to fix it")
    .argument("<rule_id>", "Rule id to explain")
    .option("--catalog <file>", "Rule catalog to use instead of the bundled one")
    .action(async (ruleId: string, options: { catalog?: string }) => {
      const catalog = await resolveCatalog({ catalogPath: options.catalog });
      const explanation = new CatalogExplainer(catalog).explain(ruleId);
      if (!explanation) {
        io.stderr.write(`pipewarden: unknown rule id "${ruleId}". Run "pipewarden rules" to list them.\n`);
        exitCode = EXIT_FATAL;
        return;
      }
      io.stdout.write(formatExplanation(explanation));
    });

  program
    .command("rules")
    .description("List the rules in the catalog")
    .option("--catalog <file>", "Rule catalog to use instead of the bundled one")
    .action(async (options: { catalog?: string }) => {
      const catalog = await resolveCatalog({ catalogPath: options.catalog });
      const lines = [`Catalog ${catalog.version}`, ""];
      for (const category of catalog.categories) {
        lines.push(`${category.key} ${category.name}`);
        for (const rule of catalog.rules.filter((entry) => entry.category === category.id && !entry.system)) {
          lines.push(`  ${rule.id.padEnd(38)} ${rule.severity.padEnd(9)} ${rule.formats.join(", ")}`);
        }
      }
      io.stdout.write(`${lines.join("\n")}\n`);
    });

  try {
    await program.parseAsync(args, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version exit cleanly; commander has already printed anything else.
      return error.exitCode === 0 ? EXIT_OK : EXIT_FATAL;
    }
    io.stderr.write(`pipewarden: ${describeError(error)}\n`);
    return EXIT_FATAL;
  }

  return exitCode;
}

async function runScan(root: string, options: ScanCommandOptions, io: CliIo): Promise<number> {
  const logger = new ConsoleLogger({
    level: options.debug ? "debug" : "warn",
    sink: io.stderr,
    color: io.color,
  });

  const { config, path: configPath } = await loadConfig(root, options.config);
  if (configPath) {
    logger.debug("Loaded config", { path: configPath });
  }
  const settings = resolveSettings(config, {
    failOn: options.failOn,
    format: options.format,
    timeoutMs: options.timeout,
    include: options.include,
    exclude: options.exclude,
    rules: options.rules,
    catalogPath: options.catalog,
  });

  const result = await scanRepository(root, {
    catalogPath: settings.catalogPath,
    rules: settings.rules,
    disable: settings.disable,
    include: settings.include,
    exclude: settings.exclude,
    timeoutMs: settings.timeoutMs,
    signal: io.signal,
    policy: settings.policy,
    baselinePath: options.baseline,
    logger,
  });
  const { report, catalog } = result;

  if (result.baseline?.created) {
    logger.warn("Baseline created; later runs report only new or regressed findings", {
      path: result.baseline.baselinePath,
    });
  }
  if (report.incomplete) {
    logger.warn("Report is incomplete: evaluation stopped before every rule ran", { evaluated: result.evaluated });
  }

  if (options.output) {
    const outputFormat = formatForPath(options.output) ?? settings.format;
    const resolved = path.resolve(options.output);
    await fs.mkdir(path.dirname(resolved), { recursive: true });
    await fs.writeFile(resolved, formatReport(report, outputFormat, { catalog }), "utf-8");
    io.stdout.write(`${formatTerminalReport(report, { color: io.color })}\n\nFull report written to: ${resolved}\n`);
  } else {
    io.stdout.write(formatReport(report, settings.format, { catalog, color: io.color }));
  }

  logger.debug("Scan finished", {
    documents: report.scannedDocuments,
    skipped: result.skippedFiles.length,
    findings: report.findings.length,
    failOn: settings.failOn,
  });

  return breachesThreshold(report.findings, settings.failOn) ? EXIT_FINDINGS : EXIT_OK;
}

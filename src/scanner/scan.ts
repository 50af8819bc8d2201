import type { ComplianceReport } from "./types.js";
import { loadCatalogFile, loadDefaultCatalog, type Catalog } from "./catalog.js";
import { loadDocuments, type TerraformParser } from "./loader.js";
import { evaluate, loaderFindings } from "./evaluator.js";
import { aggregate, DEFAULT_POLICY, type StatusPolicy } from "./aggregator.js";
import { applyIgnoreDirectives } from "./ignores.js";
import { applyBaseline, type BaselineResult } from "./baseline.js";
import type { LoadError, TimeoutError } from "./errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export interface ScanOptions {
  /** Prebuilt catalog; otherwise `catalogPath` or the bundled catalog is loaded. */
  catalog?: Catalog;
  catalogPath?: string;
  rules?: readonly string[];
  disable?: readonly string[];
  include?: string[];
  exclude?: string[];
  timeoutMs?: number;
  signal?: AbortSignal;
  policy?: StatusPolicy;
  baselinePath?: string;
  logger?: Logger;
  terraformParser?: TerraformParser;
}

export interface ScanResult {
  report: ComplianceReport;
  catalog: Catalog;
  scannedFiles: string[];
  skippedFiles: string[];
  loadErrors: LoadError[];
  evaluated: number;
  timeout?: TimeoutError;
  baseline?: BaselineResult;
}

export async function resolveCatalog(options: Pick<ScanOptions, "catalog" | "catalogPath" | "rules" | "disable">): Promise<Catalog> {
  const base =
    options.catalog ?? (options.catalogPath ? await loadCatalogFile(options.catalogPath) : await loadDefaultCatalog());
  if ((options.rules?.length ?? 0) === 0 && (options.disable?.length ?? 0) === 0) {
    return base;
  }
  return base.select({ only: options.rules, disable: options.disable });
}

/** Loader → evaluator → ignore directives → baseline → aggregator. */
export async function scanRepository(rootPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const logger = options.logger ?? silentLogger;
  const deadline = options.timeoutMs !== undefined ? Date.now() + options.timeoutMs : undefined;
  const catalog = await resolveCatalog(options);
  logger.debug("Catalog ready", { version: catalog.version, rules: catalog.rules.length });

  const loaded = await loadDocuments(rootPath, {
    include: options.include,
    exclude: options.exclude,
    logger,
    terraformParser: options.terraformParser,
  });
  for (const skipped of loaded.skipped) {
    logger.debug("Skipping file with no recognized pipeline format", { path: skipped });
  }

  const evaluation = await evaluate(loaded.documents, catalog, {
    deadline,
    signal: options.signal,
    logger,
  });

  const findings = [...loaderFindings(loaded.errors, catalog), ...evaluation.findings];
  const { active, ignored } = applyIgnoreDirectives(findings, loaded.documents);
  if (ignored.length > 0) {
    logger.debug("Findings suppressed by ignore directives", { count: ignored.length });
  }

  let reported = active;
  let baseline: BaselineResult | undefined;
  if (options.baselinePath) {
    baseline = applyBaseline(options.baselinePath, active);
    reported = baseline.findings;
    logger.debug(baseline.created ? "Baseline created" : "Baseline applied", {
      path: baseline.baselinePath,
      unchanged: baseline.unchangedCount,
    });
  }

  const report = aggregate(reported, {
    catalog,
    scannedDocuments: loaded.documents.length,
    incomplete: evaluation.incomplete,
    policy: options.policy ?? DEFAULT_POLICY,
    ignored,
  });

  return {
    report,
    catalog,
    scannedFiles: loaded.documents.map((document) => document.path),
    skippedFiles: loaded.skipped,
    loadErrors: loaded.errors,
    evaluated: evaluation.evaluated,
    timeout: evaluation.timeout,
    baseline,
  };
}

export * from "./scanner/types.js";
export * from "./scanner/errors.js";
export {
  loadDocuments,
  detectFormat,
  createDocument,
  parseSourceDocument,
  hcl2jsonParser,
  DEFAULT_INCLUDE,
  type LoadOptions,
  type LoadResult,
  type TerraformParser,
} from "./scanner/loader.js";
export {
  createCatalog,
  loadCatalog,
  loadCatalogFile,
  loadDefaultCatalog,
  LOADER_RULE_ID,
  EVAL_RULE_ID,
  type Catalog,
  type CatalogDefinition,
  type RuleSelection,
} from "./scanner/catalog.js";
export { PREDICATES, AVAILABLE_PREDICATE_REFS, type PredicateRegistry } from "./scanner/rules/index.js";
export { evaluate, sortFindings, type EvaluateOptions, type EvaluationResult } from "./scanner/evaluator.js";
export { aggregate, DEFAULT_POLICY, type AggregateOptions, type StatusPolicy } from "./scanner/aggregator.js";
export { formatReport, formatText, formatTerminalReport } from "./scanner/reporter.js";
export { buildSarifLog, type SarifLog } from "./scanner/sarif.js";
export { applyIgnoreDirectives, parseIgnoreDirectives } from "./scanner/ignores.js";
export { applyBaseline, BASELINE_SCHEMA, type BaselineResult } from "./scanner/baseline.js";
export { CatalogExplainer, formatExplanation } from "./scanner/explainer.js";
export { scanRepository, type ScanOptions, type ScanResult } from "./scanner/scan.js";
export { loadConfig, parseConfig, resolveSettings, parseDuration, type ReportFormat, type ScanSettings } from "./config.js";
export { ConsoleLogger, silentLogger, type Logger, type LogLevel } from "./utils/logger.js";
export { runCli } from "./cli.js";

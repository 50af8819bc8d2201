import type { Finding, FindingLocation, RuleDefinition, RuleMatch, SourceDocument } from "./types.js";
import type { Catalog } from "./catalog.js";
import { EVAL_RULE_ID, LOADER_RULE_ID } from "./catalog.js";
import { EvalError, ReportIntegrityError, TimeoutError, type LoadError } from "./errors.js";
import { formatPath } from "../utils/tree.js";
import { drainQueue } from "../utils/pool.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { severityRank } from "./filters.js";

export interface EvaluateOptions {
  /** Epoch milliseconds after which remaining tasks are skipped. */
  deadline?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface EvaluationResult {
  findings: Finding[];
  incomplete: boolean;
  /** (document, rule) pairs that ran. */
  evaluated: number;
  timeout?: TimeoutError;
  failures: EvalError[];
}

interface Task {
  document: SourceDocument;
  rule: RuleDefinition;
}

export async function evaluate(
  documents: readonly SourceDocument[],
  catalog: Catalog,
  options: EvaluateOptions = {},
): Promise<EvaluationResult> {
  const logger = options.logger ?? silentLogger;
  const tasks: Task[] = documents.flatMap((document) =>
    catalog.rulesFor(document.format).map((rule) => ({ document, rule })),
  );

  const findings: Finding[] = [];
  const failures: EvalError[] = [];
  const expired = (): boolean =>
    (options.signal?.aborted ?? false) || (options.deadline !== undefined && Date.now() >= options.deadline);

  const { started, skipped } = await drainQueue(
    tasks,
    ({ document, rule }) => {
      try {
        const matches = rule.predicate(document, { ruleId: rule.id });
        for (const found of matches) {
          findings.push(findingFromMatch(rule, document, found));
        }
      } catch (error) {
        const failure = new EvalError(rule.id, document.path, { cause: error });
        logger.warn(failure.message, { rule: rule.id, path: document.path });
        failures.push(failure);
        findings.push(evalFailureFinding(catalog, failure, document));
      }
    },
    // Predicates are synchronous; one lane with yields lets timers and aborts land between tasks.
    { lanes: 1, shouldStop: expired, yieldBetween: true },
  );

  let timeout: TimeoutError | undefined;
  if (skipped > 0) {
    timeout = new TimeoutError(skipped);
    logger.warn(timeout.message, { evaluated: started, skipped });
  }
  logger.debug("Evaluation finished", { documents: documents.length, tasks: tasks.length, evaluated: started });

  return {
    findings: sortFindings(findings),
    incomplete: skipped > 0,
    evaluated: started,
    timeout,
    failures,
  };
}

export function findingFromMatch(rule: RuleDefinition, document: SourceDocument, found: RuleMatch): Finding {
  const span = found.node.span;
  const location: FindingLocation = {
    path: formatPath(found.node.path),
    line: span?.line ?? 1,
    start: span?.start ?? 0,
    end: span?.end ?? 0,
  };
  return Object.freeze({
    ruleId: rule.id,
    category: rule.category,
    severity: rule.severity,
    title: rule.title,
    path: document.path,
    location: Object.freeze(location),
    message: found.message,
    remediation: rule.remediation,
  });
}

function systemRule(catalog: Catalog, ruleId: string): RuleDefinition {
  const rule = catalog.get(ruleId);
  if (!rule) {
    throw new ReportIntegrityError(`Catalog ${catalog.version} has no system rule ${ruleId}`);
  }
  return rule;
}

/** Prefix of structural paths that anchor a finding to the whole document. */
export const DOCUMENT_ROOT = "$";

export function isDocumentLevel(location: FindingLocation): boolean {
  return location.path === DOCUMENT_ROOT || location.path.startsWith(`${DOCUMENT_ROOT}#`);
}

function documentLevelFinding(rule: RuleDefinition, path: string, message: string, anchor = DOCUMENT_ROOT): Finding {
  return Object.freeze({
    ruleId: rule.id,
    category: rule.category,
    severity: rule.severity,
    title: rule.title,
    path,
    location: Object.freeze({ path: anchor, line: 1, start: 0, end: 0 }),
    message,
    remediation: rule.remediation,
  });
}

/** Anchored at `$#<rule id>` so failures of different rules on one document stay distinct. */
function evalFailureFinding(catalog: Catalog, failure: EvalError, document: SourceDocument): Finding {
  return documentLevelFinding(
    systemRule(catalog, EVAL_RULE_ID),
    document.path,
    failure.message,
    `${DOCUMENT_ROOT}#${failure.ruleId}`,
  );
}

/** One LOADER-0 finding per file that could not be read or parsed. */
export function loaderFindings(errors: readonly LoadError[], catalog: Catalog): Finding[] {
  const rule = systemRule(catalog, LOADER_RULE_ID);
  return errors.map((error) =>
    documentLevelFinding(rule, error.path, `${error.kind}: ${error.message}`),
  );
}

/** Severity desc, category asc, path asc, then rule id, line and structural location. */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    severityRank(b.severity) - severityRank(a.severity) ||
    a.category - b.category ||
    compareText(a.path, b.path) ||
    compareText(a.ruleId, b.ruleId) ||
    a.location.line - b.location.line ||
    a.location.start - b.location.start ||
    compareText(a.location.path, b.location.path) ||
    compareText(a.message, b.message)
  );
}

function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(compareFindings);
}

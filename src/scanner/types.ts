export type Severity = "info" | "low" | "medium" | "high" | "critical";

export const SEVERITIES: readonly Severity[] = ["info", "low", "medium", "high", "critical"];

export type DocumentFormat =
  | "github-actions"
  | "gitlab-ci"
  | "azure-pipelines"
  | "terraform";

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = [
  "github-actions",
  "gitlab-ci",
  "azure-pipelines",
  "terraform",
];

export type RiskCategory = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10;

export const RISK_CATEGORIES: readonly RiskCategory[] = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];

export type PathSegment = string | number;

/** Byte range of a node in its source file. `line` is 1-based. */
export interface Span {
  start: number;
  end: number;
  line: number;
}

interface NodeBase {
  path: readonly PathSegment[];
  span?: Span;
}

export interface MappingEntry {
  key: string;
  value: TreeNode;
}

export interface MappingNode extends NodeBase {
  kind: "mapping";
  entries: readonly MappingEntry[];
}

export interface SequenceNode extends NodeBase {
  kind: "sequence";
  items: readonly TreeNode[];
}

export type ScalarValue = string | number | boolean | null;

export interface ScalarNode extends NodeBase {
  kind: "scalar";
  value: ScalarValue;
}

export type TreeNode = MappingNode | SequenceNode | ScalarNode;

export interface SourceDocument {
  path: string;
  format: DocumentFormat;
  root: TreeNode;
  text: string;
}

export interface FindingLocation {
  /** Structural path, e.g. `jobs.build.steps[1].uses`. */
  path: string;
  line: number;
  start: number;
  end: number;
}

export interface Finding {
  ruleId: string;
  category: RiskCategory;
  severity: Severity;
  title: string;
  path: string;
  location: FindingLocation;
  message: string;
  remediation: string;
}

export interface RuleMatch {
  node: TreeNode;
  message: string;
}

export interface PredicateContext {
  ruleId: string;
}

export type RulePredicate = (
  document: SourceDocument,
  context: PredicateContext,
) => RuleMatch[];

export interface RuleDefinition {
  id: string;
  category: RiskCategory;
  severity: Severity;
  formats: readonly DocumentFormat[];
  title: string;
  description: string;
  remediation: string;
  example?: string;
  predicateRef: string;
  predicate: RulePredicate;
  /** Engine-emitted rules (load and evaluation failures); never evaluated against documents. */
  system: boolean;
}

export interface CategoryInfo {
  id: RiskCategory;
  key: string;
  name: string;
}

export type ComplianceStatus = "Compliant" | "PartiallyCompliant" | "NonCompliant";

export interface RiskScore {
  id: RiskCategory;
  key: string;
  name: string;
  status: ComplianceStatus;
  counts: Record<Severity, number>;
}

export interface ComplianceReport {
  catalogVersion: string;
  scannedDocuments: number;
  incomplete: boolean;
  posture: ComplianceStatus;
  categories: RiskScore[];
  findings: Finding[];
  ignored: IgnoredFinding[];
}

export interface IgnoredFinding {
  finding: Finding;
  reason: string;
  annotationLine: number;
}

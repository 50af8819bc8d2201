import fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { YAMLException, load } from "js-yaml";
import { z } from "zod";
import {
  DOCUMENT_FORMATS,
  RISK_CATEGORIES,
  type CategoryInfo,
  type DocumentFormat,
  type RiskCategory,
  type RuleDefinition,
} from "./types.js";
import { CatalogError, describeError } from "./errors.js";
import { PREDICATES, type PredicateRegistry } from "./rules/index.js";

export const LOADER_RULE_ID = "LOADER-0";
export const EVAL_RULE_ID = "EVAL-0";

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("../../catalog/cicd-top10.yml", import.meta.url));

const CategorySchema = z.object({
  id: z.number().int(),
  key: z.string().min(1),
  name: z.string().min(1),
});

const RuleSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "rule ids use letters, digits, dots and dashes"),
  category: z.number().int(),
  severity: z.enum(["info", "low", "medium", "high", "critical"]),
  formats: z.array(z.enum(["github-actions", "gitlab-ci", "azure-pipelines", "terraform"])).min(1),
  predicate_ref: z.string().min(1),
  title: z.string().min(1),
  description: z.string().min(1),
  remediation: z.string().min(1),
  example: z.string().optional(),
});

const CatalogSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String),
  categories: z.array(CategorySchema),
  rules: z.array(RuleSchema).min(1),
});

export type CatalogDefinition = z.input<typeof CatalogSchema>;

export interface RuleSelection {
  /** Rule ids, or category prefixes such as `SEC-4`, to keep. Empty keeps everything. */
  only?: readonly string[];
  /** Rule ids or category prefixes to drop. */
  disable?: readonly string[];
}

export interface Catalog {
  readonly version: string;
  readonly categories: readonly CategoryInfo[];
  /** Every rule, system rules included, in catalog order. */
  readonly rules: readonly RuleDefinition[];
  get(ruleId: string): RuleDefinition | undefined;
  /** Rules to evaluate against a document of this format. */
  rulesFor(format: DocumentFormat): readonly RuleDefinition[];
  select(selection: RuleSelection): Catalog;
}

const SYSTEM_RULES: readonly RuleDefinition[] = [
  {
    id: LOADER_RULE_ID,
    category: 10,
    severity: "info",
    formats: DOCUMENT_FORMATS,
    title: "File could not be loaded",
    description:
      "A pipeline or Terraform file matched the scan but could not be read or parsed, so none of its content was checked.",
    remediation: "Fix the syntax error or file permissions so the file can be scanned.",
    predicateRef: "system",
    predicate: () => [],
    system: true,
  },
  {
    id: EVAL_RULE_ID,
    category: 10,
    severity: "info",
    formats: DOCUMENT_FORMATS,
    title: "Rule evaluation failed",
    description:
      "A rule raised an error while checking a document. The document was not fully checked by that rule.",
    remediation: "Report the failing rule and document; the rest of the scan is unaffected.",
    predicateRef: "system",
    predicate: () => [],
    system: true,
  },
];

function toRiskCategory(id: number): RiskCategory | undefined {
  return RISK_CATEGORIES.find((category) => category === id);
}

/** Validates a parsed catalog definition and binds each rule to its registered predicate. */
export function createCatalog(definition: unknown, registry: PredicateRegistry = PREDICATES): Catalog {
  const parsed = CatalogSchema.safeParse(definition);
  if (!parsed.success) {
    throw new CatalogError(
      "Invalid rule catalog",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  const data = parsed.data;
  const problems: string[] = [];

  const categories: CategoryInfo[] = [];
  const seenCategories = new Set<number>();
  for (const category of data.categories) {
    const id = toRiskCategory(category.id);
    if (id === undefined) {
      problems.push(`category ${category.id} is outside 1..10`);
      continue;
    }
    if (seenCategories.has(id)) {
      problems.push(`category ${id} is declared more than once`);
      continue;
    }
    seenCategories.add(id);
    categories.push(Object.freeze({ id, key: category.key, name: category.name }));
  }
  for (const id of RISK_CATEGORIES) {
    if (!seenCategories.has(id)) {
      problems.push(`category ${id} is missing`);
    }
  }

  const rules: RuleDefinition[] = [];
  const seenRules = new Set<string>(SYSTEM_RULES.map((rule) => rule.id));
  for (const rule of data.rules) {
    if (seenRules.has(rule.id)) {
      problems.push(`rule id "${rule.id}" is duplicated`);
      continue;
    }
    seenRules.add(rule.id);

    const category = toRiskCategory(rule.category);
    if (category === undefined) {
      problems.push(`rule "${rule.id}" references unknown category ${rule.category}`);
      continue;
    }
    const predicate = Object.hasOwn(registry, rule.predicate_ref) ? registry[rule.predicate_ref] : undefined;
    if (!predicate) {
      problems.push(`rule "${rule.id}" references unregistered predicate "${rule.predicate_ref}"`);
      continue;
    }
    rules.push(
      Object.freeze({
        id: rule.id,
        category,
        severity: rule.severity,
        formats: Object.freeze([...new Set(rule.formats)]),
        title: rule.title.trim(),
        description: rule.description.trim(),
        remediation: rule.remediation.trim(),
        example: rule.example?.replace(/\s+$/, ""),
        predicateRef: rule.predicate_ref,
        predicate,
        system: false,
      }),
    );
  }

  for (const category of categories) {
    if (!rules.some((rule) => rule.category === category.id)) {
      problems.push(`category ${category.id} (${category.key}) has no rules`);
    }
  }

  if (problems.length > 0) {
    throw new CatalogError("Invalid rule catalog", problems);
  }

  categories.sort((a, b) => a.id - b.id);
  return buildCatalog(data.version, categories, [...rules, ...SYSTEM_RULES]);
}

function buildCatalog(
  version: string,
  categories: readonly CategoryInfo[],
  rules: readonly RuleDefinition[],
): Catalog {
  const byId = new Map(rules.map((rule) => [rule.id, rule]));
  const byFormat = new Map<DocumentFormat, readonly RuleDefinition[]>(
    DOCUMENT_FORMATS.map((format) => [
      format,
      Object.freeze(rules.filter((rule) => !rule.system && rule.formats.includes(format))),
    ]),
  );

  const catalog: Catalog = {
    version,
    categories: Object.freeze([...categories]),
    rules: Object.freeze([...rules]),
    get: (ruleId) => byId.get(ruleId),
    rulesFor: (format) => byFormat.get(format) ?? [],
    select: (selection) => {
      const known = (pattern: string): boolean => rules.some((rule) => matchesSelector(rule.id, pattern));
      const unknown = [...(selection.only ?? []), ...(selection.disable ?? [])].filter((pattern) => !known(pattern));
      if (unknown.length > 0) {
        throw new CatalogError(`Unknown rule id(s): ${unknown.join(", ")}`);
      }
      const only = selection.only ?? [];
      const disable = selection.disable ?? [];
      const kept = rules.filter(
        (rule) =>
          rule.system ||
          ((only.length === 0 || only.some((pattern) => matchesSelector(rule.id, pattern))) &&
            !disable.some((pattern) => matchesSelector(rule.id, pattern))),
      );
      return buildCatalog(version, categories, kept);
    },
  };
  return Object.freeze(catalog);
}

/** `SEC-4` selects every rule in that family; anything else must be an exact id. */
function matchesSelector(ruleId: string, pattern: string): boolean {
  const normalized = pattern.trim();
  return ruleId.toLowerCase() === normalized.toLowerCase() || ruleId.toLowerCase().startsWith(`${normalized.toLowerCase()}.`);
}

/** Parses catalog YAML text. */
export function loadCatalog(
  source: string,
  registry: PredicateRegistry = PREDICATES,
  sourceName = "catalog",
): Catalog {
  let definition: unknown;
  try {
    definition = load(source, { filename: sourceName });
  } catch (error) {
    const reason = error instanceof YAMLException ? error.message : describeError(error);
    throw new CatalogError(`Could not parse rule catalog ${sourceName}`, [reason]);
  }
  return createCatalog(definition, registry);
}

export async function loadCatalogFile(
  filePath: string,
  registry: PredicateRegistry = PREDICATES,
): Promise<Catalog> {
  const source = await fs.readFile(filePath, "utf-8").catch((error: unknown) => {
    throw new CatalogError(`Could not read rule catalog ${filePath}`, [describeError(error)]);
  });
  return loadCatalog(source, registry, filePath);
}

export function loadDefaultCatalog(registry: PredicateRegistry = PREDICATES): Promise<Catalog> {
  return loadCatalogFile(DEFAULT_CATALOG_PATH, registry);
}

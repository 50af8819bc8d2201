import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Finding, RulePredicate, Severity, SourceDocument } from "../types.js";
import { createDocument, parseYamlDocument } from "../loader.js";
import { createCatalog, type Catalog } from "../catalog.js";
import { formatPath } from "../../utils/tree.js";

export function workflow(...lines: string[]): SourceDocument {
  return parseYamlDocument(".github/workflows/ci.yml", "github-actions", lines.join("\n"));
}

export function gitlab(...lines: string[]): SourceDocument {
  return parseYamlDocument(".gitlab-ci.yml", "gitlab-ci", lines.join("\n"));
}

export function azure(...lines: string[]): SourceDocument {
  return parseYamlDocument("azure-pipelines.yml", "azure-pipelines", lines.join("\n"));
}

/** Terraform documents take hcl2json's shape directly; `text` only feeds the locator. */
export function terraform(value: unknown, text = ""): SourceDocument {
  return createDocument("main.tf", "terraform", value, text);
}

export function run(predicate: RulePredicate, document: SourceDocument): Array<{ path: string; message: string }> {
  return predicate(document, { ruleId: "TEST" }).map((found) => ({
    path: formatPath(found.node.path),
    message: found.message,
  }));
}

/** A valid catalog with one `SEC-<n>.check` rule per category. */
export function catalogDefinition(): {
  version: string;
  categories: Array<{ id: number; key: string; name: string }>;
  rules: Array<Record<string, unknown>>;
} {
  const ids = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
  return {
    version: "test-1",
    categories: ids.map((id) => ({ id, key: `CICD-SEC-${id}`, name: `Category ${id}` })),
    rules: ids.map((id) => ({
      id: `SEC-${id}.check`,
      category: id,
      severity: "medium",
      formats: ["github-actions", "gitlab-ci", "azure-pipelines", "terraform"],
      predicate_ref: "noop",
      title: `Check ${id}`,
      description: `Describes check ${id}.`,
      remediation: `Fix check ${id}.`,
    })),
  };
}

export const noop: RulePredicate = () => [];

export function testCatalog(predicates: Record<string, RulePredicate> = {}): Catalog {
  return createCatalog(catalogDefinition(), { noop, ...predicates });
}

export function finding(overrides: Partial<Omit<Finding, "location">> & { line?: number; at?: string; start?: number } = {}): Finding {
  const { line = 1, at = "$", start = 0, ...rest } = overrides;
  const severity: Severity = rest.severity ?? "medium";
  return {
    ruleId: "SEC-1.check",
    category: 1,
    title: "Check 1",
    path: ".github/workflows/ci.yml",
    message: "finding",
    remediation: "Fix check 1.",
    ...rest,
    severity,
    location: { path: at, line, start, end: start },
  };
}

export async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "pipewarden-"));
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, "utf-8");
  }
}

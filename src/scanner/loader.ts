import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import hcl2json from "@cdktf/hcl2json";
import { CORE_SCHEMA, Type, YAMLException, load, types } from "js-yaml";
import type { DocumentFormat, SourceDocument } from "./types.js";
import { LoadError, RootPathError, describeError } from "./errors.js";
import { createTerraformLocator, createYamlLocator } from "./locator.js";
import { buildTree } from "../utils/tree.js";
import { drainQueue } from "../utils/pool.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export const DEFAULT_INCLUDE = ["**/*.yml", "**/*.yaml", "**/*.tf"];

const ALWAYS_EXCLUDE = [
  "**/node_modules/**",
  "**/.git/**",
  "**/.terraform/**",
];

/** Parses HCL source into hcl2json's JSON shape (blocks become arrays of bodies). */
export interface TerraformParser {
  parse(fileName: string, source: string): Promise<unknown>;
}

export const hcl2jsonParser: TerraformParser = {
  parse: (fileName, source) => hcl2json.parse(fileName, source),
};

export interface LoadOptions {
  include?: string[];
  exclude?: string[];
  concurrency?: number;
  logger?: Logger;
  terraformParser?: TerraformParser;
}

export interface LoadResult {
  documents: SourceDocument[];
  errors: LoadError[];
  skipped: string[];
}

// GitLab's `!reference [job, key]` is kept as data rather than resolved.
const referenceTag = new Type("!reference", {
  kind: "sequence",
  construct: (data: unknown) => ({ "!reference": data }),
});

const PIPELINE_SCHEMA = CORE_SCHEMA.extend({
  implicit: [types.merge],
  explicit: [referenceTag],
});

export function detectFormat(relativePath: string): DocumentFormat | undefined {
  const normalized = relativePath.replace(/\\/g, "/");
  const base = path.posix.basename(normalized);
  const dir = path.posix.dirname(normalized);

  if (base.endsWith(".tf")) {
    return "terraform";
  }
  if (!/\.ya?ml$/i.test(base)) {
    return undefined;
  }
  if (dir === ".github/workflows" || dir.endsWith("/.github/workflows")) {
    return "github-actions";
  }
  if (/^(.+\.)?gitlab-ci\.ya?ml$/i.test(base.replace(/^\./, "")) || /(^|\/)\.gitlab\/ci(\/|$)/.test(dir)) {
    return "gitlab-ci";
  }
  if (/^azure-pipelines.*\.ya?ml$/i.test(base) || /(^|\/)\.(azure-pipelines|azuredevops)(\/|$)/.test(dir)) {
    return "azure-pipelines";
  }
  return undefined;
}

export function createDocument(
  documentPath: string,
  format: DocumentFormat,
  value: unknown,
  text = "",
): SourceDocument {
  const locate = format === "terraform" ? createTerraformLocator(text) : createYamlLocator(text);
  return Object.freeze({
    path: documentPath,
    format,
    text,
    root: buildTree(value, locate),
  });
}

export function parseYamlDocument(
  documentPath: string,
  format: Exclude<DocumentFormat, "terraform">,
  text: string,
): SourceDocument {
  let value: unknown;
  try {
    value = load(text, { schema: PIPELINE_SCHEMA, filename: documentPath });
  } catch (error) {
    const reason = error instanceof YAMLException ? error.message : describeError(error);
    throw new LoadError("ParseFailure", documentPath, reason, { cause: error });
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new LoadError("ParseFailure", documentPath, "Expected a mapping at the top level of the pipeline file");
  }
  return createDocument(documentPath, format, value, text);
}

export async function parseTerraformDocument(
  documentPath: string,
  text: string,
  parser: TerraformParser = hcl2jsonParser,
): Promise<SourceDocument> {
  let value: unknown;
  try {
    value = await parser.parse(documentPath, text);
  } catch (error) {
    throw new LoadError("ParseFailure", documentPath, describeError(error), { cause: error });
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new LoadError("ParseFailure", documentPath, "Terraform parser returned no configuration body");
  }
  return createDocument(documentPath, "terraform", value, text);
}

export async function parseSourceDocument(
  documentPath: string,
  text: string,
  options?: { format?: DocumentFormat; terraformParser?: TerraformParser },
): Promise<SourceDocument> {
  const format = options?.format ?? detectFormat(documentPath);
  if (!format) {
    throw new LoadError("ParseFailure", documentPath, "Unrecognized pipeline or IaC file");
  }
  if (format === "terraform") {
    return parseTerraformDocument(documentPath, text, options?.terraformParser);
  }
  return parseYamlDocument(documentPath, format, text);
}

export async function loadDocuments(rootPath: string, options: LoadOptions = {}): Promise<LoadResult> {
  const logger = options.logger ?? silentLogger;
  const root = path.resolve(rootPath);
  await assertDirectory(root);

  const include = options.include && options.include.length > 0 ? options.include : DEFAULT_INCLUDE;
  const candidates = await fg(include, {
    cwd: root,
    dot: true,
    onlyFiles: true,
    unique: true,
    followSymbolicLinks: false,
    ignore: [...ALWAYS_EXCLUDE, ...(options.exclude ?? [])],
  });
  candidates.sort();

  const skipped: string[] = [];
  const targets: Array<{ file: string; format: DocumentFormat }> = [];
  for (const file of candidates) {
    const format = detectFormat(file);
    if (format) {
      targets.push({ file, format });
    } else {
      skipped.push(file);
    }
  }
  logger.debug("Discovered files", { root, recognized: targets.length, skipped: skipped.length });

  const slots: Array<SourceDocument | LoadError> = new Array(targets.length);
  await drainQueue(
    targets,
    async (target, index) => {
      slots[index] = await loadOne(root, target.file, target.format, options.terraformParser);
    },
    { lanes: options.concurrency ?? 16 },
  );

  const documents: SourceDocument[] = [];
  const errors: LoadError[] = [];
  for (const slot of slots) {
    if (slot instanceof LoadError) {
      logger.warn("Could not load file", { path: slot.path, kind: slot.kind, reason: slot.message });
      errors.push(slot);
    } else {
      documents.push(slot);
    }
  }

  return { documents, errors, skipped };
}

async function loadOne(
  root: string,
  file: string,
  format: DocumentFormat,
  terraformParser?: TerraformParser,
): Promise<SourceDocument | LoadError> {
  let text: string;
  try {
    text = await fs.readFile(path.join(root, file), "utf-8");
  } catch (error) {
    return new LoadError("ReadFailure", file, describeError(error), { cause: error });
  }
  try {
    return await parseSourceDocument(file, text, { format, terraformParser });
  } catch (error) {
    if (error instanceof LoadError) {
      return error;
    }
    return new LoadError("ParseFailure", file, describeError(error), { cause: error });
  }
}

async function assertDirectory(root: string): Promise<void> {
  const stat = await fs.stat(root).catch((error: unknown) => {
    throw new RootPathError(root, describeError(error));
  });
  if (!stat.isDirectory()) {
    throw new RootPathError(root, "not a directory");
  }
}

import type { RuleMatch, RulePredicate, ScalarNode, TreeNode } from "../types.js";
import { commandNodes } from "../pipeline.js";
import { child, isMapping, isScalar, scalarText, walk } from "../../utils/tree.js";
import { PRIVATE_KEY_MARKER, SECRET_NAME, isLiteralSecret, match, textOf } from "./shared.js";
import { labeledBlocks } from "./terraform.js";

const PRINT_COMMAND = /\b(echo|printf|Write-Host|Write-Output|cat\s+<<)\b/i;
const INLINE_SECRET = /\$\{\{\s*secrets\.([A-Za-z0-9_]+)\s*\}\}/;
const VARIABLE_REFERENCE =
  /\$\{\{\s*(?:secrets|env)\.([A-Za-z0-9_]+)\s*\}\}|\$\(([A-Za-z0-9_.]+)\)|\$\{?(?:env:)?([A-Za-z_][A-Za-z0-9_]*)\}?/g;

function referencedNames(line: string): string[] {
  return [...line.matchAll(VARIABLE_REFERENCE)]
    .map((found) => found[1] ?? found[2] ?? found[3])
    .filter((name): name is string => name !== undefined);
}

function describeCommandLeak(command: ScalarNode): string | undefined {
  for (const raw of textOf(command).split(/\r?\n/)) {
    const line = raw.trim();
    if (line.length === 0 || line.startsWith("#")) {
      continue;
    }
    if (PRINT_COMMAND.test(line)) {
      const leaked = referencedNames(line).find((name) => SECRET_NAME.test(name));
      if (leaked) {
        return `Command prints secret "${leaked}" to the job log: "${line}"`;
      }
    }
    const inline = INLINE_SECRET.exec(line);
    if (inline) {
      return `Secret "${inline[1]}" is expanded into the script text; pass it through env instead`;
    }
  }
  return undefined;
}

export const secretInCommand: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  for (const command of commandNodes(document)) {
    const message = describeCommandLeak(command);
    if (message) {
      matches.push(match(command, message));
    }
  }

  return matches;
};

/** Keys that name a secret without holding one (`secret_name`, `token_url`, ...). */
const SECRET_METADATA_KEY = /(name|id|arn|path|file|ref|url|uri|version|type|length|description|env|inherit)$/i;

function literalValue(node: TreeNode | undefined): ScalarNode | undefined {
  if (isScalar(node) && typeof node.value === "string" && isLiteralSecret(node.value)) {
    return node;
  }
  // GitLab variables may be `{ value: ..., description: ... }`.
  const nested = child(node, "value");
  if (isScalar(nested) && typeof nested.value === "string" && isLiteralSecret(nested.value)) {
    return nested;
  }
  return undefined;
}

export const hardcodedSecret: RulePredicate = (document) => {
  const flagged = new Set<TreeNode>();
  const matches: RuleMatch[] = [];
  const report = (node: TreeNode, message: string): void => {
    if (!flagged.has(node)) {
      flagged.add(node);
      matches.push(match(node, message));
    }
  };

  walk(document.root, (node) => {
    if (isScalar(node) && typeof node.value === "string" && PRIVATE_KEY_MARKER.test(node.value)) {
      report(node, "A private key is embedded in the file");
      return;
    }
    if (!isMapping(node)) {
      return;
    }

    const listedName = scalarText(child(node, "name"));
    const listedValue = child(node, "value");
    if (listedName && SECRET_NAME.test(listedName) && !SECRET_METADATA_KEY.test(listedName)) {
      const literal = literalValue(listedValue);
      if (literal) {
        report(literal, `Variable "${listedName}" holds a literal secret value`);
      }
    }

    for (const entry of node.entries) {
      if (!SECRET_NAME.test(entry.key) || SECRET_METADATA_KEY.test(entry.key)) {
        continue;
      }
      const literal = literalValue(entry.value);
      if (literal) {
        report(literal, `"${entry.key}" is assigned a literal secret value`);
      }
    }
  });

  if (document.format === "terraform") {
    for (const variable of labeledBlocks(document.root, "variable")) {
      if (!SECRET_NAME.test(variable.name)) {
        continue;
      }
      const literal = literalValue(child(variable.body, "default"));
      if (literal) {
        report(literal, `Variable "${variable.name}" ships a literal default; supply it from a secret store`);
      }
    }
  }

  return matches;
};

import type { RuleMatch, RulePredicate, ScalarNode } from "../types.js";
import { commandNodes, imageReferences } from "../pipeline.js";
import { isExpression, match, parseImageReference, textOf } from "./shared.js";

export const unpinnedImage: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  for (const node of imageReferences(document)) {
    const reference = textOf(node).trim();
    if (reference.length === 0 || isExpression(reference)) {
      continue;
    }
    const image = parseImageReference(reference);
    if (image.digest) {
      continue;
    }
    if (!image.tag) {
      matches.push(match(node, `Image "${reference}" has no tag and resolves to :latest`));
    } else if (image.tag === "latest") {
      matches.push(match(node, `Image "${reference}" uses the mutable :latest tag`));
    }
  }

  return matches;
};

interface InstallCheck {
  pattern: RegExp;
  safe?: RegExp;
}

const INSTALL_CHECKS: InstallCheck[] = [
  { pattern: /\bnpm\s+(install|i)(\s|$)/ },
  { pattern: /\byarn\s+install\b/, safe: /--frozen-lockfile|--immutable/ },
  { pattern: /\bpnpm\s+(install|i)(\s|$)/, safe: /--frozen-lockfile/ },
  {
    pattern: /\bpip3?\s+install\b/,
    safe: /(\s-r\s|--requirement|--require-hashes|\s-c\s|--constraint|install\s+(-U|--upgrade)\s+(pip|setuptools|wheel)(\s|$))/,
  },
  { pattern: /\bgo\s+install\s+\S+@latest\b/ },
  { pattern: /\bgem\s+install\b/, safe: /\s(-v|--version)\s/ },
];

function commandLines(node: ScalarNode): string[] {
  return textOf(node)
    .split(/\r?\n|&&|;/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export const installWithoutLockfile: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  for (const node of commandNodes(document)) {
    const offending = commandLines(node).find((line) =>
      INSTALL_CHECKS.some((check) => check.pattern.test(line) && !(check.safe?.test(` ${line} `) ?? false)),
    );
    if (offending) {
      matches.push(match(node, `Dependency install "${offending}" does not enforce a lockfile or pinned versions`));
    }
  }

  return matches;
};

const PIPED_SCRIPT = /\b(curl|wget)\b[^|\n]*\|\s*(sudo\s+)?(ba|z|k|da)?sh\b/;
const PROCESS_SUBSTITUTION = /\b(ba)?sh\s+<\(\s*(curl|wget)\b/;

export const remoteScriptPipe: RulePredicate = (document) => {
  const matches: RuleMatch[] = [];

  for (const node of commandNodes(document)) {
    const offending = commandLinesRaw(node).find(
      (line) => PIPED_SCRIPT.test(line) || PROCESS_SUBSTITUTION.test(line),
    );
    if (offending) {
      matches.push(match(node, `Remote script is piped straight into a shell: "${offending}"`));
    }
  }

  return matches;
};

function commandLinesRaw(node: ScalarNode): string[] {
  return textOf(node)
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

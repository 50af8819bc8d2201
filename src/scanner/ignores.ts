import type { Finding, IgnoredFinding, SourceDocument } from "./types.js";
import { isDocumentLevel } from "./evaluator.js";

export const IGNORE_MARKER = "pipewarden-ignore";

export interface IgnoreDirective {
  ruleId: string;
  reason: string;
  line: number;
}

const DIRECTIVE_PATTERN = /^\s*(?:#|\/\/)\s*pipewarden-ignore\s+([A-Za-z0-9][A-Za-z0-9._-]*)\s*:\s*(.*?)\s*$/;

/** Directives without a reason are not honoured. */
export function parseIgnoreDirectives(text: string): IgnoreDirective[] {
  const directives: IgnoreDirective[] = [];
  const lines = text.split(/\r?\n/);

  for (let index = 0; index < lines.length; index += 1) {
    const match = DIRECTIVE_PATTERN.exec(lines[index]);
    if (!match) {
      continue;
    }
    const reason = match[2];
    if (reason.length === 0) {
      continue;
    }
    directives.push({ ruleId: match[1].toUpperCase(), reason, line: index + 1 });
  }

  return directives;
}

export interface IgnoreResult {
  active: Finding[];
  ignored: IgnoredFinding[];
}

/**
 * Each directive suppresses the next finding of its rule below it in the same file.
 * Findings anchored at the document root may be suppressed from anywhere in the file.
 */
export function applyIgnoreDirectives(
  findings: readonly Finding[],
  documents: readonly SourceDocument[],
): IgnoreResult {
  const pending = new Map<string, Array<IgnoreDirective & { consumed: boolean }>>();
  for (const document of documents) {
    const directives = parseIgnoreDirectives(document.text);
    if (directives.length > 0) {
      pending.set(
        document.path,
        directives.map((directive) => ({ ...directive, consumed: false })),
      );
    }
  }

  const active: Finding[] = [];
  const ignored: IgnoredFinding[] = [];
  const ordered = [...findings].sort(
    (a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0) || a.location.line - b.location.line,
  );

  for (const finding of ordered) {
    const anywhere = isDocumentLevel(finding.location);
    const directive = pending
      .get(finding.path)
      ?.find(
        (candidate) =>
          !candidate.consumed &&
          candidate.ruleId === finding.ruleId.toUpperCase() &&
          (anywhere || candidate.line < finding.location.line),
      );

    if (directive) {
      directive.consumed = true;
      ignored.push({ finding, reason: directive.reason, annotationLine: directive.line });
      continue;
    }
    active.push(finding);
  }

  return { active, ignored };
}

import type { PathSegment, Span } from "./types.js";
import type { SpanResolver } from "../utils/tree.js";

interface SourceLine {
  text: string;
  offset: number;
  indent: number;
  significant: boolean;
}

function splitLines(text: string, isComment: (trimmed: string) => boolean): SourceLine[] {
  const lines: SourceLine[] = [];
  let offset = 0;
  for (const raw of text.split("\n")) {
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
    const trimmed = line.trim();
    lines.push({
      text: line,
      offset,
      indent: line.length - line.trimStart().length,
      significant: trimmed.length > 0 && !isComment(trimmed),
    });
    offset += Buffer.byteLength(raw, "utf8") + 1;
  }
  return lines;
}

function byteAt(line: SourceLine, column: number): number {
  return line.offset + Buffer.byteLength(line.text.slice(0, column), "utf8");
}

function spanOf(
  lines: SourceLine[],
  first: number,
  column: number,
  last: number,
  endColumn: (index: number) => number = (index) => lines[index].text.trimEnd().length,
): Span {
  return {
    start: byteAt(lines[first], column),
    end: byteAt(lines[last], endColumn(last)),
    line: first + 1,
  };
}

function lastSignificant(lines: SourceLine[], from: number, to: number): number {
  for (let index = to; index > from; index -= 1) {
    if (lines[index].significant) {
      return index;
    }
  }
  return from;
}

function memoize(resolve: (path: readonly PathSegment[]) => Span | undefined): SpanResolver {
  const cache = new Map<string, Span | undefined>();
  return (path) => {
    const key = JSON.stringify(path);
    if (!cache.has(key)) {
      cache.set(key, resolve(path));
    }
    return cache.get(key);
  };
}

// ---------------------------------------------------------------------------
// YAML: block-structure resolution by indentation.

interface YamlRegion {
  first: number;
  last: number;
  /** Column where content starts on `first`. */
  column: number;
  /** Flow or scalar content: nothing below it can be located. */
  opaque: boolean;
  span: Span;
}

const YAML_KEY =
  /^(?:"((?:[^"\\]|\\.)*)"|'((?:[^']|'')*)'|([^\s"'#\-[\]{},?|>][^#]*?|-[^\s#][^#]*?))\s*:(?:\s|$)/;
const YAML_PROPERTIES_ONLY = /^(?:[&!]\S*\s*)*$/;

function readYamlKey(text: string): { key: string; length: number } | undefined {
  const match = YAML_KEY.exec(text);
  if (!match) {
    return undefined;
  }
  const key = match[1] ?? (match[2] !== undefined ? match[2].replace(/''/g, "'") : match[3]);
  if (key === undefined) {
    return undefined;
  }
  return { key: key.trim(), length: match[0].length };
}

function isSequenceItem(text: string): boolean {
  return text === "-" || text.startsWith("- ");
}

function stripYamlComment(value: string): string {
  return value.replace(/(^|\s)#.*$/, "").trim();
}

/** Column of a trailing `#` comment outside quoted scalars, or the line length. */
function yamlCommentColumn(text: string): number {
  let quote: string | undefined;
  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    const previous = index === 0 ? " " : text[index - 1];
    if (quote === '"' && char === "\\") {
      index += 1;
    } else if (quote !== undefined) {
      if (char === quote) {
        quote = undefined;
      }
    } else if ((char === '"' || char === "'") && /[\s[{,]/.test(previous)) {
      quote = char;
    } else if (char === "#" && /\s/.test(previous)) {
      return index;
    }
  }
  return text.length;
}

const BLOCK_SCALAR_HEADER = /(^|\s)[|>][0-9+-]*$/;

/** End column of each line's content; lines of block scalars keep their `#` text. */
function yamlContentEnds(lines: readonly SourceLine[]): number[] {
  const ends: number[] = [];
  let scalarIndent: number | undefined;
  for (const line of lines) {
    if (scalarIndent !== undefined && (line.text.trim().length === 0 || line.indent > scalarIndent)) {
      ends.push(line.text.trimEnd().length);
      continue;
    }
    scalarIndent = undefined;
    const content = line.text.slice(0, yamlCommentColumn(line.text)).trimEnd();
    ends.push(content.length);
    if (BLOCK_SCALAR_HEADER.test(content)) {
      scalarIndent = line.indent;
    }
  }
  return ends;
}

export function createYamlLocator(text: string): SpanResolver {
  const lines = splitLines(text, (trimmed) => trimmed.startsWith("#") || trimmed === "---" || trimmed === "...");
  const regions = new Map<string, YamlRegion | undefined>();
  const contentEnds = yamlContentEnds(lines);
  const endColumn = (index: number): number => contentEnds[index];

  const firstSignificant = lines.findIndex((line) => line.significant);
  const rootRegion: YamlRegion | undefined =
    firstSignificant === -1
      ? undefined
      : {
          first: firstSignificant,
          last: lines.length - 1,
          column: lines[firstSignificant].indent,
          opaque: false,
          span: spanOf(
            lines,
            firstSignificant,
            lines[firstSignificant].indent,
            lastSignificant(lines, firstSignificant, lines.length - 1),
            endColumn,
          ),
        };

  const columnOf = (region: YamlRegion, index: number): number =>
    index === region.first ? region.column : lines[index].indent;

  /** Last line belonging to a block that opens on `start` at `column`. */
  const blockEnd = (start: number, column: number, bound: number, allowCompactSequence: boolean): number => {
    let end = start;
    let compact: boolean | undefined;
    for (let index = start + 1; index <= bound; index += 1) {
      const line = lines[index];
      if (!line.significant) {
        continue;
      }
      const item = line.indent === column && isSequenceItem(line.text.slice(column));
      // `key:` followed by `- item` at the key's own indentation
      compact ??= allowCompactSequence && item;
      if (line.indent > column || (compact && item)) {
        end = index;
        continue;
      }
      break;
    }
    return end;
  };

  const valueRegion = (keyLine: number, valueColumn: number, end: number, keySpan: Span): YamlRegion => {
    const inline = stripYamlComment(lines[keyLine].text.slice(valueColumn));
    if (inline.length > 0 && !YAML_PROPERTIES_ONLY.test(inline)) {
      return { first: keyLine, last: end, column: valueColumn, opaque: true, span: keySpan };
    }
    let first = keyLine + 1;
    while (first <= end && !lines[first].significant) {
      first += 1;
    }
    if (first > end) {
      return { first: keyLine, last: keyLine, column: valueColumn, opaque: true, span: keySpan };
    }
    return { first, last: end, column: lines[first].indent, opaque: false, span: keySpan };
  };

  const resolveKey = (region: YamlRegion, key: string): YamlRegion | undefined => {
    const keyColumn = region.column;
    for (let index = region.first; index <= region.last; index += 1) {
      const line = lines[index];
      if (!line.significant || columnOf(region, index) !== keyColumn) {
        continue;
      }
      const rest = line.text.slice(keyColumn);
      if (isSequenceItem(rest)) {
        continue;
      }
      const parsed = readYamlKey(rest);
      if (!parsed || parsed.key !== key) {
        continue;
      }
      const end = blockEnd(index, keyColumn, region.last, true);
      const span = spanOf(lines, index, keyColumn, lastSignificant(lines, index, end), endColumn);
      return valueRegion(index, keyColumn + parsed.length, end, span);
    }
    return undefined;
  };

  const resolveItem = (region: YamlRegion, position: number): YamlRegion | undefined => {
    const dashColumn = region.column;
    let seen = -1;
    for (let index = region.first; index <= region.last; index += 1) {
      const line = lines[index];
      if (!line.significant || columnOf(region, index) !== dashColumn) {
        continue;
      }
      const rest = line.text.slice(dashColumn);
      if (!isSequenceItem(rest)) {
        continue;
      }
      seen += 1;
      if (seen !== position) {
        continue;
      }
      const end = blockEnd(index, dashColumn, region.last, false);
      const span = spanOf(lines, index, dashColumn, lastSignificant(lines, index, end), endColumn);
      const afterDash = rest.slice(1);
      const contentOffset = afterDash.length - afterDash.trimStart().length;
      const content = stripYamlComment(afterDash);
      if (content.length === 0) {
        let first = index + 1;
        while (first <= end && !lines[first].significant) {
          first += 1;
        }
        if (first > end) {
          return { first: index, last: index, column: dashColumn, opaque: true, span };
        }
        return { first, last: end, column: lines[first].indent, opaque: false, span };
      }
      const column = dashColumn + 1 + contentOffset;
      const opaque = !readYamlKey(line.text.slice(column)) && !isSequenceItem(line.text.slice(column));
      return { first: index, last: end, column, opaque, span };
    }
    return undefined;
  };

  const regionFor = (path: readonly PathSegment[]): YamlRegion | undefined => {
    if (path.length === 0) {
      return rootRegion;
    }
    const cacheKey = JSON.stringify(path);
    if (regions.has(cacheKey)) {
      return regions.get(cacheKey);
    }
    const parent = regionFor(path.slice(0, -1));
    const segment = path[path.length - 1];
    let region: YamlRegion | undefined;
    if (parent && !parent.opaque) {
      region = typeof segment === "number" ? resolveItem(parent, segment) : resolveKey(parent, segment);
    }
    regions.set(cacheKey, region);
    return region;
  };

  return memoize((path) => regionFor(path)?.span);
}

// ---------------------------------------------------------------------------
// Terraform: block and attribute resolution by bracket depth.

interface HclLine extends SourceLine {
  /** Bracket depth at the start of the line. */
  depth: number;
  /** Bracket depth after the line. */
  depthAfter: number;
  /** False when the line starts inside a string, heredoc or block comment. */
  code: boolean;
}

interface HclRegion {
  first: number;
  last: number;
  depth: number;
  span: Span;
  /** Name of the repeated nested block this region lists, when the next segment is an index. */
  blockName?: string;
  opaque: boolean;
}

const HCL_LABEL_COUNT: Record<string, number> = {
  resource: 2,
  data: 2,
  module: 1,
  provider: 1,
  variable: 1,
  output: 1,
};

const HCL_ATTRIBUTE = /^\s*"?([A-Za-z_][\w-]*)"?\s*[=:](?!=)/;
const HCL_BLOCK = /^\s*([A-Za-z_][\w-]*)((?:\s+(?:"[^"]*"|[A-Za-z_][\w-]*))*)\s*\{/;

function scanHcl(text: string): HclLine[] {
  const base = splitLines(text, (trimmed) => trimmed.startsWith("#") || trimmed.startsWith("//"));
  const result: HclLine[] = [];
  let depth = 0;
  type Mode = { kind: "string" } | { kind: "interp"; braces: number };
  const stack: Mode[] = [];
  let blockComment = false;
  let heredoc: string | undefined;

  for (const line of base) {
    const code = stack.length === 0 && !blockComment && heredoc === undefined;
    const startDepth = depth;
    const text = line.text;

    if (heredoc !== undefined) {
      if (text.trim() === heredoc) {
        heredoc = undefined;
      }
      result.push({ ...line, depth: startDepth, depthAfter: depth, code });
      continue;
    }

    for (let index = 0; index < text.length; index += 1) {
      const char = text[index];
      const next = text[index + 1];
      const mode = stack[stack.length - 1];

      if (blockComment) {
        if (char === "*" && next === "/") {
          blockComment = false;
          index += 1;
        }
        continue;
      }

      if (mode?.kind === "string") {
        if (char === "\\") {
          index += 1;
        } else if (char === '"') {
          stack.pop();
        } else if (char === "$" && next === "{") {
          stack.push({ kind: "interp", braces: 0 });
          index += 1;
        }
        continue;
      }

      if (mode?.kind === "interp") {
        if (char === '"') {
          stack.push({ kind: "string" });
        } else if (char === "{") {
          mode.braces += 1;
        } else if (char === "}") {
          if (mode.braces === 0) {
            stack.pop();
          } else {
            mode.braces -= 1;
          }
        }
        continue;
      }

      if (char === "#" || (char === "/" && next === "/")) {
        break;
      }
      if (char === "/" && next === "*") {
        blockComment = true;
        index += 1;
        continue;
      }
      if (char === "<" && next === "<") {
        const marker = /^<<-?\s*([A-Za-z_]\w*)/.exec(text.slice(index));
        if (marker) {
          heredoc = marker[1];
          break;
        }
      }
      if (char === '"') {
        stack.push({ kind: "string" });
      } else if (char === "{" || char === "[" || char === "(") {
        depth += 1;
      } else if (char === "}" || char === "]" || char === ")") {
        depth = Math.max(0, depth - 1);
      }
    }

    result.push({ ...line, depth: startDepth, depthAfter: depth, code });
  }

  return result;
}

interface HclEntry {
  name: string;
  labels: string[];
  kind: "block" | "attribute";
  line: number;
  column: number;
  last: number;
}

export function createTerraformLocator(text: string): SpanResolver {
  const lines = scanHcl(text);
  const regions = new Map<string, HclRegion | undefined>();
  const lastLine = lines.length - 1;

  const extentEnd = (index: number): number => {
    const startDepth = lines[index].depth;
    if (lines[index].depthAfter <= startDepth) {
      return index;
    }
    for (let cursor = index + 1; cursor <= lastLine; cursor += 1) {
      if (lines[cursor].depthAfter <= startDepth) {
        return cursor;
      }
    }
    return lastLine;
  };

  const entriesIn = (region: HclRegion): HclEntry[] => {
    const entries: HclEntry[] = [];
    for (let index = region.first; index <= region.last; index += 1) {
      const line = lines[index];
      if (!line.code || !line.significant || line.depth !== region.depth) {
        continue;
      }
      const block = HCL_BLOCK.exec(line.text);
      if (block) {
        const labels = [...block[2].matchAll(/"([^"]*)"|([A-Za-z_][\w-]*)/g)].map(
          (match) => match[1] ?? match[2] ?? "",
        );
        entries.push({
          name: block[1],
          labels,
          kind: "block",
          line: index,
          column: line.indent,
          last: extentEnd(index),
        });
        continue;
      }
      const attribute = HCL_ATTRIBUTE.exec(line.text);
      if (attribute) {
        entries.push({
          name: attribute[1],
          labels: [],
          kind: "attribute",
          line: index,
          column: line.indent,
          last: extentEnd(index),
        });
      }
    }
    return entries;
  };

  const bodyOf = (entry: HclEntry, depth: number): HclRegion => {
    const span = spanOf(lines, entry.line, entry.column, entry.last);
    const single = entry.last === entry.line;
    return {
      first: entry.line + 1,
      last: Math.max(entry.line, entry.last - 1),
      depth: depth + 1,
      span,
      opaque: single,
    };
  };

  const rootRegion: HclRegion = {
    first: 0,
    last: lastLine,
    depth: 0,
    span: spanOf(lines, 0, 0, Math.max(0, lastLine)),
    opaque: false,
  };

  const resolveTopLevel = (path: readonly PathSegment[]): HclRegion | undefined => {
    const type = path[0];
    if (typeof type !== "string") {
      return undefined;
    }
    const labelCount = HCL_LABEL_COUNT[type] ?? 0;
    const labels = path.slice(1, 1 + labelCount);
    if (labels.some((label) => typeof label !== "string")) {
      return undefined;
    }
    const candidates = entriesIn(rootRegion).filter(
      (entry) =>
        entry.kind === "block" &&
        entry.name === type &&
        labels.every((label, index) => entry.labels[index] === label),
    );
    if (candidates.length === 0) {
      return undefined;
    }
    const index = path[1 + labelCount];
    if (path.length <= 1 + labelCount) {
      return { ...bodyOf(candidates[0], 0), opaque: true };
    }
    if (typeof index !== "number" || !candidates[index]) {
      return undefined;
    }
    return bodyOf(candidates[index], 0);
  };

  const regionFor = (path: readonly PathSegment[]): HclRegion | undefined => {
    if (path.length === 0) {
      return rootRegion;
    }
    const cacheKey = JSON.stringify(path);
    if (regions.has(cacheKey)) {
      return regions.get(cacheKey);
    }

    let region: HclRegion | undefined;
    const type = path[0];
    const topLength = typeof type === "string" ? 2 + (HCL_LABEL_COUNT[type] ?? 0) : 1;
    if (path.length <= topLength) {
      region = resolveTopLevel(path);
    } else {
      const parent = regionFor(path.slice(0, -1));
      const segment = path[path.length - 1];
      if (parent && !parent.opaque) {
        if (typeof segment === "number") {
          if (parent.blockName !== undefined) {
            const blocks = entriesIn(parent).filter(
              (entry) => entry.kind === "block" && entry.name === parent.blockName,
            );
            const entry = blocks[segment];
            region = entry ? bodyOf(entry, parent.depth) : undefined;
          }
        } else {
          const entry = entriesIn(parent).find((candidate) => candidate.name === segment);
          if (entry?.kind === "block") {
            region = {
              ...parent,
              span: spanOf(lines, entry.line, entry.column, entry.last),
              blockName: segment,
            };
          } else if (entry) {
            region = bodyOf(entry, parent.depth);
          }
        }
      }
    }

    regions.set(cacheKey, region);
    return region;
  };

  return memoize((path) => regionFor(path)?.span);
}

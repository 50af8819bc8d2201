import type {
  MappingNode,
  PathSegment,
  ScalarNode,
  ScalarValue,
  SequenceNode,
  Span,
  TreeNode,
} from "../scanner/types.js";

export type SpanResolver = (path: readonly PathSegment[]) => Span | undefined;

/**
 * Converts a parsed value (js-yaml or hcl2json output) into a frozen normalized tree.
 * Nodes the resolver cannot place inherit the span of their nearest located ancestor.
 */
export function buildTree(value: unknown, resolveSpan: SpanResolver = () => undefined): TreeNode {
  return toNode(value, [], resolveSpan, undefined);
}

function toNode(
  value: unknown,
  path: readonly PathSegment[],
  resolveSpan: SpanResolver,
  parentSpan: Span | undefined,
): TreeNode {
  const span = resolveSpan(path) ?? parentSpan;
  const frozenPath = Object.freeze([...path]);

  if (Array.isArray(value)) {
    const items = value.map((item, index) =>
      toNode(item, [...path, index], resolveSpan, span),
    );
    const node: SequenceNode = { kind: "sequence", path: frozenPath, span, items: Object.freeze(items) };
    return Object.freeze(node);
  }

  if (isPlainRecord(value)) {
    const entries = Object.entries(value).map(([key, entryValue]) =>
      Object.freeze({ key, value: toNode(entryValue, [...path, key], resolveSpan, span) }),
    );
    const node: MappingNode = { kind: "mapping", path: frozenPath, span, entries: Object.freeze(entries) };
    return Object.freeze(node);
  }

  const node: ScalarNode = { kind: "scalar", path: frozenPath, span, value: toScalar(value) };
  return Object.freeze(node);
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !(value instanceof Date);
}

function toScalar(value: unknown): ScalarValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export function isMapping(node: TreeNode | undefined): node is MappingNode {
  return node?.kind === "mapping";
}

export function isSequence(node: TreeNode | undefined): node is SequenceNode {
  return node?.kind === "sequence";
}

export function isScalar(node: TreeNode | undefined): node is ScalarNode {
  return node?.kind === "scalar";
}

export function child(node: TreeNode | undefined, key: string): TreeNode | undefined {
  if (!isMapping(node)) {
    return undefined;
  }
  return node.entries.find((entry) => entry.key === key)?.value;
}

export function at(node: TreeNode | undefined, ...segments: PathSegment[]): TreeNode | undefined {
  let current = node;
  for (const segment of segments) {
    if (typeof segment === "number") {
      current = isSequence(current) ? current.items[segment] : undefined;
    } else {
      current = child(current, segment);
    }
    if (!current) {
      return undefined;
    }
  }
  return current;
}

export function hasKey(node: TreeNode | undefined, key: string): boolean {
  return child(node, key) !== undefined;
}

/** String form of a scalar node; undefined for collections and null. */
export function scalarText(node: TreeNode | undefined): string | undefined {
  if (!isScalar(node) || node.value === null) {
    return undefined;
  }
  return String(node.value);
}

export function isTrue(node: TreeNode | undefined): boolean {
  if (!isScalar(node)) {
    return false;
  }
  return node.value === true || node.value === "true";
}

/** Sequence items, or the node itself when a single value stands in for a list. */
export function asList(node: TreeNode | undefined): readonly TreeNode[] {
  if (!node) {
    return [];
  }
  if (isSequence(node)) {
    return node.items;
  }
  return [node];
}

export function mappingEntries(node: TreeNode | undefined): readonly { key: string; value: TreeNode }[] {
  return isMapping(node) ? node.entries : [];
}

/** Pre-order walk over every node. */
export function walk(node: TreeNode, visit: (node: TreeNode) => void): void {
  visit(node);
  if (node.kind === "mapping") {
    for (const entry of node.entries) {
      walk(entry.value, visit);
    }
  } else if (node.kind === "sequence") {
    for (const item of node.items) {
      walk(item, visit);
    }
  }
}

export function collectScalars(node: TreeNode): ScalarNode[] {
  const scalars: ScalarNode[] = [];
  walk(node, (current) => {
    if (current.kind === "scalar") {
      scalars.push(current);
    }
  });
  return scalars;
}

/** Last key on the node's path, if it sits in a mapping. */
export function keyOf(node: TreeNode): string | undefined {
  const last = node.path[node.path.length - 1];
  return typeof last === "string" ? last : undefined;
}

const SIMPLE_KEY = /^[A-Za-z_][A-Za-z0-9_-]*$/;

export function formatPath(path: readonly PathSegment[]): string {
  if (path.length === 0) {
    return "$";
  }
  let result = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      result += `[${segment}]`;
    } else if (SIMPLE_KEY.test(segment)) {
      result += result.length === 0 ? segment : `.${segment}`;
    } else {
      result += `[${JSON.stringify(segment)}]`;
    }
  }
  return result;
}

import type { MappingNode, TreeNode } from "../types.js";
import { asList, child, isMapping, mappingEntries, walk } from "../../utils/tree.js";

export interface TerraformBlock {
  type: string;
  name: string;
  body: MappingNode;
}

/** `resource "type" "name" { ... }` bodies, optionally limited to some resource types. */
export function terraformResources(root: TreeNode, types?: readonly string[]): TerraformBlock[] {
  const blocks: TerraformBlock[] = [];
  for (const typeEntry of mappingEntries(child(root, "resource"))) {
    if (types && !types.includes(typeEntry.key)) {
      continue;
    }
    for (const nameEntry of mappingEntries(typeEntry.value)) {
      for (const body of asList(nameEntry.value)) {
        if (isMapping(body)) {
          blocks.push({ type: typeEntry.key, name: nameEntry.key, body });
        }
      }
    }
  }
  return blocks;
}

/** Single-label blocks (`provider`, `module`, `variable`). */
export function labeledBlocks(root: TreeNode, kind: string): Array<{ name: string; body: MappingNode }> {
  return mappingEntries(child(root, kind)).flatMap((entry) =>
    asList(entry.value)
      .filter(isMapping)
      .map((body) => ({ name: entry.key, body })),
  );
}

export function nestedBlocks(body: TreeNode | undefined, key: string): MappingNode[] {
  return asList(child(body, key)).filter(isMapping);
}

/** Every mapping reachable from `node` that has a block or object under `key`. */
export function findAll(node: TreeNode, key: string): MappingNode[] {
  const found: MappingNode[] = [];
  walk(node, (current) => {
    if (isMapping(current)) {
      found.push(...nestedBlocks(current, key));
    }
  });
  return found;
}

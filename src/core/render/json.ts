import type { DocTree } from "../docs/doc-tree.js";

/**
 * The tree as indented JSON, exactly as decoded
 */
export function renderJson(tree: DocTree): string {
  return `${JSON.stringify(tree, null, 2)}\n`;
}

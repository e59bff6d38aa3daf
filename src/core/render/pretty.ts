/**
 * Plain-text listing of a doc tree for terminals
 *
 * @module
 */

import { functionDocs, type DocTree, type FuncMap } from "../docs/doc-tree.js";
import { exportedFunctions } from "../docs/resolution.js";
import { NO_WORLDS_MESSAGE, type DisplayFilters } from "./types.js";

export const PRETTY_PLACEHOLDER = "(no documentation)";

function functionSection(heading: string, functions: FuncMap | undefined, filters: DisplayFilters): string[] {
  const entries = Object.entries(functions ?? {});
  if (entries.length === 0) return [];

  const lines: string[] = [];
  if (!filters.functionsOnly) lines.push(heading);
  for (const [name, entry] of entries) {
    lines.push(`  ${name}: ${functionDocs(entry) ?? PRETTY_PLACEHOLDER}`);
  }
  lines.push("");
  return lines;
}

export function renderPretty(tree: DocTree, filters: DisplayFilters = {}): string {
  const worlds = Object.entries(tree.worlds);
  if (worlds.length === 0) return `${NO_WORLDS_MESSAGE}\n`;

  const lines: string[] = [];
  for (const [name, world] of worlds) {
    if (!filters.functionsOnly) {
      lines.push(`World: ${name}`);
      lines.push(`  ${world.docs ?? PRETTY_PLACEHOLDER}`);
      lines.push("");
    }

    if (!filters.worldsOnly) {
      lines.push(...functionSection("Exported Functions:", exportedFunctions(world), filters));
      lines.push(...functionSection("Imported Functions:", world.func_imports, filters));
    }
  }

  return lines.map((line) => `${line}\n`).join("");
}

/**
 * Name resolution between declarations in WIT text and entries of a DocTree.
 *
 * Each compatibility rule is its own exported function:
 * - exact world name match wins
 * - single-world fallback: a tree with exactly one world answers for any name
 * - export alias: `func_exports`, or the legacy `functions` when it is absent
 *
 * @module
 */

import { functionDocs, type DocTree, type FuncMap, type WorldDocs } from "./doc-tree.js";

/**
 * Look a world up by its exact name
 */
export function findWorldExact(tree: DocTree, worldName: string): WorldDocs | undefined {
  return Object.hasOwn(tree.worlds, worldName) ? tree.worlds[worldName] : undefined;
}

/**
 * The tree's only world, when it has exactly one
 */
export function singleWorldFallback(tree: DocTree): WorldDocs | undefined {
  const worlds = Object.values(tree.worlds);
  return worlds.length === 1 ? worlds[0] : undefined;
}

/**
 * Exact match first, then the single-world fallback. Zero or several worlds
 * with no exact match resolve to nothing.
 */
export function resolveWorld(tree: DocTree, worldName: string): WorldDocs | undefined {
  return findWorldExact(tree, worldName) ?? singleWorldFallback(tree);
}

/**
 * Exported functions of a world: `func_exports` when present, else `functions`.
 * The two maps are never merged.
 */
export function exportedFunctions(world: WorldDocs): FuncMap | undefined {
  return world.func_exports ?? world.functions;
}

export function resolveWorldDocs(tree: DocTree, worldName: string): string | undefined {
  return resolveWorld(tree, worldName)?.docs ?? undefined;
}

/**
 * Docs of a function declared in a world. `export` and `import` declarations
 * both read the exported collection; `func_imports` is only listed by renderers.
 */
export function resolveFunctionDocs(tree: DocTree, worldName: string, funcName: string): string | undefined {
  const world = resolveWorld(tree, worldName);
  if (!world) return undefined;

  const functions = exportedFunctions(world);
  if (!functions || !Object.hasOwn(functions, funcName)) return undefined;
  return functionDocs(functions[funcName]);
}

/**
 * WIT Source Reader
 *
 * Collects `///` doc comments from the top-level `.wit` files of a package
 * directory and attaches them to the package, its worlds, the functions a
 * world imports or exports, and interfaces with their functions.
 *
 * This is a line scanner with brace-depth tracking, not a WIT parser: it
 * assumes one declaration header per line, which is how WIT is written in
 * practice. Items without docs are left out of the tree, and so are worlds and
 * interfaces with nothing documented.
 *
 * @module
 */

import * as path from "node:path";
import type { IDocSource, PackageDocs } from "../interfaces/IDocSource.js";
import type { DocTree, FuncMap, InterfaceDocs, WorldDocs } from "../docs/doc-tree.js";
import { ErrorCode, IOError, ParseError } from "../errors.js";
import { listFilesWithExtension, readTextFile } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("wit-source");

// =============================================================================
// Patterns
// =============================================================================

const NAME = String.raw`%?[A-Za-z][\w-]*`;
const PACKAGE_RE = /^package\s+([^\s;{]+)/;
const WORLD_RE = new RegExp(`^world\\s+(${NAME})`);
const INTERFACE_RE = new RegExp(`^interface\\s+(${NAME})`);
const WORLD_FUNC_RE = new RegExp(`^(export|import)\\s+(${NAME})\\s*:\\s*(?:async\\s+)?func\\b`);
const INTERFACE_FUNC_RE = new RegExp(`^(${NAME})\\s*:\\s*(?:async\\s+)?func\\b`);

// =============================================================================
// Builders
// =============================================================================

interface WorldBuilder {
  docs?: string;
  exports: Map<string, string>;
  imports: Map<string, string>;
}

interface InterfaceBuilder {
  docs?: string;
  funcs: Map<string, string>;
}

type Scope =
  | { kind: "world"; builder: WorldBuilder }
  | { kind: "interface"; builder: InterfaceBuilder };

/**
 * Accumulates docs across every file of one package
 */
export class PackageDocsBuilder {
  packageId?: string;
  packageDocs?: string;
  private readonly worlds = new Map<string, WorldBuilder>();
  private readonly interfaces = new Map<string, InterfaceBuilder>();

  world(name: string, source: string): WorldBuilder {
    if (this.worlds.has(name)) {
      throw new ParseError(`world \`${name}\` is defined more than once`, ErrorCode.PARSE_WIT_INVALID, {
        filePath: source,
      });
    }
    const builder: WorldBuilder = { exports: new Map(), imports: new Map() };
    this.worlds.set(name, builder);
    return builder;
  }

  interface(name: string, source: string): InterfaceBuilder {
    if (this.interfaces.has(name)) {
      throw new ParseError(`interface \`${name}\` is defined more than once`, ErrorCode.PARSE_WIT_INVALID, {
        filePath: source,
      });
    }
    const builder: InterfaceBuilder = { funcs: new Map() };
    this.interfaces.set(name, builder);
    return builder;
  }

  build(): DocTree {
    const tree: DocTree = { worlds: {} };
    if (this.packageDocs !== undefined) tree.docs = this.packageDocs;

    for (const [name, builder] of this.worlds) {
      const world: WorldDocs = {};
      if (builder.docs !== undefined) world.docs = builder.docs;
      if (builder.exports.size > 0) world.func_exports = toFuncMap(builder.exports);
      if (builder.imports.size > 0) world.func_imports = toFuncMap(builder.imports);
      if (Object.keys(world).length > 0) tree.worlds[name] = world;
    }

    const interfaces: Record<string, InterfaceDocs> = {};
    for (const [name, builder] of this.interfaces) {
      const iface: InterfaceDocs = {};
      if (builder.docs !== undefined) iface.docs = builder.docs;
      if (builder.funcs.size > 0) iface.funcs = toFuncMap(builder.funcs);
      if (Object.keys(iface).length > 0) interfaces[name] = iface;
    }
    if (Object.keys(interfaces).length > 0) tree.interfaces = interfaces;

    return tree;
  }
}

function toFuncMap(entries: Map<string, string>): FuncMap {
  const map: FuncMap = {};
  for (const [name, docs] of entries) map[name] = { docs };
  return map;
}

// =============================================================================
// Scanning
// =============================================================================

function unescapeName(name: string): string {
  return name.startsWith("%") ? name.slice(1) : name;
}

function stripLineComment(line: string): string {
  const index = line.indexOf("//");
  return index === -1 ? line : line.slice(0, index).trimEnd();
}

function countBraces(code: string): number {
  let delta = 0;
  for (const char of code) {
    if (char === "{") delta++;
    else if (char === "}") delta--;
  }
  return delta;
}

/**
 * Scan one WIT file into `builder`
 *
 * @param source - File name used in error messages
 */
export function scanWitSource(text: string, builder: PackageDocsBuilder, source: string): void {
  let pending: string[] = [];
  let depth = 0;
  let scope: Scope | null = null;

  for (const rawLine of text.split("\n")) {
    const trimmed = rawLine.trim();

    if (trimmed.startsWith("///") && !trimmed.startsWith("////")) {
      pending.push(trimmed.slice(3).trim());
      continue;
    }
    if (trimmed === "" || trimmed.startsWith("//")) continue;

    const code = stripLineComment(trimmed);
    const docs = pending.length > 0 ? pending.join("\n") : undefined;
    pending = [];
    let opened: Scope | null = null;

    if (depth === 0) {
      const pkg = PACKAGE_RE.exec(code);
      const world = WORLD_RE.exec(code);
      const iface = INTERFACE_RE.exec(code);

      if (pkg?.[1]) {
        const packageId = pkg[1];
        if (builder.packageId !== undefined && builder.packageId !== packageId) {
          throw new ParseError(
            `package \`${packageId}\` does not match \`${builder.packageId}\` declared earlier`,
            ErrorCode.PARSE_WIT_INVALID,
            { filePath: source }
          );
        }
        builder.packageId = packageId;
        if (docs !== undefined) builder.packageDocs = docs;
      } else if (world?.[1]) {
        const worldBuilder = builder.world(unescapeName(world[1]), source);
        worldBuilder.docs = docs;
        opened = { kind: "world", builder: worldBuilder };
      } else if (iface?.[1]) {
        const ifaceBuilder = builder.interface(unescapeName(iface[1]), source);
        ifaceBuilder.docs = docs;
        opened = { kind: "interface", builder: ifaceBuilder };
      }
    } else if (depth === 1 && scope !== null && docs !== undefined) {
      if (scope.kind === "world") {
        const match = WORLD_FUNC_RE.exec(code);
        if (match?.[1] && match[2]) {
          const target = match[1] === "export" ? scope.builder.exports : scope.builder.imports;
          target.set(unescapeName(match[2]), docs);
        }
      } else {
        const match = INTERFACE_FUNC_RE.exec(code);
        if (match?.[1]) {
          scope.builder.funcs.set(unescapeName(match[1]), docs);
        }
      }
    }

    depth = Math.max(0, depth + countBraces(code));
    if (opened !== null && depth === 1) {
      scope = opened;
    } else if (depth === 0) {
      scope = null;
    }
  }
}

// =============================================================================
// Reader
// =============================================================================

/**
 * Reads a WIT package directory into a doc tree
 */
export class WitSourceReader implements IDocSource {
  async read(witDir: string): Promise<PackageDocs> {
    const files = await listFilesWithExtension(witDir, ".wit");
    if (files.length === 0) {
      throw new IOError("no .wit files found", ErrorCode.IO_NOT_FOUND, { filePath: witDir });
    }

    const builder = new PackageDocsBuilder();
    for (const file of files) {
      const text = await readTextFile(file, "reading WIT source");
      scanWitSource(text, builder, path.basename(file));
    }

    if (builder.packageId === undefined) {
      throw new ParseError("no `package` declaration found", ErrorCode.PARSE_WIT_INVALID, {
        filePath: witDir,
      });
    }

    const tree = builder.build();
    logger.debug(
      { packageId: builder.packageId, files: files.length, worlds: Object.keys(tree.worlds).length },
      "Resolved WIT package docs"
    );
    return { packageId: builder.packageId, tree };
  }
}

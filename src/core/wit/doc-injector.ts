/**
 * WIT Doc Injector
 *
 * Weaves a DocTree back into WIT text printed from a component. The text is
 * never parsed: a two-state line scanner recognises `world` headers at the top
 * level and `export` / `import` lines inside a world body, and writes `///`
 * comment lines in front of them. Lines it cannot interpret pass through
 * unchanged, so the output is the input plus comment lines.
 *
 * @module
 */

import type { DocTree } from "../docs/doc-tree.js";
import { resolveFunctionDocs, resolveWorldDocs } from "../docs/resolution.js";

export const UNKNOWN_WORLD = "unknown";

const WORLD_HEADER_RE = /^world\s/;
const FUNCTION_LINE_RE = /^(?:export|import)\s/;

type ScannerState = "top-level" | "world-body";

/**
 * Split text into lines: `\n` separates, a trailing `\r` is dropped, and the
 * empty remainder after a final newline is not a line.
 */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Second whitespace-separated token of a world header, or "unknown"
 */
export function extractWorldName(trimmedLine: string): string {
  return trimmedLine.split(/\s+/)[1] ?? UNKNOWN_WORLD;
}

/**
 * Name of the function declared by an `export` / `import` line: the second
 * token before the first colon. Lines of any other shape yield undefined.
 */
export function extractFunctionName(trimmedLine: string): string | undefined {
  const colon = trimmedLine.indexOf(":");
  if (colon === -1) return undefined;

  const name = trimmedLine.slice(0, colon).split(/\s+/).filter(Boolean)[1];
  if (name === undefined) return undefined;
  return name.startsWith("%") ? name.slice(1) : name;
}

export function leadingWhitespace(line: string): string {
  return line.slice(0, line.length - line.trimStart().length);
}

function docComment(indent: string, docs: string): string[] {
  return splitLines(docs).map((docLine) => `${indent}/// ${docLine}`);
}

/**
 * Return `witText` with world and function docs from `tree` inserted as `///`
 * comments. Every output line ends with a newline.
 */
export function injectDocs(witText: string, tree: DocTree): string {
  const out: string[] = [];
  let state: ScannerState = "top-level";
  let worldName = UNKNOWN_WORLD;

  for (const line of splitLines(witText)) {
    const trimmed = line.trim();

    if (state === "top-level") {
      if (WORLD_HEADER_RE.test(trimmed)) {
        worldName = extractWorldName(trimmed);
        const docs = resolveWorldDocs(tree, worldName);
        if (docs !== undefined) out.push(...docComment("", docs));
        state = "world-body";
      }
      out.push(line);
      continue;
    }

    if (FUNCTION_LINE_RE.test(trimmed)) {
      const funcName = extractFunctionName(trimmed);
      if (funcName !== undefined) {
        const docs = resolveFunctionDocs(tree, worldName, funcName);
        if (docs !== undefined) out.push(...docComment(leadingWhitespace(line), docs));
      }
    }

    out.push(line);
    if (trimmed === "}") state = "top-level";
  }

  return out.map((line) => `${line}\n`).join("");
}

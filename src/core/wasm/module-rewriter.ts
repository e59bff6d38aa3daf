/**
 * Module rewriter
 *
 * Copies a module or component section by section and appends one custom
 * section at the end. Sections are never decoded beyond their framing, so
 * section kinds this tool does not know are carried over unchanged.
 *
 * @module
 */

import type { OnExisting } from "../../utils/validation.js";
import { createLogger } from "../../utils/logger.js";
import { concatBytes, encodeCustomSection, parseBinary, type RawSection } from "./binary.js";

const logger = createLogger("module-rewriter");

export interface RewriteOptions {
  /**
   * Custom sections already named like the new one: "replace" drops them,
   * "append" keeps them so the binary ends up with duplicates.
   * @default "replace"
   */
  onExisting?: OnExisting;
}

export interface RewriteResult {
  bytes: Uint8Array;
  /** Sections copied from the input */
  preserved: number;
  /** Same-named custom sections dropped under "replace" */
  replaced: number;
}

/**
 * Re-emit `original` with a custom section `name` holding `payload` appended.
 *
 * @throws RewriteError when `original` is not a structurally valid binary
 */
export function rewriteModule(
  original: Uint8Array,
  name: string,
  payload: Uint8Array,
  options: RewriteOptions = {}
): RewriteResult {
  const { onExisting = "replace" } = options;
  const parsed = parseBinary(original);

  const kept: RawSection[] = [];
  let replaced = 0;
  for (const section of parsed.sections) {
    if (onExisting === "replace" && section.name === name) {
      replaced++;
      continue;
    }
    kept.push(section);
  }

  const bytes = concatBytes([
    parsed.preamble,
    ...kept.map((section) => section.bytes),
    encodeCustomSection(name, payload),
  ]);

  logger.debug(
    { kind: parsed.kind, preserved: kept.length, replaced, section: name, bytes: bytes.length },
    "Rewrote binary"
  );
  return { bytes, preserved: kept.length, replaced };
}

/**
 * package-docs section codec
 *
 * Payload layout: one version byte, then the doc tree as UTF-8 JSON.
 * Decoders skip the version byte without checking it; it is reserved so a
 * later payload shape can be told apart.
 *
 * @module
 */

import { DocTreeSchema, type DocTree } from "../docs/doc-tree.js";
import { DecodingError, EncodingError, ErrorCode } from "../errors.js";
import { formatZodError, safeValidate } from "../../utils/validation.js";
import { createLogger } from "../../utils/logger.js";
import { customSections, parseBinary, type CustomSection } from "./binary.js";

const logger = createLogger("section-codec");

export const SECTION_NAME = "package-docs";
export const PAYLOAD_VERSION = 1;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Serialize a doc tree into a section payload
 *
 * @throws EncodingError if the tree cannot be serialized to JSON
 */
export function encodeDocTree(tree: DocTree): Uint8Array {
  let json: string;
  try {
    json = JSON.stringify(tree);
  } catch (error) {
    throw new EncodingError(
      `encoding ${SECTION_NAME}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const body = new TextEncoder().encode(json);
  const payload = new Uint8Array(body.length + 1);
  payload[0] = PAYLOAD_VERSION;
  payload.set(body, 1);

  logger.debug({ bytes: payload.length, version: PAYLOAD_VERSION }, "Encoded package-docs payload");
  return payload;
}

/**
 * Parse a section payload back into a doc tree
 *
 * @throws DecodingError for a payload of one byte or less, invalid UTF-8,
 * invalid JSON, or JSON that is not a doc tree
 */
export function decodeDocTree(payload: Uint8Array): DocTree {
  if (payload.length <= 1) {
    throw new DecodingError(`${SECTION_NAME} payload has no content after the version byte`, ErrorCode.PARSE_PAYLOAD_EMPTY, {
      length: payload.length,
    });
  }

  let text: string;
  try {
    text = utf8.decode(payload.subarray(1));
  } catch {
    throw new DecodingError(`${SECTION_NAME} payload is not valid UTF-8`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DecodingError(
      `Failed to parse ${SECTION_NAME} JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = safeValidate(DocTreeSchema, raw);
  if (!result.success) {
    throw new DecodingError(
      `${SECTION_NAME} JSON does not describe a doc tree: ${formatZodError(result.error).join("; ")}`
    );
  }
  return result.data;
}

/**
 * Data of the first custom section called `name`. Later duplicates are ignored.
 */
export function findCustomSection(
  sections: readonly CustomSection[],
  name: string = SECTION_NAME
): Uint8Array | undefined {
  return sections.find((section) => section.name === name)?.data;
}

/**
 * Read the doc tree out of a module or component binary.
 *
 * Returns null when no package-docs section carries a payload. Sections whose
 * payload is a lone version byte (or empty) are passed over, not rejected.
 *
 * @throws RewriteError when the binary itself is malformed
 * @throws DecodingError when a payload is present but unreadable
 */
export function extractDocTree(moduleBytes: Uint8Array): DocTree | null {
  const { sections } = parseBinary(moduleBytes);

  for (const section of customSections(sections)) {
    if (section.name !== SECTION_NAME) continue;
    if (section.data.length <= 1) {
      logger.debug({ length: section.data.length }, "Skipping package-docs section without payload");
      continue;
    }
    return decodeDocTree(section.data);
  }

  return null;
}

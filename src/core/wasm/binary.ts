/**
 * WebAssembly binary container
 *
 * Splits a core module or component into its preamble and top-level sections
 * without interpreting section contents. Each section keeps the exact bytes it
 * was read from, header included, so writing them back reproduces the input
 * even where an encoder used a padded LEB128 size.
 *
 * @module
 */

import { ErrorCode, RewriteError } from "../errors.js";
import { decodeVarUint32, encodeVarUint32 } from "./leb128.js";

// =============================================================================
// Constants
// =============================================================================

export const WASM_MAGIC = Uint8Array.of(0x00, 0x61, 0x73, 0x6d);
export const PREAMBLE_LENGTH = 8;
export const CUSTOM_SECTION_ID = 0;

/** Layer field of the preamble: 0 for core modules, 1 for components */
export type BinaryKind = "module" | "component";

const CORE_MODULE_VERSION = 1;
const COMPONENT_LAYER = 1;

// =============================================================================
// Types
// =============================================================================

export interface RawSection {
  /** Section id byte */
  id: number;
  /** Offset of the id byte in the source binary */
  offset: number;
  /** Full encoded section: id, size and contents */
  bytes: Uint8Array;
  /** Section contents (view into `bytes`) */
  contents: Uint8Array;
  /** Name of a custom section; undefined for every other id */
  name?: string;
  /** Custom section data after the name (view into `bytes`) */
  data?: Uint8Array;
}

export interface CustomSection {
  name: string;
  data: Uint8Array;
}

export interface ParsedBinary {
  kind: BinaryKind;
  preamble: Uint8Array;
  sections: RawSection[];
}

// =============================================================================
// Parsing
// =============================================================================

const utf8 = new TextDecoder("utf-8", { fatal: true });

function readPreamble(bytes: Uint8Array): BinaryKind {
  if (bytes.length < PREAMBLE_LENGTH) {
    throw new RewriteError("input is too short to be a wasm binary", ErrorCode.PARSE_MODULE_INVALID, {
      offset: 0,
      length: bytes.length,
    });
  }
  for (let i = 0; i < WASM_MAGIC.length; i++) {
    if (bytes[i] !== WASM_MAGIC[i]) {
      throw new RewriteError("magic header not detected: not a wasm binary", ErrorCode.PARSE_MODULE_INVALID, {
        offset: i,
      });
    }
  }

  const version = (bytes[4] ?? 0) | ((bytes[5] ?? 0) << 8);
  const layer = (bytes[6] ?? 0) | ((bytes[7] ?? 0) << 8);

  if (layer === 0 && version === CORE_MODULE_VERSION) return "module";
  if (layer === COMPONENT_LAYER) return "component";

  throw new RewriteError(
    `unknown binary version 0x${version.toString(16)} with layer ${layer}`,
    ErrorCode.PARSE_MODULE_INVALID,
    { offset: 4 }
  );
}

function readCustomName(contents: Uint8Array, sectionOffset: number): { name: string; data: Uint8Array } {
  const { value: nameLength, length } = decodeVarUint32(contents, 0);
  const nameEnd = length + nameLength;
  if (nameEnd > contents.length) {
    throw new RewriteError("custom section name runs past the end of the section", ErrorCode.PARSE_MODULE_INVALID, {
      offset: sectionOffset,
    });
  }

  let name: string;
  try {
    name = utf8.decode(contents.subarray(length, nameEnd));
  } catch {
    throw new RewriteError("custom section name is not valid UTF-8", ErrorCode.PARSE_MODULE_INVALID, {
      offset: sectionOffset,
    });
  }
  return { name, data: contents.subarray(nameEnd) };
}

/**
 * Split a binary into its preamble and top-level sections.
 *
 * @throws RewriteError when the input is not a structurally valid module or component
 */
export function parseBinary(bytes: Uint8Array): ParsedBinary {
  const kind = readPreamble(bytes);
  const sections: RawSection[] = [];

  let offset = PREAMBLE_LENGTH;
  while (offset < bytes.length) {
    const id = bytes[offset] ?? 0;
    const size = decodeVarUint32(bytes, offset + 1);
    const contentsStart = offset + 1 + size.length;
    const end = contentsStart + size.value;

    if (end > bytes.length) {
      throw new RewriteError(
        `section ${id} declares ${size.value} bytes but only ${bytes.length - contentsStart} remain`,
        ErrorCode.PARSE_MODULE_INVALID,
        { offset }
      );
    }

    const sectionBytes = bytes.subarray(offset, end);
    const contents = bytes.subarray(contentsStart, end);
    const section: RawSection = { id, offset, bytes: sectionBytes, contents };

    if (id === CUSTOM_SECTION_ID) {
      const { name, data } = readCustomName(contents, offset);
      section.name = name;
      section.data = data;
    }

    sections.push(section);
    offset = end;
  }

  return { kind, preamble: bytes.subarray(0, PREAMBLE_LENGTH), sections };
}

/**
 * Custom sections in stored order
 */
export function customSections(sections: readonly RawSection[]): CustomSection[] {
  const result: CustomSection[] = [];
  for (const section of sections) {
    if (section.name !== undefined && section.data !== undefined) {
      result.push({ name: section.name, data: section.data });
    }
  }
  return result;
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Encode a complete custom section: id 0, size, name, data
 */
export function encodeCustomSection(name: string, data: Uint8Array): Uint8Array {
  const nameBytes = new TextEncoder().encode(name);
  const nameLength = encodeVarUint32(nameBytes.length);
  const contentsLength = nameLength.length + nameBytes.length + data.length;
  const size = encodeVarUint32(contentsLength);

  return concatBytes([Uint8Array.of(CUSTOM_SECTION_ID), size, nameLength, nameBytes, data]);
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  let total = 0;
  for (const part of parts) total += part.length;

  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

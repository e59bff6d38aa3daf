/**
 * Byte-level builders for test binaries
 */

import { encodeVarUint32 } from "../leb128.js";

export const CORE_PREAMBLE = [0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00];
export const COMPONENT_PREAMBLE = [0x00, 0x61, 0x73, 0x6d, 0x0d, 0x00, 0x01, 0x00];

export function bytes(...parts: ArrayLike<number>[]): Uint8Array {
  const out: number[] = [];
  for (const part of parts) out.push(...Array.from(part));
  return Uint8Array.from(out);
}

/** A section with a canonical size field */
export function section(id: number, contents: ArrayLike<number>): Uint8Array {
  return bytes([id], encodeVarUint32(contents.length), contents);
}

export function customSection(name: string, data: ArrayLike<number>): Uint8Array {
  const nameBytes = new TextEncoder().encode(name);
  return section(0, bytes(encodeVarUint32(nameBytes.length), nameBytes, data));
}

/** `() -> ()` type, one function using it, an empty body */
export function sampleCoreModule(): Uint8Array {
  return bytes(
    CORE_PREAMBLE,
    section(1, [0x01, 0x60, 0x00, 0x00]),
    section(3, [0x01, 0x00]),
    customSection("producers", [0x00]),
    section(10, [0x01, 0x02, 0x00, 0x0b])
  );
}

/** A component with sections this tool knows nothing about */
export function sampleComponent(): Uint8Array {
  return bytes(
    COMPONENT_PREAMBLE,
    section(7, [0x01, 0x40, 0x00, 0x01, 0x00]),
    customSection("component-type", [0x04, 0x00, 0x01]),
    section(11, [0x00])
  );
}

/**
 * Unsigned LEB128, as used for sizes, counts and name lengths in wasm binaries
 */

import { ErrorCode, RewriteError } from "../errors.js";

/** varuint32 never takes more than 5 bytes */
export const MAX_VARUINT32_BYTES = 5;

export interface DecodedVarUint {
  value: number;
  /** Bytes consumed */
  length: number;
}

/**
 * Decode a varuint32 at `offset`.
 *
 * @throws RewriteError when the encoding runs past the end of `bytes`,
 * is longer than 5 bytes, or does not fit in 32 bits
 */
export function decodeVarUint32(bytes: Uint8Array, offset: number): DecodedVarUint {
  let value = 0;
  let shift = 0;

  for (let i = 0; i < MAX_VARUINT32_BYTES; i++) {
    const position = offset + i;
    if (position >= bytes.length) {
      throw new RewriteError("unexpected end of input in LEB128 integer", ErrorCode.PARSE_MODULE_INVALID, {
        offset: position,
      });
    }
    const byte = bytes[position] ?? 0;

    if (i === MAX_VARUINT32_BYTES - 1 && (byte & 0xf0) !== 0) {
      throw new RewriteError("LEB128 integer too large for 32 bits", ErrorCode.PARSE_MODULE_INVALID, {
        offset: position,
      });
    }

    // Multiplication keeps bit 31 from turning the value negative
    value += (byte & 0x7f) * 2 ** shift;
    if ((byte & 0x80) === 0) {
      return { value, length: i + 1 };
    }
    shift += 7;
  }

  throw new RewriteError("LEB128 integer longer than 5 bytes", ErrorCode.PARSE_MODULE_INVALID, {
    offset: offset + MAX_VARUINT32_BYTES - 1,
  });
}

/**
 * Encode a number as the shortest varuint32
 */
export function encodeVarUint32(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new RangeError(`${value} is not a u32`);
  }

  const out: number[] = [];
  let remaining = value;
  do {
    let byte = remaining % 0x80;
    remaining = Math.floor(remaining / 0x80);
    if (remaining !== 0) byte |= 0x80;
    out.push(byte);
  } while (remaining !== 0);

  return Uint8Array.from(out);
}

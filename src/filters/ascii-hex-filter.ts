import { CHAR_ANGLE_BRACKET_CLOSE } from "#src/helpers/chars";
import type { Filter } from "./filter";

const HEX_DIGITS = "0123456789ABCDEF";
const NIBBLE_MASK = 0x0f;

/**
 * ASCIIHexDecode filter.
 *
 * Each byte becomes two uppercase hex digits; the data ends with the `>`
 * end-of-data marker.
 *
 * Example: "Hello" → "48656C6C6F>"
 */
export class ASCIIHexFilter implements Filter {
  readonly name = "ASCIIHexDecode";

  static readonly END_MARKER = CHAR_ANGLE_BRACKET_CLOSE;

  encode(data: Uint8Array): Uint8Array {
    const result = new Uint8Array(data.length * 2 + 1);

    let i = 0;

    for (const byte of data) {
      result[i] = HEX_DIGITS.charCodeAt((byte >> 4) & NIBBLE_MASK);
      result[i + 1] = HEX_DIGITS.charCodeAt(byte & NIBBLE_MASK);

      i += 2;
    }

    result[i] = ASCIIHexFilter.END_MARKER;

    return result;
  }
}

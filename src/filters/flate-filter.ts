import { deflate } from "pako";

import type { Filter } from "./filter";

/**
 * FlateDecode filter - zlib/deflate compression via pako.
 *
 * Output is zlib format (RFC 1950, with header and Adler-32), which is what
 * PDF readers expect for /FlateDecode.
 */
export class FlateFilter implements Filter {
  readonly name = "FlateDecode";

  encode(data: Uint8Array): Uint8Array {
    return deflate(data);
  }
}

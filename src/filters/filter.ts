/**
 * Stream filter contract.
 *
 * `name` is the PDF filter name that appears in a stream's /Filter entry.
 * `encode` produces data a reader undoes with that filter.
 */
export interface Filter {
  readonly name: FilterName;

  encode(data: Uint8Array): Uint8Array;
}

/**
 * Filter names this library emits in /Filter arrays.
 *
 * DCTDecode is only ever declared (JPEG payloads pass through untouched),
 * so it has no Filter implementation.
 */
export type FilterName = "ASCIIHexDecode" | "FlateDecode" | "DCTDecode";

/**
 * Test utilities for inspecting written PDF files.
 */

import { decodeLatin1 } from "#src/helpers/strings";

/**
 * A written file as text, with its cross-reference table parsed.
 */
export interface ParsedOutput {
  /** The whole file, one character per byte */
  text: string;
  /** Offset of the xref keyword, from startxref */
  xrefOffset: number;
  /** Offset of object N at index N - 1 */
  offsets: number[];
  /** The trailer dictionary text */
  trailer: string;
}

/**
 * Parse the single-subsection xref table this library writes.
 *
 * @example
 * ```ts
 * const { offsets, text } = parseOutput(doc.save());
 * expect(text.startsWith("1 0 obj", offsets[0])).toBe(true);
 * ```
 */
export function parseOutput(bytes: Uint8Array): ParsedOutput {
  const text = decodeLatin1(bytes);

  const startxref = /startxref\n(\d+)\n%%EOF\n$/.exec(text);

  if (!startxref) {
    throw new Error("No startxref at end of file");
  }

  const xrefOffset = Number(startxref[1]);
  const header = /^xref\n0 (\d+)\n/.exec(text.slice(xrefOffset));

  if (!header) {
    throw new Error(`No xref table at offset ${xrefOffset}`);
  }

  const size = Number(header[1]);
  const entriesStart = xrefOffset + header[0].length;
  const offsets: number[] = [];

  // Entry 0 is the free list head
  for (let i = 1; i < size; i++) {
    const entry = text.slice(entriesStart + i * 20, entriesStart + (i + 1) * 20);

    offsets.push(Number(entry.slice(0, 10)));
  }

  const trailerStart = text.indexOf("trailer\n", entriesStart);
  const trailer = text.slice(trailerStart, text.indexOf("startxref", trailerStart));

  return { text, xrefOffset, offsets, trailer };
}

/**
 * Extract the body of object `objectNumber` ("N 0 obj\n" … "\nendobj").
 */
export function objectBody(parsed: ParsedOutput, objectNumber: number): string {
  const start = parsed.offsets[objectNumber - 1];
  const end = parsed.text.indexOf("\nendobj", start);

  return parsed.text.slice(start + `${objectNumber} 0 obj\n`.length, end);
}

/**
 * Cross-reference table and trailer writing.
 *
 * Objects are numbered contiguously from 1, so the table is a single
 * subsection starting at the free list head.
 */

import type { ByteWriter } from "#src/io/byte-writer";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";

/**
 * Options for writing the xref section.
 */
export interface XRefWriteOptions {
  /** Byte offset where the xref section starts */
  xrefOffset: number;

  /** Byte offset of object N at index N - 1 */
  offsets: readonly number[];

  /** Root catalog reference */
  root: PdfRef;

  /** Info dictionary reference (optional) */
  info?: PdfRef;
}

/** Free list head entry */
const FREE_ENTRY = "0000000000 65535 f\r\n";

/**
 * Format an in-use xref entry (exactly 20 bytes).
 *
 * Format: "OOOOOOOOOO 00000 n\r\n"
 */
export function formatXRefEntry(offset: number): string {
  return `${offset.toString().padStart(10, "0")} 00000 n\r\n`;
}

/**
 * Write the xref table, trailer, startxref and end marker.
 *
 * Format:
 * ```
 * xref
 * 0 4
 * 0000000000 65535 f
 * 0000000015 00000 n
 * ...
 * trailer
 * << /Size 4 /Root 1 0 R >>
 * startxref
 * 12345
 * %%EOF
 * ```
 */
export function writeXRefTable(writer: ByteWriter, options: XRefWriteOptions): void {
  const size = options.offsets.length + 1;

  writer.writeAscii("xref\n");
  writer.writeAscii(`0 ${size}\n`);
  writer.writeAscii(FREE_ENTRY);

  for (const offset of options.offsets) {
    writer.writeAscii(formatXRefEntry(offset));
  }

  writer.writeAscii("trailer\n");
  buildTrailerDict(size, options).toBytes(writer);
  writer.writeAscii("\n");

  writer.writeAscii("startxref\n");
  writer.writeAscii(`${options.xrefOffset}\n`);
  writer.writeAscii("%%EOF\n");
}

function buildTrailerDict(size: number, options: XRefWriteOptions): PdfDict {
  const entries: [string, PdfObject][] = [
    ["Size", PdfNumber.of(size)],
    ["Root", options.root],
  ];

  if (options.info) {
    entries.push(["Info", options.info]);
  }

  return new PdfDict(entries);
}

/**
 * Append-only writer for indirect objects.
 *
 * Every object is written once, in object-number order, and its byte
 * offset is recorded for the cross-reference table.
 */

import { ObjectOrderError } from "#src/document/errors";
import { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";

import { writeXRefTable } from "./xref-writer";

/** "%" followed by four bytes >= 128, marking the file as binary */
const BINARY_MARKER = new Uint8Array([0x25, 0xe2, 0xe3, 0xcf, 0xd3, 0x0a]);

export interface ObjectWriterOptions {
  /** PDF version in the header (default: "1.4") */
  version?: string;
}

export interface TrailerOptions {
  root: PdfRef;
  info?: PdfRef;
}

/**
 * @example
 * ```typescript
 * const out = new ObjectWriter();
 * out.appendObject(PdfRef.of(1), catalog);
 * out.appendObject(PdfRef.of(2), pages);
 * const bytes = out.finish({ root: PdfRef.of(1) });
 * ```
 */
export class ObjectWriter {
  private readonly writer = new ByteWriter();
  private readonly objectOffsets: number[] = [];
  private finished = false;

  constructor(options: ObjectWriterOptions = {}) {
    this.writer.writeAscii(`%PDF-${options.version ?? "1.4"}\n`);
    this.writer.writeBytes(BINARY_MARKER);
  }

  /** Current output length in bytes */
  get position(): number {
    return this.writer.position;
  }

  /** Offsets of the objects written so far, object N at index N - 1 */
  get offsets(): readonly number[] {
    return this.objectOffsets;
  }

  /**
   * Write `N 0 obj … endobj` and return the offset it starts at.
   *
   * @throws {ObjectOrderError} if `ref` is not the next object number
   */
  appendObject(ref: PdfRef, obj: PdfObject): number {
    if (this.finished) {
      throw new Error("Cannot append objects after the trailer was written");
    }

    const expected = this.objectOffsets.length + 1;

    if (ref.objectNumber !== expected) {
      throw new ObjectOrderError(expected, ref.objectNumber);
    }

    const offset = this.writer.position;

    this.objectOffsets.push(offset);

    this.writer.writeAscii(`${ref.objectNumber} ${ref.generation} obj\n`);
    obj.toBytes(this.writer);
    this.writer.writeAscii("\nendobj\n");

    return offset;
  }

  /**
   * Write the xref table and trailer and return the complete file.
   */
  finish(trailer: TrailerOptions): Uint8Array {
    if (this.finished) {
      throw new Error("Trailer was already written");
    }

    this.finished = true;

    writeXRefTable(this.writer, {
      xrefOffset: this.writer.position,
      offsets: this.objectOffsets,
      root: trailer.root,
      info: trailer.info,
    });

    return this.writer.toBytes();
  }
}

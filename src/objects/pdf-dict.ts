import type { ByteWriter } from "#src/io/byte-writer";

import { PdfName } from "./pdf-name";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF dictionary object.
 *
 * In PDF: `<< /Type /Page /MediaBox [0 0 612 792] >>`
 *
 * Keys are PdfName; insertion order is preserved in the output.
 */
export class PdfDict implements PdfPrimitive {
  get type(): "dict" | "stream" {
    return "dict";
  }

  private entries = new Map<PdfName, PdfObject>();

  constructor(entries?: Iterable<[PdfName | string, PdfObject]>) {
    if (entries) {
      for (const [key, value] of entries) {
        this.set(key, value);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: PdfName | string): PdfObject | undefined {
    return this.entries.get(typeof key === "string" ? PdfName.of(key) : key);
  }

  set(key: PdfName | string, value: PdfObject): void {
    this.entries.set(typeof key === "string" ? PdfName.of(key) : key, value);
  }

  has(key: PdfName | string): boolean {
    return this.entries.has(typeof key === "string" ? PdfName.of(key) : key);
  }

  *[Symbol.iterator](): Iterator<[PdfName, PdfObject]> {
    yield* this.entries;
  }

  static of(entries: Record<string, PdfObject>): PdfDict {
    return new PdfDict(Object.entries(entries));
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("<<\n");
    this.writeEntries(writer);
    writer.writeAscii(">>");
  }

  /**
   * Write "/Key value\n" for every entry, skipping the given keys.
   */
  protected writeEntries(writer: ByteWriter, skip?: ReadonlySet<string>): void {
    for (const [key, value] of this.entries) {
      if (skip?.has(key.value)) {
        continue;
      }

      key.toBytes(writer);
      writer.writeAscii(" ");
      value.toBytes(writer);
      writer.writeAscii("\n");
    }
  }
}

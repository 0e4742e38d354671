import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF array object.
 *
 * In PDF: `[1 2 3]`, `[/Name (string) 42]`
 */
export class PdfArray implements PdfPrimitive {
  get type(): "array" {
    return "array";
  }

  private items: PdfObject[];

  constructor(items: PdfObject[] = []) {
    this.items = [...items];
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): PdfObject | undefined {
    return this.items.at(index);
  }

  push(...values: PdfObject[]): void {
    this.items.push(...values);
  }

  *[Symbol.iterator](): Iterator<PdfObject> {
    yield* this.items;
  }

  static of(...items: PdfObject[]): PdfArray {
    return new PdfArray(items);
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("[");

    this.items.forEach((item, i) => {
      if (i > 0) {
        writer.writeAscii(" ");
      }

      item.toBytes(writer);
    });

    writer.writeAscii("]");
  }
}

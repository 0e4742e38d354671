import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF indirect reference (interned).
 *
 * In PDF: `1 0 R`. Generation is always 0 for documents this library
 * writes, so only the object number is stored.
 */
export class PdfRef implements PdfPrimitive {
  get type(): "ref" {
    return "ref";
  }

  private static cache = new Map<number, PdfRef>();

  private constructor(readonly objectNumber: number) {}

  static of(objectNumber: number): PdfRef {
    let cached = PdfRef.cache.get(objectNumber);

    if (!cached) {
      cached = new PdfRef(objectNumber);

      PdfRef.cache.set(objectNumber, cached);
    }

    return cached;
  }

  /** Generation number (always 0) */
  get generation(): number {
    return 0;
  }

  toString(): string {
    return `${this.objectNumber} 0 R`;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.toString());
  }
}

import { formatPdfNumber } from "#src/helpers/format";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF numeric object (integer or real).
 *
 * In PDF: `42`, `-3.14`, `0.5`. Reals are written with at most five
 * decimals.
 */
export class PdfNumber implements PdfPrimitive {
  get type(): "number" {
    return "number";
  }

  /**
   * @throws {RangeError} for NaN and infinities, which PDF has no syntax for
   */
  constructor(readonly value: number) {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Cannot write non-finite number ${value}`);
    }
  }

  static of(value: number): PdfNumber {
    return new PdfNumber(value);
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(formatPdfNumber(this.value));
  }
}

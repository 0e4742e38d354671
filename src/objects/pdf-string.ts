import { bytesToHex, encodeWinAnsi, escapeLiteralString } from "#src/helpers/strings";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF string object.
 *
 * In PDF: `(Hello World)` (literal) or `<48656C6C6F>` (hex)
 */
export class PdfString implements PdfPrimitive {
  get type(): "string" {
    return "string";
  }

  constructor(
    readonly bytes: Uint8Array,
    readonly format: "literal" | "hex" = "literal",
  ) {}

  /**
   * Create a literal string from text, WinAnsi-encoded.
   */
  static fromString(str: string): PdfString {
    return new PdfString(encodeWinAnsi(str), "literal");
  }

  toBytes(writer: ByteWriter): void {
    if (this.format === "hex") {
      writer.writeAscii(`<${bytesToHex(this.bytes)}>`);

      return;
    }

    writer.writeByte(0x28); // (
    writer.writeBytes(escapeLiteralString(this.bytes));
    writer.writeByte(0x29); // )
  }
}

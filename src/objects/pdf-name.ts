import { CHAR_HASH, DELIMITERS, WHITESPACE } from "#src/helpers/chars";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

// Whitespace, delimiters and "#" must be written as #XX (ISO 32000-1, 7.3.5)
const NAME_NEEDS_ESCAPE = new Set([...WHITESPACE, ...DELIMITERS, CHAR_HASH]);

function escapeName(name: string): string {
  const bytes = new TextEncoder().encode(name);

  let result = "";

  for (const byte of bytes) {
    if (byte < 33 || byte > 126 || NAME_NEEDS_ESCAPE.has(byte)) {
      result += `#${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    } else {
      result += String.fromCharCode(byte);
    }
  }

  return result;
}

/**
 * PDF name object (interned).
 *
 * In PDF: `/Type`, `/Page`, `/Length`
 *
 * `PdfName.of("Type") === PdfName.of("Type")`.
 */
export class PdfName implements PdfPrimitive {
  get type(): "name" {
    return "name";
  }

  private static cache = new Map<string, PdfName>();

  private constructor(readonly value: string) {}

  /**
   * Get or create the interned name. The leading `/` is not part of `name`.
   */
  static of(name: string): PdfName {
    let cached = PdfName.cache.get(name);

    if (!cached) {
      cached = new PdfName(name);

      PdfName.cache.set(name, cached);
    }

    return cached;
  }

  /** The name as written in a content stream or dictionary ("/F1") */
  toString(): string {
    return `/${escapeName(this.value)}`;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.toString());
  }

  static readonly Type = PdfName.of("Type");
  static readonly Page = PdfName.of("Page");
  static readonly Pages = PdfName.of("Pages");
  static readonly Catalog = PdfName.of("Catalog");
  static readonly Font = PdfName.of("Font");
  static readonly XObject = PdfName.of("XObject");
  static readonly Image = PdfName.of("Image");
  static readonly ExtGState = PdfName.of("ExtGState");
  static readonly DeviceRGB = PdfName.of("DeviceRGB");
  static readonly FlateDecode = PdfName.of("FlateDecode");
}

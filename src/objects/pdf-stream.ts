import type { ByteWriter } from "#src/io/byte-writer";
import { PdfDict } from "./pdf-dict";
import type { PdfName } from "./pdf-name";
import type { PdfObject } from "./pdf-object";

const LENGTH_KEY = new Set(["Length"]);

/**
 * PDF stream object (dictionary + data).
 *
 * In PDF:
 * ```
 * << /Length 5 /Filter /FlateDecode >>
 * stream
 * ...data...
 * endstream
 * ```
 *
 * `/Length` is always written from the actual data length.
 */
export class PdfStream extends PdfDict {
  override get type(): "stream" {
    return "stream";
  }

  readonly data: Uint8Array;

  constructor(
    dict?: PdfDict | Iterable<[PdfName | string, PdfObject]>,
    data: Uint8Array = new Uint8Array(0),
  ) {
    super(dict);

    this.data = data;
  }

  static fromDict(
    entries: Record<string, PdfObject>,
    data: Uint8Array = new Uint8Array(0),
  ): PdfStream {
    return new PdfStream(Object.entries(entries), data);
  }

  override toBytes(writer: ByteWriter): void {
    writer.writeAscii("<<\n");
    writer.writeAscii(`/Length ${this.data.length}\n`);
    this.writeEntries(writer, LENGTH_KEY);
    writer.writeAscii(">>");

    writer.writeAscii("\nstream\n");
    writer.writeBytes(this.data);
    writer.writeAscii("\nendstream");
  }
}

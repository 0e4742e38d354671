/**
 * Interface for PDF objects that serialize themselves.
 *
 * Every concrete object class writes its own byte representation, so the
 * writer never needs a central switch over object types.
 */

import type { ByteWriter } from "#src/io/byte-writer";

export interface PdfPrimitive {
  /** Type discriminator, used by the type guards in pdf-object */
  readonly type: string;

  /** Write this object's PDF syntax to `writer` */
  toBytes(writer: ByteWriter): void;
}

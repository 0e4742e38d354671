/**
 * Image embedding: format normalization, decode filter chain and the
 * hex-encoded image XObject.
 *
 * Image bytes are never decoded. The payload is the caller's bytes in
 * ASCIIHex form, and the /Filter array tells the reader how to undo it.
 */

import type { FilterName } from "#src/filters/filter";
import { FilterPipeline } from "#src/filters/filter-pipeline";
import type { WarningHandler } from "#src/helpers/types";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import { PdfStream } from "#src/objects/pdf-stream";

const JPEG_CHAIN: readonly FilterName[] = ["ASCIIHexDecode", "DCTDecode"];
const PNG_CHAIN: readonly FilterName[] = ["ASCIIHexDecode", "FlateDecode"];

/**
 * Result of embedding one image.
 */
export interface EmbeddedImage {
  /** "JPEG", "PNG", or the caller's tag when unrecognized */
  readonly normalizedFormat: string;
  /** Decode filters, in the order a reader applies them */
  readonly filterChain: readonly FilterName[];
  readonly colorSpace: "DeviceRGB";
  /** Uppercase hex digits followed by ">" */
  readonly hexPayload: Uint8Array;
  /** Payload length including the terminator */
  readonly byteLength: number;
}

/**
 * Normalize a caller-supplied format tag.
 *
 * Trimmed and uppercased; empty or absent and "JPG" mean JPEG. Unknown tags
 * are returned exactly as given, with a warning.
 *
 * @example
 * ```ts
 * normalizeImageFormat(" jpg ") // "JPEG"
 * normalizeImageFormat("png") // "PNG"
 * normalizeImageFormat("gif") // "gif"
 * ```
 */
export function normalizeImageFormat(tag: string | undefined, onWarning?: WarningHandler): string {
  const normalized = (tag ?? "").trim().toUpperCase();

  if (normalized === "" || normalized === "JPG" || normalized === "JPEG") {
    return "JPEG";
  }

  if (normalized === "PNG") {
    return "PNG";
  }

  onWarning?.(`Unrecognized image format "${tag}", embedding as JPEG`);

  return tag ?? "";
}

/**
 * Decode filter chain for a normalized format. Unrecognized formats use the
 * JPEG chain.
 */
export function selectFilterChain(normalizedFormat: string): readonly FilterName[] {
  return normalizedFormat === "PNG" ? PNG_CHAIN : JPEG_CHAIN;
}

/**
 * Prepare image bytes for embedding.
 */
export function embedImage(
  data: Uint8Array,
  formatTag: string | undefined,
  onWarning?: WarningHandler,
): EmbeddedImage {
  const normalizedFormat = normalizeImageFormat(formatTag, onWarning);
  const hexPayload = FilterPipeline.encode(data, ["ASCIIHexDecode"]);

  return {
    normalizedFormat,
    filterChain: selectFilterChain(normalizedFormat),
    colorSpace: "DeviceRGB",
    hexPayload,
    byteLength: hexPayload.length,
  };
}

/**
 * Image XObject stream for an embedded image.
 *
 * Width and Height come from the placement box; the image's own pixel
 * dimensions are never read.
 */
export function buildImageXObject(image: EmbeddedImage, width: number, height: number): PdfStream {
  return PdfStream.fromDict(
    {
      Type: PdfName.XObject,
      Subtype: PdfName.Image,
      Width: PdfNumber.of(width),
      Height: PdfNumber.of(height),
      ColorSpace: PdfName.of(image.colorSpace),
      BitsPerComponent: PdfNumber.of(8),
      Filter: new PdfArray(image.filterChain.map(name => PdfName.of(name))),
    },
    image.hexPayload,
  );
}

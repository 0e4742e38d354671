/**
 * pdf-composer
 *
 * Compose PDF documents from text, images, rectangles and tables.
 */

// ─────────────────────────────────────────────────────────────────────────────
// High-level API
// ─────────────────────────────────────────────────────────────────────────────

export {
  type Cursor,
  type DocumentOptions,
  PDFDocument,
  type PlaceHeadingOptions,
  type PlaceImageOptions,
  type PlaceTextOptions,
} from "./api/pdf-document";
export { PDFPage } from "./api/pdf-page";
export { DocumentInfoSchema, DocumentOptionsSchema } from "./api/schemas";

// ─────────────────────────────────────────────────────────────────────────────
// Elements
// ─────────────────────────────────────────────────────────────────────────────

export { ImageElement, type ImageElementInit } from "./elements/image-element";
export { type DrawMode, RectElement, type RectElementInit } from "./elements/rect-element";
export { TextElement, type TextElementInit } from "./elements/text-element";
export type { RenderContext } from "./elements/types";

// ─────────────────────────────────────────────────────────────────────────────
// Layout
// ─────────────────────────────────────────────────────────────────────────────

export {
  HEADING_SIZES,
  type HeadingLevel,
  lineHeightFor,
  TextLayout,
  type TextLayoutOptions,
} from "./layout/text-layout";
export { DEFAULT_GLYPH_MODEL, type GlyphWidthModel, TextMetrics } from "./layout/text-metrics";
export { flipY } from "./layout/coordinates";

// ─────────────────────────────────────────────────────────────────────────────
// Tables
// ─────────────────────────────────────────────────────────────────────────────

export { TableRenderer } from "./table/table-renderer";
export { TableDrawError } from "./table/errors";
export {
  type CellAlign,
  type CellStyle,
  type TableOptions,
  TableOptionsSchema,
} from "./table/schemas";
export type { TableColumn, TableRow, TableTarget } from "./table/types";

// ─────────────────────────────────────────────────────────────────────────────
// Images
// ─────────────────────────────────────────────────────────────────────────────

export {
  type EmbeddedImage,
  embedImage,
  normalizeImageFormat,
  selectFilterChain,
} from "./images/image-pipeline";

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

export type { OutputSink } from "./sinks/output-sink";
export { MemorySink, type StoredBlob } from "./sinks/memory-sink";
export { FileSink } from "./sinks/file-sink";
export {
  type DocumentContent,
  type DocumentInfo,
  type WriteOptions,
  writeDocument,
} from "./writer/pdf-writer";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  DocumentError,
  DocumentFinalizedError,
  ObjectOrderError,
  PlacementError,
} from "./document/errors";

// ─────────────────────────────────────────────────────────────────────────────
// Fonts and colors
// ─────────────────────────────────────────────────────────────────────────────

export {
  type FontFamily,
  type FontStyle,
  type FontTable,
  STANDARD_FONTS,
} from "./fonts/standard-fonts";
export { hexToRgb, normalizeHexColor, type RGB } from "./helpers/colors";
export { PAGE_SIZES, type PageSizePreset } from "./helpers/page-size";
export type { PageGeometry, WarningHandler } from "./helpers/types";

// ─────────────────────────────────────────────────────────────────────────────
// PDF Objects
// ─────────────────────────────────────────────────────────────────────────────

export { PdfArray } from "./objects/pdf-array";
export { PdfDict } from "./objects/pdf-dict";
export { PdfName } from "./objects/pdf-name";
export { PdfNumber } from "./objects/pdf-number";
export type { PdfObject } from "./objects/pdf-object";
export { PdfRef } from "./objects/pdf-ref";
export { PdfStream } from "./objects/pdf-stream";
export { PdfString } from "./objects/pdf-string";

/**
 * High-level document API.
 *
 * Sequences drawing calls onto pages, keeps the flow cursor and hands the
 * finished pages to the writer.
 */

import { PlacementError } from "#src/document/errors";
import { ImageElement } from "#src/elements/image-element";
import { RectElement, type RectElementInit } from "#src/elements/rect-element";
import type { TextElement } from "#src/elements/text-element";
import type { FontFamily, FontStyle } from "#src/fonts/standard-fonts";
import { normalizeHexColor } from "#src/helpers/colors";
import { parseLenient } from "#src/helpers/options";
import { type PageSizePreset, resolvePageSize } from "#src/helpers/page-size";
import type { WarningHandler } from "#src/helpers/types";
import { embedImage } from "#src/images/image-pipeline";
import {
  HEADING_SIZES,
  type HeadingLevel,
  lineHeightFor,
  TextLayout,
  type TextLayoutOptions,
} from "#src/layout/text-layout";
import type { OutputSink } from "#src/sinks/output-sink";
import type { TableOptions } from "#src/table/schemas";
import { TableRenderer } from "#src/table/table-renderer";
import type { TableColumn, TableRow, TableTarget } from "#src/table/types";
import { type DocumentInfo, writeDocument } from "#src/writer/pdf-writer";

import { PDFContext } from "./pdf-context";
import { PDFPage } from "./pdf-page";
import { DocumentOptionsSchema, type ResolvedDocumentOptions } from "./schemas";

/**
 * Options for creating a document.
 */
export interface DocumentOptions {
  /** Page size preset (default: "letter") */
  size?: PageSizePreset;
  /** Margin on every edge in points (default: 50) */
  margin?: number;
  /** PDF header version (default: "1.4") */
  version?: string;
  /** Flate-compress content streams (default: false) */
  compressStreams?: boolean;
  /** Metadata for the Info dictionary; no Info object when absent */
  info?: DocumentInfo;
  /** Receives every warning as it is recorded */
  onWarning?: WarningHandler;
}

/**
 * Options for placing text.
 */
export interface PlaceTextOptions {
  /** Left edge (default: the margin) */
  x?: number;
  /** Top edge (default: one line below the cursor) */
  y?: number;
  /** Wrap width; absent means no wrapping */
  maxWidth?: number;
  /** X of wrapped lines after the first */
  wrapX?: number;
  fontSize?: number;
  fontStyle?: FontStyle | string;
  fontFamily?: FontFamily | string;
  /** 6-digit hex */
  color?: string;
  /** Degrees counter-clockwise */
  rotation?: number;
  /** Uniform scale, or separate X and Y factors */
  scale?: number | { x: number; y: number };
  opacity?: number;
  strikethrough?: boolean;
}

export type PlaceHeadingOptions = Omit<PlaceTextOptions, "fontSize">;

/**
 * Options for placing an image.
 */
export interface PlaceImageOptions {
  /** "JPEG", "JPG" or "PNG" (default: JPEG) */
  format?: string;
  /** XObject name (default: "Im1", "Im2", …) */
  id?: string;
  x?: number;
  /** Top edge (default: below the cursor) */
  y?: number;
  width: number;
  height: number;
}

/**
 * Position of the last auto-advancing placement.
 */
export interface Cursor {
  lastX: number;
  lastY: number;
}

/**
 * A document under construction.
 *
 * @example
 * ```typescript
 * const doc = PDFDocument.create({ size: "a4" });
 *
 * doc.placeHeading("Quarterly report", 1);
 * doc.placeText(summary, { maxWidth: 400 });
 * doc.drawTable(columns, rows, { theme: "striped" });
 *
 * const id = await doc.finalize(new MemorySink(), "report.pdf");
 * ```
 */
export class PDFDocument {
  private readonly ctx: PDFContext;
  private readonly options: ResolvedDocumentOptions;
  private readonly layout: TextLayout;
  private readonly tables: TableRenderer;
  private readonly pages: PDFPage[] = [];

  private cursorState: Cursor | undefined;
  /** Line height of the text that set the cursor; undefined after other placements */
  private cursorLineHeight: number | undefined;

  private constructor(options: ResolvedDocumentOptions, ctx: PDFContext) {
    this.options = options;
    this.ctx = ctx;
    this.layout = new TextLayout(ctx.geometry, ctx.metrics, ctx.warn);
    this.tables = new TableRenderer(ctx.metrics, ctx.warn);
    this.tables.bind(this.tableTarget());
  }

  /**
   * Create an empty document. Invalid options fall back to their defaults
   * with a warning.
   */
  static create(options: DocumentOptions = {}): PDFDocument {
    const { onWarning, ...rest } = options;
    const warnings: string[] = [];

    const resolved = parseLenient(DocumentOptionsSchema, rest, "document option", message =>
      warnings.push(message),
    );

    const { width, height } = resolvePageSize(resolved.size);
    const ctx = new PDFContext({ width, height, margin: resolved.margin }, onWarning);

    for (const message of warnings) {
      ctx.warn(message);
    }

    return new PDFDocument(resolved, ctx);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Pages
  // ─────────────────────────────────────────────────────────────────────────────

  get pageCount(): number {
    return this.pages.length;
  }

  /**
   * The page drawing calls go to (the last page), creating the first page
   * on demand.
   */
  get currentPage(): PDFPage {
    return this.pages.at(-1) ?? this.createPage();
  }

  /**
   * Append a page. The cursor resets to the top margin.
   */
  addPage(): PDFPage {
    this.ctx.assertWritable("add a page");

    const page = this.createPage();

    this.moveCursor(undefined);

    return page;
  }

  getPage(index: number): PDFPage | undefined {
    return this.pages[index];
  }

  get pageWidth(): number {
    return this.ctx.geometry.width;
  }

  get pageHeight(): number {
    return this.ctx.geometry.height;
  }

  get margin(): number {
    return this.ctx.geometry.margin;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Cursor
  // ─────────────────────────────────────────────────────────────────────────────

  /** Last placement, or undefined at the top of a page */
  get cursor(): Readonly<Cursor> | undefined {
    return this.cursorState;
  }

  /** Y of the last placement, or the top margin */
  get cursorY(): number {
    return this.cursorState?.lastY ?? this.margin;
  }

  /**
   * Move the cursor. The next placement without a Y starts one body line
   * below. A non-finite `y` is ignored with a warning.
   */
  setCursor(y: number, x: number = this.margin): void {
    this.ctx.assertWritable("move the cursor");

    const lastY = this.checkedCoordinate(y, "cursor y");

    if (lastY !== undefined) {
      this.moveCursor({ lastX: this.checkedCoordinate(x, "cursor x") ?? this.margin, lastY });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Drawing
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Lay out and draw text, continuing on new pages as needed.
   *
   * @returns Every element drawn, across all pages
   */
  placeText(text: string, options: PlaceTextOptions = {}): TextElement[] {
    this.ctx.assertWritable("place text");

    const layoutOptions = this.toLayoutOptions(options);
    const placed: TextElement[] = [];

    let page = this.currentPage;
    // Elements drawn on `page` by this call; -1 until the first page break
    let drawnOnPage = -1;
    let pending = this.layout.layout(
      text,
      this.checkedCoordinate(options.x, "x"),
      this.checkedCoordinate(options.y, "y"),
      {
        ...layoutOptions,
        previousY: this.cursorState?.lastY,
        previousLineHeight: this.cursorLineHeight,
      },
    );

    while (pending.length > 0) {
      const next: TextElement[] = [];

      for (const element of pending) {
        if (element.pageBreakNeeded) {
          if (drawnOnPage === 0) {
            // Does not fit even at the top of an empty page
            this.ctx.warn(`Text does not fit on a page: "${element.text.slice(0, 20)}"`);
          } else {
            page = this.addPage();
            drawnOnPage = 0;
            next.push(
              ...this.layout.layout(element.text, element.x, this.margin, layoutOptions),
            );

            break;
          }
        }

        const drawn = element.withPageBreak(false);

        page.drawText(drawn);
        placed.push(drawn);
        this.moveCursor({ lastX: drawn.x, lastY: drawn.y }, lineHeightFor(drawn.fontSize));

        if (drawnOnPage >= 0) {
          drawnOnPage++;
        }
      }

      pending = next;
    }

    return placed;
  }

  /**
   * Draw a heading (24, 18 or 16 pt for levels 1-3, bold by default).
   */
  placeHeading(
    text: string,
    level: HeadingLevel,
    options: PlaceHeadingOptions = {},
  ): TextElement[] {
    return this.placeText(text, {
      fontStyle: "bold",
      ...options,
      fontSize: HEADING_SIZES[level],
    });
  }

  /**
   * Embed and draw an image.
   *
   * Without a Y the image goes below the cursor, moving to a new page when
   * it would cross the bottom margin, and the cursor moves to its bottom.
   *
   * @throws {PlacementError} when `width` or `height` is not a finite
   *   number >= 0
   */
  placeImage(data: Uint8Array, options: PlaceImageOptions): ImageElement {
    this.ctx.assertWritable("place an image");

    const width = this.checkedSize(options.width, "image width");
    const height = this.checkedSize(options.height, "image height");
    const resources = this.ctx.resources;
    const image = embedImage(data, options.format, this.ctx.warn);
    const id = resources.uniqueImageId(options.id, this.ctx.warn);
    const x = this.checkedCoordinate(options.x, "x") ?? this.margin;
    const explicitY = this.checkedCoordinate(options.y, "y");

    let page = this.currentPage;
    let y = explicitY ?? this.flowY();

    if (explicitY === undefined && y > this.margin && y + height > this.pageHeight - this.margin) {
      page = this.addPage();
      y = this.margin;
    }

    const element = new ImageElement({ id, image, data, x, y, width, height });

    resources.addImage({ id, image, width, height });
    page.drawImage(element);

    if (explicitY === undefined) {
      this.moveCursor({ lastX: x, lastY: y + height });
    }

    return element;
  }

  /**
   * Draw a rectangle on the current page. The cursor does not move.
   *
   * Invalid colors become black and an invalid stroke width becomes 1,
   * with a warning.
   *
   * @throws {PlacementError} when `width` or `height` is not a finite
   *   number >= 0
   */
  placeRect(options: RectElementInit): RectElement {
    this.ctx.assertWritable("place a rectangle");

    const warn = this.ctx.warn;
    const { strokeColor, fillColor, strokeWidth } = options;

    if (strokeWidth !== undefined && !(Number.isFinite(strokeWidth) && strokeWidth >= 0)) {
      warn(`Invalid stroke width ${strokeWidth}, using 1`);
    }

    const rect = new RectElement({
      ...options,
      x: this.checkedCoordinate(options.x, "x") ?? this.margin,
      y: this.checkedCoordinate(options.y, "y") ?? this.margin,
      width: this.checkedSize(options.width, "rectangle width"),
      height: this.checkedSize(options.height, "rectangle height"),
      strokeColor: strokeColor === undefined ? undefined : normalizeHexColor(strokeColor, warn),
      fillColor: fillColor === undefined ? undefined : normalizeHexColor(fillColor, warn),
    });

    this.currentPage.drawRect(rect);

    return rect;
  }

  /**
   * Draw a table below the cursor (or at `options.startY`), paginating as
   * needed.
   *
   * @returns The new cursor Y: bottom of the last row plus the margin
   * @throws {TableDrawError} when `columns` is empty
   */
  drawTable(
    columns: readonly TableColumn[],
    rows: readonly TableRow[],
    options: TableOptions = {},
  ): number {
    this.ctx.assertWritable("draw a table");

    const nextY = this.tables.draw(columns, rows, options);

    this.moveCursor({ lastX: this.margin, lastY: nextY });

    return nextY;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Output
  // ─────────────────────────────────────────────────────────────────────────────

  /** Every warning recorded so far, in order */
  get warnings(): readonly string[] {
    return this.ctx.warnings;
  }

  get isFinalized(): boolean {
    return this.ctx.isFinalized;
  }

  /**
   * Serialize the document. A successful save consumes it: later mutations
   * and saves throw `DocumentFinalizedError`.
   */
  save(): Uint8Array {
    this.ctx.assertWritable("save");

    const bytes = writeDocument(
      {
        pageWidth: this.pageWidth,
        pageHeight: this.pageHeight,
        pages: this.pages.map(page => page.contentOperators),
        images: this.ctx.resources.images,
        graphicsStates: this.ctx.resources.graphicsStates,
        fonts: this.ctx.fonts,
      },
      {
        version: this.options.version,
        compressStreams: this.options.compressStreams,
        info: this.options.info,
      },
    );

    this.ctx.finalize();

    return bytes;
  }

  /**
   * Save and hand the bytes to `sink`.
   *
   * @returns The identifier the sink assigned
   */
  async finalize(sink: OutputSink, name = "document.pdf"): Promise<string> {
    const bytes = this.save();

    return sink.write(bytes, name);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  private createPage(): PDFPage {
    const page = new PDFPage(this.pages.length, this.ctx);

    this.pages.push(page);

    return page;
  }

  private moveCursor(cursor: Cursor | undefined, lineHeight?: number): void {
    this.cursorState = cursor;
    this.cursorLineHeight = lineHeight;
  }

  /** Top of the next block placed without a Y */
  private flowY(): number {
    const cursor = this.cursorState;

    return cursor ? cursor.lastY + (this.cursorLineHeight ?? lineHeightFor(12)) : this.margin;
  }

  /** `value` when finite; otherwise a warning and undefined (the default) */
  private checkedCoordinate(value: number | undefined, field: string): number | undefined {
    if (value === undefined || Number.isFinite(value)) {
      return value;
    }

    this.ctx.warn(`Invalid ${field} ${value}, using default`);

    return undefined;
  }

  private checkedSize(value: number, field: string): number {
    if (Number.isFinite(value) && value >= 0) {
      return value;
    }

    const error = new PlacementError(field, value);

    this.ctx.warn(error.message);

    throw error;
  }

  private toLayoutOptions(options: PlaceTextOptions): TextLayoutOptions {
    const scale = options.scale;

    return {
      fontSize: options.fontSize,
      fontStyle: options.fontStyle,
      fontFamily: options.fontFamily,
      color: options.color,
      maxWidth: options.maxWidth,
      wrapX: this.checkedCoordinate(options.wrapX, "wrapX"),
      rotation: options.rotation,
      scaleX: typeof scale === "number" ? scale : scale?.x,
      scaleY: typeof scale === "number" ? scale : scale?.y,
      opacity: options.opacity,
      strikethrough: options.strikethrough,
    };
  }

  private tableTarget(): TableTarget {
    const flowY = () => this.flowY();

    return {
      pageWidth: this.pageWidth,
      pageHeight: this.pageHeight,
      margin: this.margin,
      get cursorY() {
        return flowY();
      },
      drawRect: rect => this.currentPage.drawRect(rect),
      drawText: element => this.currentPage.drawText(element),
      newPage: () => {
        this.addPage();
      },
    };
  }
}

/**
 * Table data and drawing target types.
 */

import type { RectElement } from "#src/elements/rect-element";
import type { TextElement } from "#src/elements/text-element";

import type { CellStyle } from "./schemas";

/**
 * One table column.
 */
export interface TableColumn {
  /** Header text */
  title: string;
  /** Row field shown in this column */
  key: string;
  /** Fixed width in points; columns without one share the remaining width */
  width?: number;
  /** Overrides for the body cells of this column */
  style?: CellStyle;
}

/** One row of cell text, keyed by column key. A missing key is an empty cell. */
export type TableRow = Readonly<Record<string, string>>;

/**
 * Where a table draws. Implemented by the document; the renderer never
 * touches pages directly.
 */
export interface TableTarget {
  readonly pageWidth: number;
  readonly pageHeight: number;
  readonly margin: number;
  /** Y the table starts at when no startY is given */
  readonly cursorY: number;

  drawRect(rect: RectElement): void;

  drawText(element: TextElement): void;

  /** Continue on a fresh page */
  newPage(): void;
}

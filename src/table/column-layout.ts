/**
 * Column sizing, cell text truncation and alignment.
 */

import type { CellAlign } from "./schemas";
import type { TableColumn } from "./types";

/** Fixed table dimensions in points */
export const TABLE_METRICS = {
  rowHeight: 20,
  headerHeight: 24,
  padding: 5,
  fontSize: 10,
} as const;

export const ELLIPSIS = "...";

function isFixedWidth(width: number | undefined): width is number {
  return width !== undefined && Number.isFinite(width) && width > 0;
}

/**
 * Column widths for an available width.
 *
 * Fixed widths are used as given. Columns without one split whatever is
 * left equally, never below 0.
 *
 * @example
 * ```ts
 * computeColumnWidths([{ title: "A", key: "a" }, { title: "B", key: "b" }], 500) // [250, 250]
 * computeColumnWidths([{ title: "A", key: "a", width: 100 }, { title: "B", key: "b" }], 500) // [100, 400]
 * ```
 */
export function computeColumnWidths(columns: readonly TableColumn[], available: number): number[] {
  let fixedTotal = 0;
  let flexibleCount = 0;

  for (const column of columns) {
    if (isFixedWidth(column.width)) {
      fixedTotal += column.width;
    } else {
      flexibleCount++;
    }
  }

  const share = flexibleCount > 0 ? Math.max(0, (available - fixedTotal) / flexibleCount) : 0;

  return columns.map(column => (isFixedWidth(column.width) ? column.width : share));
}

/**
 * Shorten `text` with a trailing "..." until it fits `maxWidth`.
 *
 * Returns the text unchanged when it fits, and "" when not even the
 * ellipsis fits.
 */
export function truncateText(
  text: string,
  maxWidth: number,
  measure: (text: string) => number,
): string {
  if (measure(text) <= maxWidth) {
    return text;
  }

  if (measure(ELLIPSIS) > maxWidth) {
    return "";
  }

  for (let end = text.length - 1; end > 0; end--) {
    const candidate = `${text.slice(0, end).trimEnd()}${ELLIPSIS}`;

    if (measure(candidate) <= maxWidth) {
      return candidate;
    }
  }

  return ELLIPSIS;
}

/**
 * X of a text run of `textWidth` inside a cell.
 */
export function alignedX(
  align: CellAlign,
  cellX: number,
  cellWidth: number,
  textWidth: number,
  padding: number,
): number {
  switch (align) {
    case "left":
      return cellX + padding;
    case "center":
      return cellX + (cellWidth - textWidth) / 2;
    case "right":
      return cellX + cellWidth - padding - textWidth;
  }
}

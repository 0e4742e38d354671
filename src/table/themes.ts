/**
 * Table themes: default cell styles per theme and style merging.
 */

import { type FontStyle, resolveFontStyle } from "#src/fonts/standard-fonts";
import { normalizeHexColor } from "#src/helpers/colors";
import type { WarningHandler } from "#src/helpers/types";

import { TABLE_METRICS } from "./column-layout";
import type { CellAlign, CellStyle, ResolvedTableOptions } from "./schemas";

/**
 * A cell style with every field decided.
 */
export interface ResolvedCellStyle {
  fontSize: number;
  fontStyle: FontStyle;
  /** 6-digit hex */
  textColor: string;
  /** 6-digit hex, or no background */
  backgroundColor: string | undefined;
  align: CellAlign;
}

/**
 * Styles a table draws with.
 */
export interface TableStyles {
  header: ResolvedCellStyle;
  body: ResolvedCellStyle;
  /** Body style of rows with an odd zero-based index */
  alternate: ResolvedCellStyle;
  /** Outline, column and row dividers */
  borders: boolean;
}

const GRID_HEADER_BACKGROUND = "E0E0E0";
const STRIPED_HEADER_BACKGROUND = "2F4F4F";
const STRIPED_HEADER_TEXT = "FFFFFF";
const STRIPED_ROW_BACKGROUND = "F2F2F2";

/**
 * Apply the set fields of `override` on top of `base`.
 */
export function mergeCellStyle(
  base: ResolvedCellStyle,
  override: CellStyle | undefined,
  onWarning?: WarningHandler,
): ResolvedCellStyle {
  if (!override) {
    return base;
  }

  return {
    fontSize:
      override.fontSize !== undefined && Number.isFinite(override.fontSize) && override.fontSize > 0
        ? override.fontSize
        : base.fontSize,
    fontStyle:
      override.fontStyle !== undefined
        ? resolveFontStyle(override.fontStyle, onWarning)
        : base.fontStyle,
    textColor:
      override.textColor !== undefined
        ? normalizeHexColor(override.textColor, onWarning)
        : base.textColor,
    backgroundColor:
      override.backgroundColor !== undefined
        ? normalizeHexColor(override.backgroundColor, onWarning)
        : base.backgroundColor,
    align: override.align ?? base.align,
  };
}

/**
 * Resolve header, body and alternate-row styles for the chosen theme.
 *
 * The striped theme always draws a dark header with white text; the
 * header style can still change its font and alignment.
 */
export function resolveTableStyles(
  options: ResolvedTableOptions,
  onWarning?: WarningHandler,
): TableStyles {
  const bodyDefaults: ResolvedCellStyle = {
    fontSize: TABLE_METRICS.fontSize,
    fontStyle: "normal",
    textColor: "000000",
    backgroundColor: undefined,
    align: "left",
  };

  const headerDefaults: ResolvedCellStyle = {
    ...bodyDefaults,
    fontStyle: "bold",
    backgroundColor: GRID_HEADER_BACKGROUND,
  };

  const body = mergeCellStyle(bodyDefaults, options.bodyStyle, onWarning);
  const header = mergeCellStyle(headerDefaults, options.headerStyle, onWarning);

  if (options.theme === "striped") {
    return {
      header: {
        ...header,
        backgroundColor: STRIPED_HEADER_BACKGROUND,
        textColor: STRIPED_HEADER_TEXT,
      },
      body,
      alternate: mergeCellStyle(
        body,
        {
          ...options.alternateRowStyle,
          backgroundColor: options.alternateRowStyle.backgroundColor ?? STRIPED_ROW_BACKGROUND,
        },
        onWarning,
      ),
      borders: false,
    };
  }

  return {
    header,
    body,
    alternate: mergeCellStyle(body, options.alternateRowStyle, onWarning),
    borders: true,
  };
}

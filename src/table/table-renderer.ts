/**
 * Table layout and pagination.
 *
 * Draws a header row and one fixed-height row per data row through a
 * `TableTarget`. When the next row would cross the bottom margin the
 * current page segment is closed, the target starts a new page and the
 * table continues at the top margin.
 */

import { RectElement } from "#src/elements/rect-element";
import { TextElement } from "#src/elements/text-element";
import { parseLenient } from "#src/helpers/options";
import type { WarningHandler } from "#src/helpers/types";
import { TextMetrics } from "#src/layout/text-metrics";

import { alignedX, computeColumnWidths, TABLE_METRICS, truncateText } from "./column-layout";
import { TableDrawError } from "./errors";
import { type TableOptions, TableOptionsSchema } from "./schemas";
import {
  mergeCellStyle,
  type ResolvedCellStyle,
  resolveTableStyles,
  type TableStyles,
} from "./themes";
import type { TableColumn, TableRow, TableTarget } from "./types";

const BORDER_COLOR = "000000";
const BORDER_WIDTH = 0.5;

/**
 * Per-call drawing state.
 */
interface TableRun {
  target: TableTarget;
  columns: readonly TableColumn[];
  widths: number[];
  styles: TableStyles;
  /** Per-column body styles for even and odd rows */
  bodyStyles: [ResolvedCellStyle[], ResolvedCellStyle[]];
  margin: number;
  totalWidth: number;
  /** Top of the current page segment */
  segmentTop: number;
  /** Top of the next row */
  y: number;
}

/**
 * @example
 * ```typescript
 * const renderer = new TableRenderer();
 * renderer.bind(target);
 * const nextY = renderer.draw(
 *   [{ title: "Name", key: "name" }, { title: "Qty", key: "qty", width: 60 }],
 *   [{ name: "Bolts", qty: "40" }],
 *   { theme: "striped" },
 * );
 * ```
 */
export class TableRenderer {
  private target: TableTarget | undefined;

  constructor(
    private readonly metrics: TextMetrics = new TextMetrics(),
    private readonly onWarning?: WarningHandler,
  ) {}

  /**
   * Attach the target tables are drawn on.
   */
  bind(target: TableTarget): void {
    this.target = target;
  }

  /**
   * Draw a table.
   *
   * @returns The bottom of the last row plus the margin, the Y where
   *   following content should start
   * @throws {TableDrawError} `NO_TARGET` when no target is bound,
   *   `NO_COLUMNS` when `columns` is empty; nothing is drawn in either case
   */
  draw(
    columns: readonly TableColumn[],
    rows: readonly TableRow[],
    options: TableOptions = {},
  ): number {
    const target = this.target;

    if (!target) {
      throw this.fail(new TableDrawError("Table renderer is not bound to a target", "NO_TARGET"));
    }

    if (columns.length === 0) {
      throw this.fail(new TableDrawError("Table has no columns", "NO_COLUMNS"));
    }

    const resolved = parseLenient(TableOptionsSchema, options, "table option", this.onWarning);
    const margin = resolved.margin ?? target.margin;
    const widths = computeColumnWidths(columns, target.pageWidth - 2 * margin);
    const startY = resolved.startY ?? target.cursorY;
    const styles = resolveTableStyles(resolved, this.onWarning);

    const run: TableRun = {
      target,
      columns,
      widths,
      styles,
      bodyStyles: [
        columns.map(column => mergeCellStyle(styles.body, column.style, this.onWarning)),
        columns.map(column => mergeCellStyle(styles.alternate, column.style, this.onWarning)),
      ],
      margin,
      totalWidth: widths.reduce((sum, width) => sum + width, 0),
      segmentTop: startY,
      y: startY,
    };

    if (resolved.headerVisibility !== "never") {
      // Keep the header together with at least one row
      const needed = TABLE_METRICS.headerHeight + (rows.length > 0 ? TABLE_METRICS.rowHeight : 0);

      if (run.y > margin && this.crossesBottom(run, needed)) {
        this.startNewPage(run, false);
      }

      this.drawHeader(run);
    }

    rows.forEach((row, index) => {
      if (this.crossesBottom(run, TABLE_METRICS.rowHeight)) {
        this.closeSegment(run);
        this.startNewPage(run, resolved.headerVisibility === "every-page");
      }

      this.drawRow(run, row, index);
    });

    this.closeSegment(run);

    return run.y + margin;
  }

  private fail(error: TableDrawError): TableDrawError {
    this.onWarning?.(error.message);

    return error;
  }

  private crossesBottom(run: TableRun, height: number): boolean {
    return run.y + height > run.target.pageHeight - run.margin;
  }

  private startNewPage(run: TableRun, withHeader: boolean): void {
    run.target.newPage();
    run.y = run.margin;
    run.segmentTop = run.margin;

    if (withHeader) {
      this.drawHeader(run);
    }
  }

  private drawHeader(run: TableRun): void {
    const style = run.styles.header;

    this.drawBackground(run, style, TABLE_METRICS.headerHeight);
    this.drawCells(
      run,
      run.columns.map(column => column.title),
      run.columns.map(() => style),
      TABLE_METRICS.headerHeight,
    );

    run.y += TABLE_METRICS.headerHeight;

    if (run.styles.borders) {
      this.drawRule(run, run.y);
    }
  }

  private drawRow(run: TableRun, row: TableRow, index: number): void {
    const odd = index % 2 === 1;

    this.drawBackground(
      run,
      odd ? run.styles.alternate : run.styles.body,
      TABLE_METRICS.rowHeight,
    );
    this.drawCells(
      run,
      run.columns.map(column => row[column.key] ?? ""),
      run.bodyStyles[odd ? 1 : 0],
      TABLE_METRICS.rowHeight,
    );

    run.y += TABLE_METRICS.rowHeight;

    if (run.styles.borders) {
      this.drawRule(run, run.y);
    }
  }

  private drawBackground(run: TableRun, style: ResolvedCellStyle, height: number): void {
    if (style.backgroundColor === undefined) {
      return;
    }

    run.target.drawRect(
      new RectElement({
        x: run.margin,
        y: run.y,
        width: run.totalWidth,
        height,
        mode: "fill",
        fillColor: style.backgroundColor,
      }),
    );
  }

  private drawCells(
    run: TableRun,
    texts: readonly string[],
    styles: readonly ResolvedCellStyle[],
    height: number,
  ): void {
    let cellX = run.margin;

    texts.forEach((text, i) => {
      const style = styles[i];
      const width = run.widths[i];
      const measure = (value: string) =>
        this.metrics.estimateWidth(value, style.fontSize, style.fontStyle);

      const shown = truncateText(text, width - 2 * TABLE_METRICS.padding, measure);

      if (shown !== "") {
        run.target.drawText(
          TextElement.create(
            {
              text: shown,
              x: alignedX(style.align, cellX, width, measure(shown), TABLE_METRICS.padding),
              y: run.y + (height - style.fontSize) / 2,
              fontSize: style.fontSize,
              fontStyle: style.fontStyle,
              color: style.textColor,
            },
            this.onWarning,
          ),
        );
      }

      cellX += width;
    });
  }

  private drawRule(run: TableRun, y: number): void {
    run.target.drawRect(
      RectElement.line(run.margin, y, run.margin + run.totalWidth, y, run.target.pageHeight, {
        color: BORDER_COLOR,
        width: BORDER_WIDTH,
      }),
    );
  }

  /**
   * Outline and column dividers of the rows drawn on the current page.
   */
  private closeSegment(run: TableRun): void {
    if (!run.styles.borders || run.y <= run.segmentTop) {
      return;
    }

    let dividerX = run.margin;

    for (let i = 0; i < run.widths.length - 1; i++) {
      dividerX += run.widths[i];

      run.target.drawRect(
        RectElement.line(dividerX, run.segmentTop, dividerX, run.y, run.target.pageHeight, {
          color: BORDER_COLOR,
          width: BORDER_WIDTH,
        }),
      );
    }

    run.target.drawRect(
      new RectElement({
        x: run.margin,
        y: run.segmentTop,
        width: run.totalWidth,
        height: run.y - run.segmentTop,
        mode: "stroke",
        strokeColor: BORDER_COLOR,
        strokeWidth: BORDER_WIDTH,
      }),
    );
  }
}

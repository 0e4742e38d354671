/**
 * RectElement - the drawing primitive used for boxes, fills and rules.
 */

import { hexToRgb } from "#src/helpers/colors";
import {
  fill,
  fillAndStroke,
  lineTo,
  moveTo,
  type Operator,
  popGraphicsState,
  pushGraphicsState,
  rectangle,
  setFillColor,
  setLineWidth,
  setStrokeColor,
  stroke,
} from "#src/helpers/operators";
import { flipY } from "#src/layout/coordinates";

/** Which paint operators a rectangle uses */
export type DrawMode = "stroke" | "fill" | "both";

export interface RectElementInit {
  x: number;
  y: number;
  width: number;
  height: number;
  /** Default: "stroke" */
  mode?: DrawMode;
  /** 6-digit hex; absent or invalid → black */
  strokeColor?: string;
  /** 6-digit hex; absent or invalid → black */
  fillColor?: string;
  /** Default: 1 */
  strokeWidth?: number;
  /**
   * Operators emitted verbatim instead of the rectangle, for shapes the
   * rectangle model cannot express (diagonal rules and the like).
   * Coordinates in the override are already in PDF space.
   */
  rawOperators?: string;
}

export class RectElement {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly mode: DrawMode;
  readonly strokeColor: string | undefined;
  readonly fillColor: string | undefined;
  readonly strokeWidth: number;
  readonly rawOperators: string | undefined;

  constructor(init: RectElementInit) {
    this.x = init.x;
    this.y = init.y;
    this.width = init.width;
    this.height = init.height;
    this.mode = init.mode ?? "stroke";
    this.strokeColor = init.strokeColor;
    this.fillColor = init.fillColor;
    this.strokeWidth =
      init.strokeWidth !== undefined && Number.isFinite(init.strokeWidth) && init.strokeWidth >= 0
        ? init.strokeWidth
        : 1;
    this.rawOperators = init.rawOperators;
  }

  /**
   * A straight rule from (x1, y1) to (x2, y2) in document space, emitted
   * through the raw operator override.
   */
  static line(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    pageHeight: number,
    options: { color?: string; width?: number } = {},
  ): RectElement {
    const ops = [
      pushGraphicsState(),
      setStrokeColor(hexToRgb(options.color)),
      setLineWidth(options.width ?? 1),
      moveTo(x1, flipY(y1, 0, pageHeight)),
      lineTo(x2, flipY(y2, 0, pageHeight)),
      stroke(),
      popGraphicsState(),
    ];

    return new RectElement({
      x: Math.min(x1, x2),
      y: Math.min(y1, y2),
      width: Math.abs(x2 - x1),
      height: Math.abs(y2 - y1),
      strokeWidth: options.width,
      strokeColor: options.color,
      rawOperators: ops.join("\n"),
    });
  }

  /**
   * Content stream operators for this rectangle, joined with "\n".
   *
   * @example
   * ```typescript
   * new RectElement({ x: 10, y: 20, width: 30, height: 40, mode: "fill", fillColor: "FF0000" })
   *   .toOperators(792);
   * // "q\n1.000 0.000 0.000 rg\n10 732 30 40 re\nf\nQ"
   * ```
   */
  toOperators(pageHeight: number): string {
    if (this.rawOperators !== undefined) {
      return this.rawOperators;
    }

    const pdfY = flipY(this.y, this.height, pageHeight);
    const ops: Operator[] = [pushGraphicsState()];

    if (this.mode === "stroke" || this.mode === "both") {
      ops.push(setStrokeColor(hexToRgb(this.strokeColor)));
    }

    if (this.mode === "fill" || this.mode === "both") {
      ops.push(setFillColor(hexToRgb(this.fillColor)));
    }

    if (this.mode !== "fill") {
      ops.push(setLineWidth(this.strokeWidth));
    }

    ops.push(rectangle(this.x, pdfY, this.width, this.height));

    switch (this.mode) {
      case "stroke":
        ops.push(stroke());
        break;
      case "fill":
        ops.push(fill());
        break;
      case "both":
        ops.push(fillAndStroke());
        break;
    }

    ops.push(popGraphicsState());

    return ops.join("\n");
  }
}

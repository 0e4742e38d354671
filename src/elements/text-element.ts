/**
 * TextElement - one positioned run of text.
 *
 * Elements are immutable. Coordinates are in document space (origin
 * top-left, Y down); the flip to PDF space happens in `toOperators`.
 */

import {
  type FontFamily,
  type FontStyle,
  resolveFontFamily,
  resolveFontStyle,
} from "#src/fonts/standard-fonts";
import { hexToRgb, normalizeHexColor } from "#src/helpers/colors";
import {
  beginText,
  concatMatrix,
  endText,
  lineTo,
  moveTo,
  type Operator,
  popGraphicsState,
  pushGraphicsState,
  setFillColor,
  setFont,
  setGraphicsState,
  setLineWidth,
  setStrokeColor,
  setTextMatrix,
  showText,
  stroke,
} from "#src/helpers/operators";
import type { WarningHandler } from "#src/helpers/types";
import { flipY } from "#src/layout/coordinates";

import type { RenderContext } from "./types";

/** Strike line height above the baseline, as a fraction of the font size */
const STRIKE_POSITION = 0.3;

/** Strike line thickness, as a fraction of the font size */
const STRIKE_THICKNESS = 0.05;

/**
 * Caller-facing description of a text element. Loose fields (font names,
 * style strings, colors) are normalized by `TextElement.create`.
 */
export interface TextElementInit {
  text: string;
  x: number;
  y: number;
  /** Font size in points (default: 12) */
  fontSize?: number;
  fontStyle?: FontStyle | string;
  fontFamily?: FontFamily | string;
  /** 6-digit hex color (default: black) */
  color?: string;
  /** Degrees counter-clockwise */
  rotation?: number;
  scaleX?: number;
  scaleY?: number;
  opacity?: number;
  strikethrough?: boolean;
  pageBreakNeeded?: boolean;
}

interface TextElementProps {
  readonly text: string;
  readonly x: number;
  readonly y: number;
  readonly fontSize: number;
  readonly fontStyle: FontStyle;
  readonly fontFamily: FontFamily;
  readonly color: string;
  readonly rotation: number;
  readonly scaleX: number;
  readonly scaleY: number;
  readonly opacity: number;
  readonly strikethrough: boolean;
  readonly pageBreakNeeded: boolean;
}

export const DEFAULT_FONT_SIZE = 12;

/**
 * Normalize an angle into [0, 360). Non-finite angles become 0.
 */
export function normalizeRotation(angle: number): number {
  if (!Number.isFinite(angle)) {
    return 0;
  }

  return ((angle % 360) + 360) % 360;
}

/**
 * Clamp opacity into [0, 1]. NaN becomes fully opaque.
 */
export function clampOpacity(opacity: number): number {
  if (Number.isNaN(opacity)) {
    return 1;
  }

  return Math.min(1, Math.max(0, opacity));
}

function normalizeScale(value: number | undefined, onWarning?: WarningHandler): number {
  if (value === undefined) {
    return 1;
  }

  if (!Number.isFinite(value) || value <= 0) {
    onWarning?.(`Invalid scale ${value}, using 1`);

    return 1;
  }

  return value;
}

function normalizeFontSize(value: number | undefined, onWarning?: WarningHandler): number {
  if (value === undefined) {
    return DEFAULT_FONT_SIZE;
  }

  if (!Number.isFinite(value) || value <= 0) {
    onWarning?.(`Invalid font size ${value}, using ${DEFAULT_FONT_SIZE}`);

    return DEFAULT_FONT_SIZE;
  }

  return value;
}

export class TextElement implements TextElementProps {
  readonly text: string;
  readonly x: number;
  readonly y: number;
  readonly fontSize: number;
  readonly fontStyle: FontStyle;
  readonly fontFamily: FontFamily;
  readonly color: string;
  readonly rotation: number;
  readonly scaleX: number;
  readonly scaleY: number;
  readonly opacity: number;
  readonly strikethrough: boolean;
  readonly pageBreakNeeded: boolean;

  private constructor(props: TextElementProps) {
    this.text = props.text;
    this.x = props.x;
    this.y = props.y;
    this.fontSize = props.fontSize;
    this.fontStyle = props.fontStyle;
    this.fontFamily = props.fontFamily;
    this.color = props.color;
    this.rotation = props.rotation;
    this.scaleX = props.scaleX;
    this.scaleY = props.scaleY;
    this.opacity = props.opacity;
    this.strikethrough = props.strikethrough;
    this.pageBreakNeeded = props.pageBreakNeeded;
  }

  /**
   * Build an element, replacing invalid input with defaults.
   *
   * @example
   * ```typescript
   * const el = TextElement.create({ text: "Total", x: 50, y: 80, fontStyle: "bold" });
   * const faded = el.withOpacity(0.4).withRotation(-90); // rotation 270
   * ```
   */
  static create(init: TextElementInit, onWarning?: WarningHandler): TextElement {
    return new TextElement({
      text: init.text,
      x: init.x,
      y: init.y,
      fontSize: normalizeFontSize(init.fontSize, onWarning),
      fontStyle: resolveFontStyle(init.fontStyle, onWarning),
      fontFamily: resolveFontFamily(init.fontFamily, onWarning),
      color: normalizeHexColor(init.color, onWarning),
      rotation: normalizeRotation(init.rotation ?? 0),
      scaleX: normalizeScale(init.scaleX, onWarning),
      scaleY: normalizeScale(init.scaleY, onWarning),
      opacity: clampOpacity(init.opacity ?? 1),
      strikethrough: init.strikethrough ?? false,
      pageBreakNeeded: init.pageBreakNeeded ?? false,
    });
  }

  private with(changes: Partial<TextElementProps>): TextElement {
    const current: TextElementProps = {
      text: this.text,
      x: this.x,
      y: this.y,
      fontSize: this.fontSize,
      fontStyle: this.fontStyle,
      fontFamily: this.fontFamily,
      color: this.color,
      rotation: this.rotation,
      scaleX: this.scaleX,
      scaleY: this.scaleY,
      opacity: this.opacity,
      strikethrough: this.strikethrough,
      pageBreakNeeded: this.pageBreakNeeded,
    };

    return new TextElement({ ...current, ...changes });
  }

  withRotation(angle: number): TextElement {
    return this.with({ rotation: normalizeRotation(angle) });
  }

  withScale(scaleX: number, scaleY: number = scaleX): TextElement {
    return this.with({ scaleX: normalizeScale(scaleX), scaleY: normalizeScale(scaleY) });
  }

  withOpacity(opacity: number): TextElement {
    return this.with({ opacity: clampOpacity(opacity) });
  }

  withColor(color: string, onWarning?: WarningHandler): TextElement {
    return this.with({ color: normalizeHexColor(color, onWarning) });
  }

  withText(text: string): TextElement {
    return this.with({ text });
  }

  withPosition(x: number, y: number): TextElement {
    return this.with({ x, y });
  }

  withPageBreak(pageBreakNeeded: boolean): TextElement {
    return this.with({ pageBreakNeeded });
  }

  /** PDF Y of the baseline on a page of the given height */
  baselineY(pageHeight: number): number {
    return flipY(this.y, this.fontSize, pageHeight);
  }

  private get isTransformed(): boolean {
    return this.rotation !== 0 || this.scaleX !== 1 || this.scaleY !== 1;
  }

  /**
   * Content stream operators drawing this element.
   *
   * Untransformed text is positioned with the text matrix alone. Rotated or
   * scaled text moves the origin with `cm` so the strike line follows.
   */
  toOperators(ctx: RenderContext): Operator[] {
    const color = hexToRgb(this.color);
    const slot = ctx.fonts.slotFor(this.fontFamily, this.fontStyle);
    const baseline = this.baselineY(ctx.pageHeight);

    const ops: Operator[] = [pushGraphicsState()];

    if (this.opacity < 1) {
      ops.push(setGraphicsState(ctx.graphicsStateFor(this.opacity)));
    }

    // Local origin: (x, baseline) when untransformed, (0, 0) after cm
    let originX = this.x;
    let originY = baseline;

    if (this.isTransformed) {
      const rad = (this.rotation * Math.PI) / 180;
      const cos = Math.cos(rad);
      const sin = Math.sin(rad);

      ops.push(
        concatMatrix(
          this.scaleX * cos,
          this.scaleX * sin,
          -this.scaleY * sin,
          this.scaleY * cos,
          this.x,
          baseline,
        ),
      );

      originX = 0;
      originY = 0;
    }

    ops.push(setFillColor(color));
    ops.push(beginText());
    ops.push(setFont(slot.resourceName, this.fontSize));
    ops.push(setTextMatrix(1, 0, 0, 1, originX, originY));
    ops.push(showText(this.text));
    ops.push(endText());

    if (this.strikethrough) {
      const width = ctx.metrics.estimateWidth(this.text, this.fontSize, this.fontStyle);
      const strikeY = originY + this.fontSize * STRIKE_POSITION;

      ops.push(setStrokeColor(color));
      ops.push(setLineWidth(this.fontSize * STRIKE_THICKNESS));
      ops.push(moveTo(originX, strikeY));
      ops.push(lineTo(originX + width, strikeY));
      ops.push(stroke());
    }

    ops.push(popGraphicsState());

    return ops;
  }
}

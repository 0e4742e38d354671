/**
 * Approximate text measurement.
 *
 * No font metrics are available at layout time, so widths come from a
 * per-character model: a base width per character, a weight per character
 * class and multipliers for bold and italic.
 */

import { type FontStyle, isBold, isItalic } from "#src/fonts/standard-fonts";

/**
 * Parameters of the width model.
 */
export interface GlyphWidthModel {
  /** Width of an ordinary character at `baseSize`, in points */
  readonly baseWidth: number;
  /** Font size `baseWidth` is expressed at */
  readonly baseSize: number;
  /** Multiplier applied to bold text */
  readonly boldFactor: number;
  /** Multiplier applied to italic text */
  readonly italicFactor: number;
  /** Characters weighted by `narrowFactor` */
  readonly narrowChars: string;
  readonly narrowFactor: number;
  /** Characters weighted by `wideFactor` */
  readonly wideChars: string;
  readonly wideFactor: number;
}

export const DEFAULT_GLYPH_MODEL: GlyphWidthModel = Object.freeze({
  baseWidth: 6,
  baseSize: 12,
  boldFactor: 1.1,
  italicFactor: 1.08,
  narrowChars: " iIljtfr.,;:'!|",
  narrowFactor: 0.55,
  wideChars: "mwMW@%",
  wideFactor: 1.45,
});

/**
 * Width estimator over a glyph width model.
 *
 * @example
 * ```typescript
 * const metrics = new TextMetrics();
 * metrics.estimateWidth("Hello", 12); // 24.6
 * metrics.estimateWidth("Hello", 12, "bold"); // 27.06
 * ```
 */
export class TextMetrics {
  private readonly narrow: ReadonlySet<string>;
  private readonly wide: ReadonlySet<string>;

  constructor(readonly model: GlyphWidthModel = DEFAULT_GLYPH_MODEL) {
    this.narrow = new Set(model.narrowChars);
    this.wide = new Set(model.wideChars);
  }

  /**
   * Relative weight of one character (1 for ordinary characters).
   */
  charWeight(char: string): number {
    if (this.narrow.has(char)) {
      return this.model.narrowFactor;
    }

    if (this.wide.has(char)) {
      return this.model.wideFactor;
    }

    return 1;
  }

  /**
   * Estimated width of `text` in points.
   */
  estimateWidth(text: string, fontSize: number, style: FontStyle = "normal"): number {
    let units = 0;

    for (const char of text) {
      units += this.charWeight(char);
    }

    let width = units * this.model.baseWidth * (fontSize / this.model.baseSize);

    if (isBold(style)) {
      width *= this.model.boldFactor;
    }

    if (isItalic(style)) {
      width *= this.model.italicFactor;
    }

    return width;
  }
}

/**
 * Text layout: line height, greedy word wrapping and page overflow.
 *
 * Layout produces positioned `TextElement`s in document space. It never
 * creates pages; when a line would cross the bottom margin the remaining
 * text comes back as a single element flagged `pageBreakNeeded`, and the
 * caller decides where to continue.
 */

import type { FontFamily, FontStyle } from "#src/fonts/standard-fonts";
import type { PageGeometry, WarningHandler } from "#src/helpers/types";
import { TextElement } from "#src/elements/text-element";

import { TextMetrics } from "./text-metrics";

// ─────────────────────────────────────────────────────────────────────────────
// Line height
// ─────────────────────────────────────────────────────────────────────────────

/** Heading level → font size */
export const HEADING_SIZES = {
  1: 24,
  2: 18,
  3: 16,
} as const;

export type HeadingLevel = keyof typeof HEADING_SIZES;

const HEADING_LINE_RATIOS: Readonly<Record<HeadingLevel, number>> = {
  1: 1.5,
  2: 1.4,
  3: 1.3,
};

const BODY_LINE_RATIO = 1.2;

function headingLevelFor(fontSize: number): HeadingLevel | undefined {
  if (fontSize === HEADING_SIZES[1]) {
    return 1;
  }

  if (fontSize === HEADING_SIZES[2]) {
    return 2;
  }

  if (fontSize === HEADING_SIZES[3]) {
    return 3;
  }

  return undefined;
}

/**
 * Whether a font size is one of the heading sizes (never wrapped).
 */
export function isHeadingSize(fontSize: number): boolean {
  return headingLevelFor(fontSize) !== undefined;
}

/**
 * Line height for a font size: 1.2× for body text, 1.5× / 1.4× / 1.3× for
 * heading levels 1-3.
 *
 * @example
 * ```ts
 * lineHeightFor(12) // 14.4
 * lineHeightFor(24) // 36
 * ```
 */
export function lineHeightFor(fontSize: number): number {
  const level = headingLevelFor(fontSize);

  return fontSize * (level === undefined ? BODY_LINE_RATIO : HEADING_LINE_RATIOS[level]);
}

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

export interface TextLayoutOptions {
  /** Font size in points (default: 12) */
  fontSize?: number;
  fontStyle?: FontStyle | string;
  fontFamily?: FontFamily | string;
  /** 6-digit hex color */
  color?: string;
  /** Wrap width. Absent: no wrapping. */
  maxWidth?: number;
  /** X of every line after the first (default: the starting X) */
  wrapX?: number;
  /** Y of the previous line, used when no Y is given */
  previousY?: number;
  /** Line height of the previous line (default: this text's line height) */
  previousLineHeight?: number;
  rotation?: number;
  scaleX?: number;
  scaleY?: number;
  opacity?: number;
  strikethrough?: boolean;
}

interface WrappedLine {
  text: string;
  /** Last line of a paragraph (followed by an explicit break) */
  endsParagraph: boolean;
}

const LINE_BREAK = /\r\n|\r|\n/;

// ─────────────────────────────────────────────────────────────────────────────
// TextLayout
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Lays out text against a fixed page geometry.
 *
 * @example
 * ```typescript
 * const layout = new TextLayout({ width: 612, height: 792, margin: 50 });
 * const lines = layout.layout(paragraph, undefined, undefined, { maxWidth: 300 });
 * ```
 */
export class TextLayout {
  constructor(
    private readonly geometry: PageGeometry,
    private readonly metrics: TextMetrics = new TextMetrics(),
    private readonly onWarning?: WarningHandler,
  ) {}

  /**
   * Position `text` starting at (x, y).
   *
   * Omitted `x` is the left margin. Omitted `y` is one line below
   * `options.previousY`, or the top margin when there is no previous line.
   * That line is `options.previousLineHeight` tall when given.
   *
   * Text that fits, the empty string included, comes back as exactly one
   * element.
   */
  layout(text: string, x?: number, y?: number, options: TextLayoutOptions = {}): TextElement[] {
    const { margin } = this.geometry;

    const template = TextElement.create(
      {
        text: "",
        x: 0,
        y: 0,
        fontSize: options.fontSize,
        fontStyle: options.fontStyle,
        fontFamily: options.fontFamily,
        color: options.color,
        rotation: options.rotation,
        scaleX: options.scaleX,
        scaleY: options.scaleY,
        opacity: options.opacity,
        strikethrough: options.strikethrough,
      },
      this.onWarning,
    );

    const lineHeight = lineHeightFor(template.fontSize);
    const startX = x ?? margin;
    const startY =
      y ??
      (options.previousY !== undefined
        ? options.previousY + (options.previousLineHeight ?? lineHeight)
        : margin);

    if (isHeadingSize(template.fontSize)) {
      const element = template.withText(text).withPosition(startX, startY);

      return [this.crossesBottom(startY, lineHeight) ? element.withPageBreak(true) : element];
    }

    const maxWidth = this.resolveMaxWidth(options.maxWidth);
    const firstBudget =
      maxWidth !== undefined && startX > margin ? maxWidth - (startX - margin) : maxWidth;

    const lines = this.breakLines(text, template, firstBudget, maxWidth);
    const continuationX = options.wrapX ?? startX;

    const elements: TextElement[] = [];
    let lineY = startY;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      const lineX = i === 0 ? startX : continuationX;

      // Blank lines between paragraphs only advance
      if (line.text === "" && lines.length > 1) {
        lineY += lineHeight;
        continue;
      }

      if (this.crossesBottom(lineY, lineHeight)) {
        elements.push(
          template
            .withText(joinLines(lines.slice(i)))
            .withPosition(lineX, lineY)
            .withPageBreak(true),
        );

        return elements;
      }

      elements.push(template.withText(line.text).withPosition(lineX, lineY));
      lineY += lineHeight;
    }

    return elements;
  }

  private crossesBottom(y: number, lineHeight: number): boolean {
    return y + lineHeight > this.geometry.height - this.geometry.margin;
  }

  private resolveMaxWidth(maxWidth: number | undefined): number | undefined {
    if (maxWidth === undefined) {
      return undefined;
    }

    if (!Number.isFinite(maxWidth) || maxWidth <= 0) {
      this.onWarning?.(`Invalid maxWidth ${maxWidth}, text is not wrapped`);

      return undefined;
    }

    return maxWidth;
  }

  /**
   * Split text into lines. Text without line breaks that fits the first
   * budget comes back unchanged as a single line.
   */
  private breakLines(
    text: string,
    template: TextElement,
    firstBudget: number | undefined,
    maxWidth: number | undefined,
  ): WrappedLine[] {
    const hasBreak = LINE_BREAK.test(text);

    if (
      !hasBreak &&
      (firstBudget === undefined || this.measure(text, template) <= firstBudget)
    ) {
      return [{ text, endsParagraph: true }];
    }

    const paragraphs = text.split(LINE_BREAK);
    const lines: WrappedLine[] = [];

    for (const paragraph of paragraphs) {
      if (maxWidth === undefined) {
        lines.push({ text: paragraph, endsParagraph: true });
        continue;
      }

      const words = paragraph.split(/\s+/).filter(w => w.length > 0);

      if (words.length === 0) {
        lines.push({ text: "", endsParagraph: true });
        continue;
      }

      let current = "";

      for (const word of words) {
        if (current === "") {
          current = word;
          continue;
        }

        // Only the very first line of the text gets the indented budget
        const budget = lines.length === 0 && firstBudget !== undefined ? firstBudget : maxWidth;

        if (this.measure(current, template) + this.measure(` ${word}`, template) <= budget) {
          current += ` ${word}`;
        } else {
          lines.push({ text: current, endsParagraph: false });
          current = word;
        }
      }

      lines.push({ text: current, endsParagraph: true });
    }

    return lines;
  }

  private measure(text: string, template: TextElement): number {
    return this.metrics.estimateWidth(text, template.fontSize, template.fontStyle);
  }
}

/**
 * Rebuild the text of a run of lines: soft-wrapped lines rejoin with a
 * space, paragraph ends with "\n".
 */
function joinLines(lines: readonly WrappedLine[]): string {
  let result = "";

  for (let i = 0; i < lines.length; i++) {
    result += lines[i].text;

    if (i < lines.length - 1) {
      result += lines[i].endsParagraph ? "\n" : " ";
    }
  }

  return result;
}

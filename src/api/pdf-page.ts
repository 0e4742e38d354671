/**
 * PDFPage - one page and its content operators.
 *
 * Elements are positioned in document space; each turns itself into
 * operators for this page's height as it is drawn. The operators are
 * written as the page's content stream on save.
 */

import type { ImageElement } from "#src/elements/image-element";
import type { RectElement } from "#src/elements/rect-element";
import type { TextElement } from "#src/elements/text-element";
import type { Operator } from "#src/helpers/operators";

import type { PDFContext } from "./pdf-context";

export class PDFPage {
  /** The page index (0-based) */
  readonly index: number;

  private readonly ctx: PDFContext;
  private readonly operators: Operator[] = [];

  constructor(index: number, ctx: PDFContext) {
    this.index = index;
    this.ctx = ctx;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Page Dimensions
  // ─────────────────────────────────────────────────────────────────────────────

  get width(): number {
    return this.ctx.geometry.width;
  }

  get height(): number {
    return this.ctx.geometry.height;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Drawing
  // ─────────────────────────────────────────────────────────────────────────────

  drawText(element: TextElement): void {
    this.ctx.assertWritable("draw text");
    this.operators.push(...element.toOperators(this.ctx.renderContext));
  }

  drawRect(rect: RectElement): void {
    this.ctx.assertWritable("draw a rectangle");
    this.operators.push(rect.toOperators(this.height));
  }

  /**
   * Paint an image. The image must already be registered with the
   * document's resources under `element.id`.
   */
  drawImage(element: ImageElement): void {
    this.ctx.assertWritable("draw an image");
    this.operators.push(...element.toOperators(this.height));
  }

  /** Content stream operators in drawing order */
  get contentOperators(): readonly Operator[] {
    return this.operators;
  }
}

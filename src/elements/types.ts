/**
 * Shared element rendering types.
 */

import type { FontTable } from "#src/fonts/standard-fonts";
import type { TextMetrics } from "#src/layout/text-metrics";

/**
 * What an element needs to turn itself into content stream operators.
 */
export interface RenderContext {
  /** Height of the target page, for the Y flip */
  readonly pageHeight: number;
  /** Font resource table */
  readonly fonts: FontTable;
  /** Width model (strikethrough length) */
  readonly metrics: TextMetrics;
  /**
   * Name of an ExtGState resource applying the given opacity, registering
   * it with the document on first use.
   */
  graphicsStateFor(opacity: number): string;
}

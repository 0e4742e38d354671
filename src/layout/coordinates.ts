/**
 * Conversion from document space (origin top-left, Y down) to PDF user
 * space (origin bottom-left, Y up).
 */

/**
 * Flip a top-edge Y coordinate for an object `extent` points tall.
 *
 * The result is the PDF Y of the object's bottom edge. For text the extent
 * is the font size, which puts the baseline one font size below the top.
 *
 * @example
 * ```ts
 * flipY(0, 0, 792) // 792
 * flipY(100, 12, 792) // 680
 * ```
 */
export function flipY(y: number, extent: number, pageHeight: number): number {
  return pageHeight - y - extent;
}

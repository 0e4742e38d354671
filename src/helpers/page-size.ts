/**
 * Page size utilities.
 */

/** Standard page sizes in points (1 point = 1/72 inch) */
export const PAGE_SIZES = {
  letter: {
    width: 612,
    height: 792,
  },
  a4: {
    width: 595.28,
    height: 841.89,
  },
  legal: {
    width: 612,
    height: 1008,
  },
} as const;

/** Available page size presets */
export type PageSizePreset = keyof typeof PAGE_SIZES;

/** Default margin on every edge, in points */
export const DEFAULT_MARGIN = 50;

/**
 * Resolve page dimensions for a preset (default: letter).
 *
 * @example
 * ```ts
 * resolvePageSize() // { width: 612, height: 792 }
 * resolvePageSize("a4") // { width: 595.28, height: 841.89 }
 * ```
 */
export function resolvePageSize(preset: PageSizePreset = "letter"): {
  width: number;
  height: number;
} {
  const { width, height } = PAGE_SIZES[preset];

  return { width, height };
}

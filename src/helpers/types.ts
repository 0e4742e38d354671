/**
 * Shared type definitions used across the library.
 */

/**
 * Receiver for non-fatal diagnostics.
 *
 * Input that is malformed but recoverable (bad colors, unknown fonts,
 * invalid option values) is replaced by a default and reported here rather
 * than thrown.
 */
export type WarningHandler = (message: string) => void;

/**
 * Fixed page geometry in points.
 */
export interface PageGeometry {
  /** Page width */
  width: number;
  /** Page height */
  height: number;
  /** Margin applied to all four edges */
  margin: number;
}

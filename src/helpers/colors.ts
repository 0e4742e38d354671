/**
 * Color types and hex color parsing.
 *
 * Callers describe colors as 6-digit hex strings ("FF8800" or "#FF8800").
 * Internally colors are RGB triples in the 0-1 range, which is what the
 * `rg` / `RG` operators take.
 */

import { formatColorComponent } from "./format";
import type { WarningHandler } from "./types";

/**
 * RGB color with values in the 0-1 range.
 */
export interface RGB {
  type: "RGB";
  red: number;
  green: number;
  blue: number;
}

/**
 * Create an RGB color.
 *
 * @example
 * ```typescript
 * const red = rgb(1, 0, 0);
 * const gray50 = rgb(0.5, 0.5, 0.5);
 * ```
 */
export function rgb(r: number, g: number, b: number): RGB {
  return { type: "RGB", red: r, green: g, blue: b };
}

export const black: RGB = rgb(0, 0, 0);

const HEX_COLOR = /^#?[0-9a-fA-F]{6}$/;

/**
 * Check whether a value is a 6-digit hex color (leading "#" allowed).
 */
export function isHexColor(value: string | null | undefined): value is string {
  return typeof value === "string" && HEX_COLOR.test(value);
}

/**
 * Normalize a hex color to six uppercase digits without "#".
 *
 * Anything that is not a 6-digit hex color falls back to black ("000000").
 * The fallback is reported through `onWarning` when the caller supplied a
 * value; an absent color is just the default.
 */
export function normalizeHexColor(
  value: string | null | undefined,
  onWarning?: WarningHandler,
): string {
  if (isHexColor(value)) {
    return value.replace("#", "").toUpperCase();
  }

  if (value !== undefined && value !== null) {
    onWarning?.(`Invalid color "${value}", using black`);
  }

  return "000000";
}

/**
 * Convert a hex color to RGB, each channel divided by 255.
 *
 * Invalid input (null, wrong length, non-hex digits) yields black.
 */
export function hexToRgb(value: string | null | undefined): RGB {
  if (!isHexColor(value)) {
    return black;
  }

  const hex = value.replace("#", "");

  return rgb(
    Number.parseInt(hex.slice(0, 2), 16) / 255,
    Number.parseInt(hex.slice(2, 4), 16) / 255,
    Number.parseInt(hex.slice(4, 6), 16) / 255,
  );
}

/**
 * Render a color as operator operands: "r g b", three decimals each.
 *
 * @example
 * ```typescript
 * colorOperands(hexToRgb("FF8000")) // "1.000 0.502 0.000"
 * ```
 */
export function colorOperands(color: RGB): string {
  return [color.red, color.green, color.blue].map(formatColorComponent).join(" ");
}

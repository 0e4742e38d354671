/**
 * Standard font resource table.
 *
 * Eight Type1 base fonts are declared once in the page tree's resources
 * under fixed names F1-F8. Text picks a slot from its family and style; no
 * font program is ever embedded.
 */

import type { WarningHandler } from "#src/helpers/types";

/** Font style of a text run. Strikethrough is a separate flag. */
export type FontStyle = "normal" | "bold" | "italic" | "bold-italic";

/** Supported family names */
export type FontFamily = "helvetica" | "arial" | "times" | "times-new-roman";

export const FONT_FAMILIES: readonly FontFamily[] = [
  "helvetica",
  "arial",
  "times",
  "times-new-roman",
];

export const FONT_STYLES: readonly FontStyle[] = ["normal", "bold", "italic", "bold-italic"];

/** Family used when a requested family is not supported */
export const DEFAULT_FONT_FAMILY: FontFamily = "helvetica";

/** One entry in the resource table */
export interface FontSlot {
  /** Resource name used in content streams ("F1") */
  readonly resourceName: string;
  /** PDF base font name ("Helvetica-Bold") */
  readonly baseFont: string;
}

/**
 * Read-only lookup from (family, style) to a font slot.
 *
 * Injected into the writer (to declare the resources) and the text elements
 * (to select them), so both always agree on the names.
 */
export interface FontTable {
  /** Every slot, in declaration order */
  readonly slots: readonly FontSlot[];

  /** Slot for a family and style */
  slotFor(family: FontFamily, style: FontStyle): FontSlot;
}

type SlotsByStyle = Readonly<Record<FontStyle, FontSlot>>;

const HELVETICA: SlotsByStyle = Object.freeze({
  normal: { resourceName: "F1", baseFont: "Helvetica" },
  bold: { resourceName: "F2", baseFont: "Helvetica-Bold" },
  italic: { resourceName: "F3", baseFont: "Helvetica-Oblique" },
  "bold-italic": { resourceName: "F4", baseFont: "Helvetica-BoldOblique" },
});

const TIMES: SlotsByStyle = Object.freeze({
  normal: { resourceName: "F5", baseFont: "Times-Roman" },
  bold: { resourceName: "F6", baseFont: "Times-Bold" },
  italic: { resourceName: "F7", baseFont: "Times-Italic" },
  "bold-italic": { resourceName: "F8", baseFont: "Times-BoldItalic" },
});

const FAMILY_SLOTS: Readonly<Record<FontFamily, SlotsByStyle>> = Object.freeze({
  helvetica: HELVETICA,
  arial: HELVETICA,
  times: TIMES,
  "times-new-roman": TIMES,
});

/**
 * The standard table: Helvetica in F1-F4, Times in F5-F8.
 */
export const STANDARD_FONTS: FontTable = Object.freeze({
  slots: Object.freeze([...FONT_STYLES.map(s => HELVETICA[s]), ...FONT_STYLES.map(s => TIMES[s])]),

  slotFor(family: FontFamily, style: FontStyle): FontSlot {
    return FAMILY_SLOTS[family][style];
  },
});

export function isFontFamily(value: string): value is FontFamily {
  return FONT_FAMILIES.some(family => family === value);
}

export function isFontStyle(value: string): value is FontStyle {
  return FONT_STYLES.some(style => style === value);
}

/**
 * Resolve a caller-supplied family name ("Times New Roman", "arial").
 *
 * Matching ignores case and treats spaces and hyphens alike. Unknown names
 * fall back to Helvetica with a warning.
 */
export function resolveFontFamily(name: string | undefined, onWarning?: WarningHandler): FontFamily {
  if (name === undefined) {
    return DEFAULT_FONT_FAMILY;
  }

  const key = name.trim().toLowerCase().replace(/[\s_]+/g, "-");

  if (isFontFamily(key)) {
    return key;
  }

  onWarning?.(`Unsupported font "${name}", using ${DEFAULT_FONT_FAMILY}`);

  return DEFAULT_FONT_FAMILY;
}

/**
 * Resolve a caller-supplied style; unknown styles become "normal".
 */
export function resolveFontStyle(style: string | undefined, onWarning?: WarningHandler): FontStyle {
  if (style === undefined) {
    return "normal";
  }

  if (isFontStyle(style)) {
    return style;
  }

  onWarning?.(`Unsupported font style "${style}", using normal`);

  return "normal";
}

export function isBold(style: FontStyle): boolean {
  return style === "bold" || style === "bold-italic";
}

export function isItalic(style: FontStyle): boolean {
  return style === "italic" || style === "bold-italic";
}

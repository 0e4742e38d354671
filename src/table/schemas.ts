/**
 * Zod schemas for table options.
 *
 * Colors are validated later (an invalid color falls back to black), so
 * they are plain strings here.
 */

import { z } from "zod";

export const TableThemeSchema = z.enum(["grid", "striped"]);
export type TableTheme = z.infer<typeof TableThemeSchema>;

export const HeaderVisibilitySchema = z.enum(["every-page", "first-page", "never"]);
export type HeaderVisibility = z.infer<typeof HeaderVisibilitySchema>;

export const CellAlignSchema = z.enum(["left", "center", "right"]);
export type CellAlign = z.infer<typeof CellAlignSchema>;

export const CellStyleSchema = z.object({
  fontSize: z.number().positive().finite().optional(),
  fontStyle: z.enum(["normal", "bold", "italic", "bold-italic"]).optional(),
  textColor: z.string().optional(),
  backgroundColor: z.string().optional(),
  align: CellAlignSchema.optional(),
});
export type CellStyle = z.infer<typeof CellStyleSchema>;

export const TableOptionsSchema = z.object({
  theme: TableThemeSchema.default("grid"),
  headerVisibility: HeaderVisibilitySchema.default("every-page"),
  /** Top of the table; default: the document cursor */
  startY: z.number().finite().optional(),
  /** Default: the document margin */
  margin: z.number().nonnegative().finite().optional(),
  headerStyle: CellStyleSchema.default({}),
  bodyStyle: CellStyleSchema.default({}),
  /** Applied to rows with an odd zero-based index */
  alternateRowStyle: CellStyleSchema.default({}),
});

/** Options as callers pass them */
export type TableOptions = z.input<typeof TableOptionsSchema>;

/** Options after validation and defaults */
export type ResolvedTableOptions = z.output<typeof TableOptionsSchema>;

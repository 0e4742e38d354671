/**
 * Zod schema for document options.
 */

import { z } from "zod";

import { DEFAULT_MARGIN } from "#src/helpers/page-size";

export const DocumentInfoSchema = z.object({
  title: z.string().optional(),
  author: z.string().optional(),
  subject: z.string().optional(),
  creator: z.string().optional(),
  producer: z.string().optional(),
  creationDate: z.date().optional(),
});

export const DocumentOptionsSchema = z.object({
  size: z.enum(["letter", "a4", "legal"]).default("letter"),
  margin: z.number().nonnegative().finite().default(DEFAULT_MARGIN),
  /** Header version, "1.4" by default */
  version: z
    .string()
    .regex(/^\d\.\d$/, "Expected a version like 1.4")
    .default("1.4"),
  compressStreams: z.boolean().default(false),
  info: DocumentInfoSchema.optional(),
});

export type ResolvedDocumentOptions = z.output<typeof DocumentOptionsSchema>;

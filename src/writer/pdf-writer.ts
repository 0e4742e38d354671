/**
 * PDF file writer.
 *
 * Turns the finished page contents and shared resources into numbered
 * objects and writes them in one pass:
 *
 * 1. catalog, 2. page tree (with the shared resources), then a page
 * dictionary and its content stream per page, then every image XObject in
 * creation order, then the optional Info dictionary.
 */

import { ObjectRegistry } from "#src/document/object-registry";
import { FilterPipeline } from "#src/filters/filter-pipeline";
import type { FontTable } from "#src/fonts/standard-fonts";
import { formatPdfDate } from "#src/helpers/format";
import { encodeLatin1 } from "#src/helpers/strings";
import { buildImageXObject, type EmbeddedImage } from "#src/images/image-pipeline";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { PdfString } from "#src/objects/pdf-string";

import { ObjectWriter } from "./object-writer";

/**
 * Document metadata written to the Info dictionary.
 */
export interface DocumentInfo {
  title?: string;
  author?: string;
  subject?: string;
  creator?: string;
  producer?: string;
  creationDate?: Date;
}

/**
 * An image XObject and the box it was first placed in.
 */
export interface ImageResource {
  /** Resource name under /XObject */
  readonly id: string;
  readonly image: EmbeddedImage;
  readonly width: number;
  readonly height: number;
}

/**
 * Everything the writer needs from the document.
 */
export interface DocumentContent {
  readonly pageWidth: number;
  readonly pageHeight: number;
  /** Content operators of each page, in page order */
  readonly pages: readonly (readonly string[])[];
  /** Images in creation order */
  readonly images: readonly ImageResource[];
  /** ExtGState resource name → opacity */
  readonly graphicsStates: ReadonlyMap<string, number>;
  readonly fonts: FontTable;
}

/**
 * Options for PDF writing.
 */
export interface WriteOptions {
  /** PDF version string (default: "1.4") */
  version?: string;

  /**
   * Compress content streams with FlateDecode (default: false).
   *
   * A stream is only replaced when compression makes it smaller. Image
   * streams keep their own filter chain.
   */
  compressStreams?: boolean;

  /** Info dictionary; omitted when absent */
  info?: DocumentInfo;
}

const PROC_SET = ["PDF", "Text", "ImageB", "ImageC", "ImageI"];

/**
 * Build the content stream for one page.
 */
export function buildContentStream(operators: readonly string[], compress: boolean): PdfStream {
  const data = encodeLatin1(operators.join("\n"));

  if (!compress || data.length === 0) {
    return new PdfStream([], data);
  }

  const compressed = FilterPipeline.encode(data, ["FlateDecode"]);

  if (compressed.length >= data.length) {
    return new PdfStream([], data);
  }

  return new PdfStream([["Filter", PdfName.FlateDecode]], compressed);
}

/**
 * Resource dictionary shared by every page through the page tree.
 */
export function buildResources(
  content: DocumentContent,
  imageRefs: ReadonlyMap<string, PdfRef>,
): PdfDict {
  const resources = new PdfDict();

  resources.set("ProcSet", new PdfArray(PROC_SET.map(name => PdfName.of(name))));

  const fonts = new PdfDict();

  for (const slot of content.fonts.slots) {
    fonts.set(
      slot.resourceName,
      PdfDict.of({
        Type: PdfName.Font,
        Subtype: PdfName.of("Type1"),
        BaseFont: PdfName.of(slot.baseFont),
        Encoding: PdfName.of("WinAnsiEncoding"),
      }),
    );
  }

  resources.set("Font", fonts);

  if (imageRefs.size > 0) {
    const xobjects = new PdfDict();

    for (const [id, ref] of imageRefs) {
      xobjects.set(id, ref);
    }

    resources.set("XObject", xobjects);
  }

  if (content.graphicsStates.size > 0) {
    const states = new PdfDict();

    for (const [name, opacity] of content.graphicsStates) {
      states.set(
        name,
        PdfDict.of({
          Type: PdfName.ExtGState,
          ca: PdfNumber.of(opacity),
          CA: PdfNumber.of(opacity),
        }),
      );
    }

    resources.set("ExtGState", states);
  }

  return resources;
}

/**
 * Info dictionary with the configured fields only.
 */
export function buildInfoDict(info: DocumentInfo): PdfDict {
  const entries: [string, PdfObject][] = [];

  const text: [string, string | undefined][] = [
    ["Title", info.title],
    ["Author", info.author],
    ["Subject", info.subject],
    ["Creator", info.creator],
    ["Producer", info.producer],
  ];

  for (const [key, value] of text) {
    if (value !== undefined) {
      entries.push([key, PdfString.fromString(value)]);
    }
  }

  if (info.creationDate) {
    entries.push(["CreationDate", PdfString.fromString(formatPdfDate(info.creationDate))]);
  }

  return new PdfDict(entries);
}

/**
 * Number every object, write them in order and finish with the xref table.
 *
 * @returns The complete PDF file
 */
export function writeDocument(content: DocumentContent, options: WriteOptions = {}): Uint8Array {
  const registry = new ObjectRegistry();
  const compress = options.compressStreams ?? false;

  const catalogRef = registry.allocateRef();
  const pagesRef = registry.allocateRef();

  const kids: PdfRef[] = [];

  for (const operators of content.pages) {
    const pageRef = registry.allocateRef();
    const contentRef = registry.allocateRef();

    registry.registerAt(
      pageRef,
      PdfDict.of({
        Type: PdfName.Page,
        Parent: pagesRef,
        Contents: contentRef,
      }),
    );
    registry.registerAt(contentRef, buildContentStream(operators, compress));

    kids.push(pageRef);
  }

  const imageRefs = new Map<string, PdfRef>();

  for (const resource of content.images) {
    imageRefs.set(
      resource.id,
      registry.register(buildImageXObject(resource.image, resource.width, resource.height)),
    );
  }

  const infoRef = options.info ? registry.register(buildInfoDict(options.info)) : undefined;

  registry.registerAt(
    catalogRef,
    PdfDict.of({
      Type: PdfName.Catalog,
      Pages: pagesRef,
    }),
  );

  registry.registerAt(
    pagesRef,
    PdfDict.of({
      Type: PdfName.Pages,
      Kids: new PdfArray(kids),
      Count: PdfNumber.of(kids.length),
      MediaBox: PdfArray.of(
        PdfNumber.of(0),
        PdfNumber.of(0),
        PdfNumber.of(content.pageWidth),
        PdfNumber.of(content.pageHeight),
      ),
      Resources: buildResources(content, imageRefs),
    }),
  );

  const out = new ObjectWriter({ version: options.version });

  for (const [ref, obj] of registry.entries()) {
    out.appendObject(ref, obj);
  }

  return out.finish({ root: catalogRef, info: infoRef });
}

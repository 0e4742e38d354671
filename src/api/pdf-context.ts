/**
 * PDFContext - Central context object for document operations.
 *
 * Holds the state every page and drawing subsystem shares: page geometry,
 * the font table, the width model, shared resources and the warning
 * channel. Passed to pages instead of separate arguments.
 *
 * @internal This is an internal class, not part of the public API.
 */

import type { RenderContext } from "#src/elements/types";
import { DocumentFinalizedError } from "#src/document/errors";
import { type FontTable, STANDARD_FONTS } from "#src/fonts/standard-fonts";
import type { PageGeometry, WarningHandler } from "#src/helpers/types";
import { TextMetrics } from "#src/layout/text-metrics";

import { PDFResources } from "./pdf-resources";

export class PDFContext {
  readonly fonts: FontTable = STANDARD_FONTS;
  readonly metrics = new TextMetrics();
  readonly resources = new PDFResources();

  /** Every diagnostic, in order */
  readonly warnings: string[] = [];

  /** Element render context shared by all pages */
  readonly renderContext: RenderContext;

  private finalized = false;

  constructor(
    readonly geometry: Readonly<PageGeometry>,
    private readonly onWarning?: WarningHandler,
  ) {
    const resources = this.resources;

    this.renderContext = {
      pageHeight: geometry.height,
      fonts: this.fonts,
      metrics: this.metrics,
      graphicsStateFor: opacity => resources.graphicsStateFor(opacity),
    };
  }

  /**
   * Record a diagnostic and forward it to the caller's handler.
   */
  readonly warn: WarningHandler = message => {
    this.warnings.push(message);
    this.onWarning?.(message);
  };

  get isFinalized(): boolean {
    return this.finalized;
  }

  /**
   * Mark the document as consumed. Later mutations throw.
   */
  finalize(): void {
    this.finalized = true;
  }

  /**
   * @throws {DocumentFinalizedError} once the document has been saved
   */
  assertWritable(operation: string): void {
    if (this.finalized) {
      const error = new DocumentFinalizedError(operation);

      this.warn(error.message);

      throw error;
    }
  }
}

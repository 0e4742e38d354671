/**
 * ImageElement - an embedded image placed in a box on one page.
 */

import {
  concatMatrix,
  drawXObject,
  type Operator,
  popGraphicsState,
  pushGraphicsState,
} from "#src/helpers/operators";
import type { EmbeddedImage } from "#src/images/image-pipeline";
import { flipY } from "#src/layout/coordinates";

export interface ImageElementInit {
  /** XObject resource name, unique within the document */
  id: string;
  image: EmbeddedImage;
  /** Original image bytes */
  data: Uint8Array;
  x: number;
  y: number;
  width: number;
  height: number;
}

export class ImageElement {
  readonly id: string;
  readonly image: EmbeddedImage;
  readonly data: Uint8Array;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;

  constructor(init: ImageElementInit) {
    this.id = init.id;
    this.image = init.image;
    this.data = init.data;
    this.x = init.x;
    this.y = init.y;
    this.width = init.width;
    this.height = init.height;
  }

  /** Normalized format tag */
  get format(): string {
    return this.image.normalizedFormat;
  }

  /**
   * Scale the unit square to the box and paint the XObject:
   * `q w 0 0 h x pdfY cm /id Do Q`.
   */
  toOperators(pageHeight: number): Operator[] {
    const pdfY = flipY(this.y, this.height, pageHeight);

    return [
      pushGraphicsState(),
      concatMatrix(this.width, 0, 0, this.height, this.x, pdfY),
      drawXObject(this.id),
      popGraphicsState(),
    ];
  }
}

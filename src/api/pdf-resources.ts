/**
 * PDFResources - resources shared by every page.
 *
 * Fonts are fixed, so only graphics states (one per opacity in use) and
 * image XObjects are collected while drawing.
 */

import type { WarningHandler } from "#src/helpers/types";
import type { ImageResource } from "#src/writer/pdf-writer";

const RESOURCE_NAME = /^[A-Za-z0-9_.-]+$/;

export class PDFResources {
  /** ExtGState name → opacity */
  private readonly states = new Map<string, number>();
  private readonly stateByOpacity = new Map<number, string>();

  private readonly imageList: ImageResource[] = [];
  private readonly imageIds = new Set<string>();

  /**
   * Name of the graphics state applying `opacity` to fills and strokes.
   *
   * Opacities are rounded to two decimals, so 0.501 and 0.5 share a state.
   */
  graphicsStateFor(opacity: number): string {
    const rounded = Math.round(opacity * 100) / 100;
    const existing = this.stateByOpacity.get(rounded);

    if (existing !== undefined) {
      return existing;
    }

    const name = `GS${this.states.size + 1}`;

    this.states.set(name, rounded);
    this.stateByOpacity.set(rounded, name);

    return name;
  }

  /**
   * Pick an unused XObject name.
   *
   * Absent ids become "Im1", "Im2", … Characters that cannot appear in a
   * resource name are replaced with "_". A taken id gets a numeric suffix
   * ("logo" → "logo-2").
   */
  uniqueImageId(requested: string | undefined, onWarning?: WarningHandler): string {
    if (requested === undefined || requested.trim() === "") {
      let n = this.imageList.length + 1;

      while (this.imageIds.has(`Im${n}`)) {
        n++;
      }

      return `Im${n}`;
    }

    let id = requested;

    if (!RESOURCE_NAME.test(id)) {
      id = id.replace(/[^A-Za-z0-9_.-]/g, "_");
      onWarning?.(`Image id "${requested}" contains invalid characters, using "${id}"`);
    }

    if (!this.imageIds.has(id)) {
      return id;
    }

    let suffix = 2;

    while (this.imageIds.has(`${id}-${suffix}`)) {
      suffix++;
    }

    onWarning?.(`Duplicate image id "${id}", using "${id}-${suffix}"`);

    return `${id}-${suffix}`;
  }

  /**
   * Register an image under its (already unique) id.
   *
   * @throws {Error} if the id is taken
   */
  addImage(resource: ImageResource): void {
    if (this.imageIds.has(resource.id)) {
      throw new Error(`Image id "${resource.id}" is already registered`);
    }

    this.imageIds.add(resource.id);
    this.imageList.push(resource);
  }

  get graphicsStates(): ReadonlyMap<string, number> {
    return this.states;
  }

  /** Images in creation order */
  get images(): readonly ImageResource[] {
    return this.imageList;
  }
}

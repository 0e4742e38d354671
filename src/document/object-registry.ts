/**
 * Object registry for numbering the objects of a document.
 *
 * Maps refs to objects and assigns object numbers sequentially from 1.
 * A ref can be allocated before its object exists (the page tree is
 * referenced by every page before it is built).
 */

import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";

export class ObjectRegistry {
  private objects = new Map<PdfRef, PdfObject>();

  /** Next object number to assign (0 is the free list head) */
  private nextObjNum = 1;

  /**
   * Get the next object number that will be assigned.
   */
  get nextObjectNumber(): number {
    return this.nextObjNum;
  }

  /** Number of allocated refs */
  get size(): number {
    return this.nextObjNum - 1;
  }

  /**
   * Register a new object, assigning it a fresh object number.
   */
  register(obj: PdfObject): PdfRef {
    const ref = this.allocateRef();

    this.objects.set(ref, obj);

    return ref;
  }

  /**
   * Allocate a reference without assigning an object.
   */
  allocateRef(): PdfRef {
    return PdfRef.of(this.nextObjNum++);
  }

  /**
   * Register an object at a pre-allocated reference.
   *
   * @throws {Error} if the ref was never allocated or already holds an object
   */
  registerAt(ref: PdfRef, obj: PdfObject): void {
    if (ref.objectNumber < 1 || ref.objectNumber >= this.nextObjNum) {
      throw new Error(`Object ${ref.objectNumber} was not allocated`);
    }

    if (this.objects.has(ref)) {
      throw new Error(`Object ${ref.objectNumber} is already registered`);
    }

    this.objects.set(ref, obj);
  }

  getObject(ref: PdfRef): PdfObject | null {
    return this.objects.get(ref) ?? null;
  }

  /**
   * Every registered object in object-number order.
   *
   * @throws {Error} if an allocated ref never received an object
   */
  *entries(): Generator<[PdfRef, PdfObject]> {
    for (let objNum = 1; objNum < this.nextObjNum; objNum++) {
      const ref = PdfRef.of(objNum);
      const obj = this.objects.get(ref);

      if (obj === undefined) {
        throw new Error(`Object ${objNum} was allocated but never registered`);
      }

      yield [ref, obj];
    }
  }
}

/**
 * Error classes for document building.
 *
 * Malformed input (bad colors, unknown fonts, invalid options) is never
 * thrown; it is replaced by a default and reported as a warning. The
 * errors here are structural: the operation cannot produce a correct
 * document.
 */

/**
 * Base class for document errors.
 */
export class DocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DocumentError";
  }
}

/**
 * A mutation or second save was attempted after the document was saved.
 */
export class DocumentFinalizedError extends DocumentError {
  constructor(operation: string) {
    super(`Cannot ${operation}: document has already been saved`);
    this.name = "DocumentFinalizedError";
  }
}

/**
 * Objects reached the writer out of object-number order, which would
 * break the cross-reference table.
 */
export class ObjectOrderError extends DocumentError {
  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`Object ${actual} written out of order, expected object ${expected}`);
    this.name = "ObjectOrderError";
  }
}

/**
 * A placement was given a size that cannot be drawn (not a finite,
 * non-negative number).
 */
export class PlacementError extends DocumentError {
  constructor(
    readonly field: string,
    readonly value: number,
  ) {
    super(`Invalid ${field} ${value}: expected a finite number >= 0`);
    this.name = "PlacementError";
  }
}

import { DocumentError } from "#src/document/errors";

/**
 * Error codes for table drawing failures.
 */
export type TableDrawErrorCode = "NO_COLUMNS" | "NO_TARGET";

/**
 * A table could not be drawn. Nothing was emitted.
 */
export class TableDrawError extends DocumentError {
  constructor(
    message: string,
    readonly code: TableDrawErrorCode,
  ) {
    super(message);
    this.name = "TableDrawError";
  }
}

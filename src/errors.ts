import type { Row } from "./types";

export type FileOperation = "read" | "write";

/** Input unreadable or output unwritable; aborts the run. */
export class FileError extends Error {
  readonly path: string;
  readonly operation: FileOperation;

  constructor(operation: FileOperation, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot ${operation} ${path}: ${reason}`, { cause });
    this.name = "FileError";
    this.path = path;
    this.operation = operation;
  }
}

/** A single row could not be transformed; the row is passed through. */
export class RowError extends Error {
  readonly rowIndex: number;
  readonly row: Row;

  constructor(rowIndex: number, row: Row, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Error processing row ${rowIndex}: ${reason}`, { cause });
    this.name = "RowError";
    this.rowIndex = rowIndex;
    this.row = row;
  }
}

// packages/core/src/errors.ts
export type ErrorCode =
  | 'CONNECTION'
  | 'EMPTY_FILE'
  | 'UNSUPPORTED_FILE'
  | 'VALIDATION'
  | 'INTERNAL';

export class ShipqueryError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Store unreachable. Fatal for the current action only. */
export class ConnectionError extends ShipqueryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION', message, options);
  }
}

/** Ingestion parsed zero data rows. */
export class EmptyFileError extends ShipqueryError {
  constructor(filename: string) {
    super('EMPTY_FILE', `No rows found in ${filename}`);
  }
}

export class UnsupportedFileError extends ShipqueryError {
  constructor(filename: string) {
    super('UNSUPPORTED_FILE', `Unsupported file type: ${filename} (expected .xlsx, .xls or .csv)`);
  }
}

export function isShipqueryError(e: unknown): e is ShipqueryError {
  return e instanceof ShipqueryError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

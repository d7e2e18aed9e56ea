/**
 * Raised when the master or delta file cannot be read, parsed or written.
 * Fatal to the run.
 */
export class DeltaStoreError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeltaStoreError';
    this.path = path;
  }
}

export class CsvFormatError extends Error {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} at offset ${offset}`);
    this.name = 'CsvFormatError';
    this.offset = offset;
  }
}

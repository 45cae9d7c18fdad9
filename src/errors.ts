/**
 * Error taxonomy for the embedding asset pipeline
 */

/** A required input artifact (corpus, vector store, catalog) does not exist. */
export class MissingInputError extends Error {
  readonly path: string;

  constructor(path: string, what = 'input file') {
    super(`Missing ${what}: ${path}`);
    this.name = 'MissingInputError';
    this.path = path;
  }
}

/**
 * A corpus line could not be parsed into a word vector.
 * The reducer skips these lines; they never abort a run.
 */
export class MalformedLineError extends Error {
  readonly lineNumber: number | undefined;
  readonly reason: string;

  constructor(reason: string, lineNumber?: number) {
    super(lineNumber === undefined ? `Malformed line: ${reason}` : `Malformed line ${lineNumber}: ${reason}`);
    this.name = 'MalformedLineError';
    this.reason = reason;
    this.lineNumber = lineNumber;
  }
}

/** Binary asset does not follow its declared layout. */
export class FormatError extends Error {
  /** Byte offset where the problem was detected */
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} (at byte ${offset})`);
    this.name = 'FormatError';
    this.offset = offset;
  }
}

/** The stream ended before a declared field or record was complete. */
export class TruncatedStreamError extends FormatError {
  readonly needed: number;
  readonly available: number;

  constructor(field: string, offset: number, needed: number, available: number) {
    super(`Truncated stream reading ${field}: need ${needed} bytes, ${available} remain`, offset);
    this.name = 'TruncatedStreamError';
    this.needed = needed;
    this.available = available;
  }
}

/** Word bytes are not valid UTF-8. */
export class EncodingError extends FormatError {
  constructor(message: string, offset: number) {
    super(message, offset);
    this.name = 'EncodingError';
  }
}

export class DimensionMismatchError extends FormatError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, offset: number) {
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}`, offset);
    this.name = 'DimensionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/** The command catalog is not a list of valid command records. */
export class CatalogFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogFormatError';
  }
}

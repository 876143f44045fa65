export type StatusErrorCode =
  | 'UNRECOGNIZED_FORMAT'
  | 'MISSING_HEADER'
  | 'HEADER_ARITY_MISMATCH'
  | 'UNSUPPORTED_RECORD_TYPE'
  | 'INVALID_NUMERIC_VALUE'
  | 'INVALID_TIMESTAMP';

/**
 * Base class for every failure raised while decoding a status document.
 * Any of these aborts the scan of the current source.
 */
export abstract class StatusError extends Error {
  abstract readonly code: StatusErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnrecognizedFormatError extends StatusError {
  readonly code = 'UNRECOGNIZED_FORMAT';

  constructor(readonly prefix: string) {
    super(`unexpected file contents: ${JSON.stringify(prefix)}`);
  }
}

export class MissingHeaderError extends StatusError {
  readonly code = 'MISSING_HEADER';

  constructor(readonly section: string) {
    super(`${section} should be preceded by HEADER`);
  }
}

export class HeaderArityMismatchError extends StatusError {
  readonly code = 'HEADER_ARITY_MISMATCH';

  constructor(readonly section: string) {
    super(`HEADER for ${section} describes a different number of columns`);
  }
}

export class UnsupportedRecordTypeError extends StatusError {
  readonly code = 'UNSUPPORTED_RECORD_TYPE';

  constructor(readonly tag: string) {
    super(`unsupported key: ${JSON.stringify(tag)}`);
  }
}

export class InvalidNumericValueError extends StatusError {
  readonly code = 'INVALID_NUMERIC_VALUE';

  constructor(
    readonly value: string,
    readonly column: string | null = null
  ) {
    super(
      column
        ? `invalid numeric value ${JSON.stringify(value)} in column "${column}"`
        : `invalid numeric value ${JSON.stringify(value)}`
    );
  }
}

export class InvalidTimestampError extends StatusError {
  readonly code = 'INVALID_TIMESTAMP';

  constructor(readonly value: string) {
    super(`invalid timestamp ${JSON.stringify(value)}`);
  }
}

export function isStatusError(error: unknown): error is StatusError {
  return error instanceof StatusError;
}

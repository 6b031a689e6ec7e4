/**
 * dnt-codec — error classes
 *
 * Every failure aborts the current read or write call. Nothing is retried and
 * no partial table is returned. Catch DntError to handle all of them at once.
 */

export class DntError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DntError';
  }
}

/**
 * The underlying bytes could not be read or written: a truncated buffer or
 * file, a failed fs call, a seek past the end.
 *
 * offset is the stream position at which the operation was attempted, when
 * the failing layer knows it.
 */
export class DntIOError extends DntError {
  readonly offset: number | undefined;

  constructor(message: string, offset?: number, options?: ErrorOptions) {
    super(message, options);
    this.name   = 'DntIOError';
    this.offset = offset;
  }
}

export type DntFormatErrorCode = 'UnknownTypeTag' | 'BadSentinel';

/** The bytes were readable but do not follow the DNT layout. */
export class DntFormatError extends DntError {
  readonly code:   DntFormatErrorCode;
  readonly offset: number | undefined;
  /** The offending byte, for UnknownTypeTag. */
  readonly tag:    number | undefined;

  constructor(
    code:    DntFormatErrorCode,
    message: string,
    details: { offset?: number; tag?: number } = {},
  ) {
    super(message);
    this.name   = 'DntFormatError';
    this.code   = code;
    this.offset = details.offset;
    this.tag    = details.tag;
  }
}

/**
 * A table handed to the writer breaks a shape invariant. Thrown before any
 * byte is written.
 *
 * path locates the offending part, e.g. `head[2]` or `body[4].values[1]`.
 */
export class DntContractError extends DntError {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = 'DntContractError';
    this.path = path;
  }
}

/**
 * DSON errors. Parse errors carry the byte offset they were raised at.
 */

export type DsonErrorKind =
  | 'UnexpectedEndOfInput'
  | 'NotNulTerminated'
  | 'MalformedKeyword'
  | 'MalformedNumber'
  | 'UnterminatedString'
  | 'ForbiddenEscape'
  | 'UnrecognizedEscape'
  | 'InvalidCodepoint'
  | 'UnrecognizedValue'
  | 'NestingTooDeep'
  | 'InputTooLarge';

export class DsonError extends Error {
  override readonly name: string = 'DsonError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, DsonError.prototype);
  }
}

export class DsonParseError extends DsonError {
  override readonly name = 'DsonParseError';
  readonly kind: DsonErrorKind;
  /** Offset of the offending byte in the input */
  readonly byteOffset?: number;

  constructor(kind: DsonErrorKind, message: string, options?: { byteOffset?: number; cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.byteOffset = options?.byteOffset;
    Object.setPrototypeOf(this, DsonParseError.prototype);
  }

  get location(): string {
    return this.byteOffset === undefined ? '' : `input char #${this.byteOffset}`;
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.message} (${loc})` : this.message;
  }
}

/** A value tree that has no DSON text form */
export class DsonEncodeError extends DsonError {
  override readonly name = 'DsonEncodeError';
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, DsonEncodeError.prototype);
  }
}

/**
 * Authority exception hierarchy.
 *
 * All errors raised by this package inherit from UriError.
 */

/** Base error for all URI authority errors. */
export class UriError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "UriError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised (or returned) when a value fails a validity check.
 *
 * Several reasons can be merged into one error with `ValidationError.join`.
 */
export class ValidationError extends UriError {
  static readonly SEPARATOR = ", ";

  readonly reasons: readonly string[];

  constructor(message: string, reasons?: readonly string[]) {
    super(message);
    this.name = "ValidationError";
    this.reasons = reasons ?? [message];
  }

  /** Merge reasons in insertion order into a single error. */
  static join(errors: readonly ValidationError[]): ValidationError {
    const reasons = errors.flatMap((err) => err.reasons);
    return new ValidationError(reasons.join(ValidationError.SEPARATOR), reasons);
  }
}

/** Raised when a serialized authority cannot be decoded. */
export class InvalidAuthorityError extends UriError {
  constructor(message?: string) {
    super(message);
    this.name = "InvalidAuthorityError";
  }
}

/**
 * Raised when a decode step needs more bytes than remain between the
 * cursor and the end of the buffer.
 *
 * This is the only way decoding fails: every bit pattern is a valid number
 * and malformed UTF-8 is repaired rather than rejected.
 */
export class InsufficientDataError extends Error {
  readonly kind = 'InsufficientData' as const;
  /** Cursor offset at which the read was attempted */
  readonly offset: number;
  /** Bytes the read required */
  readonly needed: number;
  /** Bytes left after `offset` */
  readonly available: number;

  constructor(offset: number, needed: number, available: number) {
    super(`Insufficient data: needed ${needed} byte(s) at offset ${offset}, ${available} available`);
    this.name = 'InsufficientDataError';
    this.offset = offset;
    this.needed = needed;
    this.available = available;
  }
}

export type DecodeError = InsufficientDataError;

/**
 * Outcome of a root decode.
 */
export type DecodeResult<T> =
  | { ok: true; value: T; bytesRead: number }
  | { ok: false; error: DecodeError };

export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof InsufficientDataError;
}

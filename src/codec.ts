import type { ByteBuffer } from './buffer.js';
import type { Cursor } from './cursor.js';

/**
 * Writes values of type T to the end of a buffer.
 */
export interface Encoder<T> {
  /** Lower bound of the number of bytes one encoded value occupies */
  readonly minSize: number;

  /**
   * Append the canonical bytes of `value`. Never fails and never
   * touches bytes already in the buffer.
   */
  encode(buffer: ByteBuffer, value: T): void;
}

/**
 * Reads values of type T starting at a cursor.
 */
export interface Decoder<T> {
  /** Lower bound of the number of bytes one encoded value occupies */
  readonly minSize: number;

  /**
   * Rebuild a value from `cursor.offset`, advancing the cursor past the
   * bytes consumed. Throws `InsufficientDataError` when the buffer ends
   * early; the cursor position is unspecified after a throw.
   */
  decode(buffer: ByteBuffer, cursor: Cursor): T;
}

/**
 * A codec that can both encode and decode a type T.
 */
export interface Codec<T> extends Encoder<T>, Decoder<T> {}

/**
 * Infer the TypeScript type from a codec.
 */
export type Infer<C> = C extends Decoder<infer T> ? T : never;

/**
 * A value that knows how to write itself.
 */
export interface Encodable {
  serialize(buffer: ByteBuffer): void;
}

/**
 * The static side of a class whose instances can be rebuilt from a buffer.
 */
export interface Decodable<T> {
  deserialize(buffer: ByteBuffer, cursor: Cursor): T;
}

/**
 * Lift a self-serializing class into a codec so it can be nested inside
 * `vec`, `struct` and the other combinators.
 *
 * @example
 * ```typescript
 * class Point implements Encodable {
 *   constructor(readonly x: number, readonly y: number) {}
 *
 *   serialize(buffer: ByteBuffer) {
 *     s.i32.encode(buffer, this.x);
 *     s.i32.encode(buffer, this.y);
 *   }
 *
 *   static deserialize(buffer: ByteBuffer, cursor: Cursor) {
 *     return new Point(s.i32.decode(buffer, cursor), s.i32.decode(buffer, cursor));
 *   }
 * }
 *
 * const Path = s.vec(encodable(Point, 8));
 * ```
 */
export function encodable<T extends Encodable>(type: Decodable<T>, minSize = 0): Codec<T> {
  return {
    minSize,
    encode: (buffer, value) => value.serialize(buffer),
    decode: (buffer, cursor) => type.deserialize(buffer, cursor),
  };
}

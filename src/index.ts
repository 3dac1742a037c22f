/**
 * serbuf: a minimal big-endian binary serialization library
 *
 * A `ByteBuffer` is the encode sink and the decode source. Codecs describe how
 * a type is written to and read back from it; larger formats are built by
 * composing codecs, in field order, with no schema compiler.
 *
 * @example
 * ```typescript
 * import { s } from 'serbuf';
 *
 * const Person = s.struct({
 *   name: s.string,
 *   age: s.u8,
 *   scores: s.vec(s.u32),
 * });
 *
 * type Person = s.infer<typeof Person>;
 *
 * const bytes = s.encode(Person, { name: 'Alice', age: 30, scores: [7, 9] });
 * const person = s.decode(Person, bytes);
 * ```
 *
 * @packageDocumentation
 */

export { ByteBuffer } from './buffer.js';
export type { ByteBufferOptions } from './buffer.js';

export { Cursor } from './cursor.js';

export { InsufficientDataError, isDecodeError } from './errors.js';
export type { DecodeError, DecodeResult } from './errors.js';

export { encodable } from './codec.js';
export type { Codec, Decodable, Decoder, Encodable, Encoder, Infer } from './codec.js';

export { DEFAULT_CONFIG, FORMAT, LENGTH_PREFIX_BYTES, POINTER_BYTES } from './config.js';
export type { FormatConfig, SerbufConfig } from './config.js';

export { createDebug, isEnabled } from './debug.js';
export type { DebugLogger } from './debug.js';

export {
  // Signed integers
  i8,
  i16,
  i32,
  i64,
  i128,
  isize,
  // Unsigned integers
  u8,
  u16,
  u32,
  u64,
  u128,
  usize,
  // Floats
  f32,
  f64,
  // Text & sequences
  string,
  vec,
  // Composition
  struct,
  tuple,
  transform,
  lazy,
  // Length prefix helpers
  readLength,
  writeLength,
  // Functions
  encode,
  decode,
  tryDecode,
} from './intrinsics.js';

export { bytes } from './lib/bytes.js';

import { encodable, type Infer } from './codec.js';
import {
  i8, i16, i32, i64, i128, isize,
  u8, u16, u32, u64, u128, usize,
  f32, f64,
  string, vec,
  struct, tuple, transform, lazy,
  encode, decode, tryDecode,
} from './intrinsics.js';
import { bytes } from './lib/bytes.js';

export const s = {
  // Numbers
  i8,
  i16,
  i32,
  i64,
  i128,
  isize,
  u8,
  u16,
  u32,
  u64,
  u128,
  usize,
  f32,
  f64,

  // Text & sequences
  string,
  vec,
  bytes,

  // Composition
  struct,
  tuple,
  transform,
  lazy,
  encodable,

  // Functions
  encode,
  decode,
  tryDecode,
} as const;

export declare namespace s {
  export type infer<C> = Infer<C>;
  export type Codec<T> = import('./codec.js').Codec<T>;
}

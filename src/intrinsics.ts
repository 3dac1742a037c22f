/**
 * Intrinsic codecs for serbuf
 *
 * This module provides all built-in codecs:
 * - Numbers: i8, i16, i32, i64, i128, isize, u8, u16, u32, u64, u128, usize, f32, f64
 * - Text: string
 * - Sequences: vec
 * - Composition: struct, tuple, transform, lazy
 * - Top-level functions: encode, decode, tryDecode
 */

import { ByteBuffer } from './buffer.js';
import type { Codec, Infer } from './codec.js';
import { LENGTH_PREFIX_BYTES, POINTER_BYTES } from './config.js';
import type { Cursor } from './cursor.js';
import { InsufficientDataError, type DecodeResult } from './errors.js';

// ============================================================================
// Numeric Codecs
// ============================================================================

function createNumericCodec<T>(
  width: number,
  read: (buffer: ByteBuffer, cursor: Cursor) => T,
  write: (buffer: ByteBuffer, value: T) => void
): Codec<T> {
  return {
    minSize: width,
    decode: read,
    encode: write,
  };
}

// Signed Integer Codecs
export const i8: Codec<number> = createNumericCodec(1, (b, c) => b.readI8(c), (b, v) => b.writeI8(v));
export const i16: Codec<number> = createNumericCodec(2, (b, c) => b.readI16(c), (b, v) => b.writeI16(v));
export const i32: Codec<number> = createNumericCodec(4, (b, c) => b.readI32(c), (b, v) => b.writeI32(v));
export const i64: Codec<bigint> = createNumericCodec(8, (b, c) => b.readI64(c), (b, v) => b.writeI64(v));
export const i128: Codec<bigint> = createNumericCodec(16, (b, c) => b.readI128(c), (b, v) => b.writeI128(v));
export const isize: Codec<bigint> = createNumericCodec(POINTER_BYTES, (b, c) => b.readI64(c), (b, v) => b.writeI64(v));

// Unsigned Integer Codecs
export const u8: Codec<number> = createNumericCodec(1, (b, c) => b.readU8(c), (b, v) => b.writeU8(v));
export const u16: Codec<number> = createNumericCodec(2, (b, c) => b.readU16(c), (b, v) => b.writeU16(v));
export const u32: Codec<number> = createNumericCodec(4, (b, c) => b.readU32(c), (b, v) => b.writeU32(v));
export const u64: Codec<bigint> = createNumericCodec(8, (b, c) => b.readU64(c), (b, v) => b.writeU64(v));
export const u128: Codec<bigint> = createNumericCodec(16, (b, c) => b.readU128(c), (b, v) => b.writeU128(v));
export const usize: Codec<bigint> = createNumericCodec(POINTER_BYTES, (b, c) => b.readU64(c), (b, v) => b.writeU64(v));

// Float Codecs
export const f32: Codec<number> = createNumericCodec(4, (b, c) => b.readF32(c), (b, v) => b.writeF32(v));
export const f64: Codec<number> = createNumericCodec(8, (b, c) => b.readF64(c), (b, v) => b.writeF64(v));

// ============================================================================
// Length Prefix
// ============================================================================

/**
 * Write a count or byte length as u64.
 */
export function writeLength(buffer: ByteBuffer, length: number): void {
  buffer.writeU64(BigInt(length));
}

/**
 * Read a u64 count or byte length. Values past 2^53 lose precision, which is
 * harmless: no buffer is that large, so the following bounds check fails.
 */
export function readLength(buffer: ByteBuffer, cursor: Cursor): number {
  return Number(buffer.readU64(cursor));
}

// ============================================================================
// String Codec
// ============================================================================

/**
 * String - u64 byte length followed by UTF-8 bytes
 *
 * Decoding repairs invalid UTF-8 with U+FFFD instead of failing.
 */
export const string: Codec<string> = {
  minSize: LENGTH_PREFIX_BYTES,

  encode(buffer, value) {
    const bytes = buffer.encodeText(value);
    writeLength(buffer, bytes.byteLength);
    buffer.writeBytes(bytes);
  },

  decode(buffer, cursor) {
    const length = readLength(buffer, cursor);
    return buffer.readText(cursor, length);
  },
};

// ============================================================================
// Sequence Codec
// ============================================================================

/**
 * Vec<T> - u64 element count followed by the elements back-to-back
 *
 * A count that cannot fit in the remaining bytes is rejected before any
 * element is decoded. Every element is budgeted at least one byte, so a
 * sequence of zero-width elements may not be longer than what is left of
 * the buffer.
 */
export function vec<T>(element: Codec<T>): Codec<T[]> {
  return {
    minSize: LENGTH_PREFIX_BYTES,

    encode(buffer, value) {
      writeLength(buffer, value.length);
      for (const item of value) {
        element.encode(buffer, item);
      }
    },

    decode(buffer, cursor) {
      const length = readLength(buffer, cursor);
      const needed = length * Math.max(element.minSize, 1);
      const available = buffer.remaining(cursor);
      if (needed > available) {
        throw new InsufficientDataError(cursor.offset, needed, available);
      }

      const result: T[] = [];
      for (let i = 0; i < length; i++) {
        result.push(element.decode(buffer, cursor));
      }
      return result;
    },
  };
}

// ============================================================================
// Composition
// ============================================================================

/**
 * Tuple - fixed list of differently typed values, encoded in order
 */
export function tuple<T extends unknown[]>(
  ...codecs: { [K in keyof T]: Codec<T[K]> }
): Codec<T> {
  return {
    // Summed on demand so `lazy` elements are not resolved at definition time
    get minSize() {
      let total = 0;
      for (const codec of codecs) {
        total += codec.minSize;
      }
      return total;
    },

    encode(buffer, value) {
      for (let i = 0; i < codecs.length; i++) {
        codecs[i].encode(buffer, value[i]);
      }
    },

    decode(buffer, cursor) {
      const result: unknown[] = new Array(codecs.length);
      for (let i = 0; i < codecs.length; i++) {
        result[i] = codecs[i].decode(buffer, cursor);
      }
      return result as T;
    },
  };
}

/**
 * Struct - named fields, encoded in property order with no padding or tags
 *
 * Property order follows JavaScript's own-key order, so integer-like keys
 * come first.
 *
 * @example
 * ```typescript
 * const Person = s.struct({
 *   name: s.string,
 *   age: s.u8,
 *   tags: s.vec(s.string),
 * });
 * ```
 */
export function struct<T extends Record<string, unknown>>(
  fields: { [K in keyof T]: Codec<T[K]> }
): Codec<T> {
  const fieldNames = Object.keys(fields) as (keyof T)[];
  const fieldCodecs = fieldNames.map((name) => ({ name, codec: fields[name] }));

  return {
    get minSize() {
      return fieldCodecs.reduce((sum, { codec }) => sum + codec.minSize, 0);
    },

    encode(buffer, value) {
      for (const { name, codec } of fieldCodecs) {
        codec.encode(buffer, value[name]);
      }
    },

    decode(buffer, cursor) {
      const result = {} as T;
      for (const { name, codec } of fieldCodecs) {
        result[name] = codec.decode(buffer, cursor) as T[keyof T];
      }
      return result;
    },
  };
}

/**
 * Transform a codec's output/input with mapping functions
 */
export function transform<T, U>(
  codec: Codec<T>,
  decode: (value: T) => U,
  encode: (value: U) => T
): Codec<U> {
  return {
    get minSize() { return codec.minSize; },
    decode: (buffer, cursor) => decode(codec.decode(buffer, cursor)),
    encode: (buffer, value) => codec.encode(buffer, encode(value)),
  };
}

/**
 * Lazy codec for recursive types
 *
 * @example
 * ```typescript
 * type Tree = { label: string; children: Tree[] };
 * const Tree: Codec<Tree> = s.struct({
 *   label: s.string,
 *   children: s.vec(s.lazy(() => Tree)),
 * });
 * ```
 */
export function lazy<T>(getCodec: () => Codec<T>): Codec<T> {
  let cached: Codec<T> | null = null;
  const get = () => {
    if (!cached) cached = getCodec();
    return cached;
  };

  return {
    get minSize() { return get().minSize; },
    decode: (buffer, cursor) => get().decode(buffer, cursor),
    encode: (buffer, value) => get().encode(buffer, value),
  };
}

// ============================================================================
// Top-level Functions
// ============================================================================

/**
 * Encode a value into a standalone byte array.
 *
 * @example
 * ```typescript
 * const bytes = s.encode(Person, { name: 'Alice', age: 30, tags: [] });
 * ```
 */
export function encode<T>(codec: Codec<T>, value: T): Uint8Array {
  const buffer = new ByteBuffer();
  buffer.encode(codec, value);
  return buffer.toBytes();
}

/**
 * Decode the value at the start of `bytes`, ignoring anything after it.
 * Throws `InsufficientDataError` if the bytes end early.
 */
export function decode<T>(codec: Codec<T>, bytes: ArrayBuffer | Uint8Array): T {
  return ByteBuffer.from(bytes).decode(codec);
}

/**
 * Decode the value at the start of `bytes`, reporting failure as a result.
 */
export function tryDecode<T>(codec: Codec<T>, bytes: ArrayBuffer | Uint8Array): DecodeResult<T> {
  return ByteBuffer.from(bytes).tryDecode(codec);
}

export type { Infer };

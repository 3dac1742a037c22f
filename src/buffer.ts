import { TextDecoder, TextEncoder } from 'node:util';
import type { Decodable, Decoder, Encodable, Encoder } from './codec.js';
import { DEFAULT_CONFIG } from './config.js';
import { Cursor } from './cursor.js';
import { createDebug } from './debug.js';
import { InsufficientDataError, type DecodeResult } from './errors.js';

export interface ByteBufferOptions {
  initialCapacity?: number;
  textEncoder?: TextEncoder;
}

const U64_MASK = (1n << 64n) - 1n;

const debug = createDebug(DEFAULT_CONFIG.debugNamespace);

/**
 * ByteBuffer owns the bytes of an archive and serves as both the encode
 * sink and the decode source.
 *
 * Encoding only ever appends. Decoding never mutates: reads go through a
 * `Cursor` the caller owns, and every read checks that enough bytes remain
 * before touching the underlying storage.
 *
 * All multi-byte values are big-endian.
 */
export class ByteBuffer {
  private storage: Uint8Array;
  private view: DataView;
  private used: number;
  readonly textEncoder: TextEncoder;
  private readonly textDecoder: TextDecoder;

  constructor(options: ByteBufferOptions = {}) {
    const capacity = options.initialCapacity ?? DEFAULT_CONFIG.initialCapacity;
    this.textEncoder = options.textEncoder ?? new TextEncoder();
    // Keep a leading U+FEFF as text instead of stripping it as a BOM.
    this.textDecoder = new TextDecoder('utf-8', { ignoreBOM: true });
    this.storage = new Uint8Array(capacity);
    this.view = new DataView(this.storage.buffer);
    this.used = 0;
  }

  /**
   * Wrap bytes loaded from elsewhere. Nothing is validated here; malformed
   * content surfaces when it is decoded.
   *
   * The bytes are not copied. Appending to the returned buffer moves it onto
   * fresh storage first, so `data` itself is never written to.
   */
  static from(data: ArrayBuffer | Uint8Array, options: Omit<ByteBufferOptions, 'initialCapacity'> = {}): ByteBuffer {
    const buffer = new ByteBuffer({ ...options, initialCapacity: 0 });
    const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
    buffer.storage = bytes;
    buffer.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    buffer.used = bytes.byteLength;
    return buffer;
  }

  /**
   * Number of bytes written (or loaded).
   */
  get length(): number {
    return this.used;
  }

  /**
   * Bytes that can be appended before the storage has to grow.
   */
  get capacity(): number {
    return this.storage.byteLength;
  }

  /**
   * Bytes left between `cursor` and the end of the buffer. A cursor that is
   * not at a whole, non-negative offset has nothing left to read.
   */
  remaining(cursor: Cursor): number {
    if (!Number.isInteger(cursor.offset) || cursor.offset < 0) {
      return 0;
    }
    return Math.max(0, this.used - cursor.offset);
  }

  /**
   * Ensure the buffer has enough capacity for additional bytes.
   */
  private ensureCapacity(additionalBytes: number): void {
    const required = this.used + additionalBytes;
    if (required > this.storage.byteLength) {
      const capacity = Math.max(this.storage.byteLength * 2, required);
      const next = new Uint8Array(capacity);
      next.set(this.storage.subarray(0, this.used));
      this.storage = next;
      this.view = new DataView(next.buffer);
    }
  }

  /**
   * Claim `width` bytes at the end and return where they start.
   */
  private reserve(width: number): number {
    this.ensureCapacity(width);
    const pos = this.used;
    this.used += width;
    return pos;
  }

  /**
   * Claim `width` bytes at the cursor for reading and return where they
   * start. Throws before reading anything if the buffer is too short.
   */
  private take(cursor: Cursor, width: number): number {
    const available = this.remaining(cursor);
    if (width > available) {
      throw new InsufficientDataError(cursor.offset, width, available);
    }
    return cursor.advance(width);
  }

  // === Primitive Writers (Big Endian) ===

  writeU8(value: number): void {
    this.view.setUint8(this.reserve(1), value);
  }

  writeI8(value: number): void {
    this.view.setInt8(this.reserve(1), value);
  }

  writeU16(value: number): void {
    this.view.setUint16(this.reserve(2), value);
  }

  writeI16(value: number): void {
    this.view.setInt16(this.reserve(2), value);
  }

  writeU32(value: number): void {
    this.view.setUint32(this.reserve(4), value);
  }

  writeI32(value: number): void {
    this.view.setInt32(this.reserve(4), value);
  }

  writeU64(value: bigint): void {
    this.view.setBigUint64(this.reserve(8), value);
  }

  writeI64(value: bigint): void {
    this.view.setBigInt64(this.reserve(8), value);
  }

  /**
   * Write a 128-bit unsigned integer as two big-endian 64-bit halves.
   */
  writeU128(value: bigint): void {
    const wide = BigInt.asUintN(128, value);
    const pos = this.reserve(16);
    this.view.setBigUint64(pos, wide >> 64n);
    this.view.setBigUint64(pos + 8, wide & U64_MASK);
  }

  /**
   * Two's complement of `value`, written like `writeU128`.
   */
  writeI128(value: bigint): void {
    this.writeU128(value);
  }

  writeF32(value: number): void {
    this.view.setFloat32(this.reserve(4), value);
  }

  writeF64(value: number): void {
    this.view.setFloat64(this.reserve(8), value);
  }

  /**
   * Append raw bytes.
   */
  writeBytes(bytes: Uint8Array): void {
    const pos = this.reserve(bytes.byteLength);
    this.storage.set(bytes, pos);
  }

  /**
   * Encode a string to UTF-8 bytes.
   */
  encodeText(text: string): Uint8Array {
    return this.textEncoder.encode(text);
  }

  // === Primitive Readers (Big Endian) ===

  readU8(cursor: Cursor): number {
    return this.view.getUint8(this.take(cursor, 1));
  }

  readI8(cursor: Cursor): number {
    return this.view.getInt8(this.take(cursor, 1));
  }

  readU16(cursor: Cursor): number {
    return this.view.getUint16(this.take(cursor, 2));
  }

  readI16(cursor: Cursor): number {
    return this.view.getInt16(this.take(cursor, 2));
  }

  readU32(cursor: Cursor): number {
    return this.view.getUint32(this.take(cursor, 4));
  }

  readI32(cursor: Cursor): number {
    return this.view.getInt32(this.take(cursor, 4));
  }

  readU64(cursor: Cursor): bigint {
    return this.view.getBigUint64(this.take(cursor, 8));
  }

  readI64(cursor: Cursor): bigint {
    return this.view.getBigInt64(this.take(cursor, 8));
  }

  readU128(cursor: Cursor): bigint {
    const pos = this.take(cursor, 16);
    return (this.view.getBigUint64(pos) << 64n) | this.view.getBigUint64(pos + 8);
  }

  readI128(cursor: Cursor): bigint {
    return BigInt.asIntN(128, this.readU128(cursor));
  }

  readF32(cursor: Cursor): number {
    return this.view.getFloat32(this.take(cursor, 4));
  }

  readF64(cursor: Cursor): number {
    return this.view.getFloat64(this.take(cursor, 8));
  }

  /**
   * Read a raw byte slice. The result is a view into the buffer, not a copy.
   */
  readBytes(cursor: Cursor, length: number): Uint8Array {
    const pos = this.take(cursor, length);
    return this.storage.subarray(pos, pos + length);
  }

  /**
   * Read `length` bytes as UTF-8. Invalid sequences become U+FFFD.
   */
  readText(cursor: Cursor, length: number): string {
    return this.textDecoder.decode(this.readBytes(cursor, length));
  }

  // === Root Operations ===

  /**
   * Append the encoding of `value` to the end of the buffer.
   */
  encode<T>(encoder: Encoder<T>, value: T): void {
    encoder.encode(this, value);
  }

  /**
   * Append a self-serializing value.
   */
  serialize(value: Encodable): void {
    value.serialize(this);
  }

  /**
   * Decode one value from the start of the buffer. Trailing bytes after the
   * value are ignored.
   */
  tryDecode<T>(decoder: Decoder<T>): DecodeResult<T> {
    const cursor = new Cursor();
    try {
      const value = decoder.decode(this, cursor);
      return { ok: true, value, bytesRead: cursor.offset };
    } catch (error) {
      if (error instanceof InsufficientDataError) {
        debug.log('root decode failed', {
          offset: error.offset,
          needed: error.needed,
          available: error.available,
          length: this.used,
        });
        return { ok: false, error };
      }
      throw error;
    }
  }

  /**
   * Like `tryDecode`, but throws the `InsufficientDataError` on failure.
   */
  decode<T>(decoder: Decoder<T>): T {
    const result = this.tryDecode(decoder);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  /**
   * Rebuild an instance of a `Decodable` class from the start of the buffer.
   */
  deserialize<T>(type: Decodable<T>): T {
    return this.decode({ minSize: 0, decode: (buffer, cursor) => type.deserialize(buffer, cursor) });
  }

  /**
   * Decode one value at an explicit cursor. Use this to read records that
   * were appended back-to-back.
   *
   * @example
   * ```typescript
   * const cursor = new Cursor();
   * while (buffer.remaining(cursor) > 0) {
   *   records.push(buffer.decodeAt(Record, cursor));
   * }
   * ```
   */
  decodeAt<T>(decoder: Decoder<T>, cursor: Cursor): T {
    return decoder.decode(this, cursor);
  }

  /**
   * The bytes written so far, for handing to storage or a transport.
   * Returns a view; later appends do not alter it.
   */
  toBytes(): Uint8Array {
    return this.storage.subarray(0, this.used);
  }
}

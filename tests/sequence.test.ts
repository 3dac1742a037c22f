import { describe, it, expect } from 'vitest';
import { ByteBuffer } from '../src/buffer.js';
import { Cursor } from '../src/cursor.js';
import { InsufficientDataError } from '../src/errors.js';
import { encode, decode, tryDecode, string, struct, u8, u16, u32, vec } from '../src/intrinsics.js';
import { bytes } from '../src/lib/bytes.js';

/** A u64 count or length below 256, big-endian */
const len = (n: number) => [0, 0, 0, 0, 0, 0, 0, n];

function decodeError(run: () => unknown): InsufficientDataError {
  try {
    run();
  } catch (error) {
    if (error instanceof InsufficientDataError) return error;
    throw error;
  }
  throw new Error('expected decode to fail');
}

describe('vec', () => {
  it('should write the count then each element', () => {
    expect(Array.from(encode(vec(u16), [1, 2]))).toEqual([...len(2), 0x00, 0x01, 0x00, 0x02]);
  });

  it('should write an empty vec as a zero count', () => {
    expect(Array.from(encode(vec(u32), []))).toEqual(len(0));
  });

  it('should round-trip and consume every byte', () => {
    const data = encode(vec(u32), [10, 20, 30]);
    expect(tryDecode(vec(u32), data)).toEqual({ ok: true, value: [10, 20, 30], bytesRead: 20 });
  });

  it('should encode nested sequences of text with the documented layout', () => {
    const codec = vec(vec(string));
    const value = [['ab', 'cd'], ['e']];
    const data = encode(codec, value);

    expect(Array.from(data)).toEqual([
      ...len(2),
      ...len(2),
      ...len(2), 0x61, 0x62,
      ...len(2), 0x63, 0x64,
      ...len(1),
      ...len(1), 0x65,
    ]);
    expect(tryDecode(codec, data)).toEqual({ ok: true, value, bytesRead: 53 });
  });

  it('should fail when the count exceeds the elements present', () => {
    const data = new Uint8Array([...len(3), 0, 0, 0, 1, 0, 0, 0, 2]);
    const error = decodeError(() => decode(vec(u32), data));
    expect(error.offset).toBe(8);
    expect(error.needed).toBe(12);
    expect(error.available).toBe(8);
  });

  it('should fail on a truncated element rather than return a partial vec', () => {
    const data = new Uint8Array([
      ...len(2),
      ...len(1), 0x61,
      ...len(5), 0x62, 0x63,
    ]);
    const result = tryDecode(vec(string), data);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.offset).toBe(25);
      expect(result.error.needed).toBe(5);
      expect(result.error.available).toBe(2);
    }
  });

  it('should reject an adversarial count without decoding elements', () => {
    const data = new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 1, 2, 3]);
    const error = decodeError(() => decode(vec(u8), data));
    expect(error.offset).toBe(8);
    expect(error.available).toBe(3);
  });

  it('should fail when the count itself is truncated', () => {
    const error = decodeError(() => decode(vec(u8), new Uint8Array([0, 0, 0])));
    expect(error.offset).toBe(0);
    expect(error.needed).toBe(8);
    expect(error.available).toBe(3);
  });

  it('should decode zero-width elements while the count fits the remaining bytes', () => {
    const Empty = struct({});
    const data = new Uint8Array([...len(3), 0xaa, 0xbb, 0xcc]);
    expect(tryDecode(vec(Empty), data)).toEqual({ ok: true, value: [{}, {}, {}], bytesRead: 8 });
  });

  it('should reject a zero-width count larger than the remaining bytes', () => {
    const Empty = struct({});
    const error = decodeError(() => decode(vec(Empty), new Uint8Array(len(3))));
    expect(error.offset).toBe(8);
    expect(error.needed).toBe(3);
    expect(error.available).toBe(0);
  });

  it('should reject a huge zero-width count without building elements', () => {
    const data = new Uint8Array([0, 0, 0, 0, 0x00, 0x10, 0, 0]);
    const result = tryDecode(vec(struct({})), data);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.offset).toBe(8);
      expect(result.error.needed).toBe(0x100000);
      expect(result.error.available).toBe(0);
    }
  });

  it('should be deterministic', () => {
    const codec = vec(vec(string));
    const value = [['x'], [], ['y', 'z']];
    expect(Array.from(encode(codec, value))).toEqual(Array.from(encode(codec, value)));
  });
});

describe('string', () => {
  it('should write the UTF-8 byte length, not the code unit count', () => {
    expect(Array.from(encode(string, 'h\u00e9'))).toEqual([...len(3), 0x68, 0xc3, 0xa9]);
  });

  it('should write an empty string as a zero length', () => {
    expect(Array.from(encode(string, ''))).toEqual(len(0));
    expect(decode(string, new Uint8Array(len(0)))).toBe('');
  });

  it('should round-trip characters outside the BMP', () => {
    const data = encode(string, 'hi 😀');
    expect(data.byteLength).toBe(8 + 7);
    expect(decode(string, data)).toBe('hi 😀');
  });

  it('should keep a leading byte order mark', () => {
    expect(decode(string, encode(string, '\uFEFFhi'))).toBe('\uFEFFhi');
  });

  it('should replace invalid UTF-8 instead of failing', () => {
    const data = new Uint8Array([...len(3), 0x61, 0xff, 0x62]);
    expect(tryDecode(string, data)).toEqual({ ok: true, value: 'a\uFFFDb', bytesRead: 11 });
  });

  it('should replace a truncated multi-byte sequence', () => {
    const data = new Uint8Array([...len(2), 0xe2, 0x82]);
    expect(decode(string, data)).toBe('\uFFFD');
  });

  it('should fail when the declared length exceeds the remaining bytes', () => {
    const data = new Uint8Array([...len(10), 0x61, 0x62, 0x63]);
    const error = decodeError(() => decode(string, data));
    expect(error.offset).toBe(8);
    expect(error.needed).toBe(10);
    expect(error.available).toBe(3);
  });

  it('should fail on a length beyond any buffer size', () => {
    const data = new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x61]);
    expect(() => decode(string, data)).toThrow(InsufficientDataError);
  });

  it('should leave the cursor after the text', () => {
    const buffer = ByteBuffer.from(new Uint8Array([...len(1), 0x61, 0xaa]));
    const cursor = new Cursor();
    expect(buffer.decodeAt(string, cursor)).toBe('a');
    expect(cursor.offset).toBe(9);
  });
});

describe('bytes', () => {
  it('should share the wire layout of vec(u8)', () => {
    const data = encode(bytes, new Uint8Array([1, 2, 3]));
    expect(Array.from(data)).toEqual(Array.from(encode(vec(u8), [1, 2, 3])));
    expect(Array.from(data)).toEqual([...len(3), 1, 2, 3]);
  });

  it('should decode into a Uint8Array', () => {
    const value = decode(bytes, encode(vec(u8), [4, 5]));
    expect(value).toBeInstanceOf(Uint8Array);
    expect(Array.from(value)).toEqual([4, 5]);
  });

  it('should return a copy that does not alias the source', () => {
    const data = new Uint8Array([...len(2), 7, 8]);
    const value = decode(bytes, data);
    data[8] = 0;
    expect(Array.from(value)).toEqual([7, 8]);
  });

  it('should fail when the declared length exceeds the remaining bytes', () => {
    const error = decodeError(() => decode(bytes, new Uint8Array([...len(4), 1])));
    expect(error.needed).toBe(4);
    expect(error.available).toBe(1);
  });
});

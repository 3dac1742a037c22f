/**
 * Raw byte string codec for serbuf
 */

import type { Codec } from '../codec.js';
import { LENGTH_PREFIX_BYTES } from '../config.js';
import { readLength, writeLength } from '../intrinsics.js';

/**
 * Uint8Array - a contiguous chunk of bytes
 *
 * Same wire layout as `vec(u8)`: `{ len: u64, data: [u8; len] }`.
 * Decoded as Uint8Array instead of number[].
 *
 * This is more efficient than `s.vec(s.u8)` because it:
 * - Returns a Uint8Array directly (no array conversion)
 * - Copies a single slice instead of decoding element-by-element
 *
 * @example
 * ```typescript
 * import { s } from 'serbuf';
 * import { bytes } from 'serbuf/lib/bytes';
 *
 * const Message = s.struct({
 *   topic: s.string,
 *   payload: bytes,
 * });
 *
 * const msg = s.decode(Message, data);
 * console.log(msg.payload); // Uint8Array
 * ```
 */
export const bytes: Codec<Uint8Array> = {
  minSize: LENGTH_PREFIX_BYTES,

  encode(buffer, value) {
    writeLength(buffer, value.byteLength);
    buffer.writeBytes(value);
  },

  decode(buffer, cursor) {
    const length = readLength(buffer, cursor);
    // Copy so the result does not alias the source buffer
    return buffer.readBytes(cursor, length).slice();
  },
};

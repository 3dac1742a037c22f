/**
 * Wire format constants.
 * These are fixed: the format has no header, so nothing is negotiated.
 */
export interface FormatConfig {
  /**
   * Width in bytes of the count written before sequences and text.
   */
  lengthPrefixBytes: 8;

  /**
   * Width in bytes of `isize`/`usize`, fixed at 64 bits so archives
   * are portable between platforms.
   */
  pointerBytes: 8;
}

export const FORMAT: FormatConfig = {
  lengthPrefixBytes: 8,
  pointerBytes: 8,
};

export const LENGTH_PREFIX_BYTES = FORMAT.lengthPrefixBytes;
export const POINTER_BYTES = FORMAT.pointerBytes;

/**
 * Runtime defaults, overridable per buffer through `ByteBufferOptions`.
 */
export interface SerbufConfig {
  /**
   * Bytes allocated up front by an empty buffer.
   */
  initialCapacity: number;

  /**
   * Namespace matched against `DEBUG` to enable decode failure logging.
   */
  debugNamespace: string;
}

export const DEFAULT_CONFIG: SerbufConfig = {
  initialCapacity: 256,
  debugNamespace: 'serbuf:decode',
};

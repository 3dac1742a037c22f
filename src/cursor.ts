/**
 * Read position within a buffer.
 *
 * One cursor is created per root decode and handed by reference to every
 * nested decoder, so each read picks up where the previous one stopped.
 */
export class Cursor {
  offset: number;

  constructor(offset = 0) {
    this.offset = offset;
  }

  /**
   * Move forward by `count` bytes and return the offset before the move.
   */
  advance(count: number): number {
    const start = this.offset;
    this.offset += count;
    return start;
  }
}

/**
 * Growing byte buffer used to assemble the output file.
 *
 * The buffer doubles when full. `position` is the number of bytes written so
 * far, which is exactly the byte offset the next write lands at; the object
 * writer relies on this for cross-reference offsets.
 */

export interface ByteWriterOptions {
  /** Initial buffer size in bytes. Default: 16384 */
  initialSize?: number;
}

export class ByteWriter {
  private buffer: Uint8Array;
  private offset = 0;

  constructor(options: ByteWriterOptions = {}) {
    this.buffer = new Uint8Array(Math.max(1, options.initialSize ?? 16384));
  }

  /**
   * Ensure capacity for `needed` more bytes.
   */
  private grow(needed: number): void {
    const requiredSize = this.offset + needed;

    if (requiredSize <= this.buffer.length) {
      return;
    }

    let newSize = this.buffer.length;

    while (newSize < requiredSize) {
      newSize *= 2;
    }

    const newBuffer = new Uint8Array(newSize);
    newBuffer.set(this.buffer.subarray(0, this.offset));
    this.buffer = newBuffer;
  }

  /** Number of bytes written so far */
  get position(): number {
    return this.offset;
  }

  writeByte(b: number): void {
    this.grow(1);
    this.buffer[this.offset++] = b;
  }

  writeBytes(data: Uint8Array): void {
    this.grow(data.length);
    this.buffer.set(data, this.offset);
    this.offset += data.length;
  }

  /**
   * Write a string whose characters are all single-byte (PDF keywords,
   * numbers, names, escaped literal strings).
   */
  writeAscii(str: string): void {
    this.grow(str.length);

    for (let i = 0; i < str.length; i++) {
      this.buffer[this.offset++] = str.charCodeAt(i);
    }
  }

  /**
   * Copy of the written bytes.
   *
   * The writer stays usable; later writes do not affect the returned array.
   */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }
}

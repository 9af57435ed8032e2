/**
 * Growable byte buffer for serializing one output chunk.
 */

export interface ByteWriterOptions {
  /** Initial capacity in bytes. Default: 4096 */
  initialSize?: number;
}

export class ByteWriter {
  private buffer: Uint8Array;
  private length = 0;

  constructor({ initialSize = 4096 }: ByteWriterOptions = {}) {
    this.buffer = new Uint8Array(Math.max(1, initialSize));
  }

  writeByte(byte: number): void {
    const at = this.claim(1);

    this.buffer[at] = byte;
  }

  writeBytes(data: Uint8Array): void {
    const at = this.claim(data.length);

    this.buffer.set(data, at);
  }

  /**
   * Write PDF syntax (keywords, numbers, names already escaped). Each
   * UTF-16 code unit becomes one byte, so the text must be ASCII.
   */
  writeAscii(text: string): void {
    const at = this.claim(text.length);

    for (let i = 0; i < text.length; i++) {
      this.buffer[at + i] = text.charCodeAt(i);
    }
  }

  /**
   * The written bytes, copied out of the working buffer.
   */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  /**
   * Make room for `count` more bytes and return where they start.
   * Capacity at least doubles on each reallocation.
   */
  private claim(count: number): number {
    const start = this.length;
    const end = start + count;

    if (end > this.buffer.length) {
      const grown = new Uint8Array(Math.max(end, this.buffer.length * 2));

      grown.set(this.buffer.subarray(0, start));
      this.buffer = grown;
    }

    this.length = end;

    return start;
  }
}

/**
 * Append-only asynchronous byte sinks for document output.
 *
 * The writer never seeks or asks a sink for its position: offsets are
 * tracked on the writer side, so any destination that accepts chunks in
 * order will do.
 */

import type { Writable } from "node:stream";

export interface ByteSink {
  /**
   * Append a chunk. The returned promise settles once the sink has taken
   * the chunk; the writer does not produce the next chunk before that.
   */
  write(chunk: Uint8Array): Promise<void>;
}

/**
 * Sink that keeps every chunk in memory.
 */
export class MemorySink implements ByteSink {
  private chunks: Uint8Array[] = [];
  private length = 0;

  async write(chunk: Uint8Array): Promise<void> {
    this.chunks.push(chunk);
    this.length += chunk.length;
  }

  /** Total number of bytes received. */
  get byteLength(): number {
    return this.length;
  }

  /** Number of `write()` calls received. */
  get chunkCount(): number {
    return this.chunks.length;
  }

  toBytes(): Uint8Array {
    const result = new Uint8Array(this.length);
    let offset = 0;

    for (const chunk of this.chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }

    return result;
  }
}

/**
 * Sink over a Node.js writable stream (file, socket, HTTP response).
 *
 * Each write resolves when the stream reports the chunk as handled, so a
 * slow destination holds the writer back. The stream is not ended by the sink.
 *
 * The sink listens for the stream's `error` event for as long as it exists:
 * a failure rejects the pending write and every later one.
 */
export class WritableSink implements ByteSink {
  private failure: Error | null = null;

  constructor(private readonly stream: Writable) {
    stream.on("error", error => {
      this.failure ??= error;
    });
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }

    if (this.stream.destroyed || this.stream.writableEnded) {
      throw new Error("Destination stream is closed");
    }

    await new Promise<void>((resolve, reject) => {
      this.stream.write(chunk, error => {
        if (error) {
          this.failure ??= error;
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}

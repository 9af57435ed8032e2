/**
 * Errors raised while writing a document to a sink.
 */

/**
 * Base class for output failures. The sink may hold a partial file; retry
 * by writing to a fresh sink.
 */
export class IoError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "IoError";
  }
}

/**
 * The sink rejected a chunk.
 */
export class SinkWriteError extends IoError {
  constructor(
    /** Object being written, or the file section */
    readonly objectNumber: number | "header" | "xref" | "trailer",
    /** Byte offset of the chunk in the output */
    readonly offset: number,
    cause: unknown,
  ) {
    const what = typeof objectNumber === "number" ? `object ${objectNumber}` : `the ${objectNumber}`;
    const reason = cause instanceof Error ? cause.message : String(cause);

    super(`Sink failed writing ${what} at offset ${offset}: ${reason}`, { cause });
    this.name = "SinkWriteError";
  }
}

/**
 * Finalization was cancelled through its abort signal.
 */
export class FinalizeAbortedError extends IoError {
  constructor(
    /** Bytes already handed to the sink */
    readonly bytesWritten: number,
  ) {
    super(`Finalize aborted after ${bytesWritten} bytes`);
    this.name = "FinalizeAbortedError";
  }
}

/**
 * A writer step was called out of order.
 */
export class WriterStateError extends Error {
  constructor(
    readonly state: string,
    readonly attempted: string,
  ) {
    super(`Cannot write ${attempted} while the writer is in state "${state}"`);
    this.name = "WriterStateError";
  }
}

/**
 * PDF file writer.
 *
 * Streams a finished object graph to a sink, one chunk per object. Only
 * the chunk being written and the offset table are held in memory; the
 * sink decides where the bytes go.
 */

import type { ObjectRegistry } from "#src/document/object-registry";
import { FilterPipeline } from "#src/filters/filter-pipeline";
import type { Logger } from "#src/helpers/logger";
import { ByteWriter } from "#src/io/byte-writer";
import type { ByteSink } from "#src/io/sink";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";

import { FinalizeAbortedError, SinkWriteError, WriterStateError } from "./errors";
import {
  FREE_LIST_HEAD,
  type TrailerOptions,
  type XRefWriteEntry,
  buildXRefStream,
  writeStartXRef,
  writeTrailer,
  writeXRefTable,
} from "./xref-writer";

/**
 * Sections of the file, in the order they are written.
 * `failed` is terminal: the sink holds a partial file.
 */
export type WriterState = "header" | "body" | "xref" | "trailer" | "done" | "failed";

/**
 * Options for PDF writing.
 */
export interface WriteOptions {
  /** PDF version string (default: "1.7") */
  version?: string;

  /** Use XRef stream instead of table (PDF 1.5+) */
  useXRefStream?: boolean;

  /**
   * Encode streams that have no /Filter entry (default: true).
   *
   * Streams that already have filters (such as DCTDecode images) are left
   * unchanged.
   */
  compressStreams?: boolean;

  /** Filter used to encode streams (default: "FlateDecode") */
  filter?: string;

  /** Cancels the write between two chunks */
  signal?: AbortSignal;

  logger?: Logger;
}

/**
 * Trailer references of a document.
 */
export interface DocumentRoots {
  /** Root catalog reference */
  root: PdfRef;

  /** Info dictionary reference (optional) */
  info?: PdfRef;

  /** Document ID (optional, two 16-byte arrays) */
  id?: [Uint8Array, Uint8Array];
}

/**
 * Result of a write operation.
 */
export interface WriteResult {
  /** Trailer /Size: highest object number + 1 */
  size: number;

  /** Byte offset where the xref section starts */
  xrefOffset: number;

  /** Total bytes handed to the sink */
  bytesWritten: number;
}

/**
 * `N G obj`, the object, `endobj`.
 */
function writeIndirectObject(writer: ByteWriter, ref: PdfRef, obj: PdfObject): void {
  writer.writeAscii(`${ref.objectNumber} ${ref.generation} obj\n`);
  obj.toBytes(writer);
  writer.writeAscii("\nendobj\n");
}

/**
 * Encode a stream with the writer's filter.
 *
 * Streams with a /Filter entry and empty streams are returned unchanged.
 * The original stream is not modified.
 */
export async function prepareObjectForWrite(obj: PdfObject, compress: boolean, filter: string): Promise<PdfObject> {
  if (!(obj instanceof PdfStream) || !compress) {
    return obj;
  }

  if (obj.filter !== undefined || obj.data.length === 0) {
    return obj;
  }

  const encoded = await FilterPipeline.encode(obj.data, filter);

  return obj.withEncodedData(encoded.data, encoded.filter);
}

/**
 * Sequential writer: header, objects, xref section, trailer.
 *
 * Each step awaits the sink before returning, and calling a step out of
 * order throws {@link WriterStateError}.
 */
export class PDFWriter {
  private state: WriterState = "header";
  private offset = 0;
  private maxObjectNumber = 0;
  private readonly entries: XRefWriteEntry[] = [FREE_LIST_HEAD];
  private readonly objectNumbers = new Set<number>();

  private trailer: TrailerOptions | null = null;

  private readonly compress: boolean;
  private readonly filter: string;

  constructor(
    private readonly sink: ByteSink,
    private readonly options: WriteOptions = {},
  ) {
    this.compress = options.compressStreams ?? true;
    this.filter = options.filter ?? "FlateDecode";

    if (this.compress && !FilterPipeline.hasFilter(this.filter)) {
      throw new Error(`Unknown filter: ${this.filter}`);
    }
  }

  get currentState(): WriterState {
    return this.state;
  }

  /** Bytes handed to the sink so far */
  get bytesWritten(): number {
    return this.offset;
  }

  /**
   * Write `%PDF-x.y` and the binary marker comment.
   */
  async writeHeader(): Promise<void> {
    this.expect("header", "the header");

    const writer = new ByteWriter({ initialSize: 32 });

    writer.writeAscii(`%PDF-${this.options.version ?? "1.7"}\n`);
    // Binary comment (signals binary file to text tools)
    writer.writeBytes(new Uint8Array([0x25, 0xe2, 0xe3, 0xcf, 0xd3, 0x0a])); // %âãÏÓ\n

    await this.emit(writer.toBytes(), "header");

    this.state = "body";
  }

  /**
   * Write one indirect object, recording its offset for the xref section.
   */
  async writeObject(ref: PdfRef, obj: PdfObject): Promise<void> {
    this.expect("body", `object ${ref.objectNumber}`);

    if (this.objectNumbers.has(ref.objectNumber)) {
      throw new WriterStateError(this.state, `object ${ref.objectNumber} twice`);
    }

    const prepared = await prepareObjectForWrite(obj, this.compress, this.filter);
    const offset = this.offset;

    const writer = new ByteWriter({
      initialSize: prepared instanceof PdfStream ? prepared.data.length + 256 : 256,
    });

    writeIndirectObject(writer, ref, prepared);

    await this.emit(writer.toBytes(), ref.objectNumber);

    this.objectNumbers.add(ref.objectNumber);
    this.entries.push({ objectNumber: ref.objectNumber, generation: ref.generation, type: "inuse", offset });
    this.maxObjectNumber = Math.max(this.maxObjectNumber, ref.objectNumber);
  }

  /**
   * Write the cross-reference section: a table, or an xref stream numbered
   * one past the highest object written.
   */
  async writeXRef(roots: DocumentRoots): Promise<void> {
    this.expect("body", "the xref section");
    this.state = "xref";

    const xrefOffset = this.offset;
    const writer = new ByteWriter();

    if (this.options.useXRefStream) {
      const streamObjectNumber = this.maxObjectNumber + 1;

      this.entries.push({ objectNumber: streamObjectNumber, generation: 0, type: "inuse", offset: xrefOffset });
      this.trailer = { ...roots, xrefOffset, size: streamObjectNumber + 1 };

      const stream = buildXRefStream({ ...this.trailer, entries: this.entries });
      const prepared = await prepareObjectForWrite(stream, this.compress, this.filter);

      writeIndirectObject(writer, PdfRef.of(streamObjectNumber), prepared);
    } else {
      this.trailer = { ...roots, xrefOffset, size: this.maxObjectNumber + 1 };

      writeXRefTable(writer, this.entries);
    }

    await this.emit(writer.toBytes(), "xref");

    this.state = "trailer";
  }

  /**
   * Write the trailer (table form only), `startxref` and `%%EOF`.
   */
  async writeTrailer(): Promise<WriteResult> {
    this.expect("trailer", "the trailer");

    const trailer = this.trailer;

    if (trailer === null) {
      throw new WriterStateError(this.state, "the trailer");
    }

    const writer = new ByteWriter({ initialSize: 256 });

    if (this.options.useXRefStream) {
      writeStartXRef(writer, trailer.xrefOffset);
    } else {
      writeTrailer(writer, trailer);
    }

    await this.emit(writer.toBytes(), "trailer");

    this.state = "done";

    return { size: trailer.size, xrefOffset: trailer.xrefOffset, bytesWritten: this.offset };
  }

  private expect(state: WriterState, attempted: string): void {
    if (this.state !== state) {
      throw new WriterStateError(this.state, attempted);
    }
  }

  private async emit(chunk: Uint8Array, what: number | "header" | "xref" | "trailer"): Promise<void> {
    if (this.options.signal?.aborted) {
      this.state = "failed";

      throw new FinalizeAbortedError(this.offset);
    }

    try {
      await this.sink.write(chunk);
    } catch (error) {
      this.state = "failed";

      throw new SinkWriteError(what, this.offset, error);
    }

    this.offset += chunk.length;
  }
}

/**
 * Write a complete PDF from scratch.
 *
 * Structure:
 * ```
 * %PDF-X.Y
 * %[binary comment]
 * 1 0 obj
 * ...
 * endobj
 * 2 0 obj
 * ...
 * xref
 * ...
 * trailer
 * ...
 * startxref
 * ...
 * %%EOF
 * ```
 *
 * Objects are written in allocation order. The graph is checked before
 * the first byte goes out.
 *
 * @throws {IncompleteObjectGraphError} if a reference has no value
 * @throws {SinkWriteError} if the sink rejects a chunk
 * @throws {FinalizeAbortedError} if `options.signal` fires
 */
export async function writeDocument(
  registry: ObjectRegistry,
  sink: ByteSink,
  roots: DocumentRoots,
  options: WriteOptions = {},
): Promise<WriteResult> {
  registry.assertComplete(roots.info ? [roots.root, roots.info] : [roots.root]);

  const writer = new PDFWriter(sink, options);

  await writer.writeHeader();

  let count = 0;

  for (const [ref, obj] of registry.entries()) {
    await writer.writeObject(ref, obj);
    count++;
  }

  await writer.writeXRef(roots);

  const result = await writer.writeTrailer();

  options.logger?.debug({ objects: count, ...result }, "Wrote document");

  return result;
}

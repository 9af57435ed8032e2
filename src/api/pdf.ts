/**
 * High-level PDF document API.
 *
 * Builds a new document in memory and writes it to a sink. Building is
 * synchronous; only writing is async.
 */

import { randomBytes } from "@noble/hashes/utils.js";

import {
  type DocumentOptions,
  DocumentOptionsSchema,
  type PageOptions,
  parseOptions,
  type ResolvedDocumentOptions,
  resolvePageOptions,
} from "#src/config/options";
import { DocumentStateError } from "#src/document/errors";
import { ObjectRegistry } from "#src/document/object-registry";
import { ResourceManager } from "#src/document/resource-manager";
import { formatPdfDate } from "#src/helpers/format";
import { createLogger } from "#src/helpers/logger";
import type { PDFImage } from "#src/images/pdf-image";
import { type ByteSink, MemorySink } from "#src/io/sink";
import { PdfDict } from "#src/objects/pdf-dict";
import type { PdfRef } from "#src/objects/pdf-ref";
import { PdfString } from "#src/objects/pdf-string";
import { type WriteResult, writeDocument } from "#src/writer/pdf-writer";
import { PDFCatalog } from "./pdf-catalog";
import { PDFContext } from "./pdf-context";
import { PDFFonts } from "./pdf-fonts";
import type { PDFPage } from "./pdf-page";
import { PDFPageTree } from "./pdf-page-tree";

/**
 * Options for writing a document.
 */
export interface FinalizeOptions {
  /** Cancels the write between two chunks */
  signal?: AbortSignal;
}

/**
 * Summary of a completed write.
 */
export type FinalizeResult = WriteResult;

/**
 * High-level PDF document class.
 *
 * @example
 * ```typescript
 * const pdf = PDF.create({ title: "Report" });
 * const page = pdf.addPage({ size: "a4" });
 *
 * page.drawText("Hello, World!", { size: 24 });
 *
 * // Stream to a file
 * await pdf.finalize(new WritableSink(fs.createWriteStream("report.pdf")));
 *
 * // Or collect the bytes
 * const bytes = await pdf.save();
 * ```
 */
export class PDF {
  /** Central context for document operations */
  private readonly ctx: PDFContext;

  private readonly options: ResolvedDocumentOptions;

  /** File identifier, fixed at creation so every write is identical */
  private readonly id: Uint8Array;
  private readonly creationDate: Date;
  private readonly modificationDate: Date;

  /** Font operations manager (created lazily) */
  private _fonts: PDFFonts | null = null;

  /** Info dictionary ref once the graph is prepared */
  private info: PdfRef | null = null;
  private preparation: "pending" | "done" | "failed" = "pending";

  private constructor(ctx: PDFContext, options: ResolvedDocumentOptions) {
    this.ctx = ctx;
    this.options = options;
    this.id = options.id ?? randomBytes(16);
    this.creationDate = options.creationDate ?? new Date();
    this.modificationDate = options.modificationDate ?? this.creationDate;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Creation
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Create an empty document: a catalog (object 1) and a page tree
   * (object 2) with no pages.
   *
   * @throws {ConfigurationError} if the options are invalid
   */
  static create(options: DocumentOptions = {}): PDF {
    const resolved = parseOptions(DocumentOptionsSchema, options, "document options");
    const logger = createLogger(resolved.logLevel);

    const registry = new ObjectRegistry();
    const catalogRef = registry.reserve();
    const pagesRef = registry.reserve();

    const catalog = PDFCatalog.create(registry, catalogRef, pagesRef);
    const pages = new PDFPageTree(pagesRef);
    const resources = new ResourceManager(registry, logger);

    logger.debug({ version: resolved.version, xref: resolved.xref }, "Created document");

    return new PDF(new PDFContext(registry, catalog, pages, resources, logger), resolved);
  }

  /**
   * The version written in the file header.
   */
  get version(): string {
    return this.options.version;
  }

  /**
   * Whether the document has been finalized; build calls then throw.
   */
  get isFinalized(): boolean {
    return this.ctx.isFinalized;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Pages
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Add a new blank page at the end of the document.
   *
   * @param options Page size, orientation, and margins (default: US Letter, 1 inch margins)
   * @returns The new page
   *
   * @throws {ConfigurationError} if the options are invalid
   */
  addPage(options: PageOptions = {}): PDFPage {
    this.ctx.assertOpen();

    return this.ctx.addPage(resolvePageOptions(options));
  }

  getPageCount(): number {
    return this.ctx.pages.count;
  }

  /**
   * Get all pages in document order, including pages added by paragraph
   * overflow.
   */
  getPages(): readonly PDFPage[] {
    return this.ctx.getPages();
  }

  getPage(index: number): PDFPage | null {
    return this.ctx.getPages()[index] ?? null;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Resources
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Get the fonts API.
   */
  get fonts(): PDFFonts {
    if (!this._fonts) {
      this._fonts = new PDFFonts(this.ctx);
    }

    return this._fonts;
  }

  /**
   * Embed a JPEG image. The same bytes return the same image.
   *
   * @throws {InvalidImageError} if the data is not a readable JPEG
   */
  embedJpeg(data: Uint8Array): PDFImage {
    this.ctx.assertOpen();

    return this.ctx.resources.embedJpeg(data);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Output
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Finish the document and write it to a sink.
   *
   * The first call closes every page, writes fonts (subsetting embedded
   * ones), the page tree and the info dictionary; the document accepts no
   * changes afterwards. Later calls write the same graph again and produce
   * identical bytes, so a failed or aborted write can be retried against a
   * fresh sink.
   *
   * @throws {IncompleteObjectGraphError} if a reference has no value; nothing is written
   * @throws {SinkWriteError} if the sink rejects a chunk
   * @throws {FinalizeAbortedError} if `options.signal` fires
   */
  async finalize(sink: ByteSink, options: FinalizeOptions = {}): Promise<FinalizeResult> {
    const info = this.prepare();

    return writeDocument(
      this.ctx.registry,
      sink,
      { root: this.ctx.catalog.ref, info, id: [this.id, this.id] },
      {
        version: this.options.version,
        useXRefStream: this.options.xref === "stream",
        compressStreams: this.options.compress,
        filter: this.options.filter,
        signal: options.signal,
        logger: this.ctx.logger,
      },
    );
  }

  /**
   * Finish the document and return its bytes.
   */
  async save(): Promise<Uint8Array> {
    const sink = new MemorySink();

    await this.finalize(sink);

    return sink.toBytes();
  }

  /**
   * Materialize everything that waits for the end of building. Runs once.
   */
  private prepare(): PdfRef {
    if (this.preparation === "done" && this.info) {
      return this.info;
    }

    if (this.preparation === "failed") {
      throw new DocumentStateError("Document could not be finalized; create a new one");
    }

    this.ctx.markFinalized();

    try {
      for (const page of this.ctx.getPages()) {
        page.close();
      }

      this.ctx.resources.finalize();
      this.ctx.pages.finalize(this.ctx.registry);

      this.info = this.ctx.register(this.buildInfoDict());
    } catch (error) {
      this.preparation = "failed";

      throw error;
    }

    this.preparation = "done";

    this.ctx.logger.debug(
      { pages: this.ctx.pages.count, objects: this.ctx.registry.size },
      "Prepared document for writing",
    );

    return this.info;
  }

  private buildInfoDict(): PdfDict {
    const text = (value: string | undefined) => (value === undefined ? undefined : PdfString.fromText(value));

    return PdfDict.of({
      Title: text(this.options.title),
      Author: text(this.options.author),
      Subject: text(this.options.subject),
      Creator: text(this.options.creator),
      Producer: text(this.options.producer),
      CreationDate: PdfString.fromText(formatPdfDate(this.creationDate)),
      ModDate: PdfString.fromText(formatPdfDate(this.modificationDate)),
    });
  }
}

/**
 * PDFContext - Central context object for document building.
 *
 * Provides shared access to the registry, catalog, page tree and resources.
 * Passed to pages and the fonts facade instead of multiple separate
 * arguments.
 *
 * @internal This is an internal class, not part of the public API.
 */

import { DocumentStateError } from "#src/document/errors";
import type { ObjectRegistry } from "#src/document/object-registry";
import type { ResourceManager } from "#src/document/resource-manager";
import type { Logger } from "#src/helpers/logger";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";
import type { ResolvedPageOptions } from "#src/config/options";
import type { PDFCatalog } from "./pdf-catalog";
import { PDFPage } from "./pdf-page";
import type { PDFPageTree } from "./pdf-page-tree";

export class PDFContext {
  /** Set once the graph has been prepared for writing */
  private _finalized = false;

  /** Pages in document order */
  private readonly pageList: PDFPage[] = [];

  constructor(
    /** Object registry for allocating refs and storing objects */
    readonly registry: ObjectRegistry,
    /** Document catalog (object 1) */
    readonly catalog: PDFCatalog,
    /** Page tree (object 2) */
    readonly pages: PDFPageTree,
    /** Fonts and images */
    readonly resources: ResourceManager,
    readonly logger: Logger,
  ) {}

  get isFinalized(): boolean {
    return this._finalized;
  }

  markFinalized(): void {
    this._finalized = true;
  }

  /**
   * @throws {DocumentStateError} once the document has been finalized
   */
  assertOpen(): void {
    if (this._finalized) {
      throw new DocumentStateError("Document is finalized and no longer accepts changes");
    }
  }

  /**
   * Append a blank page. Its ref is reserved now and filled when the page
   * is closed.
   */
  addPage(layout: ResolvedPageOptions): PDFPage {
    this.assertOpen();

    const ref = this.registry.reserve();
    const page = new PDFPage(ref, this.pageList.length, layout, this);

    this.pages.addPage(ref);
    this.pageList.push(page);

    return page;
  }

  getPages(): readonly PDFPage[] {
    return this.pageList;
  }

  /**
   * Register a new object, assigning it a reference.
   */
  register(obj: PdfObject): PdfRef {
    return this.registry.allocate(obj);
  }
}

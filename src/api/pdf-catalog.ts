/**
 * PDFCatalog - The document catalog (root dictionary).
 *
 * The catalog is the root of the document's object hierarchy; here it only
 * links the page tree. It is always object 1.
 *
 * PDF Reference: Section 7.7.2 "Document Catalog"
 */

import type { ObjectRegistry } from "#src/document/object-registry";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import type { PdfRef } from "#src/objects/pdf-ref";

export class PDFCatalog {
  private constructor(readonly ref: PdfRef) {}

  /**
   * Write the catalog into its reserved ref, pointing at the page tree.
   */
  static create(registry: ObjectRegistry, ref: PdfRef, pages: PdfRef): PDFCatalog {
    registry.update(ref, PdfDict.of({ Type: PdfName.Catalog, Pages: pages }));

    return new PDFCatalog(ref);
  }
}

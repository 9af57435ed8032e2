import type { ObjectRegistry } from "#src/document/object-registry";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfRef } from "#src/objects/pdf-ref";

/**
 * The page tree of a document being generated.
 *
 * The tree is a single /Pages node whose kids are the pages in the order
 * they were added. Its ref is reserved up front so pages can name it as
 * their /Parent; the node itself is written by `finalize()`.
 */
export class PDFPageTree {
  /** Page refs in document order */
  private readonly pages: PdfRef[] = [];

  private finalized = false;

  constructor(
    /** Reference to the root /Pages dict */
    readonly ref: PdfRef,
  ) {}

  get count(): number {
    return this.pages.length;
  }

  /**
   * Get all page refs in document order.
   */
  getPages(): readonly PdfRef[] {
    return this.pages;
  }

  addPage(ref: PdfRef): void {
    this.pages.push(ref);
  }

  /**
   * Write `<< /Type /Pages /Kids [...] /Count n >>` into the reserved ref.
   * Runs once; later calls do nothing.
   */
  finalize(registry: ObjectRegistry): void {
    if (this.finalized) {
      return;
    }

    registry.update(
      this.ref,
      PdfDict.of({
        Type: PdfName.Pages,
        Kids: new PdfArray([...this.pages]),
        Count: PdfNumber.of(this.pages.length),
      }),
    );

    this.finalized = true;
  }
}

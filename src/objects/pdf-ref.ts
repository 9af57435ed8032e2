import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF indirect reference.
 *
 * In PDF: `1 0 R`, `42 0 R`
 *
 * References are handed out by an `ObjectRegistry`. Two refs denote the same
 * object when `equals()` holds; instances are not shared between documents.
 */
export class PdfRef implements PdfPrimitive {
  get type(): "ref" {
    return "ref";
  }

  private constructor(
    readonly objectNumber: number,
    readonly generation: number,
  ) {}

  static of(objectNumber: number, generation: number = 0): PdfRef {
    return new PdfRef(objectNumber, generation);
  }

  equals(other: PdfRef): boolean {
    return this.objectNumber === other.objectNumber && this.generation === other.generation;
  }

  /**
   * Returns the PDF syntax representation: "1 0 R"
   */
  toString(): string {
    return `${this.objectNumber} ${this.generation} R`;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.toString());
  }
}

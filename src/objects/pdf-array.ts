import type { ByteWriter } from "#src/io/byte-writer";
import { PdfNumber } from "./pdf-number";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF array object: `[1 2 3]`, `[/Name (string) 42]`.
 *
 * Items are fixed at construction.
 */
export class PdfArray implements PdfPrimitive {
  get type(): "array" {
    return "array";
  }

  private readonly items: PdfObject[];

  constructor(items: readonly PdfObject[] = []) {
    this.items = [...items];
  }

  get length(): number {
    return this.items.length;
  }

  *[Symbol.iterator](): Iterator<PdfObject> {
    yield* this.items;
  }

  static of(...items: PdfObject[]): PdfArray {
    return new PdfArray(items);
  }

  /**
   * Create an array of numbers, e.g. a rectangle or a widths table.
   */
  static ofNumbers(values: readonly number[]): PdfArray {
    return new PdfArray(values.map(value => PdfNumber.of(value)));
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("[");

    this.items.forEach((item, i) => {
      if (i > 0) {
        writer.writeAscii(" ");
      }

      item.toBytes(writer);
    });

    writer.writeAscii("]");
  }
}

import { formatPdfNumber } from "#src/helpers/format";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF numeric object: `42`, `-3.14`, `0.5`.
 *
 * `value` keeps full precision; reals are rounded to five decimals only
 * when written.
 */
export class PdfNumber implements PdfPrimitive {
  readonly type = "number";

  private constructor(readonly value: number) {}

  /**
   * @throws {RangeError} for NaN and infinities, which PDF has no syntax for
   */
  static of(value: number): PdfNumber {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Cannot write ${value} as a PDF number`);
    }

    return new PdfNumber(value);
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(formatPdfNumber(this.value));
  }
}

/**
 * Content stream operators.
 *
 * An operator is written postfix: its operands, separated by spaces,
 * then the operator keyword (`/F1 12 Tf`, `1 0 0 1 72 720 Tm`).
 */

import { formatPdfNumber } from "#src/helpers/format";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfArray } from "#src/objects/pdf-array";
import type { PdfString } from "#src/objects/pdf-string";

/**
 * Operator keywords this library emits.
 */
export const Op = {
  PushGraphicsState: "q",
  PopGraphicsState: "Q",
  ConcatMatrix: "cm",
  SetLineWidth: "w",
  Rectangle: "re",
  Fill: "f",
  Stroke: "S",
  FillAndStroke: "B",
  SetNonStrokingGray: "g",
  SetNonStrokingRGB: "rg",
  SetNonStrokingCMYK: "k",
  SetStrokingGray: "G",
  SetStrokingRGB: "RG",
  SetStrokingCMYK: "K",
  BeginText: "BT",
  EndText: "ET",
  SetFont: "Tf",
  SetCharSpacing: "Tc",
  SetTextMatrix: "Tm",
  ShowText: "Tj",
  ShowTextArray: "TJ",
  DrawXObject: "Do",
} as const;

export type OpKeyword = (typeof Op)[keyof typeof Op];

/**
 * A name operand is given with its leading slash ("/F1").
 */
export type Operand = number | `/${string}` | PdfString | PdfArray;

export class Operator {
  private constructor(
    readonly op: OpKeyword,
    readonly operands: readonly Operand[],
  ) {}

  /**
   * @throws {RangeError} if a numeric operand is NaN or infinite
   */
  static of(op: OpKeyword, ...operands: Operand[]): Operator {
    for (const operand of operands) {
      if (typeof operand === "number" && !Number.isFinite(operand)) {
        throw new RangeError(`Operand of ${op} must be a finite number, got ${operand}`);
      }
    }

    return new Operator(op, operands);
  }

  toBytes(writer: ByteWriter): void {
    for (const operand of this.operands) {
      if (typeof operand === "number") {
        writer.writeAscii(formatPdfNumber(operand));
      } else if (typeof operand === "string") {
        writer.writeAscii(operand);
      } else {
        operand.toBytes(writer);
      }

      writer.writeByte(0x20);
    }

    writer.writeAscii(this.op);
  }
}

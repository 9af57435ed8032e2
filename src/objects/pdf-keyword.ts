import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * Values written as a bare keyword: `true`, `false`, `null`.
 *
 * Each keyword has exactly one instance.
 */
abstract class PdfKeyword implements PdfPrimitive {
  abstract readonly type: "bool" | "null";

  protected constructor(private readonly keyword: "true" | "false" | "null") {}

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.keyword);
  }
}

export class PdfBool extends PdfKeyword {
  readonly type = "bool";

  static readonly TRUE = new PdfBool(true);
  static readonly FALSE = new PdfBool(false);

  private constructor(readonly value: boolean) {
    super(value ? "true" : "false");
  }

  static of(value: boolean): PdfBool {
    return value ? PdfBool.TRUE : PdfBool.FALSE;
  }
}

export class PdfNull extends PdfKeyword {
  readonly type = "null";

  static readonly instance = new PdfNull();

  private constructor() {
    super("null");
  }
}

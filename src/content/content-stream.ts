import { ByteWriter } from "#src/io/byte-writer";
import { PdfStream } from "#src/objects/pdf-stream";
import type { Operator } from "./operators";

/**
 * Append-only buffer of content stream operators, one per line.
 *
 * @example
 * ```typescript
 * const content = ContentStreamBuilder.from([pushGraphicsState(), rectangle(0, 0, 10, 10), fill(), popGraphicsState()]);
 * content.toBytes(); // "q\n0 0 10 10 re\nf\nQ"
 * ```
 */
export class ContentStreamBuilder {
  private readonly operators: Operator[] = [];

  static from(operators: Operator[]): ContentStreamBuilder {
    const builder = new ContentStreamBuilder();

    builder.add(...operators);

    return builder;
  }

  add(...operators: Operator[]): this {
    this.operators.push(...operators);

    return this;
  }

  get length(): number {
    return this.operators.length;
  }

  get isEmpty(): boolean {
    return this.operators.length === 0;
  }

  toBytes(): Uint8Array {
    const writer = new ByteWriter();

    for (let i = 0; i < this.operators.length; i++) {
      if (i > 0) {
        writer.writeByte(0x0a);
      }

      this.operators[i].toBytes(writer);
    }

    return writer.toBytes();
  }

  /**
   * Unfiltered stream of the operators; the writer compresses it.
   */
  toStream(): PdfStream {
    return new PdfStream(undefined, this.toBytes());
  }
}

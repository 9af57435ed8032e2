import type { ByteWriter } from "#src/io/byte-writer";
import { PdfName } from "./pdf-name";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF dictionary object (mutable).
 *
 * In PDF: `<< /Type /Page /MediaBox [0 0 612 792] >>`
 *
 * Keys are always PdfName. Entries are written in insertion order.
 */
export class PdfDict implements PdfPrimitive {
  get type(): "dict" | "stream" {
    return "dict";
  }

  private entries = new Map<PdfName, PdfObject>();

  constructor(entries?: Iterable<[PdfName | string, PdfObject]>) {
    if (entries) {
      for (const [key, value] of entries) {
        const name = typeof key === "string" ? PdfName.of(key) : key;

        this.entries.set(name, value);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: PdfName | string): PdfObject | undefined {
    const name = typeof key === "string" ? PdfName.of(key) : key;

    return this.entries.get(name);
  }

  /**
   * Set value for key. Replacing an existing key keeps its position.
   */
  set(key: PdfName | string, value: PdfObject): void {
    const name = typeof key === "string" ? PdfName.of(key) : key;

    this.entries.set(name, value);
  }

  has(key: PdfName | string): boolean {
    const name = typeof key === "string" ? PdfName.of(key) : key;

    return this.entries.has(name);
  }

  *[Symbol.iterator](): Iterator<[PdfName, PdfObject]> {
    yield* this.entries;
  }

  /**
   * The value under `key` if it is a name.
   */
  getName(key: string): PdfName | undefined {
    const value = this.get(key);

    return value?.type === "name" ? value : undefined;
  }

  /**
   * Create dict from entries.
   */
  static of(entries: Record<string, PdfObject | undefined>): PdfDict {
    const dict = new PdfDict();

    for (const [key, value] of Object.entries(entries)) {
      if (value !== undefined) {
        dict.set(key, value);
      }
    }

    return dict;
  }

  /**
   * Write the `<< ... >>` body, skipping the given keys.
   */
  protected writeEntries(writer: ByteWriter, skip?: PdfName): void {
    for (const [key, value] of this.entries) {
      if (key === skip) {
        continue;
      }

      key.toBytes(writer);
      writer.writeAscii(" ");
      value.toBytes(writer);
      writer.writeAscii("\n");
    }
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("<<\n");
    this.writeEntries(writer);
    writer.writeAscii(">>");
  }
}

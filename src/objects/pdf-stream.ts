import type { ByteWriter } from "#src/io/byte-writer";
import { PdfDict } from "./pdf-dict";
import { PdfName } from "./pdf-name";
import type { PdfObject } from "./pdf-object";

/**
 * PDF stream object (dictionary + binary data).
 *
 * In PDF:
 * ```
 * << /Length 5 /Filter /FlateDecode >>
 * stream
 * ...binary data...
 * endstream
 * ```
 *
 * `data` holds the bytes exactly as they are written. When `/Filter` is set
 * the data is already encoded with it; otherwise the writer may run the data
 * through its compression filter before serializing.
 */
export class PdfStream extends PdfDict {
  override get type(): "stream" {
    return "stream";
  }

  private _data: Uint8Array;

  constructor(
    dict?: PdfDict | Iterable<[PdfName | string, PdfObject]>,
    data: Uint8Array = new Uint8Array(0),
  ) {
    super(dict);

    this._data = data;
  }

  get data(): Uint8Array {
    return this._data;
  }

  /**
   * The filter the data is encoded with, if any.
   */
  get filter(): string | undefined {
    return this.getName("Filter")?.value;
  }

  /**
   * Create stream from dict entries and data.
   */
  static fromDict(
    entries: Record<string, PdfObject | undefined>,
    data: Uint8Array = new Uint8Array(0),
  ): PdfStream {
    return new PdfStream(PdfDict.of(entries), data);
  }

  /**
   * Copy of this stream with new data encoded by `filterName`.
   */
  withEncodedData(data: Uint8Array, filterName: string): PdfStream {
    const encoded = new PdfStream(this, data);

    encoded.set(PdfName.Filter, PdfName.of(filterName));

    return encoded;
  }

  /**
   * Write the stream. `/Length` always comes first and always equals
   * the byte length of `data`; any stored `/Length` is ignored.
   */
  override toBytes(writer: ByteWriter): void {
    writer.writeAscii("<<\n");
    writer.writeAscii(`/Length ${this._data.length}\n`);
    this.writeEntries(writer, PdfName.Length);
    writer.writeAscii(">>");

    writer.writeAscii("\nstream\n");
    writer.writeBytes(this._data);
    writer.writeAscii("\nendstream");
  }
}

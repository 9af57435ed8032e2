import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

// Delimiters and '#' inside printable ASCII; every byte outside 33-126
// (whitespace included) is escaped too. PDF 1.7 section 7.3.5.
const NAME_NEEDS_ESCAPE = new Set(Array.from("()<>[]{}/%#", char => char.charCodeAt(0)));

const encoder = new TextEncoder();

/**
 * Name syntax for a name value: UTF-8 bytes, with `#XX` for anything a
 * reader would take as a delimiter.
 */
function escapeName(name: string): string {
  let result = "";

  for (const byte of encoder.encode(name)) {
    if (byte < 33 || byte > 126 || NAME_NEEDS_ESCAPE.has(byte)) {
      result += `#${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    } else {
      result += String.fromCharCode(byte);
    }
  }

  return result;
}

/**
 * PDF name object (interned).
 *
 * In PDF: `/Type`, `/Page`, `/Length`
 *
 * Names are interned: `PdfName.of("Type") === PdfName.of("Type")`, which
 * lets dictionaries key their entries by identity.
 */
export class PdfName implements PdfPrimitive {
  get type(): "name" {
    return "name";
  }

  private static cache = new Map<string, PdfName>();

  private constructor(readonly value: string) {}

  /**
   * Get or create the interned PdfName for a string (without the leading `/`).
   */
  static of(name: string): PdfName {
    let cached = PdfName.cache.get(name);

    if (!cached) {
      cached = new PdfName(name);

      PdfName.cache.set(name, cached);
    }

    return cached;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(`/${escapeName(this.value)}`);
  }

  static readonly Type = PdfName.of("Type");
  static readonly Page = PdfName.of("Page");
  static readonly Pages = PdfName.of("Pages");
  static readonly Catalog = PdfName.of("Catalog");
  static readonly Font = PdfName.of("Font");
  static readonly XObject = PdfName.of("XObject");
  static readonly Length = PdfName.of("Length");
  static readonly Filter = PdfName.of("Filter");
}

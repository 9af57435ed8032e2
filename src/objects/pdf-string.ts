import { bytesToHex } from "#src/helpers/buffer";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

const BACKSLASH = 0x5c;
const PARENTHESIS_OPEN = 0x28;
const PARENTHESIS_CLOSE = 0x29;
const CR = 0x0d;

/**
 * Escape a PDF literal string for serialization.
 *
 * Backslash-escapes `\`, `(`, `)` and CR (a bare CR would be read back
 * as a line ending). Other bytes pass through unchanged.
 */
function escapeLiteralString(bytes: Uint8Array): Uint8Array {
  let escapeCount = 0;

  for (const byte of bytes) {
    if (byte === BACKSLASH || byte === PARENTHESIS_OPEN || byte === PARENTHESIS_CLOSE || byte === CR) {
      escapeCount++;
    }
  }

  if (escapeCount === 0) {
    return bytes;
  }

  const result = new Uint8Array(bytes.length + escapeCount);
  let j = 0;

  for (const byte of bytes) {
    if (byte === CR) {
      result[j++] = BACKSLASH;
      result[j++] = 0x72; // r
    } else if (byte === BACKSLASH || byte === PARENTHESIS_OPEN || byte === PARENTHESIS_CLOSE) {
      result[j++] = BACKSLASH;
      result[j++] = byte;
    } else {
      result[j++] = byte;
    }
  }

  return result;
}

/**
 * PDF string object.
 *
 * In PDF: `(Hello World)` (literal) or `<48656C6C6F>` (hex)
 *
 * Stores raw bytes; the format only affects serialization.
 */
export class PdfString implements PdfPrimitive {
  get type(): "string" {
    return "string";
  }

  constructor(
    readonly bytes: Uint8Array,
    readonly format: "literal" | "hex" = "literal",
  ) {}

  /**
   * Create a text string (PDF 1.7 spec 7.9.2.2).
   *
   * Printable ASCII is stored as-is in a literal string; anything else is
   * encoded as UTF-16BE with a byte order mark.
   */
  static fromText(text: string): PdfString {
    if (/^[\x20-\x7e]*$/.test(text)) {
      return new PdfString(new TextEncoder().encode(text), "literal");
    }

    const bytes = new Uint8Array(2 + text.length * 2);
    bytes[0] = 0xfe;
    bytes[1] = 0xff;

    for (let i = 0; i < text.length; i++) {
      const unit = text.charCodeAt(i);

      bytes[2 + i * 2] = unit >> 8;
      bytes[3 + i * 2] = unit & 0xff;
    }

    return new PdfString(bytes, "hex");
  }

  /**
   * Create a hex string from raw bytes.
   */
  static fromBytes(bytes: Uint8Array): PdfString {
    return new PdfString(bytes, "hex");
  }

  toBytes(writer: ByteWriter): void {
    if (this.format === "hex") {
      writer.writeAscii(`<${bytesToHex(this.bytes)}>`);
    } else {
      writer.writeByte(PARENTHESIS_OPEN);
      writer.writeBytes(escapeLiteralString(this.bytes));
      writer.writeByte(PARENTHESIS_CLOSE);
    }
  }
}

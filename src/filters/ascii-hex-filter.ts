import type { Filter } from "./filter";

const HEX_CHARS = "0123456789ABCDEF";
const END_MARKER = 0x3e; // >
const NIBBLE_MASK = 0x0f;

/**
 * ASCIIHexDecode filter.
 *
 * Writes each byte as two hex digits followed by the `>` terminator.
 * Output stays readable, which helps when inspecting generated files.
 *
 * Example: "Hello" → "48656C6C6F>"
 */
export class ASCIIHexFilter implements Filter {
  readonly name = "ASCIIHexDecode";

  async encode(data: Uint8Array): Promise<Uint8Array> {
    const result = new Uint8Array(data.length * 2 + 1);

    let i = 0;

    for (const byte of data) {
      result[i] = HEX_CHARS.charCodeAt((byte >> 4) & NIBBLE_MASK);
      result[i + 1] = HEX_CHARS.charCodeAt(byte & NIBBLE_MASK);

      i += 2;
    }

    result[i] = END_MARKER;

    return result;
  }
}

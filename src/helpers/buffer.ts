/**
 * Conversions between byte arrays and the text forms PDF syntax uses.
 */

const HEX_DIGITS = "0123456789ABCDEF";

/**
 * Uppercase hex, two digits per byte: `48656C6C6F` for "Hello".
 */
export function bytesToHex(bytes: Uint8Array): string {
  let hex = "";

  for (const byte of bytes) {
    hex += HEX_DIGITS[byte >> 4] + HEX_DIGITS[byte & 0x0f];
  }

  return hex;
}

/**
 * One byte per UTF-16 code unit, keeping the low 8 bits. For text that is
 * already Latin-1, such as CMap programs and operator syntax.
 */
export function latin1Bytes(str: string): Uint8Array {
  return Uint8Array.from({ length: str.length }, (_, i) => str.charCodeAt(i) & 0xff);
}

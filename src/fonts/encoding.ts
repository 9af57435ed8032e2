/**
 * WinAnsiEncoding (PDF 1.7 spec, Annex D), the single-byte encoding used
 * with the standard fonts.
 *
 * Codes 0x20-0x7E and 0xA0-0xFF coincide with Unicode; 0x80-0x9F hold
 * typographic characters that live elsewhere in Unicode.
 */

const HIGH_CODES: ReadonlyMap<number, number> = new Map([
  [0x20ac, 0x80], // Euro sign
  [0x201a, 0x82],
  [0x0192, 0x83],
  [0x201e, 0x84],
  [0x2026, 0x85], // ellipsis
  [0x2020, 0x86],
  [0x2021, 0x87],
  [0x02c6, 0x88],
  [0x2030, 0x89],
  [0x0160, 0x8a],
  [0x2039, 0x8b],
  [0x0152, 0x8c],
  [0x017d, 0x8e],
  [0x2018, 0x91],
  [0x2019, 0x92],
  [0x201c, 0x93],
  [0x201d, 0x94],
  [0x2022, 0x95], // bullet
  [0x2013, 0x96], // en dash
  [0x2014, 0x97], // em dash
  [0x02dc, 0x98],
  [0x2122, 0x99],
  [0x0161, 0x9a],
  [0x203a, 0x9b],
  [0x0153, 0x9c],
  [0x017e, 0x9e],
  [0x0178, 0x9f],
]);

/**
 * WinAnsi code for a Unicode scalar, or undefined if it has none.
 */
export function winAnsiCode(codePoint: number): number | undefined {
  if ((codePoint >= 0x20 && codePoint <= 0x7e) || (codePoint >= 0xa0 && codePoint <= 0xff)) {
    return codePoint;
  }

  return HIGH_CODES.get(codePoint);
}

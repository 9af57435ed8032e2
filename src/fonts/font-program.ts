/**
 * Read-only view of an OpenType/TrueType font program.
 *
 * This is the seam between composite fonts and the table parser; the
 * library implementation is FontkitProgram, and tests can supply their own.
 */

export interface FontProgramMetrics {
  postScriptName: string;
  unitsPerEm: number;
  /** Font units */
  ascent: number;
  /** Font units, negative below the baseline */
  descent: number;
  capHeight: number;
  xHeight: number;
  italicAngle: number;
  stemV: number;
  /** [xMin, yMin, xMax, yMax] in font units */
  bbox: [number, number, number, number];
  isFixedPitch: boolean;
}

export interface FontProgram {
  /** The font file as supplied, used to recognize duplicates */
  readonly data: Uint8Array;

  readonly metrics: FontProgramMetrics;

  /**
   * Outline format, which decides how the subset is embedded:
   * TrueType as /FontFile2, CFF as bare CFF in /FontFile3.
   */
  readonly outlines: "truetype" | "cff";

  /**
   * Glyph for a Unicode scalar, or undefined when the cmap has none.
   */
  glyphIdForCodePoint(codePoint: number): number | undefined;

  /**
   * Advance width in font units, or undefined when the font has no
   * metrics for the glyph.
   */
  advanceWidth(glyphId: number): number | undefined;

  /**
   * Build a program containing only `.notdef` and the given glyphs.
   * Glyph `i + 1` of the result is `glyphIds[i]`.
   */
  subset(glyphIds: readonly number[]): Uint8Array;
}

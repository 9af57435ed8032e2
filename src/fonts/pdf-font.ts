/**
 * Fonts a document can draw with.
 *
 * `PdfFont` is a closed union: code that needs font-type specific behavior
 * switches on `kind` instead of relying on subclass overrides.
 */

import type { CompositeFont } from "./composite-font";
import type { SimpleFont } from "./simple-font";

export type PdfFont = SimpleFont | CompositeFont;

/**
 * A Unicode scalar resolved against a font.
 */
export interface Glyph {
  codePoint: number;
  /** WinAnsi code for simple fonts, glyph id for composite fonts */
  id: number;
  /** Advance width in 1/1000 em */
  width: number;
}

/**
 * Resolve every scalar of `text`.
 *
 * Nothing is recorded as used; this only measures.
 *
 * @throws {UnmappableGlyphError} at the first scalar the font cannot show
 */
export function glyphsForText(font: PdfFont, text: string): Glyph[] {
  const glyphs: Glyph[] = [];

  for (const char of text) {
    const codePoint = char.codePointAt(0);

    if (codePoint !== undefined) {
      glyphs.push(font.glyphFor(codePoint));
    }
  }

  return glyphs;
}

/**
 * Width of text in points at a given size, including kerning.
 */
export function widthOfTextAtSize(font: PdfFont, text: string, size: number): number {
  const glyphs = glyphsForText(font, text);

  let units = 0;

  for (let i = 0; i < glyphs.length; i++) {
    units += glyphs[i].width;

    if (i > 0) {
      units += font.kerning(glyphs[i - 1], glyphs[i]);
    }
  }

  return (units * size) / 1000;
}

/**
 * SimpleFont - one of the standard 14 fonts, drawn with WinAnsiEncoding.
 *
 * Standard fonts are built into every PDF reader, so only their metrics are
 * needed here and nothing is embedded.
 *
 * ```typescript
 * const font = SimpleFont.of("Helvetica");
 * const width = widthOfTextAtSize(font, "Hello", 12);
 * ```
 */

import { PdfString } from "#src/objects/pdf-string";
import { winAnsiCode } from "./encoding";
import { MissingGlyphDataError, UnmappableGlyphError } from "./errors";
import type { Glyph } from "./pdf-font";
import { getStandardFontMetrics, kerningKey, type StandardFontMetrics } from "./standard-14";

export class SimpleFont {
  readonly kind = "simple";

  private readonly usedCodes = new Set<number>();

  private constructor(readonly metrics: StandardFontMetrics) {}

  /**
   * @throws {ConfigurationError} if the font's metrics are not bundled
   */
  static of(name: string): SimpleFont {
    return new SimpleFont(getStandardFontMetrics(name));
  }

  get baseFontName(): string {
    return this.metrics.fontName;
  }

  /** Ascender in 1/1000 em */
  get ascent(): number {
    return this.metrics.ascender;
  }

  /** Descender in 1/1000 em (negative) */
  get descent(): number {
    return this.metrics.descender;
  }

  /**
   * @throws {UnmappableGlyphError} if WinAnsiEncoding has no code for the scalar
   * @throws {MissingGlyphDataError} if the metrics lack a width for the code
   */
  glyphFor(codePoint: number): Glyph {
    const code = winAnsiCode(codePoint);

    if (code === undefined) {
      throw new UnmappableGlyphError(codePoint, this.baseFontName);
    }

    const width = this.metrics.widths.get(code);

    if (width === undefined) {
      throw new MissingGlyphDataError(code, this.baseFontName, "no width in font metrics");
    }

    return { codePoint, id: code, width };
  }

  /**
   * Kerning between two glyphs in 1/1000 em (negative moves them closer).
   */
  kerning(left: Glyph, right: Glyph): number {
    return this.metrics.kerning.get(kerningKey(left.id, right.id)) ?? 0;
  }

  /**
   * Record a glyph as used and return the code to write in content.
   */
  useGlyph(glyph: Glyph): number {
    this.usedCodes.add(glyph.id);

    return glyph.id;
  }

  /**
   * Used codes in ascending order.
   */
  usedCodeRange(): { firstChar: number; lastChar: number } | undefined {
    if (this.usedCodes.size === 0) {
      return undefined;
    }

    const codes = [...this.usedCodes];

    return { firstChar: Math.min(...codes), lastChar: Math.max(...codes) };
  }

  /**
   * Width of a code for the /Widths array; codes inside the used range
   * that were never drawn still get their real width.
   */
  widthOfCode(code: number): number {
    return this.metrics.widths.get(code) ?? 0;
  }

  /**
   * Encode codes as a content stream string operand.
   */
  encode(codes: readonly number[]): PdfString {
    return new PdfString(Uint8Array.from(codes), "literal");
  }
}

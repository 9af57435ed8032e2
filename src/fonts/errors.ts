/**
 * Font errors. They fail the operation that produced them and carry the
 * offending value; pages built before the failure stay valid.
 */

export class FontError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FontError";
  }
}

/**
 * Format a code point the way Unicode charts do: U+0041, U+1F600.
 */
export function formatCodePoint(codePoint: number): string {
  return `U+${codePoint.toString(16).toUpperCase().padStart(4, "0")}`;
}

/**
 * A Unicode scalar value has no glyph in the font it was drawn with.
 */
export class UnmappableGlyphError extends FontError {
  constructor(
    readonly codePoint: number,
    readonly fontName: string,
  ) {
    super(`${formatCodePoint(codePoint)} has no glyph in font ${fontName}`);
    this.name = "UnmappableGlyphError";
  }
}

/**
 * The font maps a character to a glyph but lacks the data needed to use it,
 * such as its advance width.
 */
export class MissingGlyphDataError extends FontError {
  constructor(
    readonly glyphId: number,
    readonly fontName: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`Glyph ${glyphId} in font ${fontName}: ${detail}`, options);
    this.name = "MissingGlyphDataError";
  }
}
